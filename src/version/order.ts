// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Total orders over versions, built from Effect's Order combinators.
 *
 *   (major, minor, micro)  numeric
 *   pre-release            a < b < rc < final
 *   free-threaded          standard < free-threaded
 */

import { Array as Arr, Equal, Option, Order, pipe } from "effect";
import { type Line, PRE_RELEASE_KINDS, type PreRelease, type Version } from "./types";

const preReleaseRank = (pre: PreRelease): number => PRE_RELEASE_KINDS.indexOf(pre.kind);

const PreReleaseOrder: Order.Order<PreRelease> = Order.combine(
  Order.mapInput(Order.number, preReleaseRank),
  Order.mapInput(Order.number, (pre: PreRelease) => pre.number)
);

/** A final release (None) sorts after every pre-release of the same micro. */
const OptionalPreReleaseOrder: Order.Order<Option.Option<PreRelease>> = Order.make(
  (a, b): -1 | 0 | 1 =>
    Option.match(a, {
      onNone: (): -1 | 0 | 1 => (Option.isNone(b) ? 0 : 1),
      onSome: (pa): -1 | 0 | 1 =>
        Option.match(b, {
          onNone: (): -1 | 0 | 1 => -1,
          onSome: (pb): -1 | 0 | 1 => PreReleaseOrder(pa, pb),
        }),
    })
);

export const LineOrder: Order.Order<Line> = Order.combine(
  Order.mapInput(Order.number, (l: Line) => l.major),
  Order.mapInput(Order.number, (l: Line) => l.minor)
);

/** Order ignoring the free-threaded flag: both builds of 3.13.1 compare equal. */
export const ReleaseOrder: Order.Order<Version> = Order.combineAll([
  Order.mapInput(LineOrder, (v: Version) => v),
  Order.mapInput(Order.number, (v: Version) => v.micro),
  Order.mapInput(OptionalPreReleaseOrder, (v: Version) => v.pre),
]);

/** Total order: a version compares equal only to itself. */
export const VersionOrder: Order.Order<Version> = Order.combine(
  ReleaseOrder,
  Order.mapInput(Order.boolean, (v: Version) => v.freethreaded)
);

export const compareVersions = (a: Version, b: Version): -1 | 0 | 1 => VersionOrder(a, b);

export const equals = (a: Version, b: Version): boolean => Equal.equals(a, b);

export const sortVersions = (versions: ReadonlyArray<Version>): Array<Version> =>
  Arr.sort(versions, VersionOrder);

export const maxVersion = (versions: ReadonlyArray<Version>): Option.Option<Version> =>
  Arr.isNonEmptyReadonlyArray(versions)
    ? Option.some(Arr.max(versions, VersionOrder))
    : Option.none();

export const minVersion = (versions: ReadonlyArray<Version>): Option.Option<Version> =>
  Arr.isNonEmptyReadonlyArray(versions)
    ? Option.some(Arr.min(versions, VersionOrder))
    : Option.none();

/** Distinct versions in ascending order. */
export const uniqueSorted = (versions: ReadonlyArray<Version>): Array<Version> =>
  pipe(sortVersions(versions), Arr.dedupeAdjacentWith(equals));
