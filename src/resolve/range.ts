// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Constraint resolution: turns "auto" / explicit bounds into a concrete
 * range per implementation. Pure; all remote data arrives pre-fetched.
 */

import { Array as Arr, Either, Option, Order, pipe } from "effect";
import type { Implementation, Release } from "../catalog";
import { type EolSnapshot } from "../eol";
import { ErrorCode, ResolvedRangeError } from "../lib/errors";
import {
  Bound,
  type Line,
  LineOrder,
  ReleaseOrder,
  formatLine,
  formatVersion,
  lineOf,
  version,
  withFreethreaded,
} from "../version";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export const AUTO = "auto" as const;

export type BoundSpec = typeof AUTO | Bound;

export interface RangeConstraint {
  readonly minVersion: BoundSpec;
  readonly maxVersion: BoundSpec;
  readonly includePreReleases: boolean;
  readonly includeFreethreaded: boolean;
}

export interface ResolvedRange {
  readonly implementation: Implementation;
  readonly min: Bound;
  readonly max: Bound;
}

// ─────────────────────────────────────────────────────────────────────────────
// Bound Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const isAuto = (bound: BoundSpec): bound is typeof AUTO => bound === AUTO;

/** Free-threaded flag dropped: bounds never carry it. */
const exact = (v: Release["version"]): Bound => Bound.Exact({ version: withFreethreaded(v, false) });

export const formatBound = (bound: Bound): string =>
  Bound.$match(bound, {
    Exact: ({ version: v }): string => formatVersion(v),
    Line: ({ line: l }): string => formatLine(l),
  });

export const formatBoundSpec = (bound: BoundSpec): string => (isAuto(bound) ? AUTO : formatBound(bound));

const boundLine = (bound: Bound): Line =>
  Bound.$match(bound, {
    Exact: ({ version: v }): Line => lineOf(v),
    Line: ({ line: l }): Line => l,
  });

/** At or above the bound. A line bound admits its whole line. */
export const aboveMin = (v: Release["version"], min: Bound): boolean =>
  Bound.$match(min, {
    Exact: ({ version: m }): boolean => Order.greaterThanOrEqualTo(ReleaseOrder)(v, m),
    Line: ({ line: l }): boolean => Order.greaterThanOrEqualTo(LineOrder)(lineOf(v), l),
  });

/** At or below the bound. A line bound admits its whole line. */
export const belowMax = (v: Release["version"], max: Bound): boolean =>
  Bound.$match(max, {
    Exact: ({ version: m }): boolean => Order.lessThanOrEqualTo(ReleaseOrder)(v, m),
    Line: ({ line: l }): boolean => Order.lessThanOrEqualTo(LineOrder)(lineOf(v), l),
  });

/** True when no version can satisfy both bounds. */
export const isInverted = (min: Bound, max: Bound): boolean => {
  const byLine = LineOrder(boundLine(min), boundLine(max));
  if (byLine !== 0) {
    return byLine > 0;
  }
  return Bound.$is("Exact")(min) && Bound.$is("Exact")(max)
    ? ReleaseOrder(min.version, max.version) > 0
    : false;
};

export const inRange = (range: ResolvedRange, release: Release): boolean =>
  aboveMin(release.version, range.min) && belowMax(release.version, range.max);

// ─────────────────────────────────────────────────────────────────────────────
// Eligibility
// ─────────────────────────────────────────────────────────────────────────────

export const isEligible = (constraint: RangeConstraint, release: Release): boolean =>
  (constraint.includePreReleases || !release.prerelease) &&
  (constraint.includeFreethreaded || !release.freethreaded);

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

const rangeError = (impl: Implementation, message: string): ResolvedRangeError =>
  new ResolvedRangeError({
    code: ErrorCode.RANGE_INVERTED,
    message: `${impl.name}: ${message}`,
    implementation: impl.id,
  });

const oldest = (releases: ReadonlyArray<Release>): Option.Option<Release> =>
  Arr.isNonEmptyReadonlyArray(releases)
    ? Option.some(Arr.min(releases, Order.mapInput(ReleaseOrder, (r: Release) => r.version)))
    : Option.none();

const newest = (releases: ReadonlyArray<Release>): Option.Option<Release> =>
  Arr.isNonEmptyReadonlyArray(releases)
    ? Option.some(Arr.max(releases, Order.mapInput(ReleaseOrder, (r: Release) => r.version)))
    : Option.none();

/** Lowest line the registry does not mark as EOL. */
export const lowestActiveLine = (snapshot: EolSnapshot): Option.Option<Line> =>
  pipe(
    Array.from(snapshot.values()),
    Arr.filter((record) => !record.isEol),
    Arr.map((record) => record.line),
    (lines) => (Arr.isNonEmptyReadonlyArray(lines) ? Option.some(Arr.min(lines, LineOrder)) : Option.none())
  );

const resolveAutoMin = (
  impl: Implementation,
  eligible: ReadonlyArray<Release>,
  eol: Option.Option<EolSnapshot>
): Either.Either<Bound, ResolvedRangeError> => {
  const fallback = (): Either.Either<Bound, ResolvedRangeError> =>
    pipe(
      oldest(eligible),
      Option.map((r) => exact(r.version)),
      Either.fromOption(() => rangeError(impl, "cannot resolve auto min-version: no eligible releases"))
    );
  return pipe(
    eol,
    Option.flatMap(lowestActiveLine),
    Option.match({
      onNone: fallback,
      onSome: (active): Either.Either<Bound, ResolvedRangeError> =>
        pipe(
          oldest(Arr.filter(eligible, (r) => LineOrder(lineOf(r.version), active) === 0)),
          Option.map((r) => exact(r.version)),
          Option.getOrElse(() => Bound.Exact({ version: version(active.major, active.minor, 0) })),
          Either.right
        ),
    })
  );
};

const resolveAutoMax = (
  impl: Implementation,
  eligible: ReadonlyArray<Release>
): Either.Either<Bound, ResolvedRangeError> =>
  pipe(
    newest(eligible),
    Option.map((r) => exact(r.version)),
    Either.fromOption(() => rangeError(impl, "cannot resolve auto max-version: no eligible releases"))
  );

/**
 * Effective [min, max] for one implementation.
 *
 * auto min: lowest eligible release in the lowest non-EOL line, or that line's
 * .0 when the catalog has nothing eligible there; without EOL data (or with
 * every line EOL) the oldest eligible release. auto max: newest eligible release.
 */
export const resolveRange = (
  constraint: RangeConstraint,
  releases: ReadonlyArray<Release>,
  eol: Option.Option<EolSnapshot>,
  impl: Implementation
): Either.Either<ResolvedRange, ResolvedRangeError> => {
  const eligible = Arr.filter(releases, (r) => isEligible(constraint, r));
  const min = isAuto(constraint.minVersion)
    ? resolveAutoMin(impl, eligible, eol)
    : Either.right(constraint.minVersion);
  const max = isAuto(constraint.maxVersion) ? resolveAutoMax(impl, eligible) : Either.right(constraint.maxVersion);
  return pipe(
    Either.all({ min, max }),
    Either.flatMap(({ min: lo, max: hi }) =>
      isInverted(lo, hi)
        ? Either.left(
            rangeError(
              impl,
              `resolved range is empty: min-version ${formatBound(lo)} (${formatBoundSpec(constraint.minVersion)}) is above max-version ${formatBound(hi)} (${formatBoundSpec(constraint.maxVersion)})`
            )
          )
        : Either.right({ implementation: impl, min: lo, max: hi })
    )
  );
};

const OptionalBuildOrder: Order.Order<Option.Option<Release["version"]>> = Option.getOrder(ReleaseOrder);

export const ReleaseSortOrder: Order.Order<Release> = Order.combineAll([
  Order.mapInput(ReleaseOrder, (r: Release) => r.version),
  Order.mapInput(Order.boolean, (r: Release) => r.freethreaded),
  Order.mapInput(OptionalBuildOrder, (r: Release) => r.build),
]);

/** Eligible, in-range releases in ascending ReleaseOrder, standard before free-threaded, then by build. */
export const selectReleases = (
  constraint: RangeConstraint,
  range: ResolvedRange,
  releases: ReadonlyArray<Release>
): Array<Release> =>
  pipe(
    releases,
    Arr.filter((r) => isEligible(constraint, r) && inRange(range, r)),
    Arr.sort(ReleaseSortOrder)
  );

/** Newest release per (line, threading model), kept in ascending order. */
export const latestPerLine = (sorted: ReadonlyArray<Release>): Array<Release> =>
  Arr.filter(sorted, (r, i) =>
    !Arr.some(
      sorted.slice(i + 1),
      (later) => later.freethreaded === r.freethreaded && LineOrder(lineOf(later.version), lineOf(r.version)) === 0
    )
  );
