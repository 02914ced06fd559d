// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Python version identifiers. The structured form is canonical; display
 * strings are derived from it, never the other way around.
 */

import { Data, Option, pipe } from "effect";

// ─────────────────────────────────────────────────────────────────────────────
// Core Data Types
// ─────────────────────────────────────────────────────────────────────────────

/** Pre-release phases in ascending order of maturity. */
export const PRE_RELEASE_KINDS = ["a", "b", "rc"] as const;
export type PreReleaseKind = (typeof PRE_RELEASE_KINDS)[number];

export interface PreRelease {
  readonly kind: PreReleaseKind;
  readonly number: number;
}

/**
 * A parsed interpreter version. Structural equality (via Data.case) means two
 * independently parsed "3.12.1" values are Equal.equals and hash identically.
 * A free-threaded build is a separate identity from the standard build.
 */
export interface Version {
  readonly major: number;
  readonly minor: number;
  readonly micro: number;
  readonly pre: Option.Option<PreRelease>;
  readonly freethreaded: boolean;
}

/** A minor-version line such as 3.12. */
export interface Line {
  readonly major: number;
  readonly minor: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

const makeVersion = Data.case<Version>();
const makePreRelease = Data.case<PreRelease>();
const makeLine = Data.case<Line>();

export const version = (
  major: number,
  minor: number,
  micro: number,
  options: { readonly pre?: PreRelease; readonly freethreaded?: boolean } = {}
): Version =>
  makeVersion({
    major,
    minor,
    micro,
    pre: pipe(Option.fromNullable(options.pre), Option.map(makePreRelease)),
    freethreaded: options.freethreaded ?? false,
  });

export const preRelease = (kind: PreReleaseKind, number: number): PreRelease =>
  makePreRelease({ kind, number });

export const line = (major: number, minor: number): Line => makeLine({ major, minor });

export const lineOf = (v: Version): Line => line(v.major, v.minor);

/** Same numbers and pre-release, free-threaded flag replaced. */
export const withFreethreaded = (v: Version, freethreaded: boolean): Version =>
  makeVersion({ ...v, freethreaded });

// ─────────────────────────────────────────────────────────────────────────────
// Predicates
// ─────────────────────────────────────────────────────────────────────────────

export const isPreRelease = (v: Version): boolean => Option.isSome(v.pre);

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────

export const formatPreRelease = (pre: PreRelease): string => `${pre.kind}${pre.number}`;

/**
 * Canonical PEP 440 display form: "3.12.4", "3.13.0rc2", "3.13.1t".
 * parseVersion(formatVersion(v)) is always equal to v.
 */
export const formatVersion = (v: Version): string =>
  `${v.major}.${v.minor}.${v.micro}${pipe(
    v.pre,
    Option.match({ onNone: (): string => "", onSome: formatPreRelease })
  )}${v.freethreaded ? "t" : ""}`;

export const formatLine = (l: Line): string => `${l.major}.${l.minor}`;
