// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version model.
 *
 * KEY TYPES:
 * - Version: parsed interpreter version (numbers, pre-release, free-threaded flag)
 * - Line: a minor-version line such as 3.12
 * - Bound: Exact(version) | Line(line), an explicit min/max constraint
 *
 * KEY FUNCTIONS:
 * - parseVersion / parseBound: string -> Either<_, VersionParseError>
 * - VersionOrder / ReleaseOrder / LineOrder: Effect Orders
 * - formatVersion: canonical display string, inverse of parseVersion
 */

export type { Line, PreRelease, PreReleaseKind, Version } from "./types";

export {
  PRE_RELEASE_KINDS,
  formatLine,
  formatPreRelease,
  formatVersion,
  isPreRelease,
  line,
  lineOf,
  preRelease,
  version,
  withFreethreaded,
} from "./types";

export { Bound, parseBound, parseLine, parseVersion } from "./parse";

export {
  LineOrder,
  ReleaseOrder,
  VersionOrder,
  compareVersions,
  equals,
  maxVersion,
  minVersion,
  sortVersions,
  uniqueSorted,
} from "./order";
