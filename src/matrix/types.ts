// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Matrix builder inputs and outputs.
 */

import type { Implementation, ImplementationId } from "../catalog";
import type { CancellationToken } from "../lib/cancel";
import type { Runner } from "../platform";
import type { RangeConstraint } from "../resolve";

/** Fully validated build request. */
export interface Constraint extends RangeConstraint {
  readonly implementations: ReadonlyArray<Implementation>;
  readonly runners: ReadonlyArray<Runner>;
  readonly checkPlatform: boolean;
  /** Keep only the newest release of each minor line (per threading model). */
  readonly latestPerLine: boolean;
}

export interface MatrixEntry {
  readonly runner: string;
  readonly implementation: ImplementationId;
  /** Display string accepted by actions/setup-python. */
  readonly version: string;
}

export interface BuildOptions {
  readonly cancellation?: CancellationToken;
}
