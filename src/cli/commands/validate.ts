// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Offline configuration check. Merges every source, validates it and
 * reports what a generate run would ask for, without touching the network.
 */

import { Effect } from "effect";
import type { Settings } from "../../config/settings";
import { formatPlatform } from "../../platform";
import { formatBoundSpec } from "../../resolve";
import { logSuccess } from "../../lib/log";

export interface ValidateOptions {
  readonly settings: Settings;
}

export const executeValidate = (options: ValidateOptions): Effect.Effect<void> =>
  Effect.gen(function* () {
    const { constraint, sources } = options.settings;

    for (const runner of constraint.runners) {
      yield* Effect.logInfo(`Runner ${runner.name}: ${formatPlatform(runner)}`);
    }
    yield* Effect.logInfo(`Implementations: ${constraint.implementations.map((i) => i.name).join(", ")}`);
    yield* Effect.logInfo(
      `Versions: ${formatBoundSpec(constraint.minVersion)} .. ${formatBoundSpec(constraint.maxVersion)}`
    );
    yield* Effect.logDebug("Sources").pipe(
      Effect.annotateLogs({ cpython: sources.cpython, pypy: sources.pypy, eol: sources.eolBaseUrl })
    );
    yield* logSuccess("Configuration is valid");
  });
