// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Matrix generation. Fetches release data, builds the matrix and prints it
 * as a single JSON line on stdout; progress goes to stderr.
 */

import * as core from "@actions/core";
import { Config, Effect, Option, pipe } from "effect";
import type { Settings } from "../../config/settings";
import type { OutputFormat } from "../../config/field-values";
import type { ReleaseCatalog } from "../../catalog";
import type { EolRegistry } from "../../eol";
import { type BuildError, buildMatrix, renderMatrix } from "../../matrix";
import { ErrorCode, GeneralError, causeOf, errorMessage } from "../../lib/errors";
import { createStepCounter, logSuccess, writeOutput } from "../../lib/log";

export interface GenerateOptions {
  readonly settings: Settings;
  readonly format: OutputFormat;
  readonly githubOutput: Option.Option<string>;
  readonly signal?: AbortSignal;
}

/**
 * @actions/core falls back to a stdout workflow command when GITHUB_OUTPUT is
 * unset, which would corrupt the matrix on stdout, so that case only warns.
 */
const setStepOutput = (name: string, value: string): Effect.Effect<void, GeneralError> =>
  Effect.gen(function* () {
    const outputFile = yield* Config.option(Config.string("GITHUB_OUTPUT")).pipe(
      Effect.orElseSucceed(() => Option.none<string>())
    );
    if (Option.isNone(outputFile)) {
      return yield* Effect.logWarning(`GITHUB_OUTPUT is not set; step output "${name}" was not written`);
    }
    yield* Effect.try({
      try: (): void => core.setOutput(name, value),
      catch: (e): GeneralError =>
        new GeneralError({
          code: ErrorCode.OUTPUT_FAILED,
          message: `Failed to write step output "${name}": ${errorMessage(e)}`,
          ...causeOf(e),
        }),
    });
    yield* Effect.logDebug(`Step output "${name}" written`);
  });

export const executeGenerate = (
  options: GenerateOptions
): Effect.Effect<void, BuildError | GeneralError, ReleaseCatalog | EolRegistry> =>
  Effect.gen(function* () {
    const { settings } = options;
    const steps = yield* createStepCounter(3);

    yield* steps.next(
      `Fetching release data for ${settings.constraint.implementations.map((i) => i.name).join(", ")}`
    );
    const entries = yield* buildMatrix(settings.constraint, {
      cancellation: {
        ...(options.signal === undefined ? {} : { signal: options.signal }),
        ...Option.match(settings.deadline, { onNone: () => ({}), onSome: (deadline) => ({ deadline }) }),
      },
    });

    yield* steps.next(`Rendering ${entries.length} entries as ${options.format}`);
    const json = renderMatrix(entries, options.format);

    yield* steps.next("Writing output");
    yield* writeOutput(json);
    yield* pipe(
      options.githubOutput,
      Option.match({
        onNone: (): Effect.Effect<void, GeneralError> => Effect.void,
        onSome: (name): Effect.Effect<void, GeneralError> => setStepOutput(name, json),
      })
    );

    const runners = new Set(entries.map((e) => e.runner)).size;
    yield* logSuccess(`Generated ${entries.length} matrix entries across ${runners} runner(s)`);
  });
