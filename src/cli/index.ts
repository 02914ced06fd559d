// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes configuration loading,
 * logger setup and error display so each command stays focused on its logic.
 */

import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { ValidationError } from "@effect/cli/ValidationError";
import type { FileSystem, Path } from "@effect/platform";
import { Effect, Either, Layer, pipe } from "effect";
import { type ReleaseCatalog, ReleaseCatalogLive } from "../catalog";
import { loadEnvInputs } from "../config/env";
import { LOG_FORMAT_DEFAULT, LOG_LEVEL_DEFAULT } from "../config/field-values";
import { loadFileInputs } from "../config/loader";
import {
  type InputLayers,
  type LoggingSettings,
  type Settings,
  resolveLogging,
  resolveSettings,
} from "../config/settings";
import { type EolRegistry, EolRegistryLive } from "../eol";
import { MatrixLoggerLive } from "../lib/effect-logger";
import type { AppError, ConfigError } from "../lib/errors";
import { JsonSourceLive } from "../lib/http";
import { logFail } from "../lib/log";
import { PYTHON_MATRIX_VERSION } from "../lib/version";
import { executeGenerate } from "./commands/generate";
import { executeValidate } from "./commands/validate";
import {
  type ConstraintOptions,
  type GlobalOptions,
  cliInputLayer,
  constraintOptions,
  githubOutput,
  globalOptions,
  outputFormat,
} from "./options";

type CommandArgs = GlobalOptions & ConstraintOptions;

type ReleaseServices = ReleaseCatalog | EolRegistry;

export interface CliOptions {
  /** Aborting it cancels an in-progress fetch phase. */
  readonly signal?: AbortSignal;
  /** Release data services for a run. Defaults to the HTTP-backed ones. */
  readonly services?: (settings: Settings) => Layer.Layer<ReleaseServices>;
}

export const liveServices = (settings: Settings): Layer.Layer<ReleaseServices> =>
  Layer.mergeAll(
    ReleaseCatalogLive({ urls: settings.sources, timeout: settings.fetchTimeout }),
    EolRegistryLive({ urls: settings.sources, timeout: settings.fetchTimeout })
  ).pipe(Layer.provide(JsonSourceLive));

const DEFAULT_LOGGING: LoggingSettings = { level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT };

// Context resolution

const loadInputLayers = (
  args: CommandArgs
): Effect.Effect<InputLayers, ConfigError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const env = yield* loadEnvInputs;
    const file = yield* loadFileInputs(args.config);
    return { cli: cliInputLayer(args), env, file };
  });

// Command runner

/**
 * Loads and merges configuration, installs the logger, then runs the handler.
 * Failures are logged once here as a single line; the exit code is derived
 * from the error by the caller.
 */
const runCommand = <R>(
  args: CommandArgs,
  commandName: string,
  handler: (settings: Settings) => Effect.Effect<void, AppError, R>
): Effect.Effect<void, AppError, R | FileSystem.FileSystem | Path.Path> =>
  pipe(
    Effect.either(loadInputLayers(args)),
    Effect.flatMap(
      Either.match({
        onLeft: (err): Effect.Effect<void, AppError, R> =>
          pipe(logFail(err.message), Effect.zipRight(Effect.fail(err)), Effect.provide(MatrixLoggerLive(DEFAULT_LOGGING))),
        onRight: (layers): Effect.Effect<void, AppError, R> =>
          pipe(
            Effect.gen(function* () {
              const settings = yield* resolveSettings(layers);
              yield* handler(settings);
            }),
            Effect.withLogSpan(`command-${commandName}`),
            Effect.tapError((err) => logFail(err.message)),
            Effect.provide(MatrixLoggerLive(resolveLogging(layers)))
          ),
      })
    )
  );

// Subcommand definitions

const makeGenerateCmd = (options: CliOptions) =>
  Command.make(
    "generate",
    { ...globalOptions, ...constraintOptions, format: outputFormat, githubOutput },
    (args) =>
      runCommand(args, "generate", (settings) =>
        pipe(
          executeGenerate({
            settings,
            format: args.format,
            githubOutput: args.githubOutput,
            ...(options.signal === undefined ? {} : { signal: options.signal }),
          }),
          Effect.provide((options.services ?? liveServices)(settings))
        )
      )
  ).pipe(Command.withDescription("Fetch release data and print the CI matrix as JSON"));

const validateCmd = Command.make("validate", { ...globalOptions, ...constraintOptions }, (args) =>
  runCommand(args, "validate", (settings) => executeValidate({ settings }))
).pipe(Command.withDescription("Check the configuration offline without fetching anything"));

// Root command

export const makeCli = (
  options: CliOptions = {}
): ((argv: ReadonlyArray<string>) => Effect.Effect<void, AppError | ValidationError, CliApp.Environment>) =>
  Command.run(
    Command.make("python-matrix").pipe(
      Command.withDescription("Generate a CI matrix of runners and Python versions from upstream release data"),
      Command.withSubcommands([makeGenerateCmd(options), validateCmd])
    ),
    {
      name: "python-matrix",
      version: PYTHON_MATRIX_VERSION,
    }
  );
