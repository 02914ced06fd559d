// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Files are parsed
 * and validated in a single pass; syntax errors and schema violations are
 * reported with the file path. An explicit --config path must exist; the
 * default ./python-matrix.toml is optional.
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect, Option, type Schema, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import { ConfigError, ErrorCode, causeOf, errorMessage } from "../lib/errors";
import { decodeToEffect } from "../lib/schema-utils";
import { CONFIG_FILE_DEFAULT } from "./field-values";
import { fileConfigSchema, fileToInputLayer } from "./schema";
import { type InputLayer, emptyInputLayer } from "./settings";

export const loadTomlFile = <A, I = A>(
  filePath: string,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    yield* pipe(
      fs.exists(filePath),
      Effect.orElseSucceed(() => false),
      Effect.filterOrFail(
        (exists): exists is true => exists,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* pipe(
      fs.readFileString(filePath),
      Effect.mapError(
        (e): ConfigError =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Failed to read ${filePath}: ${errorMessage(e)}`,
            path: filePath,
            ...causeOf(e),
          })
      )
    );

    const parsed = yield* Effect.try({
      try: (): unknown => parseToml(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...causeOf(e),
        }),
    });

    return yield* decodeToEffect(schema, parsed, filePath);
  });

/**
 * Inputs from the config file. With no explicit path, a missing default file
 * contributes nothing; any other problem with it is still an error.
 */
export const loadFileInputs = (
  configPath: Option.Option<string>
): Effect.Effect<InputLayer, ConfigError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    return yield* Option.match(configPath, {
      onSome: (p): Effect.Effect<InputLayer, ConfigError, FileSystem.FileSystem> =>
        pipe(
          loadTomlFile(path.resolve(p), fileConfigSchema),
          Effect.map(fileToInputLayer),
          Effect.tap(() => Effect.logDebug(`Loaded configuration from ${path.resolve(p)}`))
        ),
      onNone: (): Effect.Effect<InputLayer, ConfigError, FileSystem.FileSystem> => {
        const defaultPath = path.resolve(CONFIG_FILE_DEFAULT);
        return pipe(
          fs.exists(defaultPath),
          Effect.orElseSucceed(() => false),
          Effect.flatMap((exists) =>
            exists
              ? Effect.map(loadTomlFile(defaultPath, fileConfigSchema), fileToInputLayer)
              : Effect.succeed(emptyInputLayer)
          )
        );
      },
    });
  });
