// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All variables live under the PYTHON_MATRIX_ prefix. Empty values count as
 * unset, which is what GitHub Actions passes for an omitted input.
 */

import { Config, ConfigError as ConfigIssue, ConfigProvider, Effect, Either, Option, pipe } from "effect";
import { ConfigError, ErrorCode } from "../lib/errors";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";
import type { InputLayer } from "./settings";

export const ENV_NAMESPACE = "PYTHON_MATRIX";

// ============================================================================
// Primitive Configs (Building Blocks)
// ============================================================================

const optionalText = (name: string): Config.Config<Option.Option<string>> =>
  Config.string(name).pipe(
    Config.option,
    Config.map((value) => Option.filter(value, (s) => s.trim().length > 0))
  );

/**
 * Optional value parsed after the empty check, so "" stays unset instead of
 * failing the typed parse.
 */
const optionalParsed = <A>(
  name: string,
  expected: string,
  parse: (text: string) => Option.Option<A>
): Config.Config<Option.Option<A>> =>
  optionalText(name).pipe(
    Config.mapOrFail((value) =>
      Option.match(value, {
        onNone: (): Either.Either<Option.Option<A>, ConfigIssue.ConfigError> => Either.right(Option.none()),
        onSome: (text): Either.Either<Option.Option<A>, ConfigIssue.ConfigError> =>
          pipe(
            parse(text.trim()),
            Option.map((parsed) => Option.some(parsed)),
            Either.fromOption(() => ConfigIssue.InvalidData([name], `Expected ${expected} but received ${text}`))
          ),
      })
    )
  );

const optionalInteger = (name: string): Config.Config<Option.Option<number>> =>
  optionalParsed(name, "an integer value", (text) =>
    /^-?\d+$/.test(text) ? Option.some(Number.parseInt(text, 10)) : Option.none()
  );

// Same spellings as Config.boolean.
const TRUE_TEXT: ReadonlySet<string> = new Set(["true", "yes", "on", "1", "y"]);
const FALSE_TEXT: ReadonlySet<string> = new Set(["false", "no", "off", "0", "n"]);

const optionalBoolean = (name: string): Config.Config<Option.Option<boolean>> =>
  optionalParsed(name, "a boolean value", (text) => {
    const lower = text.toLowerCase();
    return TRUE_TEXT.has(lower) ? Option.some(true) : FALSE_TEXT.has(lower) ? Option.some(false) : Option.none();
  });

const optionalLiteral = <A extends string>(name: string, values: ReadonlyArray<A>): Config.Config<Option.Option<A>> =>
  optionalParsed(name, `one of ${values.join(", ")}`, (text) =>
    Option.fromNullable(values.find((v) => v === text))
  );

export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = optionalLiteral("LOG_LEVEL", LOG_LEVEL_VALUES);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = optionalLiteral("LOG_FORMAT", LOG_FORMAT_VALUES);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = optionalBoolean("DEBUG").pipe(
  Config.map(Option.getOrElse(() => false))
);

// ============================================================================
// Composite Config
// ============================================================================

export const EnvConfigSpec: Config.Config<InputLayer> = Config.nested(
  Config.all({
    runners: optionalText("RUNNERS"),
    minVersion: optionalText("MIN_VERSION"),
    maxVersion: optionalText("MAX_VERSION"),
    includePreReleases: optionalText("INCLUDE_PRE_RELEASES"),
    includeFreethreaded: optionalText("INCLUDE_FREETHREADED"),
    implementations: optionalText("IMPLEMENTATIONS"),
    checkPlatform: optionalText("CHECK_PLATFORM"),
    latestPerLine: optionalText("LATEST_PER_LINE"),
    cpythonIndexUrl: optionalText("CPYTHON_INDEX_URL"),
    pypyIndexUrl: optionalText("PYPY_INDEX_URL"),
    eolBaseUrl: optionalText("EOL_BASE_URL"),
    fetchTimeoutMs: optionalInteger("FETCH_TIMEOUT"),
    deadlineMs: optionalInteger("DEADLINE"),
    logLevel: LogLevelOptionConfig,
    logFormat: LogFormatOptionConfig,
    debug: DebugModeConfig,
  }),
  ENV_NAMESPACE
).pipe(
  Config.map(
    (raw): InputLayer => ({
      constraint: {
        runners: raw.runners,
        minVersion: raw.minVersion,
        maxVersion: raw.maxVersion,
        includePreReleases: raw.includePreReleases,
        includeFreethreaded: raw.includeFreethreaded,
        implementations: raw.implementations,
        checkPlatform: raw.checkPlatform,
        latestPerLine: raw.latestPerLine,
      },
      sources: { cpython: raw.cpythonIndexUrl, pypy: raw.pypyIndexUrl, eolBaseUrl: raw.eolBaseUrl },
      fetchTimeoutMs: raw.fetchTimeoutMs,
      deadlineMs: raw.deadlineMs,
      logLevel: raw.logLevel,
      logFormat: raw.logFormat,
      debug: raw.debug,
    })
  )
);

/** Read the environment, reporting malformed values as a ConfigError. */
export const loadEnvInputs: Effect.Effect<InputLayer, ConfigError> = pipe(
  EnvConfigSpec,
  Effect.mapError(
    (e) =>
      new ConfigError({
        code: ErrorCode.CONFIG_VALIDATION_ERROR,
        message: `Invalid environment configuration: ${String(e)}`,
      })
  )
);

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * ConfigProvider over a plain map, keys given without the prefix.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ RUNNERS: "ubuntu-latest" });
 * const inputs = await Effect.runPromise(Effect.withConfigProvider(loadEnvInputs, provider));
 * ```
 */
export const createTestConfigProvider = (
  variables: Readonly<Record<string, string>> = {}
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(
    new Map(Object.entries(variables).map(([key, value]): [string, string] => [`${ENV_NAMESPACE}_${key}`, value])),
    { pathDelim: "_" }
  );
