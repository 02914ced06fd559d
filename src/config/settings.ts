// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Resolved run settings: the non-constraint half of the configuration plus
 * the merge of every source into one validated value.
 */

import { Duration, Either, Option, pipe } from "effect";
import { DEFAULT_SOURCE_URLS, type SourceUrls } from "../catalog";
import { ConfigError, ErrorCode, type VersionParseError } from "../lib/errors";
import type { Constraint } from "../matrix";
import { type ConstraintInput, emptyConstraintInput, toConstraint } from "./constraint";
import {
  FETCH_TIMEOUT_MS_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_LEVEL_DEFAULT,
  type LogFormat,
  type LogLevel,
} from "./field-values";
import { resolve, resolveOption } from "./resolve";

export interface SourcesInput {
  readonly cpython: Option.Option<string>;
  readonly pypy: Option.Option<string>;
  readonly eolBaseUrl: Option.Option<string>;
}

/** Everything one configuration source can contribute. */
export interface InputLayer {
  readonly constraint: ConstraintInput;
  readonly sources: SourcesInput;
  readonly fetchTimeoutMs: Option.Option<number>;
  readonly deadlineMs: Option.Option<number>;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  /** Forces debug logging regardless of any level setting. */
  readonly debug: boolean;
}

export const emptyInputLayer: InputLayer = {
  constraint: emptyConstraintInput,
  sources: { cpython: Option.none(), pypy: Option.none(), eolBaseUrl: Option.none() },
  fetchTimeoutMs: Option.none(),
  deadlineMs: Option.none(),
  logLevel: Option.none(),
  logFormat: Option.none(),
  debug: false,
};

export interface InputLayers {
  readonly cli: InputLayer;
  readonly env: InputLayer;
  readonly file: InputLayer;
}

export interface LoggingSettings {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export interface Settings {
  readonly constraint: Constraint;
  readonly sources: SourceUrls;
  readonly fetchTimeout: Duration.Duration;
  readonly deadline: Option.Option<Duration.Duration>;
}

const select = <A>(layers: InputLayers, get: (layer: InputLayer) => Option.Option<A>): Option.Option<A> =>
  resolveOption({ cli: get(layers.cli), env: get(layers.env), file: get(layers.file) });

export const resolveLogging = (layers: InputLayers): LoggingSettings => ({
  level:
    layers.cli.debug || layers.env.debug || layers.file.debug
      ? "debug"
      : pipe(
          select(layers, (l) => l.logLevel),
          Option.getOrElse((): LogLevel => LOG_LEVEL_DEFAULT)
        ),
  format: pipe(
    select(layers, (l) => l.logFormat),
    Option.getOrElse((): LogFormat => LOG_FORMAT_DEFAULT)
  ),
});

const positiveMillis = (field: string, ms: number): Either.Either<Duration.Duration, ConfigError> =>
  Number.isSafeInteger(ms) && ms > 0
    ? Either.right(Duration.millis(ms))
    : Either.left(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid ${field}: expected a positive number of milliseconds, got ${ms}`,
          path: field,
        })
      );

const resolveSources = (layers: InputLayers): SourceUrls => ({
  cpython: resolve({
    cli: layers.cli.sources.cpython,
    env: layers.env.sources.cpython,
    file: layers.file.sources.cpython,
    fallback: DEFAULT_SOURCE_URLS.cpython,
  }),
  pypy: resolve({
    cli: layers.cli.sources.pypy,
    env: layers.env.sources.pypy,
    file: layers.file.sources.pypy,
    fallback: DEFAULT_SOURCE_URLS.pypy,
  }),
  eolBaseUrl: resolve({
    cli: layers.cli.sources.eolBaseUrl,
    env: layers.env.sources.eolBaseUrl,
    file: layers.file.sources.eolBaseUrl,
    fallback: DEFAULT_SOURCE_URLS.eolBaseUrl,
  }),
});

export const resolveSettings = (layers: InputLayers): Either.Either<Settings, ConfigError | VersionParseError> =>
  Either.all({
    constraint: toConstraint({
      cli: layers.cli.constraint,
      env: layers.env.constraint,
      file: layers.file.constraint,
    }),
    sources: Either.right(resolveSources(layers)),
    fetchTimeout: positiveMillis(
      "fetch-timeout",
      pipe(
        select(layers, (l) => l.fetchTimeoutMs),
        Option.getOrElse(() => FETCH_TIMEOUT_MS_DEFAULT)
      )
    ),
    deadline: Option.match(
      select(layers, (l) => l.deadlineMs),
      {
        onNone: (): Either.Either<Option.Option<Duration.Duration>, ConfigError> => Either.right(Option.none()),
        onSome: (ms): Either.Either<Option.Option<Duration.Duration>, ConfigError> =>
          Either.map(positiveMillis("deadline", ms), Option.some),
      }
    ),
  });
