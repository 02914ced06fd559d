// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Raw constraint inputs and their validation.
 *
 * Every source (CLI, environment, TOML) produces the same ConstraintInput
 * shape of optional raw values. Sources are merged field by field first and
 * parsed afterwards, so an error always names the field it came from.
 */

import { Array as Arr, Either, Option, pipe } from "effect";
import { type Implementation, lookupImplementation } from "../catalog";
import { ConfigError, ErrorCode, type VersionParseError } from "../lib/errors";
import type { Constraint } from "../matrix";
import { type Runner, parseRunner } from "../platform";
import { AUTO, type BoundSpec } from "../resolve";
import { parseBound } from "../version";
import { IMPLEMENTATIONS_DEFAULT } from "./field-values";
import { resolve, resolveOption } from "./resolve";

/** A list arrives as text (JSON array or comma/space separated) or as a TOML array. */
export type ListInput = string | ReadonlyArray<string>;

/** A boolean arrives as text ("true"/"false") or as a TOML boolean. */
export type BooleanInput = string | boolean;

export interface ConstraintInput {
  readonly runners: Option.Option<ListInput>;
  readonly minVersion: Option.Option<string>;
  readonly maxVersion: Option.Option<string>;
  readonly includePreReleases: Option.Option<BooleanInput>;
  readonly includeFreethreaded: Option.Option<BooleanInput>;
  readonly implementations: Option.Option<ListInput>;
  readonly checkPlatform: Option.Option<BooleanInput>;
  readonly latestPerLine: Option.Option<BooleanInput>;
}

export const emptyConstraintInput: ConstraintInput = {
  runners: Option.none(),
  minVersion: Option.none(),
  maxVersion: Option.none(),
  includePreReleases: Option.none(),
  includeFreethreaded: Option.none(),
  implementations: Option.none(),
  checkPlatform: Option.none(),
  latestPerLine: Option.none(),
};

// ============================================================================
// Field Parsers
// ============================================================================

const invalid = (field: string, message: string): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_VALIDATION_ERROR,
    message: `Invalid ${field}: ${message}`,
    path: field,
  });

const isStringArray = (value: unknown): value is ReadonlyArray<string> =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const parseJsonList = (field: string, text: string): Either.Either<ReadonlyArray<string>, ConfigError> =>
  pipe(
    Either.try({
      try: (): unknown => JSON.parse(text),
      catch: () => invalid(field, `malformed JSON array ${text}`),
    }),
    Either.filterOrLeft(isStringArray, () => invalid(field, `expected a JSON array of strings, got ${text}`))
  );

/**
 * `["a","b"]`, `a,b`, `a b` and `a, b` are all the same list. Blank items are
 * dropped; the result may be empty.
 */
export const parseList = (field: string, value: ListInput): Either.Either<ReadonlyArray<string>, ConfigError> => {
  const items: Either.Either<ReadonlyArray<string>, ConfigError> =
    typeof value !== "string"
      ? Either.right(value)
      : value.trim().startsWith("[")
        ? parseJsonList(field, value.trim())
        : Either.right(value.split(/[\s,]+/));
  return Either.map(items, (list) => Arr.filter(Arr.map(list, (s) => s.trim()), (s) => s.length > 0));
};

/** Exactly "true" or "false" (any case). GitHub Actions inputs are always strings. */
export const parseBooleanInput = (field: string, value: BooleanInput): Either.Either<boolean, ConfigError> => {
  if (typeof value === "boolean") {
    return Either.right(value);
  }
  const text = value.trim().toLowerCase();
  if (text === "true") {
    return Either.right(true);
  }
  return text === "false"
    ? Either.right(false)
    : Either.left(invalid(field, `expected true or false, got "${value}"`));
};

export const parseBoundSpec = (text: string): Either.Either<BoundSpec, VersionParseError> =>
  text.trim().toLowerCase() === AUTO ? Either.right(AUTO) : parseBound(text);

/** Case-insensitive names, duplicates removed keeping the first. */
export const parseImplementations = (
  names: ReadonlyArray<string>
): Either.Either<ReadonlyArray<Implementation>, ConfigError> =>
  Arr.isNonEmptyReadonlyArray(names)
    ? pipe(
        Either.all(names.map(lookupImplementation)),
        Either.map((impls) => Arr.dedupeWith(impls, (a, b) => a.id === b.id))
      )
    : Either.left(invalid("implementations", "at least one implementation is required"));

export const parseRunners = (labels: ReadonlyArray<string>): Either.Either<ReadonlyArray<Runner>, ConfigError> =>
  Arr.isNonEmptyReadonlyArray(labels)
    ? pipe(
        Either.all(labels.map(parseRunner)),
        Either.map((runners) => Arr.dedupeWith(runners, (a, b) => a.name === b.name))
      )
    : Either.left(invalid("runners", "at least one runner label is required"));

// ============================================================================
// Merge and Validate
// ============================================================================

export interface InputSources {
  readonly cli: ConstraintInput;
  readonly env: ConstraintInput;
  readonly file: ConstraintInput;
}

const booleanField = (
  sources: InputSources,
  key: "includePreReleases" | "includeFreethreaded" | "checkPlatform" | "latestPerLine",
  field: string,
  fallback: boolean
): Either.Either<boolean, ConfigError> =>
  Option.match(resolveOption({ cli: sources.cli[key], env: sources.env[key], file: sources.file[key] }), {
    onNone: (): Either.Either<boolean, ConfigError> => Either.right(fallback),
    onSome: (value): Either.Either<boolean, ConfigError> => parseBooleanInput(field, value),
  });

/**
 * CLI over environment over file over default, then validate. Runners have no
 * default and must come from some source.
 */
export const toConstraint = (sources: InputSources): Either.Either<Constraint, ConfigError | VersionParseError> =>
  Either.all({
    runners: pipe(
      resolveOption({ cli: sources.cli.runners, env: sources.env.runners, file: sources.file.runners }),
      Either.fromOption(() => invalid("runners", "no runners given (--runners, PYTHON_MATRIX_RUNNERS or runners in the config file)")),
      Either.flatMap((value) => parseList("runners", value)),
      Either.flatMap(parseRunners)
    ),
    minVersion: parseBoundSpec(
      resolve({ cli: sources.cli.minVersion, env: sources.env.minVersion, file: sources.file.minVersion, fallback: AUTO })
    ),
    maxVersion: parseBoundSpec(
      resolve({ cli: sources.cli.maxVersion, env: sources.env.maxVersion, file: sources.file.maxVersion, fallback: AUTO })
    ),
    includePreReleases: booleanField(sources, "includePreReleases", "include-pre-releases", false),
    includeFreethreaded: booleanField(sources, "includeFreethreaded", "include-freethreaded", false),
    implementations: pipe(
      parseList(
        "implementations",
        resolve<ListInput>({
          cli: sources.cli.implementations,
          env: sources.env.implementations,
          file: sources.file.implementations,
          fallback: IMPLEMENTATIONS_DEFAULT,
        })
      ),
      Either.flatMap(parseImplementations)
    ),
    checkPlatform: booleanField(sources, "checkPlatform", "check-platform", true),
    latestPerLine: booleanField(sources, "latestPerLine", "latest-per-line", false),
  });
