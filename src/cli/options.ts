// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Every constraint flag is optional so
 * that an unset flag falls through to the environment and the config file.
 */

import { Options as O } from "@effect/cli";
import type { Options } from "@effect/cli/Options";
import { Option } from "effect";
import {
  BOOLEAN_VALUES,
  type BooleanText,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  OUTPUT_FORMAT_DEFAULT,
  OUTPUT_FORMAT_VALUES,
  type OutputFormat,
} from "../config/field-values";
import type { InputLayer } from "../config/settings";

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly logFormat: Options<Option.Option<LogFormat>>;
  readonly config: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(O.withAlias("v"), O.withDescription("Verbose output (debug logging)")),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(O.withDescription("Set log level"), O.optional),
  logFormat: O.choice("format-logs", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Log line format on stderr"),
    O.optional
  ),
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to a TOML configuration file (default: ./python-matrix.toml if present)"),
    O.optional
  ),
};

const booleanChoice = (name: string, description: string): Options<Option.Option<BooleanText>> =>
  O.choice(name, BOOLEAN_VALUES).pipe(O.withDescription(description), O.optional);

/** Constraint and source options shared by generate and validate. */
export const constraintOptions: {
  readonly runners: Options<Option.Option<string>>;
  readonly minVersion: Options<Option.Option<string>>;
  readonly maxVersion: Options<Option.Option<string>>;
  readonly includePreReleases: Options<Option.Option<BooleanText>>;
  readonly includeFreethreaded: Options<Option.Option<BooleanText>>;
  readonly implementations: Options<Option.Option<string>>;
  readonly checkPlatform: Options<Option.Option<BooleanText>>;
  readonly latestPerLine: Options<Option.Option<BooleanText>>;
  readonly fetchTimeout: Options<Option.Option<number>>;
  readonly deadline: Options<Option.Option<number>>;
  readonly cpythonIndexUrl: Options<Option.Option<string>>;
  readonly pypyIndexUrl: Options<Option.Option<string>>;
  readonly eolBaseUrl: Options<Option.Option<string>>;
} = {
  runners: O.text("runners").pipe(
    O.withDescription('Runner labels: JSON array or comma-separated; "label=os/arch" sets the platform'),
    O.optional
  ),
  minVersion: O.text("min-version").pipe(
    O.withDescription('Lowest version: "auto" (oldest supported line), a line like 3.9, or 3.9.2'),
    O.optional
  ),
  maxVersion: O.text("max-version").pipe(
    O.withDescription('Highest version: "auto" (newest release), a line like 3.13, or 3.13.1'),
    O.optional
  ),
  includePreReleases: booleanChoice("include-pre-releases", "Include alpha, beta and rc releases"),
  includeFreethreaded: booleanChoice("include-freethreaded", "Include free-threaded builds"),
  implementations: O.text("implementations").pipe(
    O.withDescription("Implementations: CPython, PyPy (JSON array or comma-separated)"),
    O.optional
  ),
  checkPlatform: booleanChoice("check-platform", "Drop versions without files for the runner's platform"),
  latestPerLine: booleanChoice("latest-per-line", "Keep only the newest release of each minor line"),
  fetchTimeout: O.integer("fetch-timeout").pipe(
    O.withDescription("Per-request timeout in milliseconds (default 30000)"),
    O.optional
  ),
  deadline: O.integer("deadline").pipe(
    O.withDescription("Overall deadline for fetching, in milliseconds"),
    O.optional
  ),
  cpythonIndexUrl: O.text("cpython-index-url").pipe(O.withDescription("CPython release index URL"), O.optional),
  pypyIndexUrl: O.text("pypy-index-url").pipe(O.withDescription("PyPy release index URL"), O.optional),
  eolBaseUrl: O.text("eol-base-url").pipe(O.withDescription("endoflife.date API base URL"), O.optional),
};

// Per-command options

export const outputFormat: Options<OutputFormat> = O.choice("format", OUTPUT_FORMAT_VALUES).pipe(
  O.withDescription("include: [{runner, python-version}]; matrix: axes plus exclude list"),
  O.withDefault(OUTPUT_FORMAT_DEFAULT)
);

export const githubOutput: Options<Option.Option<string>> = O.text("github-output").pipe(
  O.withDescription("Also set this GitHub Actions step output to the matrix JSON"),
  O.optional
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly config: Option.Option<string>;
}

export interface ConstraintOptions {
  readonly runners: Option.Option<string>;
  readonly minVersion: Option.Option<string>;
  readonly maxVersion: Option.Option<string>;
  readonly includePreReleases: Option.Option<BooleanText>;
  readonly includeFreethreaded: Option.Option<BooleanText>;
  readonly implementations: Option.Option<string>;
  readonly checkPlatform: Option.Option<BooleanText>;
  readonly latestPerLine: Option.Option<BooleanText>;
  readonly fetchTimeout: Option.Option<number>;
  readonly deadline: Option.Option<number>;
  readonly cpythonIndexUrl: Option.Option<string>;
  readonly pypyIndexUrl: Option.Option<string>;
  readonly eolBaseUrl: Option.Option<string>;
}

/** The CLI as a configuration source, highest precedence. */
export const cliInputLayer = (args: GlobalOptions & ConstraintOptions): InputLayer => ({
  constraint: {
    runners: args.runners,
    minVersion: args.minVersion,
    maxVersion: args.maxVersion,
    includePreReleases: args.includePreReleases,
    includeFreethreaded: args.includeFreethreaded,
    implementations: args.implementations,
    checkPlatform: args.checkPlatform,
    latestPerLine: args.latestPerLine,
  },
  sources: { cpython: args.cpythonIndexUrl, pypy: args.pypyIndexUrl, eolBaseUrl: args.eolBaseUrl },
  fetchTimeoutMs: args.fetchTimeout,
  deadlineMs: args.deadline,
  logLevel: args.logLevel,
  logFormat: args.logFormat,
  debug: args.verbose,
});
