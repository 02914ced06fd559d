// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema for python-matrix.toml. Keys mirror the CLI flags.
 *
 * ```toml
 * runners = ["ubuntu-latest", "macos-14", "windows-latest"]
 * min-version = "auto"
 * max-version = "3.13"
 * implementations = ["CPython", "PyPy"]
 *
 * [sources]
 * cpython-index-url = "https://mirror.example/versions-manifest.json"
 *
 * [logging]
 * level = "debug"
 * ```
 *
 * Versions must be TOML strings: a bare 3.10 is the float 3.1.
 */

import { Option, Schema } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "./field-values";
import type { InputLayer } from "./settings";

const ListSchema = Schema.Union(Schema.String, Schema.Array(Schema.String));

const BooleanSchema = Schema.Union(Schema.Boolean, Schema.Literal("true", "false"));

const MillisSchema = Schema.Number.pipe(Schema.int(), Schema.positive());

export const sourcesSchema = Schema.Struct({
  "cpython-index-url": Schema.optional(Schema.String),
  "pypy-index-url": Schema.optional(Schema.String),
  "eol-base-url": Schema.optional(Schema.String),
});

export const loggingSchema = Schema.Struct({
  level: Schema.optional(Schema.Literal(...LOG_LEVEL_VALUES)),
  format: Schema.optional(Schema.Literal(...LOG_FORMAT_VALUES)),
  debug: Schema.optional(Schema.Boolean),
});

export const fileConfigSchema = Schema.Struct({
  runners: Schema.optional(ListSchema),
  "min-version": Schema.optional(Schema.String),
  "max-version": Schema.optional(Schema.String),
  "include-pre-releases": Schema.optional(BooleanSchema),
  "include-freethreaded": Schema.optional(BooleanSchema),
  implementations: Schema.optional(ListSchema),
  "check-platform": Schema.optional(BooleanSchema),
  "latest-per-line": Schema.optional(BooleanSchema),
  "fetch-timeout": Schema.optional(MillisSchema),
  deadline: Schema.optional(MillisSchema),
  sources: Schema.optional(sourcesSchema),
  logging: Schema.optional(loggingSchema),
});

export type FileConfig = Schema.Schema.Type<typeof fileConfigSchema>;

export const fileToInputLayer = (file: FileConfig): InputLayer => ({
  constraint: {
    runners: Option.fromNullable(file.runners),
    minVersion: Option.fromNullable(file["min-version"]),
    maxVersion: Option.fromNullable(file["max-version"]),
    includePreReleases: Option.fromNullable(file["include-pre-releases"]),
    includeFreethreaded: Option.fromNullable(file["include-freethreaded"]),
    implementations: Option.fromNullable(file.implementations),
    checkPlatform: Option.fromNullable(file["check-platform"]),
    latestPerLine: Option.fromNullable(file["latest-per-line"]),
  },
  sources: {
    cpython: Option.fromNullable(file.sources?.["cpython-index-url"]),
    pypy: Option.fromNullable(file.sources?.["pypy-index-url"]),
    eolBaseUrl: Option.fromNullable(file.sources?.["eol-base-url"]),
  },
  fetchTimeoutMs: Option.fromNullable(file["fetch-timeout"]),
  deadlineMs: Option.fromNullable(file.deadline),
  logLevel: Option.fromNullable(file.logging?.level),
  logFormat: Option.fromNullable(file.logging?.format),
  debug: file.logging?.debug ?? false,
});
