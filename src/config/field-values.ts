// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

/** `include` is the flat runner/python-version list; `matrix` is runner × version with excludes. */
export const OUTPUT_FORMAT_VALUES = ["include", "matrix"] as const;
export type OutputFormat = (typeof OUTPUT_FORMAT_VALUES)[number];
export const OUTPUT_FORMAT_DEFAULT: OutputFormat = "include";

export const BOOLEAN_VALUES = ["true", "false"] as const;
export type BooleanText = (typeof BOOLEAN_VALUES)[number];

export const IMPLEMENTATIONS_DEFAULT: readonly string[] = ["CPython"];

export const FETCH_TIMEOUT_MS_DEFAULT = 30_000;

export const CONFIG_FILE_DEFAULT = "python-matrix.toml";
