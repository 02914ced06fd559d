// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for python-matrix.
 * Every failure is a tagged error carrying a typed code that maps to an exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly OUTPUT_FAILED: 3;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;
  readonly UNKNOWN_IMPLEMENTATION: 13;

  // Versions (20-29)
  readonly VERSION_PARSE_ERROR: 20;

  // Remote data (30-39)
  readonly FETCH_FAILED: 30;

  // Resolution (40-49)
  readonly RANGE_INVERTED: 40;
  readonly EMPTY_MATRIX: 41;

  // Lifecycle (50-59)
  readonly CANCELLED: 50;
}

/**
 * Error codes for all python-matrix operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  OUTPUT_FAILED: 3,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,
  UNKNOWN_IMPLEMENTATION: 13,

  VERSION_PARSE_ERROR: 20,

  FETCH_FAILED: 30,

  RANGE_INVERTED: 40,
  EMPTY_MATRIX: 41,

  CANCELLED: 50,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type GeneralCode =
  | typeof ErrorCode.GENERAL_ERROR
  | typeof ErrorCode.INVALID_ARGS
  | typeof ErrorCode.OUTPUT_FAILED;

type ConfigCode =
  | typeof ErrorCode.CONFIG_NOT_FOUND
  | typeof ErrorCode.CONFIG_PARSE_ERROR
  | typeof ErrorCode.CONFIG_VALIDATION_ERROR
  | typeof ErrorCode.UNKNOWN_IMPLEMENTATION;

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

/** A version string that does not follow the accepted grammar. */
export class VersionParseError extends Data.TaggedError("ParseError")<{
  readonly code: typeof ErrorCode.VERSION_PARSE_ERROR;
  readonly message: string;
  readonly input: string;
}> {}

/** Network, HTTP status, timeout or document-shape failure for one remote source. */
export class FetchError extends Data.TaggedError("FetchError")<{
  readonly code: typeof ErrorCode.FETCH_FAILED;
  readonly message: string;
  readonly url: string;
  readonly cause?: Error;
}> {}

/** The resolved minimum exceeds the resolved maximum, or an auto bound had nothing to resolve against. */
export class ResolvedRangeError extends Data.TaggedError("RangeError")<{
  readonly code: typeof ErrorCode.RANGE_INVERTED;
  readonly message: string;
  readonly implementation: string;
}> {}

export class EmptyMatrixError extends Data.TaggedError("EmptyMatrixError")<{
  readonly code: typeof ErrorCode.EMPTY_MATRIX;
  readonly message: string;
}> {}

export class CancelledError extends Data.TaggedError("CancelledError")<{
  readonly code: typeof ErrorCode.CANCELLED;
  readonly message: string;
}> {}

export type MatrixError =
  | VersionParseError
  | FetchError
  | ResolvedRangeError
  | EmptyMatrixError
  | CancelledError;

export type AppError = MatrixError | ConfigError | GeneralError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spread helper so optional `cause` is only set when the caught value is an Error. */
export const causeOf = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};

/** Prefix a FetchError message with the source it came from, keeping url and cause. */
export const withFetchContext =
  (context: string) =>
  (e: FetchError): FetchError =>
    new FetchError({
      code: e.code,
      message: `${context}: ${e.message}`,
      url: e.url,
      ...causeOf(e.cause),
    });
