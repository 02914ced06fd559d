// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema decode helpers. Parse errors are rendered with the tree
 * formatter and handed to a caller-supplied error constructor, so the same
 * helper serves both config files (ConfigError) and remote documents (FetchError).
 */

import { Effect, Either, ParseResult, Schema } from "effect";
import { ConfigError, ErrorCode, FetchError } from "./errors";

// ============================================================================
// Error Formatting
// ============================================================================

export const formatParseError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error);

/**
 * Output format:
 *   Configuration validation failed for /path/to/file.toml:
 *   { readonly runners: ... }
 *   └─ ["runners"]
 *      └─ is missing
 */
export const configSchemaError =
  (context: string) =>
  (error: ParseResult.ParseError): ConfigError =>
    new ConfigError({
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
      message: `Configuration validation failed for ${context}:\n${formatParseError(error)}`,
      path: context,
    });

export const documentSchemaError =
  (label: string, url: string) =>
  (error: ParseResult.ParseError): FetchError =>
    new FetchError({
      code: ErrorCode.FETCH_FAILED,
      message: `${label} document at ${url} has an unexpected shape:\n${formatParseError(error)}`,
      url,
    });

// ============================================================================
// Decode Utilities
// ============================================================================

export const decodeWith = <A, I, E>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  onError: (error: ParseResult.ParseError) => E
): Effect.Effect<A, E> =>
  Either.match(Schema.decodeUnknownEither(schema)(data), {
    onLeft: (error): Effect.Effect<A, E> => Effect.fail(onError(error)),
    onRight: (value): Effect.Effect<A, E> => Effect.succeed(value),
  });

export const decodeToEffect = <A, I = A>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, ConfigError> => decodeWith(schema, data, configSchemaError(context));
