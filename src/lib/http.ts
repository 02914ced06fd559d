// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * JSON document source using Context.Tag pattern.
 * The live layer wraps @effect/platform's HttpClient; tests swap in a
 * Layer.succeed with canned documents so nothing touches the network.
 */

import { FetchHttpClient, HttpClient } from "@effect/platform";
import { Context, Duration, Effect, Layer, pipe } from "effect";
import { ErrorCode, FetchError, causeOf, errorMessage } from "./errors";

export interface JsonSourceService {
  /** One GET, no retries. Non-2xx, transport errors, bad JSON and timeouts all become FetchError. */
  readonly getJson: (
    url: string,
    timeout: Duration.DurationInput
  ) => Effect.Effect<unknown, FetchError>;
}

export interface JsonSource {
  readonly _tag: "JsonSource";
}

export const JsonSource: Context.Tag<JsonSource, JsonSourceService> = Context.GenericTag<
  JsonSource,
  JsonSourceService
>("python-matrix/JsonSource");

const timeoutError = (url: string, timeout: Duration.DurationInput): FetchError =>
  new FetchError({
    code: ErrorCode.FETCH_FAILED,
    message: `GET ${url} timed out after ${Duration.toMillis(Duration.decode(timeout))}ms`,
    url,
  });

export const makeJsonSource = (client: HttpClient.HttpClient): JsonSourceService => {
  const okClient = HttpClient.filterStatusOk(client);
  return {
    getJson: (url, timeout): Effect.Effect<unknown, FetchError> =>
      pipe(
        okClient.get(url, { headers: { accept: "application/json" } }),
        Effect.flatMap((response) => response.json),
        Effect.scoped,
        Effect.mapError(
          (e): FetchError =>
            new FetchError({
              code: ErrorCode.FETCH_FAILED,
              message: `GET ${url} failed: ${errorMessage(e)}`,
              url,
              ...causeOf(e),
            })
        ),
        Effect.timeoutFail({ duration: timeout, onTimeout: () => timeoutError(url, timeout) })
      ),
  };
};

/** JsonSource over an HttpClient supplied by the caller. */
export const JsonSourceFromClient: Layer.Layer<JsonSource, never, HttpClient.HttpClient> =
  Layer.effect(JsonSource, Effect.map(HttpClient.HttpClient, makeJsonSource));

/** JsonSource over the global fetch. */
export const JsonSourceLive: Layer.Layer<JsonSource> = JsonSourceFromClient.pipe(
  Layer.provide(FetchHttpClient.layer)
);
