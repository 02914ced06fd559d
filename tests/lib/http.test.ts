// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { HttpClient, HttpClientResponse } from "@effect/platform";
import { type Duration, Effect, Either } from "effect";
import { describe, expect, test } from "vitest";
import { makeJsonSource } from "../../src/lib/http";

const URL_UNDER_TEST = "https://index.test/versions.json";

const clientAnswering = (respond: () => Response, seen: Array<string> = []): HttpClient.HttpClient =>
  HttpClient.make((request) => {
    seen.push(`${request.method} ${request.url} accept=${request.headers["accept"] ?? ""}`);
    return Effect.succeed(HttpClientResponse.fromWeb(request, respond()));
  });

const getJson = (client: HttpClient.HttpClient, timeout: Duration.DurationInput = "5 seconds") =>
  Effect.runPromise(Effect.either(makeJsonSource(client).getJson(URL_UNDER_TEST, timeout)));

describe("makeJsonSource", () => {
  test("returns the decoded body of a 2xx response", async () => {
    const seen: Array<string> = [];
    const client = clientAnswering(() => new Response('[{"version":"3.12.4"}]', { status: 200 }), seen);
    expect(await getJson(client)).toEqual(Either.right([{ version: "3.12.4" }]));
    expect(seen).toEqual([`GET ${URL_UNDER_TEST} accept=application/json`]);
  });

  test("a non-2xx status is a FetchError", async () => {
    const result = await getJson(clientAnswering(() => new Response("unavailable", { status: 503 })));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("FetchError");
      expect(result.left.url).toBe(URL_UNDER_TEST);
      expect(result.left.message.startsWith(`GET ${URL_UNDER_TEST} failed: `)).toBe(true);
    }
  });

  test("a body that is not JSON is a FetchError", async () => {
    const result = await getJson(clientAnswering(() => new Response("<html>", { status: 200 })));
    expect(Either.isLeft(result) && result.left.message.startsWith(`GET ${URL_UNDER_TEST} failed: `)).toBe(true);
  });

  test("a request that outlives the timeout is a FetchError", async () => {
    const result = await getJson(
      HttpClient.make(() => Effect.never),
      "20 millis"
    );
    expect(Either.isLeft(result) && result.left.message).toBe(`GET ${URL_UNDER_TEST} timed out after 20ms`);
  });
});
