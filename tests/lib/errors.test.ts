// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  ErrorCode,
  FetchError,
  errorMessage,
  toExitCode,
  withFetchContext,
} from "../../src/lib/errors";

describe("error codes", () => {
  test("exit codes equal the error code", () => {
    expect(toExitCode(ErrorCode.EMPTY_MATRIX)).toBe(41);
    expect(toExitCode(ErrorCode.CONFIG_VALIDATION_ERROR)).toBe(12);
  });

  test("cancellation keeps its own exit code", () => {
    expect(toExitCode(ErrorCode.CANCELLED)).toBe(50);
  });
});

describe("errorMessage", () => {
  test("handles errors, strings and other values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("withFetchContext", () => {
  test("prefixes the message and keeps url and cause", () => {
    const cause = new Error("socket hang up");
    const original = new FetchError({
      code: ErrorCode.FETCH_FAILED,
      message: "GET https://index.test/a.json failed: socket hang up",
      url: "https://index.test/a.json",
      cause,
    });
    const wrapped = withFetchContext("CPython release catalog")(original);
    expect(wrapped.message).toBe("CPython release catalog: GET https://index.test/a.json failed: socket hang up");
    expect(wrapped.url).toBe("https://index.test/a.json");
    expect(wrapped.cause).toBe(cause);
    expect(wrapped._tag).toBe("FetchError");
  });
});
