// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  type ConstraintInput,
  type InputSources,
  emptyConstraintInput,
  parseBooleanInput,
  parseBoundSpec,
  parseList,
  toConstraint,
} from "../../src/config";
import { formatPlatform } from "../../src/platform";
import { formatBoundSpec } from "../../src/resolve";

const input = (values: Partial<ConstraintInput>): ConstraintInput => ({ ...emptyConstraintInput, ...values });

const sources = (overrides: Partial<InputSources>): InputSources => ({
  cli: emptyConstraintInput,
  env: emptyConstraintInput,
  file: emptyConstraintInput,
  ...overrides,
});

const leftMessage = <A>(result: Either.Either<A, { readonly message: string }>): string =>
  Either.match(result, { onLeft: (e) => e.message, onRight: () => "no error" });

describe("parseList", () => {
  test("accepts JSON arrays", () => {
    expect(parseList("runners", '["ubuntu-latest", "macos-14"]')).toEqual(Either.right(["ubuntu-latest", "macos-14"]));
  });

  test("accepts comma and whitespace separated text", () => {
    expect(parseList("runners", "ubuntu-latest, macos-14  windows-latest,")).toEqual(
      Either.right(["ubuntu-latest", "macos-14", "windows-latest"])
    );
  });

  test("drops blank items from arrays", () => {
    expect(parseList("runners", [" ubuntu-latest ", ""])).toEqual(Either.right(["ubuntu-latest"]));
    expect(parseList("runners", "  ")).toEqual(Either.right([]));
  });

  test("rejects malformed JSON and non-string items", () => {
    expect(leftMessage(parseList("runners", "[oops"))).toBe("Invalid runners: malformed JSON array [oops");
    expect(leftMessage(parseList("runners", '["a", 1]'))).toBe(
      'Invalid runners: expected a JSON array of strings, got ["a", 1]'
    );
  });
});

describe("parseBooleanInput", () => {
  test("accepts true and false in any case", () => {
    expect(parseBooleanInput("check-platform", "TRUE")).toEqual(Either.right(true));
    expect(parseBooleanInput("check-platform", " false ")).toEqual(Either.right(false));
    expect(parseBooleanInput("check-platform", false)).toEqual(Either.right(false));
  });

  test("rejects anything else, naming the field", () => {
    const result = parseBooleanInput("include-pre-releases", "yes");
    expect(leftMessage(result)).toBe('Invalid include-pre-releases: expected true or false, got "yes"');
    expect(Either.isLeft(result) && result.left.path).toBe("include-pre-releases");
  });
});

describe("parseBoundSpec", () => {
  test("auto is case-insensitive", () => {
    expect(parseBoundSpec(" AUTO ")).toEqual(Either.right("auto"));
  });

  test("anything else is a version bound", () => {
    expect(Either.map(parseBoundSpec("3.10"), formatBoundSpec)).toEqual(Either.right("3.10"));
    expect(leftMessage(parseBoundSpec("latest"))).toBe(
      'Invalid version "latest": major component must be a non-negative integer'
    );
  });
});

describe("toConstraint", () => {
  test("applies defaults around the required runners", () => {
    const result = toConstraint(sources({ cli: input({ runners: Option.some("ubuntu-latest") }) }));
    expect(Either.isRight(result)).toBe(true);
    if (Either.isRight(result)) {
      const c = result.right;
      expect(c.runners.map((r) => `${r.name} ${formatPlatform(r)}`)).toEqual(["ubuntu-latest linux/x64"]);
      expect(c.implementations.map((i) => i.name)).toEqual(["CPython"]);
      expect([formatBoundSpec(c.minVersion), formatBoundSpec(c.maxVersion)]).toEqual(["auto", "auto"]);
      expect([c.includePreReleases, c.includeFreethreaded, c.checkPlatform, c.latestPerLine]).toEqual([
        false,
        false,
        true,
        false,
      ]);
    }
  });

  test("CLI wins over environment, environment over file", () => {
    const result = toConstraint(
      sources({
        cli: input({ runners: Option.some("macos-14") }),
        env: input({ runners: Option.some("ubuntu-latest"), minVersion: Option.some("3.9") }),
        file: input({
          runners: Option.some(["windows-latest"]),
          minVersion: Option.some("3.8"),
          maxVersion: Option.some("3.12"),
          includePreReleases: Option.some(true),
        }),
      })
    );
    expect(
      Either.map(result, (c) => [
        c.runners.map((r) => r.name).join(","),
        formatBoundSpec(c.minVersion),
        formatBoundSpec(c.maxVersion),
        String(c.includePreReleases),
      ])
    ).toEqual(Either.right(["macos-14", "3.9", "3.12", "true"]));
  });

  test("implementation names are case-insensitive and deduplicated", () => {
    const result = toConstraint(
      sources({
        env: input({ runners: Option.some("ubuntu-latest"), implementations: Option.some("pypy, CPython, PyPy") }),
      })
    );
    expect(Either.map(result, (c) => c.implementations.map((i) => i.id))).toEqual(Either.right(["pypy", "cpython"]));
  });

  test("runners are required", () => {
    expect(leftMessage(toConstraint(sources({})))).toBe(
      "Invalid runners: no runners given (--runners, PYTHON_MATRIX_RUNNERS or runners in the config file)"
    );
    expect(leftMessage(toConstraint(sources({ cli: input({ runners: Option.some(" , ") }) })))).toBe(
      "Invalid runners: at least one runner label is required"
    );
  });

  test("an empty implementation list is rejected", () => {
    const result = toConstraint(
      sources({ cli: input({ runners: Option.some("ubuntu-latest"), implementations: Option.some("[]") }) })
    );
    expect(leftMessage(result)).toBe("Invalid implementations: at least one implementation is required");
  });

  test("unknown implementations and malformed versions are reported", () => {
    const runners = Option.some("ubuntu-latest");
    expect(leftMessage(toConstraint(sources({ cli: input({ runners, implementations: Option.some("jython") }) })))).toBe(
      'Unknown implementation "jython". Known: CPython, PyPy'
    );
    const badVersion = toConstraint(sources({ cli: input({ runners, maxVersion: Option.some("3.x") }) }));
    expect(Either.isLeft(badVersion) && badVersion.left._tag).toBe("ParseError");
  });
});
