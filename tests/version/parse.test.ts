// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  Bound,
  formatVersion,
  line,
  parseBound,
  parseLine,
  parseVersion,
  preRelease,
  version,
} from "../../src/version";

const parsed = (text: string) => Either.getOrThrow(parseVersion(text));

const failure = (text: string): string =>
  Either.match(parseVersion(text), {
    onLeft: (e) => e.message,
    onRight: (ok) => `unexpectedly parsed ${formatVersion(ok)}`,
  });

describe("parseVersion", () => {
  test("parses a final release", () => {
    expect(parsed("3.12.4")).toEqual(version(3, 12, 4));
  });

  test("parses PEP 440 pre-release spellings", () => {
    expect(parsed("3.13.0rc2")).toEqual(version(3, 13, 0, { pre: preRelease("rc", 2) }));
    expect(parsed("3.13.0a1")).toEqual(version(3, 13, 0, { pre: preRelease("a", 1) }));
    expect(parsed("3.13.0.b3")).toEqual(version(3, 13, 0, { pre: preRelease("b", 3) }));
    expect(parsed("3.13.0c1")).toEqual(version(3, 13, 0, { pre: preRelease("rc", 1) }));
  });

  test("parses manifest-style pre-releases", () => {
    expect(parsed("3.13.0-rc.2")).toEqual(version(3, 13, 0, { pre: preRelease("rc", 2) }));
    expect(parsed("3.14.0-alpha.4")).toEqual(version(3, 14, 0, { pre: preRelease("a", 4) }));
    expect(parsed("3.14.0-beta.1")).toEqual(version(3, 14, 0, { pre: preRelease("b", 1) }));
  });

  test("a pre-release tag without an index means index 0", () => {
    expect(parsed("3.13.0rc")).toEqual(version(3, 13, 0, { pre: preRelease("rc", 0) }));
  });

  test("a trailing t marks a free-threaded build", () => {
    expect(parsed("3.13.1t")).toEqual(version(3, 13, 1, { freethreaded: true }));
    expect(parsed("3.14.0a3t")).toEqual(version(3, 14, 0, { pre: preRelease("a", 3), freethreaded: true }));
  });

  test("surrounding whitespace is ignored", () => {
    expect(parsed("  3.10.2 ")).toEqual(version(3, 10, 2));
  });

  test("rejects malformed input with a message quoting it", () => {
    expect(failure("")).toBe('Invalid version "": empty version string');
    expect(failure("03.1.0")).toBe('Invalid version "03.1.0": major component "03" has a leading zero');
    expect(failure("3.12")).toBe('Invalid version "3.12": expected 3 dot-separated components');
    expect(failure("3.x.1")).toBe('Invalid version "3.x.1": minor component must be a non-negative integer');
    expect(failure("3.12.4foo")).toBe('Invalid version "3.12.4foo": unrecognized pre-release tag "foo"');
    expect(failure("3.12.4rc1x")).toBe('Invalid version "3.12.4rc1x": pre-release index "1x" must be numeric');
    expect(failure("3.12.4rc-")).toBe('Invalid version "3.12.4rc-": pre-release "rc" ends with a dangling separator');
  });

  test("failures carry the ParseError tag and the raw input", () => {
    const result = parseVersion("nightly");
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ParseError");
      expect(result.left.code).toBe(20);
      expect(result.left.input).toBe("nightly");
    }
  });
});

describe("formatVersion", () => {
  test("renders the canonical form", () => {
    expect(formatVersion(version(3, 12, 4))).toBe("3.12.4");
    expect(formatVersion(parsed("3.13.0-rc.2"))).toBe("3.13.0rc2");
    expect(formatVersion(version(3, 13, 1, { freethreaded: true }))).toBe("3.13.1t");
    expect(formatVersion(parsed("3.14.0-alpha.3t"))).toBe("3.14.0a3t");
  });

  test("round-trips through parseVersion", () => {
    const samples = [
      version(3, 8, 0),
      version(3, 10, 14),
      version(3, 13, 0, { pre: preRelease("b", 2) }),
      version(3, 13, 0, { pre: preRelease("rc", 0), freethreaded: true }),
      version(2, 7, 18),
    ];
    for (const sample of samples) {
      expect(parsed(formatVersion(sample))).toEqual(sample);
    }
  });
});

describe("parseBound", () => {
  test("two components form a line bound", () => {
    expect(Either.getOrThrow(parseBound("3.9"))).toEqual(Bound.Line({ line: line(3, 9) }));
  });

  test("three components form an exact bound", () => {
    expect(Either.getOrThrow(parseBound("3.9.2"))).toEqual(Bound.Exact({ version: version(3, 9, 2) }));
  });

  test("a free-threaded marker is dropped", () => {
    expect(Either.getOrThrow(parseBound("3.13t"))).toEqual(Bound.Line({ line: line(3, 13) }));
    expect(Either.getOrThrow(parseBound("3.13.1t"))).toEqual(Bound.Exact({ version: version(3, 13, 1) }));
  });

  test("rejects a single component", () => {
    expect(Either.isLeft(parseBound("3"))).toBe(true);
  });
});

describe("parseLine", () => {
  test("accepts major.minor only", () => {
    expect(parseLine("3.12")).toEqual(Option.some(line(3, 12)));
    expect(parseLine("3.12.1")).toEqual(Option.none());
    expect(parseLine("python3")).toEqual(Option.none());
  });
});
