// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version parsing: the boundary between untrusted strings and Version values.
 *
 * Accepted grammar:
 *   release  := N "." N "." N
 *   pre      := [sep] tag [sep] [N]        sep := "-" | "." | "_"
 *   tag      := "a" | "alpha" | "b" | "beta" | "rc" | "c" | "pre" | "preview"
 *   version  := release [pre] ["t"]
 *
 * This covers PEP 440 spellings ("3.13.0rc2") and the semver-style ones used by
 * the actions/python-versions manifest ("3.13.0-rc.2"). A missing pre-release
 * index is 0, as in PEP 440.
 */

import { Data, Either, Option, pipe } from "effect";
import { ErrorCode, VersionParseError } from "../lib/errors";
import {
  type Line,
  type PreRelease,
  type PreReleaseKind,
  type Version,
  line,
  preRelease,
  version,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Parsing Primitives (Internal)
// ─────────────────────────────────────────────────────────────────────────────

const isDigit = (c: string): boolean => c >= "0" && c <= "9";
const isLetter = (c: string): boolean => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z");
const isSeparator = (c: string): boolean => c === "-" || c === "." || c === "_";

/** Split at the first character failing the predicate. */
const span = (s: string, pred: (c: string) => boolean): readonly [string, string] => {
  const end = Array.from(s).findIndex((c) => !pred(c));
  return end === -1 ? [s, ""] : [s.slice(0, end), s.slice(end)];
};

const dropSeparator = (s: string): string => (s.length > 0 && isSeparator(s.charAt(0)) ? s.slice(1) : s);

/** Non-negative integer without leading zeros ("0" itself is fine). */
const parseNat = (s: string): Option.Option<number> =>
  pipe(
    Option.some(s),
    Option.filter((str) => str.length > 0 && Array.from(str).every(isDigit)),
    Option.filter((str) => str.length === 1 || !str.startsWith("0")),
    Option.map((str) => Number.parseInt(str, 10)),
    Option.filter(Number.isSafeInteger)
  );

const TAG_ALIASES: Readonly<Record<string, PreReleaseKind>> = {
  a: "a",
  alpha: "a",
  b: "b",
  beta: "b",
  c: "rc",
  rc: "rc",
  pre: "rc",
  preview: "rc",
};

const fail = (input: string, reason: string): Either.Either<never, VersionParseError> =>
  Either.left(
    new VersionParseError({
      code: ErrorCode.VERSION_PARSE_ERROR,
      message: `Invalid version "${input}": ${reason}`,
      input,
    })
  );

// ─────────────────────────────────────────────────────────────────────────────
// Segment Parsers
// ─────────────────────────────────────────────────────────────────────────────

const COMPONENT_NAMES = ["major", "minor", "micro"] as const;

/**
 * Parse the dotted numeric prefix. Returns the components and the unparsed tail.
 * The tail starts right after the last digit of the final component.
 */
const parseRelease = (
  input: string,
  count: 2 | 3
): Either.Either<readonly [readonly number[], string], VersionParseError> => {
  const go = (
    rest: string,
    acc: readonly number[]
  ): Either.Either<readonly [readonly number[], string], VersionParseError> => {
    const name = COMPONENT_NAMES[acc.length] ?? "component";
    const [digits, tail] = span(rest, isDigit);
    return Option.match(parseNat(digits), {
      onNone: () =>
        fail(
          input,
          digits.length === 0
            ? `${name} component must be a non-negative integer`
            : `${name} component "${digits}" has a leading zero`
        ),
      onSome: (n) => {
        const next = [...acc, n];
        if (next.length === count) {
          return Either.right([next, tail] as const);
        }
        return tail.startsWith(".")
          ? go(tail.slice(1), next)
          : fail(input, `expected ${count} dot-separated components`);
      },
    });
  };
  return go(input, []);
};

const parsePreRelease = (
  input: string,
  tail: string
): Either.Either<Option.Option<PreRelease>, VersionParseError> => {
  if (tail.length === 0) {
    return Either.right(Option.none());
  }
  const [word, afterWord] = span(dropSeparator(tail), isLetter);
  const kind = TAG_ALIASES[word.toLowerCase()];
  if (kind === undefined) {
    return fail(input, `unrecognized pre-release tag "${word.length > 0 ? word : tail}"`);
  }
  const digits = dropSeparator(afterWord);
  if (digits.length === 0) {
    return afterWord.length === 0
      ? Either.right(Option.some(preRelease(kind, 0)))
      : fail(input, `pre-release "${word}" ends with a dangling separator`);
  }
  return Option.match(
    pipe(
      Option.some(digits),
      Option.filter((d) => Array.from(d).every(isDigit)),
      Option.map((d) => Number.parseInt(d, 10))
    ),
    {
      onNone: () => fail(input, `pre-release index "${digits}" must be numeric`),
      onSome: (n) => Either.right(Option.some(preRelease(kind, n))),
    }
  );
};

/** Peel a trailing free-threaded marker. "t" only counts after a digit. */
const splitFreethreaded = (s: string): readonly [string, boolean] =>
  s.length > 1 && s.endsWith("t") && isDigit(s.charAt(s.length - 2))
    ? [s.slice(0, -1), true]
    : [s, false];

// ─────────────────────────────────────────────────────────────────────────────
// Public Parsers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse "3.12.4", "3.13.0rc2", "3.13.0-beta.1", "3.13.1t".
 * Fails with VersionParseError (tag "ParseError") quoting the input.
 */
export const parseVersion = (text: string): Either.Either<Version, VersionParseError> => {
  const input = text.trim();
  if (input.length === 0) {
    return fail(text, "empty version string");
  }
  const [body, freethreaded] = splitFreethreaded(input);
  return pipe(
    parseRelease(body, 3),
    Either.flatMap(([[major = 0, minor = 0, micro = 0], tail]) =>
      pipe(
        parsePreRelease(input, tail),
        Either.map((pre) =>
          version(major, minor, micro, {
            ...Option.match(pre, { onNone: () => ({}), onSome: (p) => ({ pre: p }) }),
            freethreaded,
          })
        )
      )
    )
  );
};

/** Version bound: a whole minor line ("3.9") or one exact version ("3.9.2"). */
export type Bound = Data.TaggedEnum<{
  Exact: { readonly version: Version };
  Line: { readonly line: Line };
}>;

export const Bound = Data.taggedEnum<Bound>();

/**
 * Parse an explicit version bound. Two components form a line bound covering
 * every micro release and pre-release of that line. A free-threaded marker is
 * ignored: both builds of a version share its bounds.
 */
export const parseBound = (text: string): Either.Either<Bound, VersionParseError> => {
  const input = text.trim();
  const [body] = splitFreethreaded(input);
  const dots = Array.from(body).filter((c) => c === ".").length;
  const [numeric] = span(body, (c) => isDigit(c) || c === ".");
  if (dots === 1 && numeric === body) {
    return pipe(
      parseRelease(body, 2),
      Either.flatMap(([[major = 0, minor = 0], tail]) =>
        tail.length === 0
          ? Either.right(Bound.Line({ line: line(major, minor) }))
          : fail(input, `unexpected trailing "${tail}"`)
      )
    );
  }
  return pipe(
    parseVersion(body),
    Either.map((v) => Bound.Exact({ version: v }))
  );
};

/** "3.12" -> Some(Line). Anything else, including "3.12.1", is None. */
export const parseLine = (text: string): Option.Option<Line> =>
  pipe(
    Either.getRight(parseBound(text)),
    Option.flatMap((bound) =>
      Bound.$match(bound, {
        Line: ({ line: l }): Option.Option<Line> => Option.some(l),
        Exact: (): Option.Option<Line> => Option.none(),
      })
    )
  );
