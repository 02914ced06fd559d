// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Release data fixtures and in-process stand-ins for the remote services.
 */

import { Effect, Either, Layer, Option } from "effect";
import {
  type FileDescriptor,
  type ImplementationId,
  type Release,
  ReleaseCatalog,
} from "../../src/catalog";
import { type EolRecord, EolRegistry, type EolSnapshot } from "../../src/eol";
import { ErrorCode, FetchError } from "../../src/lib/errors";
import { JsonSource } from "../../src/lib/http";
import { type Version, formatLine, isPreRelease, line, parseVersion, withFreethreaded } from "../../src/version";

// ─────────────────────────────────────────────────────────────────────────────
// Release Fixtures
// ─────────────────────────────────────────────────────────────────────────────

export const v = (text: string): Version => Either.getOrThrow(parseVersion(text));

export const file = (platform: string, arch: string): FileDescriptor => ({
  filename: `python-test-${platform}-${arch}.tar.gz`,
  platform,
  arch,
});

export const LINUX_X64 = file("linux", "x64");
export const LINUX_ARM64 = file("linux", "arm64");
export const DARWIN_ARM64 = file("darwin", "arm64");
export const WIN32_X64 = file("win32", "x64");

export const EVERY_PLATFORM: ReadonlyArray<FileDescriptor> = [LINUX_X64, LINUX_ARM64, DARWIN_ARM64, WIN32_X64];

export const cpython = (
  text: string,
  options: { readonly files?: ReadonlyArray<FileDescriptor>; readonly stable?: boolean } = {}
): Release => {
  const version = v(text);
  return {
    implementation: "cpython",
    version,
    published: Option.none(),
    build: Option.none(),
    files: options.files ?? EVERY_PLATFORM,
    prerelease: options.stable === false || isPreRelease(version),
    freethreaded: version.freethreaded,
  };
};

export const freethreaded = (text: string, files: ReadonlyArray<FileDescriptor> = EVERY_PLATFORM): Release => {
  const base = cpython(text, { files });
  return { ...base, version: withFreethreaded(base.version, true), freethreaded: true };
};

export const pypy = (
  pythonText: string,
  pypyText: string,
  files: ReadonlyArray<FileDescriptor> = [LINUX_X64, DARWIN_ARM64]
): Release => ({
  implementation: "pypy",
  version: v(pythonText),
  published: Option.none(),
  build: Option.some(v(pypyText)),
  files,
  prerelease: false,
  freethreaded: false,
});

/** `{ "3.7": true, "3.8": false }`: line -> isEol. */
export const eolSnapshot = (lines: Readonly<Record<string, boolean>>): EolSnapshot =>
  new Map(
    Object.entries(lines).map(([text, isEol]): [string, EolRecord] => {
      const [major = "0", minor = "0"] = text.split(".");
      const l = line(Number(major), Number(minor));
      return [formatLine(l), { implementation: "cpython", line: l, eolDate: Option.none(), isEol }];
    })
  );

export const fetchError = (url: string, message = "HTTP 503"): FetchError =>
  new FetchError({ code: ErrorCode.FETCH_FAILED, message, url });

// ─────────────────────────────────────────────────────────────────────────────
// Service Fakes
// ─────────────────────────────────────────────────────────────────────────────

/** "hang" never completes, for cancellation tests. */
export type CatalogAnswer = ReadonlyArray<Release> | FetchError | "hang";

export const fakeCatalog = (answers: Partial<Record<ImplementationId, CatalogAnswer>>): Layer.Layer<ReleaseCatalog> =>
  Layer.succeed(ReleaseCatalog, {
    fetchReleases: (impl) => {
      const answer = answers[impl.id] ?? [];
      if (answer === "hang") {
        return Effect.never;
      }
      return answer instanceof FetchError ? Effect.fail(answer) : Effect.succeed(answer);
    },
  });

export const fakeEolRegistry = (answer: EolSnapshot | FetchError): Layer.Layer<EolRegistry> =>
  Layer.succeed(EolRegistry, {
    fetchEolRecords: () => (answer instanceof FetchError ? Effect.fail(answer) : Effect.succeed(answer)),
  });

/** Serves canned documents by URL; anything else is a 404 FetchError. */
export const fakeJsonSource = (documents: Readonly<Record<string, unknown>>): Layer.Layer<JsonSource> =>
  Layer.succeed(JsonSource, {
    getJson: (url) =>
      url in documents ? Effect.succeed(documents[url]) : Effect.fail(fetchError(url, `GET ${url} failed: 404`)),
  });
