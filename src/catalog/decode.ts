// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Decoded index entries to Release values.
 *
 * An entry publishing both standard and "-freethreaded" files becomes two
 * releases that share the version numbers and differ in the free-threaded
 * flag, each keeping only its own files. Entries whose versions do not parse
 * (nightlies, malformed tags) are skipped with a debug log.
 */

import { Array as Arr, Effect, Either, Option, pipe } from "effect";
import { type Version, isPreRelease, parseVersion, withFreethreaded } from "../version";
import type { CpythonEntry, PypyEntry } from "./schema";
import type { FileDescriptor, ImplementationId, Release } from "./types";

const FREETHREADED_SUFFIX = "-freethreaded";

export const isFreethreadedFile = (file: FileDescriptor): boolean =>
  file.arch.toLowerCase().endsWith(FREETHREADED_SUFFIX);

const toFile = (file: FileDescriptor): FileDescriptor => ({
  filename: file.filename,
  platform: file.platform,
  arch: file.arch,
});

interface EntryBase {
  readonly implementation: ImplementationId;
  readonly version: Version;
  readonly published: Option.Option<string>;
  readonly build: Option.Option<Version>;
  readonly stable: boolean;
}

/**
 * One release per threading model that has files. An entry with no files at
 * all still yields its standard release so the platform filter can reject it.
 */
export const splitByThreading = (
  base: EntryBase,
  files: ReadonlyArray<FileDescriptor>
): ReadonlyArray<Release> => {
  const [standard, freethreaded] = Arr.partition(files.map(toFile), isFreethreadedFile);
  const make = (ft: boolean, own: ReadonlyArray<FileDescriptor>): Release => ({
    implementation: base.implementation,
    version: withFreethreaded(base.version, ft),
    published: base.published,
    build: base.build,
    files: own,
    prerelease: !base.stable || isPreRelease(base.version),
    freethreaded: ft,
  });
  if (files.length === 0) {
    return [make(false, [])];
  }
  return [
    ...(standard.length > 0 ? [make(false, standard)] : []),
    ...(freethreaded.length > 0 ? [make(true, freethreaded)] : []),
  ];
};

const parseOrSkip = (implementation: ImplementationId, text: string): Effect.Effect<Option.Option<Version>> =>
  Either.match(parseVersion(text), {
    onLeft: (e): Effect.Effect<Option.Option<Version>> =>
      pipe(
        Effect.logDebug(`Skipping catalog entry: ${e.message}`),
        Effect.annotateLogs({ implementation }),
        Effect.as(Option.none())
      ),
    onRight: (v): Effect.Effect<Option.Option<Version>> => Effect.succeed(Option.some(v)),
  });

export const cpythonReleases = (
  entries: ReadonlyArray<CpythonEntry>
): Effect.Effect<ReadonlyArray<Release>> =>
  pipe(
    Effect.forEach(entries, (entry) =>
      pipe(
        parseOrSkip("cpython", entry.version),
        Effect.map(
          Option.match({
            onNone: (): ReadonlyArray<Release> => [],
            onSome: (v): ReadonlyArray<Release> =>
              splitByThreading(
                {
                  implementation: "cpython",
                  version: v,
                  published: Option.some(entry.version.trim()),
                  build: Option.none(),
                  stable: entry.stable,
                },
                entry.files
              ),
          })
        )
      )
    ),
    Effect.map(Arr.flatten)
  );

export const pypyReleases = (entries: ReadonlyArray<PypyEntry>): Effect.Effect<ReadonlyArray<Release>> =>
  pipe(
    Effect.forEach(entries, (entry) =>
      pipe(
        Effect.all([parseOrSkip("pypy", entry.python_version), parseOrSkip("pypy", entry.pypy_version)]),
        Effect.map(([python, pypy]) =>
          pipe(
            Option.all([python, pypy]),
            Option.match({
              onNone: (): ReadonlyArray<Release> => [],
              onSome: ([v, build]): ReadonlyArray<Release> =>
                splitByThreading(
                  {
                    implementation: "pypy",
                    version: v,
                    published: Option.none(),
                    build: Option.some(build),
                    stable: entry.stable && !isPreRelease(build),
                  },
                  entry.files
                ),
            })
          )
        )
      )
    ),
    Effect.map(Arr.flatten)
  );
