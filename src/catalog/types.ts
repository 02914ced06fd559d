// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Release catalog data types.
 */

import { Option, pipe } from "effect";
import { type Version, formatVersion } from "../version";

export type ImplementationId = "cpython" | "pypy";

export interface Implementation {
  readonly id: ImplementationId;
  /** Display name, also the canonical spelling in config ("CPython"). */
  readonly name: string;
  /** Default release index; configuration may point elsewhere. */
  readonly catalogUrl: string;
  /** endoflife.date product whose cycles govern this implementation's lines. */
  readonly eolProduct: string;
}

/** One downloadable artifact, fields as published by the index. */
export interface FileDescriptor {
  readonly filename: string;
  readonly platform: string;
  readonly arch: string;
}

export interface Release {
  readonly implementation: ImplementationId;
  /** Python language version; carries the free-threaded flag. */
  readonly version: Version;
  /**
   * The index's own spelling of the version ("3.14.0-alpha.1"). setup-python
   * matches against these strings, so labels reuse it when present.
   */
  readonly published: Option.Option<string>;
  /** The implementation's own release number (PyPy), None for CPython. */
  readonly build: Option.Option<Version>;
  readonly files: ReadonlyArray<FileDescriptor>;
  readonly prerelease: boolean;
  readonly freethreaded: boolean;
}

/**
 * Version string as actions/setup-python accepts it:
 * "3.12.4", "3.13.1t", "3.14.0-alpha.1", "pypy-3.10-v7.3.17".
 */
export const releaseLabel = (release: Release): string =>
  pipe(
    release.build,
    Option.match({
      onNone: (): string =>
        pipe(
          release.published,
          Option.match({
            onNone: (): string => formatVersion(release.version),
            onSome: (text): string => (release.freethreaded && !text.endsWith("t") ? `${text}t` : text),
          })
        ),
      onSome: (build): string =>
        `${release.implementation}-${release.version.major}.${release.version.minor}-v${formatVersion(build)}`,
    })
  );
