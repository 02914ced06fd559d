// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Known interpreter implementations and their default data sources.
 */

import { Array as Arr, Either, Option, pipe } from "effect";
import { ConfigError, ErrorCode } from "../lib/errors";
import type { Implementation, ImplementationId } from "./types";

export const CPYTHON: Implementation = {
  id: "cpython",
  name: "CPython",
  catalogUrl: "https://raw.githubusercontent.com/actions/python-versions/main/versions-manifest.json",
  eolProduct: "python",
};

export const PYPY: Implementation = {
  id: "pypy",
  name: "PyPy",
  catalogUrl: "https://downloads.python.org/pypy/versions.json",
  // PyPy releases are keyed by the Python line they implement.
  eolProduct: "python",
};

export const IMPLEMENTATIONS: ReadonlyArray<Implementation> = [CPYTHON, PYPY];

export const EOL_BASE_URL_DEFAULT = "https://endoflife.date/api";

/** Where each remote document lives. */
export interface SourceUrls {
  readonly cpython: string;
  readonly pypy: string;
  readonly eolBaseUrl: string;
}

export const DEFAULT_SOURCE_URLS: SourceUrls = {
  cpython: CPYTHON.catalogUrl,
  pypy: PYPY.catalogUrl,
  eolBaseUrl: EOL_BASE_URL_DEFAULT,
};

export const catalogUrlFor = (urls: SourceUrls, id: ImplementationId): string => urls[id];

export const eolUrlFor = (urls: SourceUrls, impl: Implementation): string =>
  `${urls.eolBaseUrl.replace(/\/+$/, "")}/${impl.eolProduct}.json`;

/** Case-insensitive lookup: "CPython", "cpython" and "CPYTHON" are the same. */
export const findImplementation = (name: string): Option.Option<Implementation> =>
  Arr.findFirst(IMPLEMENTATIONS, (impl) => impl.id === name.trim().toLowerCase());

export const lookupImplementation = (name: string): Either.Either<Implementation, ConfigError> =>
  pipe(
    findImplementation(name),
    Either.fromOption(
      () =>
        new ConfigError({
          code: ErrorCode.UNKNOWN_IMPLEMENTATION,
          message: `Unknown implementation "${name}". Known: ${IMPLEMENTATIONS.map((i) => i.name).join(", ")}`,
        })
    )
  );
