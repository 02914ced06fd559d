// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * ReleaseCatalog service using Context.Tag pattern.
 * One fetch per call, no caching and no retries.
 */

import { type Duration, Context, Effect, Layer, Match, pipe } from "effect";
import { type FetchError, withFetchContext } from "../lib/errors";
import { JsonSource } from "../lib/http";
import { decodeWith, documentSchemaError } from "../lib/schema-utils";
import { cpythonReleases, pypyReleases } from "./decode";
import { type SourceUrls, catalogUrlFor } from "./implementations";
import { CpythonManifestSchema, PypyManifestSchema } from "./schema";
import type { Implementation, Release } from "./types";

export interface ReleaseCatalogService {
  readonly fetchReleases: (impl: Implementation) => Effect.Effect<ReadonlyArray<Release>, FetchError>;
}

export interface ReleaseCatalog {
  readonly _tag: "ReleaseCatalog";
}

export const ReleaseCatalog: Context.Tag<ReleaseCatalog, ReleaseCatalogService> = Context.GenericTag<
  ReleaseCatalog,
  ReleaseCatalogService
>("python-matrix/ReleaseCatalog");

export interface ReleaseCatalogOptions {
  readonly urls: SourceUrls;
  readonly timeout: Duration.DurationInput;
}

const decodeDocument = (
  impl: Implementation,
  url: string,
  document: unknown
): Effect.Effect<ReadonlyArray<Release>, FetchError> => {
  const onError = documentSchemaError(`${impl.name} release index`, url);
  return pipe(
    Match.value(impl.id),
    Match.when("cpython", () =>
      Effect.flatMap(decodeWith(CpythonManifestSchema, document, onError), cpythonReleases)
    ),
    Match.when("pypy", () => Effect.flatMap(decodeWith(PypyManifestSchema, document, onError), pypyReleases)),
    Match.exhaustive
  );
};

export const makeReleaseCatalog = (
  source: Context.Tag.Service<typeof JsonSource>,
  options: ReleaseCatalogOptions
): ReleaseCatalogService => ({
  fetchReleases: (impl): Effect.Effect<ReadonlyArray<Release>, FetchError> => {
    const url = catalogUrlFor(options.urls, impl.id);
    return pipe(
      Effect.logDebug(`Fetching ${impl.name} release index`),
      Effect.zipRight(source.getJson(url, options.timeout)),
      Effect.flatMap((document) => decodeDocument(impl, url, document)),
      Effect.tap((releases) => Effect.logDebug(`${impl.name}: ${releases.length} releases in catalog`)),
      Effect.mapError(withFetchContext(`${impl.name} release catalog`)),
      Effect.annotateLogs({ implementation: impl.id })
    );
  },
});

export const ReleaseCatalogLive = (
  options: ReleaseCatalogOptions
): Layer.Layer<ReleaseCatalog, never, JsonSource> =>
  Layer.effect(
    ReleaseCatalog,
    Effect.map(JsonSource, (source) => makeReleaseCatalog(source, options))
  );
