// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * End-of-life records per minor line, from endoflife.date.
 */

import { Array as Arr, Clock, Context, type Duration, Effect, Layer, Option, Schema, pipe } from "effect";
import { type Implementation, type ImplementationId, type SourceUrls, eolUrlFor } from "../catalog";
import { type FetchError, withFetchContext } from "../lib/errors";
import { JsonSource } from "../lib/http";
import { decodeWith, documentSchemaError } from "../lib/schema-utils";
import { type Line, formatLine, parseLine } from "../version";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface EolRecord {
  readonly implementation: ImplementationId;
  readonly line: Line;
  /** ISO date when the line goes (or went) out of support; None when the source gives a boolean. */
  readonly eolDate: Option.Option<string>;
  readonly isEol: boolean;
}

/** Records keyed by formatLine ("3.12"). */
export type EolSnapshot = ReadonlyMap<string, EolRecord>;

// ─────────────────────────────────────────────────────────────────────────────
// Document Schema
// ─────────────────────────────────────────────────────────────────────────────

/** `cycle` must be text: a JSON number 3.10 would read back as "3.1". */
export const EolCycleSchema = Schema.Struct({
  cycle: Schema.String,
  eol: Schema.Union(Schema.String, Schema.Boolean),
});

export type EolCycle = Schema.Schema.Type<typeof EolCycleSchema>;

export const EolDocumentSchema = Schema.Array(EolCycleSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Evaluation
// ─────────────────────────────────────────────────────────────────────────────

/** YYYY-MM-DD in UTC. */
export const isoDate = (millis: number): string => new Date(millis).toISOString().slice(0, 10);

/**
 * A boolean `eol` is taken as given. A date means EOL once today has reached it,
 * so a line whose support ends today is already EOL.
 */
export const isEolOn = (eol: string | boolean, today: string): boolean =>
  typeof eol === "boolean" ? eol : eol.slice(0, 10) <= today;

export const toSnapshot = (
  implementation: ImplementationId,
  cycles: ReadonlyArray<EolCycle>,
  today: string
): EolSnapshot =>
  new Map(
    Arr.filterMap(cycles, (cycle) =>
      pipe(
        parseLine(cycle.cycle),
        Option.map((l): readonly [string, EolRecord] => [
          formatLine(l),
          {
            implementation,
            line: l,
            eolDate: typeof cycle.eol === "string" ? Option.some(cycle.eol) : Option.none(),
            isEol: isEolOn(cycle.eol, today),
          },
        ])
      )
    )
  );

export const lookupEol = (snapshot: EolSnapshot, l: Line): Option.Option<EolRecord> =>
  Option.fromNullable(snapshot.get(formatLine(l)));

// ─────────────────────────────────────────────────────────────────────────────
// Service
// ─────────────────────────────────────────────────────────────────────────────

export interface EolRegistryService {
  readonly fetchEolRecords: (impl: Implementation) => Effect.Effect<EolSnapshot, FetchError>;
}

export interface EolRegistry {
  readonly _tag: "EolRegistry";
}

export const EolRegistry: Context.Tag<EolRegistry, EolRegistryService> = Context.GenericTag<
  EolRegistry,
  EolRegistryService
>("python-matrix/EolRegistry");

export interface EolRegistryOptions {
  readonly urls: SourceUrls;
  readonly timeout: Duration.DurationInput;
}

export const makeEolRegistry = (
  source: Context.Tag.Service<typeof JsonSource>,
  options: EolRegistryOptions
): EolRegistryService => ({
  fetchEolRecords: (impl): Effect.Effect<EolSnapshot, FetchError> => {
    const url = eolUrlFor(options.urls, impl);
    return pipe(
      source.getJson(url, options.timeout),
      Effect.flatMap((document) =>
        decodeWith(EolDocumentSchema, document, documentSchemaError(`${impl.eolProduct} EOL`, url))
      ),
      Effect.flatMap((cycles) =>
        Effect.map(Clock.currentTimeMillis, (now) => toSnapshot(impl.id, cycles, isoDate(now)))
      ),
      Effect.mapError(withFetchContext(`${impl.name} EOL registry`)),
      Effect.annotateLogs({ implementation: impl.id })
    );
  },
});

export const EolRegistryLive = (options: EolRegistryOptions): Layer.Layer<EolRegistry, never, JsonSource> =>
  Layer.effect(
    EolRegistry,
    Effect.map(JsonSource, (source) => makeEolRegistry(source, options))
  );
