// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Matrix assembly: fetch, resolve, filter, order, dedupe.
 *
 * Fetches run concurrently and only that phase is raced against cancellation;
 * everything after it is pure and finishes immediately. Output order is
 * runner (as given), then implementation (as given), then release ascending.
 */

import { Array as Arr, Effect, Either, Option, pipe } from "effect";
import { type Implementation, ReleaseCatalog, type Release, releaseLabel } from "../catalog";
import { EolRegistry, type EolSnapshot } from "../eol";
import { withCancellation } from "../lib/cancel";
import {
  type CancelledError,
  EmptyMatrixError,
  ErrorCode,
  type FetchError,
  type ResolvedRangeError,
} from "../lib/errors";
import { type Runner, formatPlatform, isCompatible } from "../platform";
import {
  type ResolvedRange,
  formatBound,
  formatBoundSpec,
  isAuto,
  latestPerLine,
  resolveRange,
  selectReleases,
} from "../resolve";
import type { BuildOptions, Constraint, MatrixEntry } from "./types";

export type BuildError = EmptyMatrixError | FetchError | ResolvedRangeError | CancelledError;

interface Fetched {
  readonly implementation: Implementation;
  readonly catalog: Either.Either<ReadonlyArray<Release>, FetchError>;
  readonly eol: Option.Option<Either.Either<EolSnapshot, FetchError>>;
}

interface Selected {
  readonly range: ResolvedRange;
  readonly releases: ReadonlyArray<Release>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Fetch Phase
// ─────────────────────────────────────────────────────────────────────────────

const fetchAll = (
  constraint: Constraint
): Effect.Effect<ReadonlyArray<Fetched>, never, ReleaseCatalog | EolRegistry> =>
  Effect.gen(function* () {
    const catalog = yield* ReleaseCatalog;
    const registry = yield* EolRegistry;
    const needsEol = isAuto(constraint.minVersion);

    return yield* Effect.all(
      constraint.implementations.map((implementation) =>
        Effect.all(
          {
            implementation: Effect.succeed(implementation),
            catalog: Effect.either(catalog.fetchReleases(implementation)),
            eol: needsEol
              ? Effect.asSome(Effect.either(registry.fetchEolRecords(implementation)))
              : Effect.succeedNone,
          },
          { concurrency: "unbounded" }
        )
      ),
      { concurrency: "unbounded" }
    );
  });

/** Log and drop unavailable EOL data; resolution then falls back to the catalog. */
const usableEol = (fetched: Fetched): Effect.Effect<Option.Option<EolSnapshot>> =>
  Option.match(fetched.eol, {
    onNone: (): Effect.Effect<Option.Option<EolSnapshot>> => Effect.succeedNone,
    onSome: Either.match({
      onLeft: (e): Effect.Effect<Option.Option<EolSnapshot>> =>
        pipe(
          Effect.logWarning(`EOL data unavailable, auto min-version falls back to the oldest release: ${e.message}`),
          Effect.annotateLogs({ implementation: fetched.implementation.id }),
          Effect.as(Option.none())
        ),
      onRight: (snapshot): Effect.Effect<Option.Option<EolSnapshot>> => Effect.succeed(Option.some(snapshot)),
    }),
  });

// ─────────────────────────────────────────────────────────────────────────────
// Assembly
// ─────────────────────────────────────────────────────────────────────────────

const entryKey = (entry: MatrixEntry): string => `${entry.runner}\u0000${entry.implementation}\u0000${entry.version}`;

/** First occurrence wins. */
export const dedupeEntries = (entries: ReadonlyArray<MatrixEntry>): Array<MatrixEntry> => {
  const seen = new Set<string>();
  return entries.filter((entry) => {
    const key = entryKey(entry);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
};

const entriesForRunner = (
  runner: Runner,
  selected: ReadonlyArray<Selected>,
  checkPlatform: boolean
): Array<MatrixEntry> =>
  selected.flatMap(({ releases }) =>
    releases
      .filter((release) => isCompatible(release, runner, checkPlatform))
      .map(
        (release): MatrixEntry => ({
          runner: runner.name,
          implementation: release.implementation,
          version: releaseLabel(release),
        })
      )
  );

const describeRequest = (constraint: Constraint): string =>
  `runners [${constraint.runners.map((r) => r.name).join(", ")}], ` +
  `implementations [${constraint.implementations.map((i) => i.name).join(", ")}], ` +
  `min-version ${formatBoundSpec(constraint.minVersion)}, max-version ${formatBoundSpec(constraint.maxVersion)}`;

const emptyMatrix = (constraint: Constraint): EmptyMatrixError =>
  new EmptyMatrixError({
    code: ErrorCode.EMPTY_MATRIX,
    message: `No Python versions match ${describeRequest(constraint)}`,
  });

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

export const buildMatrix = (
  constraint: Constraint,
  options: BuildOptions = {}
): Effect.Effect<ReadonlyArray<MatrixEntry>, BuildError, ReleaseCatalog | EolRegistry> =>
  Effect.gen(function* () {
    const fetched = yield* withCancellation(options.cancellation ?? {})(fetchAll(constraint));

    const available = yield* Effect.filter(fetched, (f) =>
      Either.match(f.catalog, {
        onLeft: (e): Effect.Effect<boolean> =>
          pipe(
            Effect.logWarning(`Excluding ${f.implementation.name}: ${e.message}`),
            Effect.annotateLogs({ implementation: f.implementation.id }),
            Effect.as(false)
          ),
        onRight: (): Effect.Effect<boolean> => Effect.succeed(true),
      })
    );

    const failures = Arr.getLefts(fetched.map((f) => f.catalog));
    if (available.length === 0 && Arr.isNonEmptyArray(failures)) {
      return yield* Effect.fail(Arr.headNonEmpty(failures));
    }

    const selected = yield* Effect.forEach(available, (f) =>
      Effect.gen(function* () {
        const releases = Either.getOrElse(f.catalog, (): ReadonlyArray<Release> => []);
        const eol = yield* usableEol(f);
        const range = yield* resolveRange(constraint, releases, eol, f.implementation);
        const inRange = selectReleases(constraint, range, releases);
        const kept = constraint.latestPerLine ? latestPerLine(inRange) : inRange;
        yield* pipe(
          Effect.logDebug(
            `Range ${formatBound(range.min)} .. ${formatBound(range.max)}: ${kept.length} of ${releases.length} releases selected`
          ),
          Effect.annotateLogs({ implementation: f.implementation.id })
        );
        return { range, releases: kept } satisfies Selected;
      })
    );

    const perRunner = yield* Effect.forEach(constraint.runners, (runner) => {
      const entries = entriesForRunner(runner, selected, constraint.checkPlatform);
      return entries.length === 0
        ? pipe(
            Effect.logWarning(`Runner ${runner.name} (${formatPlatform(runner)}) has no compatible releases`),
            Effect.as(entries)
          )
        : Effect.succeed(entries);
    });

    const matrix = dedupeEntries(perRunner.flat());
    return matrix.length === 0 ? yield* Effect.fail(emptyMatrix(constraint)) : matrix;
  });
