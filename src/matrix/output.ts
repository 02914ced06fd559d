// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Matrix serialization for GitHub Actions `strategy.matrix`.
 */

import { Array as Arr, Match, pipe } from "effect";
import type { OutputFormat } from "../config/field-values";
import type { MatrixEntry } from "./types";

export interface IncludeEntry {
  readonly runner: string;
  readonly "python-version": string;
}

export interface ExcludeMatrix {
  readonly runner: ReadonlyArray<string>;
  readonly "python-version": ReadonlyArray<string>;
  readonly exclude: ReadonlyArray<IncludeEntry>;
}

const toInclude = (entry: MatrixEntry): IncludeEntry => ({
  runner: entry.runner,
  "python-version": entry.version,
});

/** `matrix: { include: <this> }`. Order is the builder's order. */
export const toIncludeList = (entries: ReadonlyArray<MatrixEntry>): ReadonlyArray<IncludeEntry> =>
  entries.map(toInclude);

/**
 * Cross product of every runner and every version, minus the pairs the
 * builder did not produce. Both axes keep first-appearance order.
 */
export const toExcludeMatrix = (entries: ReadonlyArray<MatrixEntry>): ExcludeMatrix => {
  const runners = Arr.dedupe(entries.map((e) => e.runner));
  const versions = Arr.dedupe(entries.map((e) => e.version));
  const present = new Set(entries.map((e) => JSON.stringify([e.runner, e.version])));
  const exclude = runners.flatMap((runner) =>
    versions
      .filter((v) => !present.has(JSON.stringify([runner, v])))
      .map((v): IncludeEntry => ({ runner, "python-version": v }))
  );
  return { runner: runners, "python-version": versions, exclude };
};

/** Single-line JSON, ready for `fromJSON()` in a workflow. */
export const renderMatrix = (entries: ReadonlyArray<MatrixEntry>, format: OutputFormat): string =>
  pipe(
    Match.value(format),
    Match.when("include", () => JSON.stringify(toIncludeList(entries))),
    Match.when("matrix", () => JSON.stringify(toExcludeMatrix(entries))),
    Match.exhaustive
  );
