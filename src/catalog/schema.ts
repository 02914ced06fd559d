// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schemas for the upstream release indexes. Only the fields the
 * catalog reads are declared; unknown keys are ignored.
 */

import { Schema } from "effect";

// ─────────────────────────────────────────────────────────────────────────────
// CPython: actions/python-versions versions-manifest.json
// ─────────────────────────────────────────────────────────────────────────────

export const ManifestFileSchema = Schema.Struct({
  filename: Schema.String,
  arch: Schema.String,
  platform: Schema.String,
  platform_version: Schema.optional(Schema.String),
  download_url: Schema.optional(Schema.String),
});

export const CpythonEntrySchema = Schema.Struct({
  version: Schema.String,
  stable: Schema.Boolean,
  files: Schema.Array(ManifestFileSchema),
});

export type CpythonEntry = Schema.Schema.Type<typeof CpythonEntrySchema>;

export const CpythonManifestSchema = Schema.Array(CpythonEntrySchema);

// ─────────────────────────────────────────────────────────────────────────────
// PyPy: downloads.python.org/pypy/versions.json
// ─────────────────────────────────────────────────────────────────────────────

export const PypyFileSchema = Schema.Struct({
  filename: Schema.String,
  arch: Schema.String,
  platform: Schema.String,
  download_url: Schema.optional(Schema.String),
});

export const PypyEntrySchema = Schema.Struct({
  pypy_version: Schema.String,
  python_version: Schema.String,
  stable: Schema.Boolean,
  latest_pypy: Schema.optional(Schema.Boolean),
  files: Schema.Array(PypyFileSchema),
});

export type PypyEntry = Schema.Schema.Type<typeof PypyEntrySchema>;

export const PypyManifestSchema = Schema.Array(PypyEntrySchema);
