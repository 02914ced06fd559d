// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export type { FileDescriptor, Implementation, ImplementationId, Release } from "./types";
export { releaseLabel } from "./types";
export {
  CPYTHON,
  DEFAULT_SOURCE_URLS,
  EOL_BASE_URL_DEFAULT,
  IMPLEMENTATIONS,
  PYPY,
  type SourceUrls,
  catalogUrlFor,
  eolUrlFor,
  findImplementation,
  lookupImplementation,
} from "./implementations";
export { cpythonReleases, isFreethreadedFile, pypyReleases, splitByThreading } from "./decode";
export {
  ReleaseCatalog,
  ReleaseCatalogLive,
  type ReleaseCatalogOptions,
  type ReleaseCatalogService,
  makeReleaseCatalog,
} from "./client";
