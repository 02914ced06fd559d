// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export {
  ARCHITECTURES,
  type Architecture,
  OPERATING_SYSTEMS,
  type OperatingSystem,
  type Runner,
  fileMatches,
  formatPlatform,
  inferRunner,
  isCompatible,
  normalizeArch,
  normalizeOs,
  parseRunner,
} from "./compat";
