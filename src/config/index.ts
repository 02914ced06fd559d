// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Configuration module exports.
 */

export {
  type BooleanInput,
  type ConstraintInput,
  type InputSources,
  type ListInput,
  emptyConstraintInput,
  parseBooleanInput,
  parseBoundSpec,
  parseImplementations,
  parseList,
  parseRunners,
  toConstraint,
} from "./constraint";
export { ENV_NAMESPACE, EnvConfigSpec, createTestConfigProvider, loadEnvInputs } from "./env";
export * from "./field-values";
export { loadFileInputs, loadTomlFile } from "./loader";
export { type ConfigField, resolve, resolveOption } from "./resolve";
export { type FileConfig, fileConfigSchema, fileToInputLayer } from "./schema";
export {
  type InputLayer,
  type InputLayers,
  type LoggingSettings,
  type Settings,
  type SourcesInput,
  emptyInputLayer,
  resolveLogging,
  resolveSettings,
} from "./settings";
