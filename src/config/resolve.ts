// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Source precedence for a single setting: CLI, then environment, then the
 * config file, then the built-in default.
 */

import { Option, pipe } from "effect";

export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly file: Option.Option<A>;
  readonly fallback: A;
}

export const resolveOption = <A>(field: Omit<ConfigField<A>, "fallback">): Option.Option<A> =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.orElse(() => field.file)
  );

export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    resolveOption(field),
    Option.getOrElse(() => field.fallback)
  );
