// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Exit code derivation for a finished CLI run.
 */

import { ValidationError } from "@effect/cli";
import { Cause, Exit, Match, Option, pipe } from "effect";
import { ErrorCode, type ErrorCodeValue, toExitCode } from "../lib/errors";

/** Conventional exit status for a run stopped by SIGINT. */
const EXIT_INTERRUPTED = 130;

const hasCode = (v: unknown): v is { readonly code: ErrorCodeValue } =>
  typeof v === "object" && v !== null && "code" in v && typeof v.code === "number";

export const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => ErrorCode.SUCCESS,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => (Cause.isInterruptedOnly(cause) ? EXIT_INTERRUPTED : ErrorCode.GENERAL_ERROR),
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(hasCode, (v) => toExitCode(v.code)),
            Match.when(ValidationError.isValidationError, () => ErrorCode.INVALID_ARGS),
            Match.orElse(() => ErrorCode.GENERAL_ERROR)
          ),
      }),
  });
