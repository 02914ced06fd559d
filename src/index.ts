// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * python-matrix: CI build matrix generator for Python versions.
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Option } from "effect";
import { exitCodeFromExit } from "./cli/exit";
import { makeCli } from "./cli/index";
import { processTerminationSignal } from "./lib/cancel";
import { ErrorCode } from "./lib/errors";

/** Defects only: expected failures were already logged by the command runner. */
const logDefect = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => {
          if (!Cause.isInterruptedOnly(cause)) {
            process.stderr.write(`Unexpected error: ${Cause.pretty(cause)}\n`);
          }
        },
        onSome: (): void => undefined,
      }),
  });

async function main(): Promise<number> {
  const termination = processTerminationSignal();
  try {
    const program = makeCli({ signal: termination.signal })(process.argv);
    const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(NodeContext.layer)));
    logDefect(exit);
    return exitCodeFromExit(exit);
  } finally {
    termination.release();
  }
}

// exitCode rather than exit(): stdout may still be draining into a pipe.
main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`Unexpected error: ${String(e)}\n`);
    process.exitCode = ErrorCode.GENERAL_ERROR;
  }
);
