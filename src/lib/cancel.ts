// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Run-wide cancellation. A token bundles an optional AbortSignal and an
 * optional deadline; either one ends the guarded effect with CancelledError
 * and interrupts it, which aborts any in-flight HTTP request.
 */

import { Duration, Effect, Option, pipe } from "effect";
import { CancelledError, ErrorCode } from "./errors";

export interface CancellationToken {
  readonly signal?: AbortSignal;
  readonly deadline?: Duration.DurationInput;
}

const cancelled = (message: string): CancelledError =>
  new CancelledError({ code: ErrorCode.CANCELLED, message });

/** Fails once the signal aborts; never succeeds. */
export const awaitAbort = (signal: AbortSignal): Effect.Effect<never, CancelledError> =>
  Effect.async<never, CancelledError>((resume) => {
    const reason = (): string =>
      signal.reason instanceof Error ? signal.reason.message : "aborted by signal";
    if (signal.aborted) {
      resume(Effect.fail(cancelled(`Run cancelled: ${reason()}`)));
      return;
    }
    const onAbort = (): void => resume(Effect.fail(cancelled(`Run cancelled: ${reason()}`)));
    signal.addEventListener("abort", onAbort, { once: true });
    return Effect.sync(() => signal.removeEventListener("abort", onAbort));
  });

export const withCancellation =
  (token: CancellationToken) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E | CancelledError, R> => {
    const guarded = pipe(
      Option.fromNullable(token.signal),
      Option.match({
        onNone: (): Effect.Effect<A, E, R> => effect,
        onSome: (signal): Effect.Effect<A, E | CancelledError, R> =>
          Effect.raceFirst(effect, awaitAbort(signal)),
      })
    );
    return pipe(
      Option.fromNullable(token.deadline),
      Option.match({
        onNone: (): Effect.Effect<A, E | CancelledError, R> => guarded,
        onSome: (deadline): Effect.Effect<A, E | CancelledError, R> =>
          Effect.timeoutFail(guarded, {
            duration: deadline,
            onTimeout: () =>
              cancelled(
                `Run cancelled: deadline of ${Duration.toMillis(Duration.decode(deadline))}ms exceeded`
              ),
          }),
      })
    );
  };

/**
 * AbortSignal tied to SIGINT/SIGTERM. The listeners are removed once the
 * returned release function runs.
 */
export const processTerminationSignal = (): { readonly signal: AbortSignal; readonly release: () => void } => {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => (): void => controller.abort(new Error(`received ${name}`));
  const onInt = onSignal("SIGINT");
  const onTerm = onSignal("SIGTERM");
  process.once("SIGINT", onInt);
  process.once("SIGTERM", onTerm);
  return {
    signal: controller.signal,
    release: (): void => {
      process.off("SIGINT", onInt);
      process.off("SIGTERM", onTerm);
    },
  };
};
