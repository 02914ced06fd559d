// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Runner platform inference and release/runner compatibility.
 *
 * Labels follow GitHub-hosted runner naming. Self-hosted or unusual labels
 * leave the platform unset unless given explicitly as "label=os/arch"; an
 * unset dimension matches every file.
 */

import { Array as Arr, Either, Option, pipe } from "effect";
import type { FileDescriptor, Release } from "../catalog";
import { ConfigError, ErrorCode } from "../lib/errors";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export const OPERATING_SYSTEMS = ["linux", "windows", "macos"] as const;
export type OperatingSystem = (typeof OPERATING_SYSTEMS)[number];

export const ARCHITECTURES = ["x86", "x64", "arm64"] as const;
export type Architecture = (typeof ARCHITECTURES)[number];

export interface Runner {
  readonly name: string;
  readonly os: Option.Option<OperatingSystem>;
  readonly arch: Option.Option<Architecture>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────────────────────

const OS_ALIASES: Readonly<Record<string, OperatingSystem>> = {
  linux: "linux",
  windows: "windows",
  win32: "windows",
  win64: "windows",
  macos: "macos",
  darwin: "macos",
  osx: "macos",
};

const ARCH_ALIASES: Readonly<Record<string, Architecture>> = {
  x86: "x86",
  i686: "x86",
  ia32: "x86",
  x64: "x64",
  x86_64: "x64",
  amd64: "x64",
  arm64: "arm64",
  aarch64: "arm64",
};

const FREETHREADED_SUFFIX = "-freethreaded";

export const normalizeOs = (name: string): Option.Option<OperatingSystem> =>
  Option.fromNullable(OS_ALIASES[name.trim().toLowerCase()]);

export const normalizeArch = (name: string): Option.Option<Architecture> => {
  const lower = name.trim().toLowerCase();
  const base = lower.endsWith(FREETHREADED_SUFFIX) ? lower.slice(0, -FREETHREADED_SUFFIX.length) : lower;
  return Option.fromNullable(ARCH_ALIASES[base]);
};

// ─────────────────────────────────────────────────────────────────────────────
// Runner Inference
// ─────────────────────────────────────────────────────────────────────────────

/** First macOS image that runs on Apple silicon by default. */
const FIRST_ARM_MACOS = 14;

const inferOs = (label: string): Option.Option<OperatingSystem> =>
  Arr.findFirst(OPERATING_SYSTEMS, (os) =>
    label.startsWith(os === "linux" ? "ubuntu-" : `${os}-`)
  );

const macosArch = (label: string): Option.Option<Architecture> => {
  if (label.endsWith("-xlarge") || label === "macos-latest") {
    return Option.some("arm64");
  }
  if (label.endsWith("-large") || label.endsWith("-intel")) {
    return Option.some("x64");
  }
  return pipe(
    Option.fromNullable(label.split("-")[1]),
    Option.filter((n) => n.length > 0 && Array.from(n).every((c) => c >= "0" && c <= "9")),
    Option.map((n): Architecture => (Number.parseInt(n, 10) >= FIRST_ARM_MACOS ? "arm64" : "x64"))
  );
};

/**
 * ubuntu-* / windows-* / macos-* with the architecture GitHub documents for
 * each image. Unknown labels infer nothing.
 */
export const inferRunner = (label: string): Runner => {
  const name = label.trim();
  const lower = name.toLowerCase();
  const os = inferOs(lower);
  const arch = pipe(
    os,
    Option.flatMap((o): Option.Option<Architecture> => {
      if (lower.includes("-arm")) {
        return Option.some("arm64");
      }
      return o === "macos" ? macosArch(lower) : Option.some("x64");
    })
  );
  return { name, os, arch };
};

const invalidRunner = (text: string, reason: string): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_VALIDATION_ERROR,
    message: `Invalid runner "${text}": ${reason}`,
    path: "runners",
  });

/** "label=os/arch" or "label=os". Both parts must be known names. */
const parseExplicit = (text: string, label: string, platform: string): Either.Either<Runner, ConfigError> => {
  const [osText = "", archText] = platform.split("/");
  return pipe(
    normalizeOs(osText),
    Either.fromOption(() => invalidRunner(text, `unknown operating system "${osText}"`)),
    Either.flatMap((os) =>
      archText === undefined
        ? Either.right<Runner>({ name: label, os: Option.some(os), arch: Option.none() })
        : pipe(
            normalizeArch(archText),
            Either.fromOption(() => invalidRunner(text, `unknown architecture "${archText}"`)),
            Either.map((arch): Runner => ({ name: label, os: Option.some(os), arch: Option.some(arch) }))
          )
    )
  );
};

export const parseRunner = (text: string): Either.Either<Runner, ConfigError> => {
  const trimmed = text.trim();
  const eq = trimmed.indexOf("=");
  if (eq === -1) {
    return trimmed.length === 0 ? Either.left(invalidRunner(text, "empty label")) : Either.right(inferRunner(trimmed));
  }
  const label = trimmed.slice(0, eq).trim();
  return label.length === 0
    ? Either.left(invalidRunner(text, "empty label"))
    : parseExplicit(text, label, trimmed.slice(eq + 1).trim());
};

export const formatPlatform = (runner: Runner): string =>
  `${Option.getOrElse(runner.os, () => "any")}/${Option.getOrElse(runner.arch, () => "any")}`;

// ─────────────────────────────────────────────────────────────────────────────
// Compatibility
// ─────────────────────────────────────────────────────────────────────────────

const dimensionMatches = <A extends string>(wanted: Option.Option<A>, actual: Option.Option<A>): boolean =>
  Option.match(wanted, {
    onNone: (): boolean => true,
    onSome: (w): boolean => Option.contains(actual, w),
  });

export const fileMatches = (file: FileDescriptor, runner: Runner): boolean =>
  dimensionMatches(runner.os, normalizeOs(file.platform)) &&
  dimensionMatches(runner.arch, normalizeArch(file.arch));

/** A release without files never matches while the check is on. */
export const isCompatible = (release: Release, runner: Runner, checkPlatform: boolean): boolean =>
  !checkPlatform || Arr.some(release.files, (file) => fileMatches(file, runner));
