// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either } from "effect";
import { describe, expect, test } from "vitest";
import {
  fileMatches,
  formatPlatform,
  inferRunner,
  isCompatible,
  normalizeArch,
  normalizeOs,
  parseRunner,
} from "../../src/platform";
import { DARWIN_ARM64, LINUX_X64, WIN32_X64, cpython, file } from "../helpers/fixtures";

const platformOf = (label: string): string => formatPlatform(inferRunner(label));

const parsed = (text: string): string =>
  Either.match(parseRunner(text), {
    onLeft: (e) => `error: ${e.message}`,
    onRight: (runner) => `${runner.name} ${formatPlatform(runner)}`,
  });

describe("inferRunner", () => {
  test("ubuntu and windows images default to x64", () => {
    expect(platformOf("ubuntu-latest")).toBe("linux/x64");
    expect(platformOf("ubuntu-22.04")).toBe("linux/x64");
    expect(platformOf("windows-2022")).toBe("windows/x64");
  });

  test("arm images are arm64", () => {
    expect(platformOf("ubuntu-24.04-arm")).toBe("linux/arm64");
    expect(platformOf("windows-11-arm")).toBe("windows/arm64");
  });

  test("macOS architecture follows the image generation and size", () => {
    expect(platformOf("macos-13")).toBe("macos/x64");
    expect(platformOf("macos-14")).toBe("macos/arm64");
    expect(platformOf("macos-15")).toBe("macos/arm64");
    expect(platformOf("macos-latest")).toBe("macos/arm64");
    expect(platformOf("macos-13-xlarge")).toBe("macos/arm64");
    expect(platformOf("macos-14-large")).toBe("macos/x64");
    expect(platformOf("macos-15-intel")).toBe("macos/x64");
  });

  test("unknown labels infer nothing", () => {
    expect(platformOf("self-hosted")).toBe("any/any");
  });

  test("keeps the label as written", () => {
    expect(inferRunner(" Ubuntu-Latest ").name).toBe("Ubuntu-Latest");
    expect(platformOf("Ubuntu-Latest")).toBe("linux/x64");
  });
});

describe("parseRunner", () => {
  test("plain labels are inferred", () => {
    expect(parsed("macos-14")).toBe("macos-14 macos/arm64");
  });

  test("an explicit platform accepts aliases", () => {
    expect(parsed("gpu-box=linux/x86_64")).toBe("gpu-box linux/x64");
    expect(parsed("mac-mini = darwin")).toBe("mac-mini macos/any");
    expect(parsed("build=win64/aarch64")).toBe("build windows/arm64");
  });

  test("rejects unknown names and empty labels", () => {
    expect(parsed("box=plan9/x64")).toBe('error: Invalid runner "box=plan9/x64": unknown operating system "plan9"');
    expect(parsed("box=linux/sparc")).toBe('error: Invalid runner "box=linux/sparc": unknown architecture "sparc"');
    expect(parsed("=linux")).toBe('error: Invalid runner "=linux": empty label');
    expect(parsed("")).toBe('error: Invalid runner "": empty label');
  });
});

describe("normalization", () => {
  test("maps manifest spellings", () => {
    expect(normalizeOs("win32")._tag).toBe("Some");
    expect(normalizeOs("freebsd")._tag).toBe("None");
    expect(normalizeArch("x64-freethreaded")).toEqual(normalizeArch("amd64"));
  });
});

describe("compatibility", () => {
  const linux = inferRunner("ubuntu-latest");
  const mac = inferRunner("macos-14");
  const windows = inferRunner("windows-latest");

  test("a file matches when both dimensions agree", () => {
    expect(fileMatches(LINUX_X64, linux)).toBe(true);
    expect(fileMatches(DARWIN_ARM64, mac)).toBe(true);
    expect(fileMatches(WIN32_X64, windows)).toBe(true);
    expect(fileMatches(file("linux", "x64-freethreaded"), linux)).toBe(true);
    expect(fileMatches(LINUX_X64, mac)).toBe(false);
  });

  test("a release is compatible when any file matches", () => {
    const linuxOnly = cpython("3.12.4", { files: [LINUX_X64] });
    expect(isCompatible(linuxOnly, linux, true)).toBe(true);
    expect(isCompatible(linuxOnly, mac, true)).toBe(false);
    expect(isCompatible(linuxOnly, mac, false)).toBe(true);
  });

  test("an unknown runner accepts any file but not an empty file list", () => {
    const custom = inferRunner("self-hosted");
    expect(isCompatible(cpython("3.12.4", { files: [WIN32_X64] }), custom, true)).toBe(true);
    expect(isCompatible(cpython("3.12.4", { files: [] }), custom, true)).toBe(false);
    expect(isCompatible(cpython("3.12.4", { files: [] }), custom, false)).toBe(true);
  });
});
