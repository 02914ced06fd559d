// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodeContext } from "@effect/platform-node";
import { Effect, Layer } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { exitCodeFromExit } from "../../src/cli/exit";
import { makeCli } from "../../src/cli/index";
import { DARWIN_ARM64, LINUX_X64, cpython, eolSnapshot, fakeCatalog, fakeEolRegistry } from "../helpers/fixtures";

const SERVICES = Layer.merge(
  fakeCatalog({
    cpython: [
      cpython("3.11.9", { files: [LINUX_X64] }),
      cpython("3.12.0", { files: [LINUX_X64, DARWIN_ARM64] }),
      cpython("3.12.1", { files: [LINUX_X64, DARWIN_ARM64] }),
    ],
  }),
  fakeEolRegistry(eolSnapshot({ "3.11": false, "3.12": false }))
);

let stdout: Array<string>;
let stderr: Array<string>;
const savedGithubOutput = process.env["GITHUB_OUTPUT"];

beforeEach(() => {
  stdout = [];
  stderr = [];
  delete process.env["GITHUB_OUTPUT"];
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array): boolean => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array): boolean => {
    stderr.push(String(chunk));
    return true;
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  if (savedGithubOutput === undefined) {
    delete process.env["GITHUB_OUTPUT"];
  } else {
    process.env["GITHUB_OUTPUT"] = savedGithubOutput;
  }
});

const run = async (...args: Array<string>): Promise<number> => {
  const cli = makeCli({ services: () => SERVICES });
  const exit = await Effect.runPromiseExit(
    cli(["node", "python-matrix", ...args]).pipe(Effect.provide(NodeContext.layer))
  );
  return exitCodeFromExit(exit);
};

describe("generate", () => {
  test("prints the include list on stdout", async () => {
    const code = await run("generate", "--runners", "ubuntu-latest,macos-14", "--min-version", "3.12");
    expect(code).toBe(0);
    expect(stdout).toEqual([
      '[{"runner":"ubuntu-latest","python-version":"3.12.0"},' +
        '{"runner":"ubuntu-latest","python-version":"3.12.1"},' +
        '{"runner":"macos-14","python-version":"3.12.0"},' +
        '{"runner":"macos-14","python-version":"3.12.1"}]\n',
    ]);
    expect(stderr).toContain("✓ Generated 4 matrix entries across 2 runner(s)\n");
  });

  test("prints the cross-product form with --format matrix", async () => {
    const code = await run("generate", "--runners", "ubuntu-latest,macos-14", "--format", "matrix");
    expect(code).toBe(0);
    expect(stdout).toEqual([
      '{"runner":["ubuntu-latest","macos-14"],"python-version":["3.11.9","3.12.0","3.12.1"],' +
        '"exclude":[{"runner":"macos-14","python-version":"3.11.9"}]}\n',
    ]);
  });

  test("logs progress steps on stderr", async () => {
    await run("generate", "--runners", "ubuntu-latest", "--latest-per-line", "true");
    expect(stdout).toEqual([
      '[{"runner":"ubuntu-latest","python-version":"3.11.9"},{"runner":"ubuntu-latest","python-version":"3.12.1"}]\n',
    ]);
    expect(stderr.slice(0, 3)).toEqual([
      "[1/3] → Fetching release data for CPython\n",
      "[2/3] → Rendering 2 entries as include\n",
      "[3/3] → Writing output\n",
    ]);
  });

  test("an empty matrix exits with its error code and nothing on stdout", async () => {
    const code = await run("generate", "--runners", "windows-latest");
    expect(code).toBe(41);
    expect(stdout).toEqual([]);
    expect(stderr).toContain(
      "✗ No Python versions match runners [windows-latest], implementations [CPython], min-version auto, max-version auto\n"
    );
  });

  test("a configuration error is reported once", async () => {
    const code = await run("generate");
    expect(code).toBe(12);
    expect(stderr.filter((line) => line.startsWith("✗ "))).toEqual([
      "✗ Invalid runners: no runners given (--runners, PYTHON_MATRIX_RUNNERS or runners in the config file)\n",
    ]);
  });

  test("an invalid flag value exits with 2", async () => {
    expect(await run("generate", "--runners", "ubuntu-latest", "--include-pre-releases", "maybe")).toBe(2);
  });

  test("skips the step output when GITHUB_OUTPUT is unset", async () => {
    const code = await run("generate", "--runners", "ubuntu-latest", "--min-version", "3.12.1", "--github-output", "matrix");
    expect(code).toBe(0);
    expect(stderr).toContain('WARN  GITHUB_OUTPUT is not set; step output "matrix" was not written\n');
  });

  test("writes the step output file when GITHUB_OUTPUT is set", async () => {
    const dir = await mkdtemp(join(tmpdir(), "python-matrix-output-"));
    const outputFile = join(dir, "github_output");
    await writeFile(outputFile, "");
    process.env["GITHUB_OUTPUT"] = outputFile;
    try {
      const code = await run(
        "generate",
        "--runners",
        "ubuntu-latest",
        "--min-version",
        "3.12.1",
        "--github-output",
        "matrix"
      );
      expect(code).toBe(0);
      const written = await readFile(outputFile, "utf8");
      expect(written.startsWith("matrix<<")).toBe(true);
      expect(written).toContain('\n[{"runner":"ubuntu-latest","python-version":"3.12.1"}]\n');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("validate", () => {
  test("reports the merged configuration without fetching", async () => {
    const code = await run("validate", "--runners", "ubuntu-latest,gpu=linux/arm64", "--max-version", "3.13");
    expect(code).toBe(0);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      "INFO  Runner ubuntu-latest: linux/x64\n",
      "INFO  Runner gpu: linux/arm64\n",
      "INFO  Implementations: CPython\n",
      "INFO  Versions: auto .. 3.13\n",
      "✓ Configuration is valid\n",
    ]);
  });

  test("rejects an unknown implementation", async () => {
    const code = await run("validate", "--runners", "ubuntu-latest", "--implementations", "jython");
    expect(code).toBe(13);
    expect(stderr).toEqual(['✗ Unknown implementation "jython". Known: CPython, PyPy\n']);
  });
});
