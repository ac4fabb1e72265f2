/**
 * GCC/Clang toolchain
 *
 * Writes the unit to a scratch directory, compiles and links it with the
 * harness on the include path, and returns the diagnostics. The build
 * output is discarded; only whether it links matters.
 */

import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";

import { ProviderError, ToolchainError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { splitDiagnosticOutput } from "./diagnostics.js";
import { getHarnessDir } from "./harness.js";
import type { CompileOptions, CompileResult, Toolchain } from "./types.js";

export interface GccToolchainOptions {
  /** Compiler binary (default cc) */
  compiler?: string;
  /** Flags after the defaults (-std=c11 -Wall) */
  flags?: readonly string[];
  includeDirs?: readonly string[];
  /** Directory with unity.h (and optionally unity.c); bundled header by default */
  harnessDir?: string;
  timeoutMs?: number;
}

interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  killed: boolean;
  missing: boolean;
}

const DEFAULT_FLAGS = ["-std=c11", "-Wall"];

function runCommand(cmd: string, args: string[], cwd: string, timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolveResult) => {
    execFile(cmd, args, { cwd, timeout: timeoutMs, maxBuffer: 1024 * 1024 }, (error, stdout, stderr) => {
      resolveResult({
        stdout: stdout ?? "",
        stderr: stderr ?? "",
        exitCode: error ? (typeof error.code === "number" ? error.code : 1) : 0,
        killed: error?.killed === true,
        missing: error?.code === "ENOENT",
      });
    });
  });
}

export class GccToolchain implements Toolchain {
  private readonly log = logger.child("Toolchain");
  private readonly compiler: string;
  private readonly flags: readonly string[];
  private readonly includeDirs: readonly string[];
  private readonly harnessDir: string;
  private readonly timeoutMs: number;

  constructor(options: GccToolchainOptions = {}) {
    this.compiler = options.compiler ?? "cc";
    this.flags = options.flags ?? [];
    this.includeDirs = (options.includeDirs ?? []).map((dir) => resolve(dir));
    this.harnessDir = resolve(options.harnessDir ?? getHarnessDir());
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async compile(unit: string, options: CompileOptions = {}): Promise<CompileResult> {
    const workDir = await mkdtemp(join(tmpdir(), "ctestgen-"));

    try {
      await writeFile(join(workDir, "unit.c"), unit, "utf-8");

      const includeArgs = [this.harnessDir, ...this.includeDirs, ...(options.includeDirs ?? [])].map(
        (dir) => `-I${resolve(dir)}`
      );
      const harnessSource = join(this.harnessDir, "unity.c");
      const sources = existsSync(harnessSource) ? ["unit.c", harnessSource] : ["unit.c"];
      const args = [...DEFAULT_FLAGS, ...this.flags, ...includeArgs, ...sources, "-o", "unit.out", "-lm"];

      this.log.debug(`${this.compiler} ${args.join(" ")}`);
      const result = await runCommand(this.compiler, args, workDir, this.timeoutMs);

      if (result.missing) {
        throw new ToolchainError(`Compiler not found: ${this.compiler}`, { compiler: this.compiler });
      }
      if (result.killed) {
        throw new ProviderError("timeout", `Compilation did not finish within ${this.timeoutMs}ms`, {
          compiler: this.compiler,
        });
      }

      return {
        success: result.exitCode === 0,
        diagnostics: splitDiagnosticOutput(`${result.stderr}\n${result.stdout}`),
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
