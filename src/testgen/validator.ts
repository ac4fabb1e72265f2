/**
 * Test validator
 *
 * Validates a candidate test by:
 * 1. Assembling one translation unit (harness, source under test, stubs, candidate)
 * 2. Compiling and linking it with the toolchain
 * 3. Running the static heuristics on the candidate text
 * and classifies the combined outcome.
 */

import { dirname } from "node:path";

import { blankCommentsAndLiterals } from "../analyzer/c-lexer.js";
import { ProviderError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { withTimeout } from "../lib/timeout.js";
import { renderStubs } from "../stubs/synthesizer.js";
import { parseDiagnostics } from "../toolchain/diagnostics.js";
import type { Toolchain } from "../toolchain/types.js";

import { classifyQuality } from "./classifier.js";
import { extractVoidFunctions, runHeuristics } from "./heuristics.js";
import type { Issue, TestContext, ValidationResult } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface ValidatorOptions {
  minAssertions: number;
  comprehensiveDensity: number;
  testNamePattern: string;
  compileTimeoutMs: number;
}

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
  minAssertions: 2,
  comprehensiveDensity: 1,
  testNamePattern: "^test_[A-Za-z0-9_]+$",
  compileTimeoutMs: 30000,
};

/** Name the source's own main is renamed to inside the test unit */
export const SOURCE_MAIN_ALIAS = "ctestgen_source_main";

const STUBS_FILE = "ctestgen_stubs.c";
const GLUE_FILE = "ctestgen_harness.c";

function lineMarker(file: string): string {
  return `#line 1 "${file.replace(/\\/g, "/")}"`;
}

// =============================================================================
// UNIT ASSEMBLY
// =============================================================================

/**
 * One compilable unit: harness include, the source under test with its
 * main renamed, the stubs, then the candidate. `#line` markers keep
 * diagnostics pointing at the file they came from.
 */
export function assembleUnit(candidate: string, ctx: TestContext): string {
  const parts = [
    '#include "unity.h"',
    `#define main ${SOURCE_MAIN_ALIAS}`,
    lineMarker(ctx.unit.path),
    ctx.unit.text.trimEnd(),
    "#undef main",
  ];

  if (ctx.stubs.length > 0) {
    parts.push(lineMarker(STUBS_FILE), renderStubs(ctx.stubs).trimEnd());
  }

  parts.push(lineMarker(ctx.suggestedTestPath), candidate.trimEnd());

  // Unity links against setUp/tearDown; supply empty ones the candidate omitted
  const defined = new Set(extractVoidFunctions(blankCommentsAndLiterals(candidate).code).map((fn) => fn.name));
  const glue = ["setUp", "tearDown"].filter((hook) => !defined.has(hook)).map((hook) => `void ${hook}(void) {}`);
  if (glue.length > 0) {
    parts.push(lineMarker(GLUE_FILE), ...glue);
  }

  return `${parts.join("\n")}\n`;
}

// =============================================================================
// VALIDATOR
// =============================================================================

export class Validator {
  private readonly log = logger.child("Validator");
  private readonly options: ValidatorOptions;

  constructor(
    private readonly toolchain: Toolchain,
    options: Partial<ValidatorOptions> = {}
  ) {
    this.options = { ...DEFAULT_VALIDATOR_OPTIONS, ...options };
  }

  /**
   * Compile failures are results, not exceptions. Throws only when the
   * toolchain cannot run (ToolchainError) or overruns (ProviderError).
   */
  async validate(candidate: string, ctx: TestContext): Promise<ValidationResult> {
    const unit = assembleUnit(candidate, ctx);
    const compile = await withTimeout(
      this.toolchain.compile(unit, { includeDirs: [dirname(ctx.unit.path)] }),
      this.options.compileTimeoutMs,
      () => new ProviderError("timeout", `Compilation did not finish within ${this.options.compileTimeoutMs}ms`)
    );

    const diagnostics = parseDiagnostics(compile.diagnostics, compile.success);
    const compileIssues: Issue[] = diagnostics.flatMap((d): Issue[] => {
      if (d.severity === "error") {
        return [{ kind: "compile-error", severity: "blocking", description: d.message }];
      }
      // Only warnings located in the candidate become issues
      if (d.severity === "warning" && d.message.startsWith(`${ctx.suggestedTestPath}:`)) {
        return [{ kind: "compile-warning", severity: "warning", description: d.message }];
      }
      return [];
    });

    const heuristics = runHeuristics(candidate, ctx, {
      minAssertions: this.options.minAssertions,
      testNamePattern: this.options.testNamePattern,
    });

    const branchCount = Math.max(1, ctx.target.branchCount);
    const metrics = {
      assertionCount: heuristics.assertionCount,
      testFunctionCount: heuristics.testFunctions.length,
      branchCount,
      assertionDensity: heuristics.assertionCount / branchCount,
      comprehensiveDensity: this.options.comprehensiveDensity,
    };

    const partial = {
      compiled: compile.success,
      diagnostics,
      issues: [...compileIssues, ...heuristics.issues],
      metrics,
    };
    const tier = classifyQuality(partial);

    this.log.debug(
      `${ctx.target.name}: compiled=${String(compile.success)} issues=${partial.issues.length} tier=${tier}`
    );

    return { ...partial, tier };
  }
}
