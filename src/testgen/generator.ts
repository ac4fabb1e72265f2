/**
 * AI-powered test generator
 *
 * Builds the generation prompt for one target function, makes exactly one
 * provider call per attempt, and normalizes the reply into a C test file
 * that builds against the Unity harness.
 */

import { basename } from "node:path";

import type { GenerationProvider } from "../ai/types.js";
import { blankCommentsAndLiterals } from "../analyzer/c-lexer.js";
import type { FunctionSignature } from "../analyzer/types.js";
import { ProviderError } from "../lib/errors.js";
import { withTimeout } from "../lib/timeout.js";
import { declare } from "../stubs/c-types.js";

import { renderFeedback } from "./feedback.js";
import { extractTestFunctions } from "./heuristics.js";
import type { FeedbackBundle, TestContext } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface PromptOptions {
  minAssertions: number;
  testNamePattern: string;
}

export interface GenerateOptions {
  timeoutMs: number;
}

// =============================================================================
// PROMPTS
// =============================================================================

/**
 * C declaration of a signature, e.g. `int clamp(int v, int lo, int hi)`
 */
export function formatSignature(sig: FunctionSignature): string {
  if (sig.opaque) {
    return `${sig.name} (declarator not parsed)`;
  }
  const params = sig.parameters.map((p, i) => declare(p.type, p.name ?? `arg${i}`));
  if (sig.variadic) params.push("...");
  return `${declare(sig.returnType, sig.name)}(${params.length > 0 ? params.join(", ") : "void"})`;
}

function describeDependency(sig: FunctionSignature, ctx: TestContext): string {
  const stubbed = ctx.stubs.some((s) => s.name === sig.name);
  const where = sig.isDefinition ? `defined in ${sig.unitPath}` : `declared in ${sig.unitPath}`;
  return `- \`${formatSignature(sig)}\` (${where}${stubbed ? ", stubbed" : ""})`;
}

/**
 * Deterministic for identical context and options; only the feedback
 * section changes between attempts.
 */
export function buildGenerationPrompt(
  ctx: TestContext,
  options: PromptOptions,
  feedback?: FeedbackBundle
): string {
  const target = ctx.target;
  const parts: string[] = [];
  const required = Math.max(options.minAssertions, target.branchCount);

  parts.push("Generate a complete Unity unit test file in C for one function.");
  parts.push("");

  parts.push("## Function Under Test");
  parts.push(`Function name: ${target.name}`);
  parts.push(`Signature: \`${formatSignature(target)}\``);
  parts.push(`Parameter count: ${target.parameters.length}`);
  parts.push(`Defined in: ${ctx.unit.path} (line ${target.line})`);
  parts.push(`Branches: ${target.branchCount}`);
  if (target.isStatic) {
    parts.push("The function is static; it is visible to the test because the source is compiled into the same translation unit.");
  }
  if (target.globalsReferenced.length > 0) {
    parts.push(`File-scope globals it uses: ${target.globalsReferenced.join(", ")}`);
  }
  parts.push("");

  parts.push(`## Source (${ctx.unit.path})`);
  parts.push(`/* ==== BEGIN ${ctx.unit.path} ==== */`);
  parts.push(ctx.promptSource.trimEnd());
  parts.push(`/* ==== END ${ctx.unit.path} ==== */`);
  parts.push("");

  parts.push("## Dependencies");
  if (ctx.directDependencies.length === 0 && ctx.indirectDependencies.length === 0) {
    parts.push("None. The function calls no other analyzed function.");
  } else {
    if (ctx.directDependencies.length > 0) {
      parts.push("Direct:");
      parts.push(...ctx.directDependencies.map((dep) => describeDependency(dep, ctx)));
    }
    if (ctx.indirectDependencies.length > 0) {
      parts.push("Indirect:");
      parts.push(...ctx.indirectDependencies.map((dep) => describeDependency(dep, ctx)));
    }
  }
  parts.push("");

  parts.push("## Provided Stubs");
  if (ctx.stubs.length === 0) {
    parts.push("None. Do not write any stubs.");
  } else {
    parts.push("These stubs are compiled ahead of your file. Do NOT define these functions. Control and inspect them through their structs:");
    for (const stub of ctx.stubs) {
      parts.push(`- \`${formatSignature(stub.signature)}\` -> \`${stub.controlType} ${stub.controlVar}\` { ${stub.controlFields.join("; ")}; }`);
    }
  }
  parts.push("");

  if (ctx.unresolved.length > 0) {
    parts.push("## Unresolved Calls");
    parts.push("No signature was found for these; they come from the C library or are unavailable:");
    parts.push(...ctx.unresolved.map((name) => `- ${name}`));
    parts.push("");
  }

  parts.push("## Build");
  parts.push(
    `Your file is compiled as ${ctx.suggestedTestPath} in one translation unit after \`#include "unity.h"\`, ` +
      "the source above (its main renamed to ctestgen_source_main) and the stubs. " +
      "Static functions, types and file-scope globals of the source are therefore visible."
  );
  parts.push("");

  parts.push("## Requirements");
  parts.push("1. Output ONLY the complete C test file. No explanations, no markdown fences.");
  parts.push('2. Start with #include "unity.h". Do not #include the .c file under test.');
  parts.push(`3. Name every test function to match /${options.testNamePattern}/ and register each with RUN_TEST in main() between UNITY_BEGIN() and UNITY_END().`);
  parts.push("4. Define setUp() and tearDown(); reset every stub control struct (memset to zero) in both.");
  parts.push(`5. Write at least ${required} assertions so that each of the ${target.branchCount} branch(es) is exercised and checked.`);
  parts.push("6. Compare floats with TEST_ASSERT_FLOAT_WITHIN and an explicit tolerance; never TEST_ASSERT_EQUAL_FLOAT.");
  parts.push("7. Use realistic, varied inputs derived from the source; no all-zero or repeated argument sets, no physically impossible values.");
  parts.push("8. Never assert the same expression both TRUE and FALSE.");
  parts.push("");

  parts.push("## Feedback From Previous Attempt");
  parts.push(feedback ? renderFeedback(feedback) : "None. This is the first attempt.");

  return parts.join("\n");
}

// =============================================================================
// AI GENERATION
// =============================================================================

/**
 * One provider call under a timeout. Empty replies are malformed.
 */
export async function generateCandidate(
  provider: GenerationProvider,
  prompt: string,
  options: GenerateOptions
): Promise<string> {
  const raw = await withTimeout(
    provider.generate(prompt),
    options.timeoutMs,
    () => new ProviderError("timeout", `Provider did not respond within ${options.timeoutMs}ms`)
  );

  if (raw.trim().length === 0) {
    throw new ProviderError("malformed_response", "Provider returned an empty response");
  }
  return raw;
}

// =============================================================================
// POST-PROCESSING
// =============================================================================

const MACRO_FIXES: ReadonlyArray<[RegExp, string]> = [
  [/\bTEST_ASSERT_GREATER_THAN_EQUAL_INT\b/g, "TEST_ASSERT_GREATER_OR_EQUAL_INT"],
  [/\bTEST_ASSERT_LESS_THAN_EQUAL_INT\b/g, "TEST_ASSERT_LESS_OR_EQUAL_INT"],
];

const EQUAL_FLOAT_RE = /\bTEST_ASSERT_EQUAL_FLOAT\s*\(\s*([^,()]+?)\s*,\s*((?:[^()]|\([^()]*\))+?)\s*\)/g;

/**
 * Remove lines that are only a markdown fence, plus any wrapping fence
 */
export function stripMarkdownFences(content: string): string {
  return content
    .trim()
    .split("\n")
    .filter((line) => !/^\s*```[\w+-]*\s*$/.test(line))
    .join("\n")
    .trim();
}

export function postProcessCandidate(raw: string, ctx: TestContext): string {
  let code = stripMarkdownFences(raw);

  const unitFile = basename(ctx.unit.path);
  code = code
    .split("\n")
    .filter((line) => {
      const include = /^\s*#\s*include\s*"([^"]+)"/.exec(line);
      return !(include && basename(include[1] ?? "") === unitFile);
    })
    .join("\n");

  if (!/^\s*#\s*include\s*[<"]unity\.h[">]/m.test(code)) {
    code = `#include "unity.h"\n${code}`;
  }

  code = code.replace(EQUAL_FLOAT_RE, "TEST_ASSERT_FLOAT_WITHIN(0.01f, $1, $2)");
  for (const [pattern, replacement] of MACRO_FIXES) {
    code = code.replace(pattern, replacement);
  }

  const blanked = blankCommentsAndLiterals(code).code;
  if (!/\bint\s+main\s*\(/.test(blanked)) {
    const tests = extractTestFunctions(blanked);
    code = [
      code.trimEnd(),
      "",
      "int main(void)",
      "{",
      "    UNITY_BEGIN();",
      ...tests.map((t) => `    RUN_TEST(${t.name});`),
      "    return UNITY_END();",
      "}",
    ].join("\n");
  }

  return `${code.trimEnd()}\n`;
}
