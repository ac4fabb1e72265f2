/**
 * Static checks on candidate test source
 *
 * Everything here inspects text only. The candidate is blanked of comments
 * and literal contents first, so commented-out assertions do not count.
 */

import { blankCommentsAndLiterals, splitTopLevel } from "../analyzer/c-lexer.js";

import { reachableInUnit } from "./context.js";
import type { Issue, TestContext } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface HeuristicOptions {
  minAssertions: number;
  /** Regex source the test function names must match */
  testNamePattern: string;
}

export interface CandidateFunction {
  name: string;
  body: string;
  offset: number;
}

export interface HeuristicReport {
  issues: Issue[];
  assertionCount: number;
  testFunctions: CandidateFunction[];
}

const HOOK_NAMES = new Set(["setUp", "tearDown", "suiteSetUp", "suiteTearDown", "main"]);

const VOID_FUNCTION_RE = /\bvoid\s+([A-Za-z_]\w*)\s*\(\s*(?:void)?\s*\)\s*\{/g;
const RUN_TEST_RE = /\bRUN_TEST\s*\(\s*([A-Za-z_]\w*)/g;
const ASSERTION_RE = /\bTEST_ASSERT\w*\s*\(/g;
const FLOAT_EQUALITY_RE = /\bTEST_ASSERT_EQUAL_(?:FLOAT|DOUBLE)\s*\(/;
const ZERO_ARG_RE = /^[-+]?(?:0[xX]0+|0+\.?0*|\.0+)[uUlLfF]*$|^NULL$|^\(\w[\w\s*]*\)\s*0$/;
const ABSOLUTE_ZERO_RE = /-273\.15f?/;
const HUGE_LITERAL_RE = /\b\d+(?:\.\d*)?[eE]\+?(\d+)/g;
const MAIN_CALL_RE = /\bmain\s*\(/;
const EDGE_CASE_WORDS = ["min", "max", "zero", "negative", "boundary", "edge", "limit"];
const BITFIELD_RE =
  /\b(?:unsigned|signed|int|char|short|long|_Bool|bool|u?int(?:8|16|32|64)_t)\s+([A-Za-z_]\w*)\s*:\s*\d+\s*[;,]/g;

interface EmbeddedFeature {
  /** Matched against the source the target reaches */
  used: RegExp;
  /** Matched against the candidate; a hit means the feature is exercised */
  exercised: RegExp;
  uses: string;
  lacks: string;
}

const EMBEDDED_FEATURES: readonly EmbeddedFeature[] = [
  {
    used: /\bvolatile\b/,
    exercised: /\bvolatile\b/,
    uses: "touches volatile registers",
    lacks: "declares no volatile state",
  },
  {
    used: /\bswitch\s*\([^)]*[Ss]tate[^)]*\)|\b[A-Z0-9_]*STATE_[A-Z0-9_]+\b/,
    exercised: /transition|state_change|next_state|\b[A-Z0-9_]*STATE_[A-Z0-9_]+\b/i,
    uses: "runs a state machine",
    lacks: "checks no state transition",
  },
  {
    used: /\btmr|triple|\bvot(?:e|es|ing)\b|majority/i,
    exercised: /aaa|aab|abc|fault|disagree/i,
    uses: "votes between redundant values",
    lacks: "covers no disagreeing or faulty input",
  },
  {
    used: /watchdog|\bwdt|\bwdog/i,
    exercised: /timeout|feed|reset_prevent/i,
    uses: "services a watchdog",
    lacks: "checks neither feeding nor timeout",
  },
  {
    used: /dma|interrupt|irq|\bisr/i,
    exercised: /register|peripheral|mock|stub/i,
    uses: "drives DMA or interrupts",
    lacks: "simulates no hardware interaction",
  },
  {
    used: /\bmmio|\(\s*volatile\b[^)]*\*\s*\)\s*\(?\s*0[xX][0-9a-fA-F]+/i,
    exercised: /[&|^]=|read|write/i,
    uses: "accesses memory-mapped registers",
    lacks: "verifies no register access",
  },
];

// =============================================================================
// CANDIDATE STRUCTURE
// =============================================================================

function closingBrace(code: string, open: number): number {
  let depth = 0;
  for (let i = open; i < code.length; i++) {
    const ch = code.charAt(i);
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return code.length;
}

/**
 * `void name(void) { ... }` definitions in source order
 */
export function extractVoidFunctions(code: string): CandidateFunction[] {
  const functions: CandidateFunction[] = [];
  for (const match of code.matchAll(VOID_FUNCTION_RE)) {
    const open = (match.index ?? 0) + match[0].length - 1;
    const close = closingBrace(code, open);
    functions.push({ name: match[1] ?? "", body: code.slice(open + 1, close), offset: match.index ?? 0 });
  }
  return functions;
}

/**
 * Test functions: those registered with RUN_TEST plus any other
 * `void f(void)` that asserts, excluding Unity hooks
 */
export function extractTestFunctions(code: string): CandidateFunction[] {
  const registered = new Set([...code.matchAll(RUN_TEST_RE)].map((m) => m[1] ?? ""));
  return extractVoidFunctions(code).filter(
    (fn) =>
      !HOOK_NAMES.has(fn.name) &&
      (registered.has(fn.name) || /\bTEST_(?:ASSERT\w*|FAIL\w*|PASS\w*|IGNORE\w*)\s*\(/.test(fn.body))
  );
}

export function countAssertions(code: string): number {
  return code.match(ASSERTION_RE)?.length ?? 0;
}

/**
 * Argument lists of every call to `name`, whitespace-normalized
 */
export function extractCallArguments(code: string, name: string): string[][] {
  const calls: string[][] = [];
  const re = new RegExp(`\\b${name}\\s*\\(`, "g");
  for (const match of code.matchAll(re)) {
    const open = (match.index ?? 0) + match[0].length - 1;
    let depth = 0;
    let close = -1;
    for (let i = open; i < code.length; i++) {
      const ch = code.charAt(i);
      if (ch === "(") depth++;
      else if (ch === ")") {
        depth--;
        if (depth === 0) {
          close = i;
          break;
        }
      }
    }
    if (close === -1) continue;
    calls.push(splitTopLevel(code.slice(open + 1, close)).map((arg) => arg.replace(/\s+/g, " ")));
  }
  return calls;
}

// =============================================================================
// CHECKS
// =============================================================================

function checkValues(code: string, context: TestContext): Issue[] {
  const issues: Issue[] = [];
  const target = context.target.name;
  const calls = extractCallArguments(code, target).filter((args) => args.length > 0);

  if (calls.length > 0 && calls.every((args) => args.every((arg) => ZERO_ARG_RE.test(arg)))) {
    issues.push({
      kind: "unrealistic-values",
      severity: "warning",
      description: `Every call to ${target}() uses all-zero arguments`,
    });
  } else if (calls.length >= 2) {
    const first = calls[0]?.join(", ");
    if (calls.every((args) => args.join(", ") === first)) {
      issues.push({
        kind: "unrealistic-values",
        severity: "warning",
        description: `All ${calls.length} calls to ${target}() use identical arguments (${first})`,
      });
    }
  }

  if (ABSOLUTE_ZERO_RE.test(code)) {
    issues.push({
      kind: "unrealistic-values",
      severity: "warning",
      description: "Uses -273.15 (absolute zero), a physically impossible input",
    });
  }

  const huge = [...code.matchAll(HUGE_LITERAL_RE)].find((m) => Number(m[1]) >= 10);
  if (huge) {
    issues.push({
      kind: "unrealistic-values",
      severity: "warning",
      description: `Uses ${huge[0]}, an extreme magnitude likely to overflow`,
    });
  }

  return issues;
}

function checkIsolation(code: string, context: TestContext): Issue[] {
  const { stubs: stubVars, globals } = context.externalState;
  if (stubVars.length === 0 && globals.length === 0) {
    return [];
  }

  const hooks = new Map(extractVoidFunctions(code).map((fn) => [fn.name, fn.body]));
  const missing = ["setUp", "tearDown"].filter((hook) => !hooks.has(hook));
  if (missing.length > 0) {
    const state = [
      ...(stubVars.length > 0 ? [`stubs: ${stubVars.join(", ")}`] : []),
      ...(globals.length > 0 ? [`globals: ${globals.join(", ")}`] : []),
    ].join("; ");
    return [
      {
        kind: "isolation",
        severity: "warning",
        description: `${context.target.name}() depends on external state (${state}) but the test has no ${missing.map((m) => `${m}()`).join(" or ")}`,
      },
    ];
  }

  const teardown = hooks.get("tearDown") ?? "";
  const unreset = stubVars.filter((v) => !new RegExp(`\\b${v}\\b`).test(teardown));
  if (unreset.length > 0) {
    return [
      {
        kind: "isolation",
        severity: "warning",
        description: `tearDown() does not reset stub control structs: ${unreset.join(", ")}`,
      },
    ];
  }
  return [];
}

/**
 * Source text of the target and the unit functions it reaches, with the
 * types of the parameters and globals they use
 */
function reachedSource(context: TestContext): string {
  const functions = reachableInUnit(context.target, context.unit);
  const globals = new Set(functions.flatMap((fn) => fn.globalsReferenced));
  return [
    ...functions.map((fn) => fn.body ?? ""),
    ...functions.flatMap((fn) => fn.parameters.map((p) => p.type)),
    ...context.unit.globals.filter((g) => globals.has(g.name)).map((g) => g.type),
  ].join("\n");
}

function checkEmbedded(code: string, context: TestContext): Issue[] {
  const source = reachedSource(context);
  const target = context.target.name;
  const issues: Issue[] = [];

  for (const feature of EMBEDDED_FEATURES) {
    if (feature.used.test(source) && !feature.exercised.test(code)) {
      issues.push({
        kind: "embedded",
        severity: "warning",
        description: `${target}() ${feature.uses} but the test ${feature.lacks}`,
      });
    }
  }

  const { code: unitCode } = blankCommentsAndLiterals(context.unit.text);
  const bitfields = [...unitCode.matchAll(BITFIELD_RE)].map((m) => m[1] ?? "");
  const usedFields = bitfields.filter((field) => new RegExp(`(?:\\.|->)\\s*${field}\\b`).test(source));
  if (usedFields.length > 0 && !/<<|>>|~|[&|^]\s*0[xX]?[0-9a-fA-F]+/.test(code)) {
    issues.push({
      kind: "embedded",
      severity: "warning",
      description: `${target}() uses bit fields (${usedFields.join(", ")}) but the test performs no bit operations`,
    });
  }

  return issues;
}

function checkMainCalls(code: string): Issue[] {
  return extractVoidFunctions(code)
    .filter((fn) => fn.name !== "main" && MAIN_CALL_RE.test(fn.body))
    .map((fn): Issue => ({
      kind: "main-call",
      severity: "blocking",
      description: `${fn.name}() calls main(), which is the test runner's entry point`,
    }));
}

function checkEdgeCases(tests: readonly CandidateFunction[]): Issue[] {
  if (tests.length < 2) {
    return [];
  }
  const named = tests.some((test) => EDGE_CASE_WORDS.some((word) => test.name.toLowerCase().includes(word)));
  if (named) {
    return [];
  }
  return [
    {
      kind: "edge-cases",
      severity: "info",
      description: `No test is named for an edge case (${EDGE_CASE_WORDS.join(", ")})`,
    },
  ];
}

function checkContradictions(tests: readonly CandidateFunction[]): Issue[] {
  const issues: Issue[] = [];
  for (const test of tests) {
    const truthy = new Set<string>();
    const falsy = new Set<string>();
    for (const [args, bucket] of [
      [extractCallArguments(test.body, "TEST_ASSERT_TRUE"), truthy],
      [extractCallArguments(test.body, "TEST_ASSERT"), truthy],
      [extractCallArguments(test.body, "TEST_ASSERT_FALSE"), falsy],
    ] as const) {
      for (const call of args) {
        const expr = call[0];
        if (expr !== undefined) bucket.add(expr.replace(/\s+/g, ""));
      }
    }
    const contradicted = [...truthy].filter((expr) => falsy.has(expr));
    for (const expr of contradicted) {
      issues.push({
        kind: "contradiction",
        severity: "warning",
        description: `${test.name}() asserts ${expr} both true and false`,
      });
    }
  }
  return issues;
}

function checkNaming(tests: readonly CandidateFunction[], pattern: string): Issue[] {
  const re = new RegExp(pattern);
  const offenders = tests.map((t) => t.name).filter((name) => !re.test(name));
  if (offenders.length === 0) {
    return [];
  }
  return [
    {
      kind: "convention",
      severity: "info",
      description: `Test function names do not match /${pattern}/: ${offenders.join(", ")}`,
    },
  ];
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function runHeuristics(
  candidate: string,
  context: TestContext,
  options: HeuristicOptions
): HeuristicReport {
  const { code } = blankCommentsAndLiterals(candidate);
  const target = context.target;
  const tests = extractTestFunctions(code);
  const assertionCount = countAssertions(code);
  const issues: Issue[] = [];

  if (tests.length === 0) {
    issues.push({ kind: "no-tests", severity: "blocking", description: "No test functions found" });
  }

  if (candidate.includes("```")) {
    issues.push({
      kind: "markdown",
      severity: "blocking",
      description: "Markdown code fences (```) left in the C source",
    });
  }

  if (!new RegExp(`\\b${target.name}\\s*\\(`).test(code)) {
    issues.push({
      kind: "target-not-called",
      severity: "blocking",
      description: `The test never calls ${target.name}()`,
    });
  }

  const required = Math.max(options.minAssertions, target.branchCount);
  if (assertionCount < required) {
    issues.push({
      kind: "insufficient-coverage",
      severity: "warning",
      description: `Only ${assertionCount} assertion(s) for ${target.name}() with ${target.branchCount} branch(es); expected at least ${required}`,
    });
  }

  issues.push(...checkValues(code, context));

  if (FLOAT_EQUALITY_RE.test(code)) {
    issues.push({
      kind: "float-equality",
      severity: "warning",
      description: "TEST_ASSERT_EQUAL_FLOAT/DOUBLE compares floating point exactly; use TEST_ASSERT_FLOAT_WITHIN or TEST_ASSERT_DOUBLE_WITHIN",
    });
  }

  issues.push(...checkMainCalls(code));
  issues.push(...checkIsolation(code, context));
  issues.push(...checkContradictions(tests));
  issues.push(...checkEmbedded(code, context));
  issues.push(...checkEdgeCases(tests));
  issues.push(...checkNaming(tests, options.testNamePattern));

  return { issues, assertionCount, testFunctions: tests };
}
