/**
 * Turns the issues of one attempt into the feedback section of the next
 * prompt. Every issue is listed verbatim; instructions follow, one per
 * distinct issue kind, in the order the kinds first appear.
 */

import type { FeedbackBundle, Issue, IssueKind, ValidationResult } from "./types.js";

const CORRECTIONS: Record<IssueKind, string> = {
  "compile-error":
    "Fix every compiler and linker error quoted above. Use only the functions, types and stub control structs that exist; do not redefine functions that are already provided.",
  "compile-warning": "Remove the causes of the compiler warnings quoted above.",
  "no-tests": "Write at least one `void test_...(void)` function and register each with RUN_TEST in main().",
  markdown: "Output plain C only, with no markdown code fences.",
  "target-not-called": "Call the function under test directly in every test.",
  "insufficient-coverage":
    "Add assertions so that every branch of the function under test is exercised and its result checked.",
  "unrealistic-values":
    "Use realistic, varied inputs derived from the source (ranges, thresholds, #defines); avoid all-zero, repeated or physically impossible values.",
  "float-equality": "Compare floating point values with TEST_ASSERT_FLOAT_WITHIN or TEST_ASSERT_DOUBLE_WITHIN and an explicit tolerance.",
  isolation:
    "Define setUp() and tearDown() and reset every stub control struct (memset to zero) in both so tests are independent.",
  contradiction: "Remove contradictory assertions; each expression must be asserted consistently.",
  embedded:
    "Exercise the hardware behavior the source relies on: declare volatile state, check bit operations, state transitions, voting with faulty inputs, watchdog feeding and timeout, and simulated register or interrupt activity as applicable.",
  "main-call": "Never call main(); call the function under test directly.",
  "edge-cases": "Add tests for edge cases such as minimum, maximum, zero and negative inputs, and name them accordingly.",
  convention: "Rename test functions to match the required naming pattern.",
};

export function formatIssue(issue: Issue): string {
  return `- [${issue.severity}] ${issue.kind}: ${issue.description}`;
}

export function correctiveInstructions(issues: readonly Issue[]): string[] {
  const kinds: IssueKind[] = [];
  for (const issue of issues) {
    if (!kinds.includes(issue.kind)) {
      kinds.push(issue.kind);
    }
  }
  return kinds.map((kind) => CORRECTIONS[kind]);
}

export function createFeedbackBundle(attempt: number, validation: ValidationResult): FeedbackBundle {
  return { attempt, tier: validation.tier, issues: [...validation.issues] };
}

/**
 * Prompt section for a feedback bundle
 */
export function renderFeedback(bundle: FeedbackBundle): string {
  const lines = [
    `PREVIOUS ATTEMPT (#${bundle.attempt}) WAS RATED ${bundle.tier.toUpperCase()} WITH THESE ISSUES. FIX ALL OF THEM:`,
    ...bundle.issues.map(formatIssue),
  ];
  if (bundle.issues.length === 0) {
    lines.push("- no issues reported; add more assertions per branch of the function under test");
  }

  const instructions = correctiveInstructions(bundle.issues);
  if (instructions.length > 0) {
    lines.push("", "Corrections required:", ...instructions.map((text, i) => `${i + 1}. ${text}`));
  }

  return lines.join("\n");
}
