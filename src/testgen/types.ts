/**
 * Test Generation Types
 */

import type { FunctionSignature, SourceUnit } from "../analyzer/types.js";
import type { CTestGenError } from "../lib/errors.js";
import type { StubSpec } from "../stubs/types.js";

// =============================================================================
// CONTEXT
// =============================================================================

/**
 * State a test must reset between cases: stub control structs of the
 * externals the target reaches, and the globals it reads or writes
 */
export interface ExternalState {
  stubs: string[];
  globals: string[];
}

/**
 * Everything one generation run for one target function needs. Built once
 * per target and reused across attempts, so stubs stay byte-identical.
 */

export interface TestContext {
  target: FunctionSignature;
  unit: SourceUnit;
  /** Functions the target calls directly */
  directDependencies: FunctionSignature[];
  /** Transitive callees of the target, excluding direct ones */
  indirectDependencies: FunctionSignature[];
  stubs: StubSpec[];
  /** Callee names with no usable signature */
  unresolved: string[];
  externalState: ExternalState;
  /** Test framework harness the candidate builds against */
  harness: "unity";
  /** File name of the generated test, e.g. test_sensor_read_sensor.c */
  suggestedTestPath: string;
  /** Source text embedded in the prompt (redacted when configured) */
  promptSource: string;
}

// =============================================================================
// VALIDATION
// =============================================================================

export type QualityTier = "high" | "medium" | "low";

export type IssueSeverity = "blocking" | "warning" | "info";

export type IssueKind =
  | "compile-error"
  | "compile-warning"
  | "no-tests"
  | "markdown"
  | "target-not-called"
  | "insufficient-coverage"
  | "unrealistic-values"
  | "float-equality"
  | "isolation"
  | "contradiction"
  | "embedded"
  | "main-call"
  | "edge-cases"
  | "convention";

export interface Issue {
  kind: IssueKind;
  severity: IssueSeverity;
  description: string;
}

export interface Diagnostic {
  severity: "error" | "warning" | "note";
  /** Compiler output for this diagnostic, verbatim */
  message: string;
}

export interface ValidationMetrics {
  assertionCount: number;
  testFunctionCount: number;
  /** Decision points of the target plus one */
  branchCount: number;
  /** assertionCount / branchCount */
  assertionDensity: number;
  /** Density at or above which a clean result is comprehensive */
  comprehensiveDensity: number;
}

export interface ValidationResult {
  compiled: boolean;
  diagnostics: Diagnostic[];
  issues: Issue[];
  metrics: ValidationMetrics;
  tier: QualityTier;
}

// =============================================================================
// REGENERATION
// =============================================================================

export type AttemptOutcome = "pending" | "compiled" | "failed";

export interface GenerationAttempt {
  /** 1-based */
  number: number;
  prompt: string;
  candidate: string | undefined;
  outcome: AttemptOutcome;
  validation: ValidationResult | undefined;
  error: CTestGenError | undefined;
}

/**
 * Issues of a previous attempt, carried into the next prompt
 */
export interface FeedbackBundle {
  attempt: number;
  tier: QualityTier;
  issues: Issue[];
}

export type ControllerState =
  | "pending"
  | "attempting"
  | "evaluating"
  | "accepted"
  | "exhausted_warn"
  | "exhausted_fail";

export type TerminalState = Extract<ControllerState, "accepted" | "exhausted_warn" | "exhausted_fail">;

export interface ControllerResult {
  target: FunctionSignature;
  finalState: TerminalState;
  attempts: GenerationAttempt[];
  /** Attempt whose candidate is kept, if any */
  selected: GenerationAttempt | undefined;
  tier: QualityTier | undefined;
  accepted: boolean;
  degraded: boolean;
  /** States visited in order, starting with pending */
  history: ControllerState[];
  error: string | undefined;
}
