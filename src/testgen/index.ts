/**
 * Test generation module
 *
 * Generates Unity tests for C functions with a provider, validates them by
 * compiling against the source under test plus synthesized stubs, rates
 * their quality and regenerates with corrective feedback until a candidate
 * is accepted or the attempt budget runs out.
 */

export { buildTestContext, reachableInUnit, suggestTestPath, suggestTestPaths } from "./context.js";
export type { ContextOptions } from "./context.js";

export {
  buildGenerationPrompt,
  formatSignature,
  generateCandidate,
  postProcessCandidate,
  stripMarkdownFences,
} from "./generator.js";
export type { GenerateOptions, PromptOptions } from "./generator.js";

export { Validator, assembleUnit, DEFAULT_VALIDATOR_OPTIONS, SOURCE_MAIN_ALIAS } from "./validator.js";
export type { ValidatorOptions } from "./validator.js";

export { classifyQuality, compareTiers, meetsThreshold, blockingIssueCount, QUALITY_TIERS } from "./classifier.js";
export type { ClassifierInput } from "./classifier.js";

export { runHeuristics, countAssertions, extractTestFunctions } from "./heuristics.js";
export type { HeuristicOptions, HeuristicReport } from "./heuristics.js";

export { createFeedbackBundle, renderFeedback, formatIssue, correctiveInstructions } from "./feedback.js";
export { redactSensitive } from "./redact.js";

export {
  RegenerationController,
  IllegalTransitionError,
  selectBestAttempt,
  TRANSITIONS,
} from "./controller.js";
export type { CandidateValidator, ControllerOptions } from "./controller.js";

export type {
  AttemptOutcome,
  ControllerResult,
  ControllerState,
  Diagnostic,
  ExternalState,
  FeedbackBundle,
  GenerationAttempt,
  Issue,
  IssueKind,
  IssueSeverity,
  QualityTier,
  TerminalState,
  TestContext,
  ValidationMetrics,
  ValidationResult,
} from "./types.js";
