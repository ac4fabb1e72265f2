/**
 * ctestgen - AI-driven Unity test generation for C codebases
 *
 * @packageDocumentation
 */

export { VERSION } from "./version.js";

// Library utilities
export {
  // Errors
  CTestGenError,
  StructuralAnalysisError,
  ProviderError,
  ConfigurationError,
  ToolchainError,
  toError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
  Logger,
  withTimeout,
} from "./lib/index.js";

export type { Result, LogLevel, ProviderErrorKind } from "./lib/index.js";

// Source analysis
export {
  analyzeSources,
  selectTargets,
  parseSourceUnit,
  DependencyGraph,
  functionKey,
} from "./analyzer/index.js";

export type {
  AnalysisResult,
  SourceFile,
  FunctionSignature,
  Parameter,
  SourceUnit,
} from "./analyzer/index.js";

// Stubs
export { StubSynthesizer, planStubs, renderStubs } from "./stubs/index.js";
export type { StubPlan, StubSpec } from "./stubs/index.js";

// Generation, validation and regeneration
export {
  buildTestContext,
  buildGenerationPrompt,
  generateCandidate,
  postProcessCandidate,
  Validator,
  classifyQuality,
  compareTiers,
  meetsThreshold,
  RegenerationController,
  IllegalTransitionError,
} from "./testgen/index.js";

export type {
  ControllerOptions,
  ControllerResult,
  ControllerState,
  GenerationAttempt,
  Issue,
  QualityTier,
  TestContext,
  ValidationResult,
  ValidatorOptions,
} from "./testgen/index.js";

// Pipeline
export { runPipeline, ReportAggregator } from "./pipeline/index.js";
export type { PipelineOptions, PipelineReport, PipelineRun, TargetReport } from "./pipeline/index.js";

// Providers and toolchains
export { AIService, createAIService } from "./ai/index.js";
export type { AIConfig, AIProvider, GenerationProvider } from "./ai/index.js";
export { GccToolchain } from "./toolchain/index.js";
export type { CompileResult, Toolchain } from "./toolchain/index.js";

// Configuration
export { ConfigSchema, loadConfig, parseConfig } from "./config/index.js";
export type { Config } from "./config/index.js";
