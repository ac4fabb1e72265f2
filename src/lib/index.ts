// Error classes
export {
  CTestGenError,
  StructuralAnalysisError,
  ProviderError,
  ConfigurationError,
  ToolchainError,
  toError,
} from "./errors.js";
export type { ProviderErrorKind } from "./errors.js";

// Result type and utilities
export {
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
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger } from "./logger.js";
export type { LogLevel } from "./logger.js";

export { withTimeout } from "./timeout.js";
