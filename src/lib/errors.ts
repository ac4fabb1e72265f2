/**
 * Base error class for all ctestgen errors
 */
export class CTestGenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CTestGenError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or reports
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * A C file whose structure could not be recovered. Scoped to one source unit;
 * the run continues with the other files.
 */
export class StructuralAnalysisError extends CTestGenError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number,
    context?: Record<string, unknown>
  ) {
    super(message, "STRUCTURAL_ANALYSIS_ERROR", { ...context, filePath, line });
    this.name = "StructuralAnalysisError";
  }
}

export type ProviderErrorKind = "timeout" | "rate_limited" | "malformed_response";

/**
 * Failure of an external call (generation provider or toolchain process).
 * Always retryable within the attempt budget.
 */
export class ProviderError extends CTestGenError {
  readonly retryable = true;

  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, `PROVIDER_${kind.toUpperCase()}`, { ...context, kind });
    this.name = "ProviderError";
  }
}

/**
 * Invalid configuration. Fatal, raised before any pipeline work begins.
 */
export class ConfigurationError extends CTestGenError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    context?: Record<string, unknown>
  ) {
    super(message, "CONFIGURATION_ERROR", { ...context, issues });
    this.name = "ConfigurationError";
  }
}

/**
 * The compiler could not be launched at all (as opposed to a compile failure,
 * which is reported as diagnostics)
 */
export class ToolchainError extends CTestGenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TOOLCHAIN_ERROR", context);
    this.name = "ToolchainError";
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
