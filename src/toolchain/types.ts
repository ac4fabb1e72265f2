/**
 * Toolchain Types
 */

export interface CompileOptions {
  /** Extra -I directories for this unit, searched after the configured ones */
  includeDirs?: readonly string[];
}

export interface CompileResult {
  success: boolean;
  /** Compiler and linker output, one entry per diagnostic, verbatim */
  diagnostics: string[];
}

/**
 * Compiles and links one self-contained C translation unit.
 *
 * A failed build is a normal result. Implementations throw ToolchainError
 * only when the compiler cannot run at all, and ProviderError("timeout")
 * when it overruns.
 */
export interface Toolchain {
  compile(unit: string, options?: CompileOptions): Promise<CompileResult>;
}
