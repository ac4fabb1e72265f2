export { GccToolchain } from "./gcc.js";
export type { GccToolchainOptions } from "./gcc.js";
export { splitDiagnosticOutput, classifyDiagnostic, parseDiagnostics } from "./diagnostics.js";
export { getHarnessDir, HARNESS_HEADER } from "./harness.js";
export type { CompileOptions, CompileResult, Toolchain } from "./types.js";
