export { analyzeSources, selectTargets } from "./source-analyzer.js";
export type { AnalysisResult, SourceFile, TargetSelection } from "./source-analyzer.js";
export { parseSourceUnit, parseParameter } from "./c-parser.js";
export type { ParseOutcome } from "./c-parser.js";
export { DependencyGraph } from "./dependency-graph.js";
export { functionKey } from "./types.js";
export type {
  FunctionSignature,
  GlobalDeclaration,
  IncludeDirective,
  Parameter,
  SourceUnit,
} from "./types.js";
