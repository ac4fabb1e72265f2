/**
 * Source Analyzer
 *
 * One parse per file, then a single DependencyGraph over every function.
 * A file that cannot be parsed contributes an empty SourceUnit and a
 * StructuralAnalysisError; the other files are unaffected.
 */

import { logger } from "../lib/logger.js";
import type { StructuralAnalysisError } from "../lib/errors.js";

import { parseSourceUnit } from "./c-parser.js";
import { DependencyGraph } from "./dependency-graph.js";
import type { FunctionSignature, SourceUnit } from "./types.js";

const log = logger.child("Analyzer");

export interface SourceFile {
  path: string;
  text: string;
}

export interface AnalysisResult {
  units: readonly SourceUnit[];
  graph: DependencyGraph;
  errors: StructuralAnalysisError[];
}

export interface TargetSelection {
  /** Exclude `main` (default true) */
  skipMain?: boolean;
  /** Restrict to these function names */
  only?: readonly string[];
}

export function analyzeSources(files: readonly SourceFile[]): AnalysisResult {
  const units: SourceUnit[] = [];
  const errors: StructuralAnalysisError[] = [];

  for (const file of files) {
    const { unit, error } = parseSourceUnit(file.path, file.text);
    units.push(unit);
    if (error) {
      log.warn(`Skipping ${file.path}: ${error.message}`);
      errors.push(error);
    } else {
      log.debug(`${file.path}: ${unit.functions.length} functions, ${unit.globals.length} globals`);
    }
  }

  const frozen = Object.freeze(units);
  return { units: frozen, graph: new DependencyGraph(frozen), errors };
}

/**
 * Function definitions eligible for test generation, in file order
 */
export function selectTargets(
  units: readonly SourceUnit[],
  selection: TargetSelection = {}
): FunctionSignature[] {
  const skipMain = selection.skipMain ?? true;
  const only = selection.only && selection.only.length > 0 ? new Set(selection.only) : undefined;

  return units.flatMap((unit) =>
    unit.functions.filter(
      (sig) =>
        sig.isDefinition &&
        !sig.opaque &&
        !(skipMain && sig.name === "main") &&
        (only === undefined || only.has(sig.name))
    )
  );
}
