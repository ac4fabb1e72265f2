/**
 * Context builder for test generation
 *
 * Gathers everything a generation run for one target function needs:
 * its dependencies (direct and transitive), the stubs that make its unit
 * link in isolation, and the source text to show the provider.
 */

import { basename, extname } from "node:path";

import type { DependencyGraph } from "../analyzer/dependency-graph.js";
import { functionKey } from "../analyzer/types.js";
import type { FunctionSignature, SourceUnit } from "../analyzer/types.js";
import { planStubs } from "../stubs/synthesizer.js";
import type { StubSynthesizer } from "../stubs/synthesizer.js";
import type { StubSpec } from "../stubs/types.js";

import { redactSensitive } from "./redact.js";
import type { ExternalState, TestContext } from "./types.js";

export interface ContextOptions {
  /** Redact comments, literals and credential-like tokens in the prompt copy */
  redactSensitive?: boolean;
  /** Overrides the suggested test file name */
  testPath?: string;
}

/**
 * `src/motor-ctl.c` + `set_speed` -> `test_motor_ctl_set_speed.c`
 */
export function suggestTestPath(unitPath: string, functionName: string): string {
  const unitName = basename(unitPath, extname(unitPath)).replace(/\W/g, "_");
  return `test_${unitName}_${functionName}.c`;
}

/**
 * Functions defined in the unit that run when the target runs, target first
 */
export function reachableInUnit(target: FunctionSignature, unit: SourceUnit): FunctionSignature[] {
  const defined = new Map(unit.functions.filter((f) => f.isDefinition).map((f) => [f.name, f]));
  const reached = new Map<string, FunctionSignature>([[target.name, target]]);
  const queue = [target];

  for (let fn = queue.shift(); fn !== undefined; fn = queue.shift()) {
    for (const callee of fn.calls) {
      const next = defined.get(callee);
      if (next && !reached.has(callee)) {
        reached.set(callee, next);
        queue.push(next);
      }
    }
  }
  return [...reached.values()];
}

/**
 * Stub control structs and globals the target touches, directly or
 * through the unit's own helpers
 */
export function externalStateOf(
  target: FunctionSignature,
  unit: SourceUnit,
  stubs: readonly StubSpec[]
): ExternalState {
  const reached = reachableInUnit(target, unit);
  const called = new Set(reached.flatMap((fn) => fn.calls));
  const globals = new Set(reached.flatMap((fn) => fn.globalsReferenced));

  return {
    stubs: stubs.filter((stub) => called.has(stub.name)).map((stub) => stub.controlVar),
    globals: [...globals],
  };
}

/**
 * One test file name per target. Targets whose short names collide get the
 * unit's directory folded in, then a numeric suffix if that still clashes.
 */
export function suggestTestPaths(targets: readonly FunctionSignature[]): string[] {
  const short = targets.map((t) => suggestTestPath(t.unitPath, t.name));
  const counts = new Map<string, number>();
  for (const name of short) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  const used = new Set<string>();
  return targets.map((target, index) => {
    const name = short[index] ?? suggestTestPath(target.unitPath, target.name);
    const preferred = (counts.get(name) ?? 0) > 1 ? qualifiedTestPath(target.unitPath, target.name) : name;
    let chosen = preferred;
    for (let n = 2; used.has(chosen); n++) {
      chosen = preferred.replace(/\.c$/, `_${n}.c`);
    }
    used.add(chosen);
    return chosen;
  });
}

function qualifiedTestPath(unitPath: string, functionName: string): string {
  const stem = unitPath.slice(0, unitPath.length - extname(unitPath).length).replace(/^[./\\]+/, "");
  return `test_${stem.replace(/\W/g, "_")}_${functionName}.c`;
}

export function buildTestContext(
  target: FunctionSignature,
  unit: SourceUnit,
  graph: DependencyGraph,
  synthesizer: StubSynthesizer,
  options: ContextOptions = {}
): TestContext {
  const directDependencies = graph.directDependencies(target);
  const directKeys = new Set(directDependencies.map((dep) => functionKey(dep)));
  const targetKey = functionKey(target);
  const indirectDependencies = graph
    .transitiveDependencies([target])
    .filter((dep) => !directKeys.has(functionKey(dep)) && functionKey(dep) !== targetKey);

  const { stubs, unresolved } = planStubs(unit, graph, synthesizer);

  return {
    target,
    unit,
    directDependencies,
    indirectDependencies,
    stubs,
    unresolved,
    externalState: externalStateOf(target, unit, stubs),
    harness: "unity",
    suggestedTestPath: options.testPath ?? suggestTestPath(unit.path, target.name),
    promptSource: options.redactSensitive ? redactSensitive(unit.text) : unit.text,
  };
}
