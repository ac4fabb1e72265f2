/**
 * Cross-file call graph over analyzed functions.
 *
 * Edges are direct calls only. Transitive lookups are computed on demand
 * with an explicit worklist and visited set, so cycles (A -> B -> A, or a
 * function that recurses into itself) always terminate.
 */

import { functionKey } from "./types.js";
import type { FunctionSignature, SourceUnit } from "./types.js";

export class DependencyGraph {
  private readonly signatures = new Map<string, FunctionSignature>();
  private readonly byName = new Map<string, FunctionSignature[]>();
  private readonly edges = new Map<string, Set<string>>();
  private readonly unresolvedCalls = new Map<string, string[]>();

  constructor(units: readonly SourceUnit[]) {
    for (const unit of units) {
      for (const sig of unit.functions) {
        this.signatures.set(functionKey(sig), sig);
        const named = this.byName.get(sig.name) ?? [];
        named.push(sig);
        this.byName.set(sig.name, named);
      }
    }

    for (const sig of this.signatures.values()) {
      const targets = new Set<string>();
      const unresolved: string[] = [];
      for (const callee of sig.calls) {
        const resolved = this.resolve(callee, sig.unitPath);
        if (resolved) {
          targets.add(functionKey(resolved));
        } else {
          unresolved.push(callee);
        }
      }
      this.edges.set(functionKey(sig), targets);
      this.unresolvedCalls.set(functionKey(sig), unresolved);
    }
  }

  /**
   * Resolve a callee name as seen from a unit: a definition in the same
   * unit, then a definition anywhere, then any prototype.
   */
  resolve(name: string, fromUnit: string): FunctionSignature | undefined {
    const candidates = this.byName.get(name);
    if (!candidates) {
      return undefined;
    }
    return (
      candidates.find((s) => s.isDefinition && s.unitPath === fromUnit) ??
      candidates.find((s) => s.isDefinition && !s.isStatic) ??
      candidates.find((s) => !s.isDefinition && s.unitPath === fromUnit) ??
      candidates.find((s) => !s.isDefinition)
    );
  }

  get(key: string): FunctionSignature | undefined {
    return this.signatures.get(key);
  }

  /**
   * All signatures in insertion order (unit order, then file order)
   */
  all(): FunctionSignature[] {
    return [...this.signatures.values()];
  }

  get size(): number {
    return this.signatures.size;
  }

  /**
   * Functions called directly by `sig`
   */
  directDependencies(sig: FunctionSignature): FunctionSignature[] {
    const keys = this.edges.get(functionKey(sig)) ?? new Set<string>();
    return [...keys].flatMap((key) => {
      const dep = this.signatures.get(key);
      return dep ? [dep] : [];
    });
  }

  /**
   * Callee names of `sig` with no known signature
   */
  unresolved(sig: FunctionSignature): string[] {
    return [...(this.unresolvedCalls.get(functionKey(sig)) ?? [])];
  }

  /**
   * Everything reachable from the roots, excluding the roots themselves
   * unless a cycle leads back to one. Breadth-first, so the order is stable.
   */
  transitiveDependencies(roots: readonly FunctionSignature[]): FunctionSignature[] {
    const rootKeys = new Set(roots.map((s) => functionKey(s)));
    const visited = new Set<string>();
    const queue: string[] = [...rootKeys];
    const result: FunctionSignature[] = [];

    while (queue.length > 0) {
      const key = queue.shift();
      if (key === undefined) break;
      for (const next of this.edges.get(key) ?? []) {
        if (visited.has(next)) continue;
        visited.add(next);
        queue.push(next);
        const sig = this.signatures.get(next);
        if (sig && !rootKeys.has(next)) {
          result.push(sig);
        }
      }
    }

    return result;
  }

  /**
   * Unresolved callee names reachable from the roots, de-duplicated
   */
  transitiveUnresolved(roots: readonly FunctionSignature[]): string[] {
    const names = new Set<string>();
    for (const sig of [...roots, ...this.transitiveDependencies(roots)]) {
      for (const name of this.unresolved(sig)) {
        names.add(name);
      }
    }
    return [...names];
  }

  /**
   * Direct edges as [caller, callee] key pairs
   */
  edgeList(): Array<[string, string]> {
    const list: Array<[string, string]> = [];
    for (const [from, targets] of this.edges) {
      for (const to of targets) {
        list.push([from, to]);
      }
    }
    return list;
  }
}
