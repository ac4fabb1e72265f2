/**
 * Stub Synthesizer
 *
 * Generates a compilable stand-in for each function the unit under test
 * calls but does not define. Every stub exposes a control struct so tests
 * can set the return value and inspect call counts and the last arguments.
 */

import type { DependencyGraph } from "../analyzer/dependency-graph.js";
import type { FunctionSignature, SourceUnit } from "../analyzer/types.js";
import { logger } from "../lib/logger.js";

import { captureType, declare, defaultReturnLiteral, returnKindOf } from "./c-types.js";
import type { StubPlan, StubSpec } from "./types.js";

const log = logger.child("Stubs");

export interface StubSynthesizerOptions {
  /** Function name -> C expression used as the initial return value */
  returnOverrides?: Readonly<Record<string, string>>;
}

/**
 * Key identifying a signature's callable shape
 */
export function signatureKey(sig: FunctionSignature): string {
  const params = sig.parameters.map((p) => p.type).join(",");
  return `${sig.returnType}|${sig.name}(${params}${sig.variadic ? ",..." : ""})`;
}

/**
 * Parameter list of a stub definition, naming unnamed parameters argN
 */
function stubParameters(sig: FunctionSignature): Array<{ name: string; declaration: string; capture: string | undefined }> {
  return sig.parameters.map((param, index) => {
    const name = param.name ?? `arg${index}`;
    const capture = captureType(param);
    return {
      name,
      declaration: declare(param.type, name),
      capture: capture === undefined ? undefined : declare(capture, `last_${name}`),
    };
  });
}

export class StubSynthesizer {
  private readonly cache = new Map<string, StubSpec>();
  private readonly overrides: Readonly<Record<string, string>>;

  constructor(options: StubSynthesizerOptions = {}) {
    this.overrides = options.returnOverrides ?? {};
  }

  canStub(sig: FunctionSignature): boolean {
    return !sig.opaque && sig.returnType.length > 0 && !(sig.variadic && sig.parameters.length === 0);
  }

  /**
   * StubSpec for a signature, or undefined when the signature has no
   * callable shape. The same signature always yields the same object.
   */
  synthesize(sig: FunctionSignature): StubSpec | undefined {
    if (!this.canStub(sig)) {
      return undefined;
    }

    const key = signatureKey(sig);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const spec = this.build(sig);
    this.cache.set(key, spec);
    return spec;
  }

  private build(sig: FunctionSignature): StubSpec {
    const controlType = `stub_${sig.name}_t`;
    const controlVar = `stub_${sig.name}`;
    const returnKind = returnKindOf(sig.returnType);
    const override = Object.hasOwn(this.overrides, sig.name) ? this.overrides[sig.name] : undefined;
    const returnValue = returnKind === "void" ? undefined : (override ?? defaultReturnLiteral(returnKind));
    const params = stubParameters(sig);

    const fields: string[] = [];
    if (returnKind !== "void") {
      fields.push(declare(sig.returnType, "return_value"));
    }
    fields.push("unsigned int call_count");
    for (const param of params) {
      if (param.capture !== undefined) {
        fields.push(param.capture);
      }
    }

    const paramList = [...params.map((p) => p.declaration), ...(sig.variadic ? ["..."] : [])];
    const header = `${declare(sig.returnType, sig.name)}(${paramList.length > 0 ? paramList.join(", ") : "void"})`;

    const body = [`    ${controlVar}.call_count++;`];
    for (const param of params) {
      if (param.capture !== undefined) {
        body.push(`    ${controlVar}.last_${param.name} = ${param.name};`);
      }
    }
    if (returnKind !== "void") {
      body.push(`    return ${controlVar}.return_value;`);
    }

    const initializer =
      override !== undefined && returnKind !== "void" ? `{ .return_value = ${override} }` : "{0}";

    const source = [
      `/* stub: ${header} */`,
      "typedef struct {",
      ...fields.map((f) => `    ${f};`),
      `} ${controlType};`,
      "",
      `${controlType} ${controlVar} = ${initializer};`,
      "",
      header,
      "{",
      ...body,
      "}",
      "",
    ].join("\n");

    return {
      name: sig.name,
      signature: sig,
      controlType,
      controlVar,
      controlFields: fields,
      returnKind,
      returnValue,
      source,
    };
  }
}

/**
 * Decide which callees of a unit are stubbed. The whole unit is compiled
 * into the test, so every callee of any of its functions counts; a callee
 * is stubbed when it resolves to a definition in another unit or only to a
 * prototype. Names with no signature are reported as unresolved.
 */
export function planStubs(
  unit: SourceUnit,
  graph: DependencyGraph,
  synthesizer: StubSynthesizer
): StubPlan {
  const stubs: StubSpec[] = [];
  const unresolved: string[] = [];
  const seen = new Set<string>();
  const defined = new Set(unit.functions.filter((f) => f.isDefinition).map((f) => f.name));

  for (const fn of unit.functions) {
    for (const callee of fn.calls) {
      if (seen.has(callee) || defined.has(callee)) continue;
      seen.add(callee);

      const resolved = graph.resolve(callee, unit.path);
      if (!resolved) {
        unresolved.push(callee);
        continue;
      }

      const stub = synthesizer.synthesize(resolved);
      if (stub) {
        stubs.push(stub);
      } else {
        log.debug(`${callee}: signature is not stubbable`);
        unresolved.push(callee);
      }
    }
  }

  return { stubs, unresolved };
}

/**
 * Concatenated stub sources in plan order
 */
export function renderStubs(stubs: readonly StubSpec[]): string {
  return stubs.map((s) => s.source).join("\n");
}
