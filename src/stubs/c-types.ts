/**
 * Small helpers over C type strings as produced by the analyzer
 */

import type { Parameter } from "../analyzer/types.js";

export type ReturnKind = "void" | "pointer" | "struct" | "bool" | "scalar";

export function returnKindOf(returnType: string): ReturnKind {
  const type = returnType.replace(/\b(?:const|volatile)\b/g, " ").replace(/\s+/g, " ").trim();
  if (type.includes("*") || type.includes("(")) {
    return "pointer";
  }
  if (type === "void") {
    return "void";
  }
  if (/^(?:struct|union)\b/.test(type)) {
    return "struct";
  }
  if (type === "bool" || type === "_Bool") {
    return "bool";
  }
  return "scalar";
}

/**
 * C literal a stub returns when nothing is configured
 */
export function defaultReturnLiteral(kind: ReturnKind): string | undefined {
  switch (kind) {
    case "void":
      return undefined;
    case "pointer":
      return "NULL";
    case "struct":
      return "{0}";
    case "bool":
      return "false";
    case "scalar":
      return "0";
  }
}

/**
 * Join a type and a declarator name: `int` + `x` -> `int x`,
 * `char *` + `s` -> `char *s`, `int (*)(int)` + `cb` -> `int (*cb)(int)`,
 * `int [4]` + `a` -> `int a[4]`.
 */
export function declare(type: string, name: string): string {
  if (type.includes("(*)")) {
    return type.replace("(*)", `(*${name})`);
  }
  const bracket = type.indexOf("[");
  if (bracket !== -1) {
    const base = type.slice(0, bracket).trimEnd();
    return `${joinName(base, name)}${type.slice(bracket)}`;
  }
  return joinName(type, name);
}

function joinName(type: string, name: string): string {
  return type.endsWith("*") ? `${type}${name}` : `${type} ${name}`;
}

/**
 * Type suitable for a struct member that is assigned after initialization:
 * top-level const removed, arrays excluded.
 */
export function captureType(param: Parameter): string | undefined {
  if (param.type.includes("[")) {
    return undefined;
  }
  if (param.type.includes("(*)")) {
    return param.type;
  }
  if (!param.type.includes("*")) {
    return param.type.replace(/\bconst\b/g, " ").replace(/\s+/g, " ").trim();
  }
  return param.type.replace(/\*\s*const\b\s*/g, "*").trim();
}
