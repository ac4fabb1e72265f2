/**
 * Source Analyzer Types
 */

export interface Parameter {
  /** Parameter name; undefined for unnamed prototype parameters */
  name: string | undefined;
  /** Type with the name removed, e.g. "const char *" or "int (*)(int)" */
  type: string;
  /** Declaration exactly as written, normalized to single spaces */
  declaration: string;
}

export interface FunctionSignature {
  name: string;
  returnType: string;
  parameters: Parameter[];
  /** Ends with `...` */
  variadic: boolean;
  isStatic: boolean;
  /** Has a body (false for prototypes) */
  isDefinition: boolean;
  /** Declarator could not be split into a callable shape */
  opaque: boolean;
  /** Path of the defining SourceUnit */
  unitPath: string;
  /** Callee names in first-call order, de-duplicated */
  calls: string[];
  /** Body text between the braces, comments and literals blanked */
  body: string | undefined;
  /** Decision points in the body plus one */
  branchCount: number;
  /** File-scope globals of the same unit referenced in the body */
  globalsReferenced: string[];
  /** 1-based line of the declarator */
  line: number;
}

export interface IncludeDirective {
  path: string;
  /** `<...>` rather than `"..."` */
  system: boolean;
}

export interface GlobalDeclaration {
  name: string;
  type: string;
  isStatic: boolean;
  isExtern: boolean;
}

export interface SourceUnit {
  path: string;
  text: string;
  functions: readonly FunctionSignature[];
  includes: readonly IncludeDirective[];
  globals: readonly GlobalDeclaration[];
  /** Set when the file could not be parsed; functions is then empty */
  structuralError: string | undefined;
}

/**
 * Unique key of a function across the analyzed set
 */
export function functionKey(sig: Pick<FunctionSignature, "unitPath" | "name">): string {
  return `${sig.unitPath}#${sig.name}`;
}
