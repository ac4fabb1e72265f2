/**
 * Structural C parser
 *
 * Splits a C file into top-level chunks by brace depth and recovers
 * function definitions, prototypes, includes and file-scope globals.
 * This is deliberately not a C front end: macros are not expanded and
 * declarators it cannot split are recorded as opaque signatures.
 */

import { StructuralAnalysisError } from "../lib/errors.js";

import {
  C_KEYWORDS,
  TYPE_WORDS,
  indexOfTopLevel,
  lexSource,
  lineAt,
  matchingOpenParen,
  normalizeSpace,
  removeBraceBlocks,
  splitTopLevel,
  stripAttributes,
} from "./c-lexer.js";

import type {
  FunctionSignature,
  GlobalDeclaration,
  Parameter,
  SourceUnit,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

interface Chunk {
  kind: "definition" | "declaration";
  /** Declaration text, or the header before `{` for definitions */
  header: string;
  /** Offset of the chunk in the source */
  offset: number;
  body: string | undefined;
}

type Declarator =
  | {
      kind: "function";
      name: string;
      returnType: string;
      paramsText: string;
      isStatic: boolean;
      opaque: boolean;
    }
  | { kind: "pointer-variable"; name: string; type: string; isStatic: boolean; isExtern: boolean };

export interface ParseOutcome {
  unit: SourceUnit;
  error: StructuralAnalysisError | undefined;
}

const STORAGE_WORDS = /\b(?:static|extern|inline|__inline__|__inline|_Noreturn|register|_Thread_local)\b/g;

const IDENT_CALL_RE = /\b([A-Za-z_]\w*)\s*\(/g;

const BRANCH_RE = /\bif\b|\bcase\b|\bwhile\b|\bfor\b|&&|\|\||\?/g;

// =============================================================================
// TOP-LEVEL SCAN
// =============================================================================

function scanChunks(code: string): { chunks: Chunk[]; error?: { message: string; offset: number } } {
  const chunks: Chunk[] = [];
  let depth = 0;
  let parens = 0;
  let chunkStart = 0;
  let openIndex = -1;
  let externBlocks = 0;

  for (let i = 0; i < code.length; i++) {
    const ch = code.charAt(i);

    if (ch === "(" || ch === "[") {
      parens++;
    } else if (ch === ")" || ch === "]") {
      parens--;
      if (parens < 0) {
        return { chunks, error: { message: `Unbalanced '${ch}'`, offset: i } };
      }
    } else if (ch === "{") {
      if (depth === 0 && parens === 0) {
        const header = code.slice(chunkStart, i);
        // extern "C" { ... } wraps declarations without nesting them
        if (/^\s*extern\s*"\s*C?\s*"\s*$/.test(header)) {
          externBlocks++;
          chunkStart = i + 1;
          continue;
        }
        openIndex = i;
      }
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth < 0) {
        if (externBlocks > 0) {
          externBlocks--;
          depth = 0;
          chunkStart = i + 1;
          continue;
        }
        return { chunks, error: { message: "Unbalanced '}'", offset: i } };
      }
      if (depth === 0 && openIndex !== -1) {
        const header = code.slice(chunkStart, openIndex);
        if (parseDeclarator(header, true)?.kind === "function") {
          chunks.push({
            kind: "definition",
            header,
            offset: chunkStart,
            body: code.slice(openIndex + 1, i),
          });
          chunkStart = i + 1;
        }
        // Otherwise a struct body or initializer: the chunk runs to its ';'
        openIndex = -1;
      }
    } else if (ch === ";" && depth === 0 && parens === 0) {
      chunks.push({ kind: "declaration", header: code.slice(chunkStart, i), offset: chunkStart, body: undefined });
      chunkStart = i + 1;
    }
  }

  if (depth > 0 || externBlocks > 0) {
    return { chunks, error: { message: "Unterminated '{' block at end of file", offset: code.length } };
  }
  if (parens !== 0) {
    return { chunks, error: { message: "Unbalanced parentheses at end of file", offset: code.length } };
  }
  return { chunks };
}

// =============================================================================
// DECLARATORS
// =============================================================================

function stripStorage(text: string): { rest: string; isStatic: boolean; isExtern: boolean } {
  const isStatic = /\bstatic\b/.test(text);
  const isExtern = /\bextern\b/.test(text);
  return { rest: normalizeSpace(text.replace(STORAGE_WORDS, " ")), isStatic, isExtern };
}

/**
 * Recognize `type name(params)` and `type (*name)(params)` shapes.
 * `forDefinition` admits headers whose return type is missing or too
 * complex to split, as opaque definitions.
 */
function parseDeclarator(raw: string, forDefinition: boolean): Declarator | undefined {
  const text = normalizeSpace(stripAttributes(raw));
  if (!text.endsWith(")") || /^typedef\b/.test(text) || indexOfTopLevel(text, "=") !== -1) {
    return undefined;
  }

  const open = matchingOpenParen(text, text.length - 1);
  if (open <= 0) {
    return undefined;
  }
  const paramsText = text.slice(open + 1, -1);
  const prefix = text.slice(0, open).trim();

  if (prefix.endsWith(")")) {
    const pointer = /^(.*)\(\*([A-Za-z_]\w*)\)$/.exec(prefix);
    if (pointer && !forDefinition) {
      const { rest, isStatic, isExtern } = stripStorage(pointer[1] ?? "");
      return {
        kind: "pointer-variable",
        name: pointer[2] ?? "",
        type: `${rest} (*)(${paramsText})`,
        isStatic,
        isExtern,
      };
    }
    // A function returning a function pointer: keep the name, give up on the shape
    const inner = /\(\*([A-Za-z_]\w*)\(/.exec(prefix);
    if (inner && forDefinition) {
      const { rest, isStatic } = stripStorage(text);
      return { kind: "function", name: inner[1] ?? "", returnType: rest, paramsText: "", isStatic, opaque: true };
    }
    return undefined;
  }

  const nameMatch = /([A-Za-z_]\w*)$/.exec(prefix);
  const name = nameMatch?.[1];
  if (name === undefined || C_KEYWORDS.has(name)) {
    return undefined;
  }

  const { rest: returnType, isStatic } = stripStorage(prefix.slice(0, prefix.length - name.length));
  if (returnType.length === 0) {
    // Macro-style definition such as ISR(TIMER0_vect) { ... }
    return forDefinition
      ? { kind: "function", name, returnType: "", paramsText, isStatic, opaque: true }
      : undefined;
  }

  return { kind: "function", name, returnType, paramsText, isStatic, opaque: false };
}

/**
 * Parse one parameter declaration
 */
const QUALIFIERS: ReadonlySet<string> = new Set(["const", "volatile", "restrict"]);

export function parseParameter(raw: string): Parameter {
  const text = normalizeSpace(raw);

  const pointer = /^(.*?)\s?\(\*([A-Za-z_]\w*)?\)\s?(\(.*\))$/.exec(text);
  if (pointer) {
    const base = (pointer[1] ?? "").trim();
    const name = pointer[2];
    const args = pointer[3] ?? "()";
    const type = `${base} (*)${args}`;
    return { name, type, declaration: name ? `${base} (*${name})${args}` : type };
  }

  const array = /^(.*?)([A-Za-z_]\w*)\s?((?:\[[^\]]*\])+)$/.exec(text);
  if (array && (array[1] ?? "").trim().length > 0 && !TYPE_WORDS.has(array[2] ?? "")) {
    const base = (array[1] ?? "").trim();
    const name = array[2] ?? "";
    const dims = array[3] ?? "";
    return { name, type: `${base} ${dims}`, declaration: `${base}${base.endsWith("*") ? "" : " "}${name}${dims}` };
  }

  const last = /([A-Za-z_]\w*)$/.exec(text);
  const candidate = last?.[1];
  const before = candidate !== undefined ? text.slice(0, text.length - candidate.length).trim() : "";
  const beforeWords = before.replace(/\*/g, " ").trim().split(/\s+/).filter((w) => w.length > 0);
  const lastWord = beforeWords[beforeWords.length - 1];
  const hasTypeBefore =
    beforeWords.length > 0 &&
    !beforeWords.every((w) => QUALIFIERS.has(w)) &&
    !(lastWord === "struct" || lastWord === "union" || lastWord === "enum");

  if (candidate !== undefined && hasTypeBefore && !TYPE_WORDS.has(candidate)) {
    return { name: candidate, type: before, declaration: text };
  }

  return { name: undefined, type: text, declaration: text };
}

function parseParameters(paramsText: string): { parameters: Parameter[]; variadic: boolean } {
  const trimmed = paramsText.trim();
  if (trimmed === "" || trimmed === "void") {
    return { parameters: [], variadic: false };
  }

  const parameters: Parameter[] = [];
  let variadic = false;
  for (const part of splitTopLevel(trimmed)) {
    if (part === "...") {
      variadic = true;
      continue;
    }
    parameters.push(parseParameter(part));
  }
  return { parameters, variadic };
}

// =============================================================================
// BODIES
// =============================================================================

function extractCalls(body: string, exclude: ReadonlySet<string>): string[] {
  const calls: string[] = [];
  const seen = new Set<string>();
  for (const match of body.matchAll(IDENT_CALL_RE)) {
    const name = match[1] ?? "";
    if (C_KEYWORDS.has(name) || exclude.has(name) || seen.has(name)) {
      continue;
    }
    seen.add(name);
    calls.push(name);
  }
  return calls;
}

function countBranches(body: string): number {
  return 1 + (body.match(BRANCH_RE)?.length ?? 0);
}

// =============================================================================
// GLOBALS
// =============================================================================

function parseGlobals(raw: string): GlobalDeclaration[] {
  const flattened = normalizeSpace(removeBraceBlocks(stripAttributes(raw)));
  if (flattened === "" || /^typedef\b/.test(flattened) || /^_Static_assert\b/.test(flattened)) {
    return [];
  }

  const { rest, isStatic, isExtern } = stripStorage(flattened);
  const declarators = splitTopLevel(rest).map((part) => {
    const eq = indexOfTopLevel(part, "=");
    return (eq === -1 ? part : part.slice(0, eq)).trim();
  });

  const globals: GlobalDeclaration[] = [];
  let baseType: string | undefined;

  for (const [index, declarator] of declarators.entries()) {
    if (index === 0) {
      const match = /^(.*?)([A-Za-z_]\w*)\s?((?:\[[^\]]*\])*)$/.exec(declarator);
      const typePart = (match?.[1] ?? "").trim();
      const name = match?.[2];
      const words = typePart.replace(/\*/g, " ").trim().split(/\s+/);
      const lastWord = words[words.length - 1];
      if (
        !match ||
        name === undefined ||
        typePart === "" ||
        C_KEYWORDS.has(name) ||
        lastWord === "struct" ||
        lastWord === "union" ||
        lastWord === "enum"
      ) {
        return [];
      }
      baseType = typePart.replace(/\s?\*+$/, "").trim();
      globals.push({ name, type: normalizeSpace(`${typePart} ${match[3] ?? ""}`), isStatic, isExtern });
      continue;
    }

    const match = /^(\**)\s?([A-Za-z_]\w*)\s?((?:\[[^\]]*\])*)$/.exec(declarator);
    if (match && baseType !== undefined && match[2] !== undefined) {
      globals.push({
        name: match[2],
        type: normalizeSpace(`${baseType} ${match[1] ?? ""} ${match[3] ?? ""}`),
        isStatic,
        isExtern,
      });
    }
  }

  return globals;
}

// =============================================================================
// PUBLIC API
// =============================================================================

function firstContentOffset(text: string, offset: number): number {
  const lead = /^\s*/.exec(text)?.[0].length ?? 0;
  return offset + lead;
}

/**
 * Parse one C file into a SourceUnit. A file whose structure cannot be
 * recovered yields a unit with no functions and `structuralError` set.
 */
export function parseSourceUnit(path: string, text: string): ParseOutcome {
  const lexed = lexSource(text);
  const scanned = lexed.error ? { chunks: [], error: lexed.error } : scanChunks(lexed.code);

  if (scanned.error) {
    const line = lineAt(text, scanned.error.offset);
    const error = new StructuralAnalysisError(`${scanned.error.message} (line ${line})`, path, line);
    return {
      unit: Object.freeze({
        path,
        text,
        functions: Object.freeze([]),
        includes: Object.freeze(lexed.includes),
        globals: Object.freeze([]),
        structuralError: error.message,
      }),
      error,
    };
  }

  const globals: GlobalDeclaration[] = [];
  const functions = new Map<string, FunctionSignature>();
  const pending: Array<{ chunk: Chunk; declarator: Extract<Declarator, { kind: "function" }> }> = [];

  for (const chunk of scanned.chunks) {
    const declarator = parseDeclarator(chunk.header, chunk.kind === "definition");

    if (declarator?.kind === "pointer-variable") {
      globals.push({
        name: declarator.name,
        type: declarator.type,
        isStatic: declarator.isStatic,
        isExtern: declarator.isExtern,
      });
    } else if (declarator?.kind === "function") {
      pending.push({ chunk, declarator });
    } else if (chunk.kind === "declaration") {
      globals.push(...parseGlobals(chunk.header));
    }
  }

  const globalNames = globals.map((g) => g.name);

  for (const { chunk, declarator } of pending) {
    const existing = functions.get(declarator.name);
    const isDefinition = chunk.kind === "definition";
    if (existing && (existing.isDefinition || !isDefinition)) {
      continue;
    }

    const { parameters, variadic } = parseParameters(declarator.paramsText);
    const body = chunk.body;
    const paramNames = new Set(parameters.flatMap((p) => (p.name ? [p.name] : [])));

    functions.set(
      declarator.name,
      Object.freeze({
        name: declarator.name,
        returnType: declarator.returnType,
        parameters,
        variadic,
        isStatic: declarator.isStatic,
        isDefinition,
        opaque: declarator.opaque,
        unitPath: path,
        calls: body !== undefined ? extractCalls(body, paramNames) : [],
        body,
        branchCount: body !== undefined ? countBranches(body) : 1,
        globalsReferenced:
          body !== undefined ? globalNames.filter((g) => new RegExp(`\\b${g}\\b`).test(body)) : [],
        line: lineAt(text, firstContentOffset(chunk.header, chunk.offset)),
      })
    );
  }

  return {
    unit: Object.freeze({
      path,
      text,
      functions: Object.freeze([...functions.values()]),
      includes: Object.freeze(lexed.includes),
      globals: Object.freeze(globals),
      structuralError: undefined,
    }),
    error: undefined,
  };
}
