/**
 * Lexical helpers for lightweight C analysis.
 *
 * Nothing here tokenizes C properly. The goal is a copy of the source in
 * which comments, literal contents and preprocessor lines are blanked out
 * with spaces, so that brace/paren counting and identifier regexes can run
 * over it while every character keeps its original offset and line.
 */

import type { IncludeDirective } from "./types.js";

export const C_KEYWORDS: ReadonlySet<string> = new Set([
  "auto", "break", "case", "char", "const", "continue", "default", "do",
  "double", "else", "enum", "extern", "float", "for", "goto", "if", "inline",
  "int", "long", "register", "restrict", "return", "short", "signed",
  "sizeof", "static", "struct", "switch", "typedef", "union", "unsigned",
  "void", "volatile", "while", "_Alignas", "_Alignof", "_Atomic", "_Bool",
  "_Complex", "_Generic", "_Imaginary", "_Noreturn", "_Static_assert",
  "_Thread_local", "bool", "defined", "__attribute__", "__asm__", "asm",
  "__typeof__", "typeof", "__extension__",
]);

/** Keywords that name or qualify a type; never a declarator name */
export const TYPE_WORDS: ReadonlySet<string> = new Set([
  "char", "const", "double", "enum", "float", "int", "long", "restrict",
  "short", "signed", "struct", "union", "unsigned", "void", "volatile",
  "_Bool", "_Complex", "bool",
]);

export interface LexedSource {
  /** Same length as the input; comments, literal contents and directives blanked */
  code: string;
  includes: IncludeDirective[];
  /** Message and offset of the first lexical error, if any */
  error: { message: string; offset: number } | undefined;
}

function blank(text: string): string {
  return text.replace(/[^\n]/g, " ");
}

/**
 * Blank comments and the contents of string/char literals. Quote characters
 * are kept so `"..."` still reads as one expression.
 */
export function blankCommentsAndLiterals(text: string): {
  code: string;
  error: LexedSource["error"];
} {
  const out: string[] = [];
  let error: LexedSource["error"];
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    const next = text.charAt(i + 1);

    if (ch === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      const stop = end === -1 ? text.length : end + 2;
      if (end === -1 && error === undefined) {
        error = { message: "Unterminated block comment", offset: i };
      }
      out.push(blank(text.slice(i, stop)));
      i = stop;
      continue;
    }

    if (ch === "/" && next === "/") {
      const newline = text.indexOf("\n", i);
      const stop = newline === -1 ? text.length : newline;
      out.push(blank(text.slice(i, stop)));
      i = stop;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let j = i + 1;
      while (j < text.length && text.charAt(j) !== ch && text.charAt(j) !== "\n") {
        j += text.charAt(j) === "\\" ? 2 : 1;
      }
      j = Math.min(j, text.length);
      out.push(ch, blank(text.slice(i + 1, j)));
      if (text.charAt(j) === ch) {
        out.push(ch);
        j++;
      }
      i = j;
      continue;
    }

    out.push(ch);
    i++;
  }

  return { code: out.join(""), error };
}

const INCLUDE_RE = /^\s*#\s*include\s*(?:<([^>]+)>|"([^"]+)")/;

/**
 * Blank comments, literals and preprocessor directives. Includes are read
 * from the original text of each directive line.
 */
export function lexSource(text: string): LexedSource {
  const { code, error } = blankCommentsAndLiterals(text);
  const originalLines = text.split("\n");
  const lines = code.split("\n");
  const includes: IncludeDirective[] = [];

  let continuation = false;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    const isDirective = continuation || line.trimStart().startsWith("#");
    if (!isDirective) {
      continue;
    }

    if (!continuation) {
      const match = INCLUDE_RE.exec(originalLines[i] ?? "");
      if (match) {
        const system = match[1] !== undefined;
        includes.push({ path: (match[1] ?? match[2] ?? "").trim(), system });
      }
    }

    continuation = line.trimEnd().endsWith("\\");
    lines[i] = blank(line);
  }

  return { code: lines.join("\n"), includes, error };
}

/**
 * 1-based line of an offset
 */
export function lineAt(text: string, offset: number): number {
  let line = 1;
  const stop = Math.min(offset, text.length);
  for (let i = 0; i < stop; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
    }
  }
  return line;
}

/**
 * Collapse whitespace and attach pointer stars to what follows them:
 * `char*  p` -> `char *p`, `int ( * cb ) ( int )` -> `int (*cb) (int)`.
 */
export function normalizeSpace(text: string): string {
  return text
    .replace(/\s+/g, " ")
    .replace(/\s*(\*+)\s*/g, " $1")
    .replace(/([([])\s+/g, "$1")
    .replace(/\s+([)\],])/g, "$1")
    .replace(/,(?=\S)/g, ", ")
    .trim();
}

/**
 * Split on commas that are not nested in (), [] or {}
 */
export function splitTopLevel(text: string, separator = ","): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
    else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/**
 * Index of the top-level occurrence of a character, or -1
 */
export function indexOfTopLevel(text: string, target: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
    else if (ch === target && depth === 0) return i;
  }
  return -1;
}

/**
 * Index of the `(` matching the `)` at closeIndex, or -1
 */
export function matchingOpenParen(text: string, closeIndex: number): number {
  let depth = 0;
  for (let i = closeIndex; i >= 0; i--) {
    const ch = text.charAt(i);
    if (ch === ")") depth++;
    else if (ch === "(") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Remove `{...}` blocks (struct bodies, brace initializers)
 */
export function removeBraceBlocks(text: string): string {
  let depth = 0;
  let out = "";
  for (const ch of text) {
    if (ch === "{") {
      depth++;
      continue;
    }
    if (ch === "}") {
      depth = Math.max(0, depth - 1);
      continue;
    }
    if (depth === 0) {
      out += ch;
    }
  }
  return out;
}

/**
 * Drop GCC attributes and declspecs, which would otherwise look like a
 * trailing parameter list
 */
export function stripAttributes(text: string): string {
  let result = text;
  for (const keyword of ["__attribute__", "__declspec", "__asm__", "asm"]) {
    let index = result.indexOf(keyword);
    while (index !== -1) {
      const open = result.indexOf("(", index);
      if (open === -1) break;
      let depth = 0;
      let close = -1;
      for (let i = open; i < result.length; i++) {
        const ch = result.charAt(i);
        if (ch === "(") depth++;
        else if (ch === ")") {
          depth--;
          if (depth === 0) {
            close = i;
            break;
          }
        }
      }
      if (close === -1) break;
      result = `${result.slice(0, index)} ${result.slice(close + 1)}`;
      index = result.indexOf(keyword);
    }
  }
  return result;
}
