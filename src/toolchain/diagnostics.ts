/**
 * GCC/Clang diagnostic parsing
 */

import type { Diagnostic } from "../testgen/types.js";

const DIAGNOSTIC_START_RE =
  /^(?:[^\s:][^:]*:(?:\d+:){0,2}\s*(?:fatal error|error|warning|note):|[^\s].*undefined reference to|[^\s].*multiple definition of|collect2:|(?:\/\S*\/)?ld(?:\.\w+)?:|clang: (?:error|warning):)/;

const CONTEXT_LINE_RE = /^(?:In file included from|\s+from\s|[^\s:][^:]*: (?:In function|At top level|In instantiation))/;

/**
 * Split raw compiler output into one string per diagnostic. Continuation
 * lines (source excerpts, carets, fix-it hints) stay with their diagnostic;
 * "In function" context lines are dropped.
 */
export function splitDiagnosticOutput(output: string): string[] {
  const groups: string[][] = [];

  for (const line of output.split(/\r?\n/)) {
    if (line.trim().length === 0 || CONTEXT_LINE_RE.test(line)) {
      continue;
    }
    const current = groups[groups.length - 1];
    if (DIAGNOSTIC_START_RE.test(line) || current === undefined) {
      groups.push([line]);
    } else {
      current.push(line);
    }
  }

  return groups.map((lines) => lines.join("\n").trimEnd());
}

export function classifyDiagnostic(text: string): Diagnostic {
  const head = text.split("\n", 1)[0] ?? "";
  let severity: Diagnostic["severity"] = "note";

  if (/\b(?:fatal error|error)\b|undefined reference to|multiple definition of/.test(head)) {
    severity = "error";
  } else if (/\bwarning\b/.test(head)) {
    severity = "warning";
  }

  return { severity, message: text };
}

/**
 * Diagnostics in output order. A failed build without any error line gets
 * a synthetic one so the failure is never silent.
 */
export function parseDiagnostics(entries: readonly string[], success: boolean): Diagnostic[] {
  const diagnostics = entries.map(classifyDiagnostic);
  if (!success && !diagnostics.some((d) => d.severity === "error")) {
    diagnostics.push({ severity: "error", message: "Compilation failed without an error diagnostic" });
  }
  return diagnostics;
}
