/**
 * Redaction of source text before it leaves the machine in a prompt.
 * Only the prompt copy is redacted; the validator compiles the original.
 */

// Strings go first so a `//` inside a literal is not read as a comment
const REDACTIONS: ReadonlyArray<[RegExp, string]> = [
  [/"(?:[^"\\\n]|\\.)*"/g, '"[STRING REDACTED]"'],
  [/\/\*[\s\S]*?\*\//g, "/* [COMMENT REDACTED] */"],
  [/\/\/[^\n]*/g, "// [COMMENT REDACTED]"],
  [/\bhttps?:\/\/[^\s'"]+/gi, "[URL REDACTED]"],
  [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, "[EMAIL REDACTED]"],
  [/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, "[IP REDACTED]"],
  // Long base64/hex-looking runs; identifiers with underscores are left alone
  [/\b(?=[A-Za-z0-9+/=]*\d)(?=[A-Za-z0-9+/=]*[A-Za-z])[A-Za-z0-9+/=]{20,}/g, "[CREDENTIAL REDACTED]"],
];

const INCLUDE_LINE_RE = /^[ \t]*#[ \t]*include\b[^\n]*/gm;
const PLACEHOLDER_RE = /\u0000(\d+)\u0000/g;

/**
 * Include lines keep their paths so the provider still sees which headers
 * the unit uses.
 */
export function redactSensitive(source: string): string {
  const includes: string[] = [];
  let result = source.replace(INCLUDE_LINE_RE, (line) => {
    includes.push(line);
    return `\u0000${includes.length - 1}\u0000`;
  });

  for (const [pattern, replacement] of REDACTIONS) {
    result = result.replace(pattern, replacement);
  }

  return result.replace(PLACEHOLDER_RE, (_, index: string) => includes[Number(index)] ?? "");
}
