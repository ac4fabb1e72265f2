import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const HARNESS_HEADER = "unity.h";

/**
 * Directory holding the bundled Unity-compatible header
 */
export function getHarnessDir(): string {
  const candidates = [
    // src/toolchain, or the bundled CLI in dist/cli
    resolve(__dirname, "../../templates/unity"),
    // Bundled library entry in dist
    resolve(__dirname, "../templates/unity"),
    // Running from the project root
    resolve(process.cwd(), "templates/unity"),
  ];

  for (const candidate of candidates) {
    if (existsSync(resolve(candidate, HARNESS_HEADER))) {
      return candidate;
    }
  }

  return candidates[0] ?? resolve(__dirname, "../../templates/unity");
}
