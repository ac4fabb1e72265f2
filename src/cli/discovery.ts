/**
 * Source discovery
 *
 * Collects the C sources and headers of a project, honoring exclude globs.
 */

import { readdir, readFile } from "node:fs/promises";
import { extname, relative, resolve, sep } from "node:path";

import { minimatch } from "minimatch";

import type { SourceFile } from "../analyzer/source-analyzer.js";
import type { Config } from "../config/schema.js";
import { CTestGenError } from "../lib/errors.js";
import { err, ok } from "../lib/result.js";
import type { Result } from "../lib/result.js";

const SOURCE_EXTENSIONS = [".c", ".h"];
const DEFAULT_EXCLUDE_DIRS = ["node_modules", "build", "dist", "compilation_report"];

export interface DiscoveryOptions {
  rootDir: string;
  exclude: readonly string[];
  /** Directory that is never scanned (generated tests live here) */
  outputDir?: string;
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

function isExcluded(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true, matchBase: !pattern.includes("/") }));
}

/**
 * Paths of C files under rootDir, sorted
 */
export async function findSourceFiles(options: DiscoveryOptions): Promise<Result<string[], CTestGenError>> {
  const rootDir = resolve(options.rootDir);
  const outputDir = options.outputDir === undefined ? undefined : resolve(options.outputDir);
  const found: string[] = [];

  const walk = async (dirPath: string): Promise<void> => {
    const entries = await readdir(dirPath, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = resolve(dirPath, entry.name);
      const relativePath = toPosix(relative(rootDir, fullPath));

      if (entry.isDirectory()) {
        if (entry.name.startsWith(".") || DEFAULT_EXCLUDE_DIRS.includes(entry.name)) continue;
        if (fullPath === outputDir || isExcluded(relativePath, options.exclude)) continue;
        await walk(fullPath);
      } else if (entry.isFile()) {
        if (!SOURCE_EXTENSIONS.includes(extname(entry.name).toLowerCase())) continue;
        if (isExcluded(relativePath, options.exclude)) continue;
        found.push(fullPath);
      }
    }
  };

  try {
    await walk(rootDir);
  } catch (error) {
    return err(
      new CTestGenError(
        `Failed to read directory ${rootDir}: ${error instanceof Error ? error.message : String(error)}`,
        "DISCOVERY_ERROR",
        { rootDir }
      )
    );
  }

  return ok(found.sort());
}

export async function readSourceFiles(paths: readonly string[]): Promise<Result<SourceFile[], CTestGenError>> {
  const files: SourceFile[] = [];
  for (const path of paths) {
    try {
      files.push({ path, text: await readFile(path, "utf-8") });
    } catch (error) {
      return err(
        new CTestGenError(
          `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
          "DISCOVERY_ERROR",
          { path }
        )
      );
    }
  }
  return ok(files);
}

/**
 * Sources named by the config: the explicit file list, else a directory scan
 */
export async function discoverSources(config: Config, cwd: string): Promise<Result<SourceFile[], CTestGenError>> {
  if (config.sourceFiles.length > 0) {
    return readSourceFiles(config.sourceFiles.map((file) => resolve(cwd, file)));
  }

  const paths = await findSourceFiles({
    rootDir: resolve(cwd, config.sourceDir),
    exclude: config.exclude,
    outputDir: resolve(cwd, config.outputDir),
  });
  return paths.success ? readSourceFiles(paths.data) : paths;
}
