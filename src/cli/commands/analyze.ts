/**
 * Analyze command - C structure, dependencies and required stubs
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";

import chalk from "chalk";

import type { Command } from "commander";

import { analyzeSources } from "../../analyzer/source-analyzer.js";
import { loadConfig } from "../../config/loader.js";
import type { Config } from "../../config/schema.js";
import { toError } from "../../lib/errors.js";
import { StubSynthesizer } from "../../stubs/synthesizer.js";
import { discoverSources } from "../discovery.js";
import { buildAnalysisView, formatAnalysis, formatError } from "../formatters.js";

import { configureLogging, stringOption } from "./options.js";

export function registerAnalyzeCommand(program: Command): void {
  program
    .command("analyze [path]")
    .description("Show functions, dependency edges and the stubs each file needs")
    .option("--source-dir <dir>", "Directory with the C sources (relative to path)")
    .option("--config <file>", "Config file (default ctestgen.config.json)")
    .option("--json", "Print the analysis as JSON")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (targetPath: string | undefined, options: Record<string, unknown>) => {
      configureLogging(options);

      const projectRoot = resolve(targetPath ?? process.cwd());
      if (!existsSync(projectRoot)) {
        console.error(formatError(new Error(`Directory not found: ${projectRoot}`)));
        process.exit(1);
      }

      let config: Config;
      try {
        config = await loadConfig({
          cwd: projectRoot,
          configPath: stringOption(options, "config"),
          overrides: { sourceDir: stringOption(options, "sourceDir") },
        });
      } catch (error) {
        console.error(formatError(toError(error)));
        process.exit(1);
      }

      const sources = await discoverSources(config, projectRoot);
      if (!sources.success) {
        console.error(formatError(sources.error));
        process.exit(1);
      }

      const analysis = analyzeSources(sources.data);
      const view = buildAnalysisView(analysis, new StubSynthesizer({ returnOverrides: config.stubReturnOverrides }));

      if (options["json"] === true) {
        console.log(JSON.stringify(view, null, 2));
      } else {
        console.log(formatAnalysis(view));
        if (analysis.errors.length > 0) {
          console.log(chalk.yellow(`\n${analysis.errors.length} file(s) could not be analyzed`));
        }
      }

      process.exit(analysis.errors.length > 0 ? 1 : 0);
    });
}
