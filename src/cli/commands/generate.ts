/**
 * Generate command - Unity test generation for C functions
 *
 * Analyzes the sources, then generates, compiles and rates one test per
 * target function, regenerating with feedback when configured to.
 */

import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { relative, resolve } from "node:path";

import chalk from "chalk";
import ora from "ora";

import type { Command } from "commander";

import { API_KEY_ENV, createAIService } from "../../ai/service.js";
import { loadConfig } from "../../config/loader.js";
import type { Config } from "../../config/schema.js";
import { ConfigurationError, toError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { runPipeline } from "../../pipeline/pipeline.js";
import type { PipelineReport } from "../../pipeline/report.js";
import { GccToolchain } from "../../toolchain/gcc.js";
import { discoverSources } from "../discovery.js";
import { formatError, formatRunReport, formatTargetLine, formatWarning } from "../formatters.js";
import { writeRunOutput } from "../report-writer.js";

import { commaList, configureLogging, numberOption, stringOption } from "./options.js";

/**
 * 1 when nothing usable came out of the run or strict mode rejected a target
 */
export function exitCodeFor(report: PipelineReport, config: Config, aborted: boolean): number {
  const { summary } = report;
  if (aborted) return 1;
  if (summary.total > 0 && summary.accepted + summary.degraded === 0) return 1;
  if (!config.regenerateOnLowQuality && summary.rejected > 0) return 1;
  return 0;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate [path]")
    .description("Generate Unity tests for the C functions in a project")
    .option("--source-dir <dir>", "Directory with the C sources (relative to path)")
    .option("--output <dir>", "Directory for generated tests and reports")
    .option("--function <names>", "Only these functions (comma-separated)")
    .option("--quality-threshold <tier>", "Minimum accepted tier: high, medium, low")
    .option("--regenerate-on-low-quality", "Regenerate with feedback when below the threshold")
    .option("--max-regeneration-attempts <n>", "Regenerations after the first attempt")
    .option("--redact-sensitive", "Redact comments, literals and credentials from prompts")
    .option("--concurrency <n>", "Targets processed in parallel")
    .option("--ai-provider <provider>", "AI provider: anthropic, openai, mock")
    .option("--model <model>", "Model name for the AI provider")
    .option("--compiler <cmd>", "C compiler used for validation")
    .option("--config <file>", "Config file (default ctestgen.config.json)")
    .option("--json", "Print the run report as JSON")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (targetPath: string | undefined, options: Record<string, unknown>) => {
      const isJson = Boolean(options["json"]);
      const isQuiet = Boolean(options["quiet"]);
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
          overrides: {
            sourceDir: stringOption(options, "sourceDir"),
            outputDir: stringOption(options, "output"),
            functions: commaList(options, "function"),
            qualityThreshold: stringOption(options, "qualityThreshold"),
            regenerateOnLowQuality: options["regenerateOnLowQuality"] === true ? true : undefined,
            maxRegenerationAttempts: numberOption(options, "maxRegenerationAttempts"),
            redactSensitive: options["redactSensitive"] === true ? true : undefined,
            concurrency: numberOption(options, "concurrency"),
            compiler: stringOption(options, "compiler"),
            ai: {
              provider: stringOption(options, "aiProvider"),
              model: stringOption(options, "model"),
            },
          },
        });
      } catch (error) {
        console.error(formatError(toError(error)));
        process.exit(1);
      }

      const provider = createAIService({
        provider: config.ai.provider,
        apiKey: config.ai.apiKey,
        model: config.ai.model,
        maxTokens: config.ai.maxTokens,
        temperature: config.ai.temperature,
        timeoutMs: config.providerTimeoutMs,
      });

      if (!provider.isConfigured()) {
        const envVar = config.ai.provider === "mock" ? "" : API_KEY_ENV[config.ai.provider];
        console.error(formatError(new ConfigurationError(`No API key configured for ${config.ai.provider}`)));
        console.error(chalk.gray(`  Set ${envVar} or ai.apiKey in ctestgen.config.json`));
        process.exit(1);
      }

      const sources = await discoverSources(config, projectRoot);
      if (!sources.success) {
        console.error(formatError(sources.error));
        process.exit(1);
      }
      if (sources.data.length === 0) {
        console.log(chalk.yellow("No C sources found."));
        process.exit(0);
      }

      const toolchain = new GccToolchain({
        compiler: config.compiler,
        flags: config.compilerFlags,
        includeDirs: config.includeDirs.map((dir) => resolve(projectRoot, dir)),
        harnessDir: config.harnessDir === undefined ? undefined : resolve(projectRoot, config.harnessDir),
        timeoutMs: config.compileTimeoutMs,
      });

      const abortController = new AbortController();
      const onInterrupt = (): void => {
        abortController.abort();
      };
      process.once("SIGINT", onInterrupt);

      const spinner = !isJson && !isQuiet ? ora(`Analyzing ${sources.data.length} file(s)...`).start() : null;

      try {
        const run = await runPipeline(
          sources.data,
          { provider, toolchain },
          {
            concurrency: config.concurrency,
            controller: {
              qualityThreshold: config.qualityThreshold,
              regenerateOnLowQuality: config.regenerateOnLowQuality,
              maxRegenerationAttempts: config.maxRegenerationAttempts,
              providerTimeoutMs: config.providerTimeoutMs,
              prompt: { minAssertions: config.minAssertions, testNamePattern: config.testNamePattern },
            },
            validator: {
              minAssertions: config.minAssertions,
              comprehensiveDensity: config.comprehensiveDensity,
              testNamePattern: config.testNamePattern,
              compileTimeoutMs: config.compileTimeoutMs,
            },
            stubReturnOverrides: config.stubReturnOverrides,
            redactSensitive: config.redactSensitive,
            skipMain: config.skipMain,
            only: config.functions,
            signal: abortController.signal,
            onTargetStart: (context, index, total) => {
              if (spinner) {
                spinner.text = `Generating ${index + 1}/${total}: ${context.target.name} in ${relative(projectRoot, context.unit.path)}`;
              }
            },
            onTargetComplete: (entry) => {
              if (!spinner) return;
              spinner.clear();
              console.log(formatTargetLine(entry));
              spinner.render();
            },
          }
        );
        spinner?.stop();

        const outputDir = resolve(projectRoot, config.outputDir);
        await mkdir(outputDir, { recursive: true });
        const written = await writeRunOutput(outputDir, run.outcomes, run.report);

        if (isJson) {
          console.log(JSON.stringify(run.report, null, 2));
        } else {
          console.log();
          console.log(formatRunReport(run.report));
          console.log();
          console.log(
            chalk.green(`Wrote ${written.tests.length} test file${written.tests.length === 1 ? "" : "s"} to ${relative(projectRoot, outputDir) || "."}`)
          );
          console.log(chalk.gray(`Report: ${relative(projectRoot, written.report)}`));
          if (run.aborted) {
            console.error(formatWarning("Run interrupted; remaining targets were skipped"));
          }
        }

        logger.debug(`Provider usage: ${JSON.stringify(provider.getUsage())}`);
        process.exit(exitCodeFor(run.report, config, run.aborted));
      } catch (error) {
        spinner?.fail("Generation failed");
        console.error(formatError(toError(error)));
        process.exit(1);
      } finally {
        process.off("SIGINT", onInterrupt);
      }
    });
}
