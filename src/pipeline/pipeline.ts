/**
 * Generation pipeline
 *
 * analyze -> select targets -> build contexts -> run one controller per
 * target in a bounded pool -> aggregate the report.
 *
 * Units and the dependency graph are frozen before any worker starts;
 * workers share them read-only and each owns its own controller run.
 */

import type { GenerationProvider } from "../ai/types.js";
import { analyzeSources, selectTargets } from "../analyzer/source-analyzer.js";
import type { AnalysisResult, SourceFile } from "../analyzer/source-analyzer.js";
import { logger } from "../lib/logger.js";
import { StubSynthesizer } from "../stubs/synthesizer.js";
import { buildTestContext, suggestTestPaths } from "../testgen/context.js";
import { RegenerationController } from "../testgen/controller.js";
import type { ControllerOptions } from "../testgen/controller.js";
import type { TestContext } from "../testgen/types.js";
import { Validator } from "../testgen/validator.js";
import type { ValidatorOptions } from "../testgen/validator.js";
import type { Toolchain } from "../toolchain/types.js";

import { ReportAggregator } from "./report.js";
import type { PipelineReport, TargetOutcome, TargetReport } from "./report.js";
import { runPool } from "./worker-pool.js";

const log = logger.child("Pipeline");

// =============================================================================
// TYPES
// =============================================================================

export interface PipelineDependencies {
  provider: GenerationProvider;
  toolchain: Toolchain;
}

export interface PipelineOptions {
  concurrency: number;
  controller: Omit<ControllerOptions, "signal">;
  validator: ValidatorOptions;
  stubReturnOverrides: Readonly<Record<string, string>>;
  redactSensitive: boolean;
  skipMain: boolean;
  /** Restrict generation to these function names */
  only?: readonly string[];
  signal?: AbortSignal;
  onTargetStart?: (context: TestContext, index: number, total: number) => void;
  onTargetComplete?: (entry: TargetReport, completed: number, total: number) => void;
}

export interface PipelineRun {
  analysis: AnalysisResult;
  report: PipelineReport;
  /** Terminal events in target order */
  outcomes: TargetOutcome[];
  aborted: boolean;
}

// =============================================================================
// PIPELINE
// =============================================================================

export async function runPipeline(
  files: readonly SourceFile[],
  deps: PipelineDependencies,
  options: PipelineOptions
): Promise<PipelineRun> {
  const startTime = Date.now();
  const aggregator = new ReportAggregator();

  const analysis = analyzeSources(files);
  for (const error of analysis.errors) {
    aggregator.recordAnalysisError({ path: error.filePath, line: error.line, message: error.message });
  }

  const synthesizer = new StubSynthesizer({ returnOverrides: options.stubReturnOverrides });
  const targets = selectTargets(analysis.units, { skipMain: options.skipMain, only: options.only });
  const testPaths = suggestTestPaths(targets);
  const contexts = targets.flatMap((target, index) => {
    const unit = analysis.units.find((u) => u.path === target.unitPath);
    return unit
      ? [buildTestContext(target, unit, analysis.graph, synthesizer, { ...options, testPath: testPaths[index] })]
      : [];
  });

  log.info(`${contexts.length} target function(s) in ${analysis.units.length} file(s)`);

  const validator = new Validator(deps.toolchain, options.validator);
  const controller = new RegenerationController(deps.provider, validator, {
    ...options.controller,
    signal: options.signal,
  });

  let completed = 0;
  const entries = await runPool(
    contexts,
    async (context, index) => {
      options.onTargetStart?.(context, index, contexts.length);
      const result = await controller.run(context);
      const entry = aggregator.record({ index, context, result });
      completed++;
      options.onTargetComplete?.(entry, completed, contexts.length);
      return entry;
    },
    { concurrency: options.concurrency, signal: options.signal }
  );

  const aborted = options.signal?.aborted === true;
  if (aborted) {
    log.warn(`Run aborted after ${completed} of ${contexts.length} target(s)`);
  }

  // Targets the pool never started still get a verdict; the controller
  // ends an aborted run before its first attempt.
  for (const [index, context] of contexts.entries()) {
    if (entries[index] === undefined) {
      aggregator.record({ index, context, result: await controller.run(context) });
    }
  }

  return {
    analysis,
    report: aggregator.build(Date.now() - startTime),
    outcomes: aggregator.results(),
    aborted,
  };
}
