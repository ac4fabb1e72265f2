export { runPipeline } from "./pipeline.js";
export type { PipelineDependencies, PipelineOptions, PipelineRun } from "./pipeline.js";
export { ReportAggregator, toTargetReport } from "./report.js";
export type {
  AnalysisErrorReport,
  PipelineReport,
  ReportSummary,
  TargetOutcome,
  TargetReport,
} from "./report.js";
export { runPool } from "./worker-pool.js";
export type { PoolOptions } from "./worker-pool.js";
