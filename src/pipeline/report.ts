/**
 * Pipeline report
 *
 * The aggregator is the single owner of the report. Workers hand it one
 * terminal event per target; entries are append-only and come out in
 * target order regardless of completion order.
 */

import type {
  ControllerResult,
  Issue,
  QualityTier,
  TerminalState,
  TestContext,
} from "../testgen/types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface TargetReport {
  target: string;
  unitPath: string;
  finalState: TerminalState;
  tier: QualityTier | undefined;
  attempts: number;
  /** A candidate was kept, cleanly or degraded */
  accepted: boolean;
  degraded: boolean;
  testPath: string;
  /** Issues of the kept attempt (or of the last attempt when none was kept) */
  issues: Issue[];
  error: string | undefined;
}

export interface ReportSummary {
  total: number;
  /** Accepted at or above the threshold */
  accepted: number;
  /** Kept as best effort after the budget ran out */
  degraded: number;
  rejected: number;
  /** Attempts beyond the first, summed over all targets */
  regenerations: number;
  /** Targets accepted on a later attempt */
  successfulRegenerations: number;
  durationMs: number;
}

export interface AnalysisErrorReport {
  path: string;
  line: number | undefined;
  message: string;
}

export interface PipelineReport {
  targets: TargetReport[];
  analysisErrors: AnalysisErrorReport[];
  summary: ReportSummary;
}

/**
 * Terminal event of one target, with everything needed to persist it
 */
export interface TargetOutcome {
  index: number;
  context: TestContext;
  result: ControllerResult;
}

// =============================================================================
// AGGREGATOR
// =============================================================================

export function toTargetReport(context: TestContext, result: ControllerResult): TargetReport {
  const reported = result.selected ?? result.attempts[result.attempts.length - 1];
  return {
    target: result.target.name,
    unitPath: context.unit.path,
    finalState: result.finalState,
    tier: result.tier,
    attempts: result.attempts.length,
    accepted: result.accepted,
    degraded: result.degraded,
    testPath: context.suggestedTestPath,
    issues: reported?.validation?.issues ?? [],
    error: result.error,
  };
}

export class ReportAggregator {
  private readonly outcomes: TargetOutcome[] = [];
  private readonly analysisErrors: AnalysisErrorReport[] = [];

  recordAnalysisError(error: AnalysisErrorReport): void {
    this.analysisErrors.push(error);
  }

  record(outcome: TargetOutcome): TargetReport {
    this.outcomes.push(outcome);
    return toTargetReport(outcome.context, outcome.result);
  }

  /**
   * Outcomes in target order
   */
  results(): TargetOutcome[] {
    return [...this.outcomes].sort((a, b) => a.index - b.index);
  }

  entries(): TargetReport[] {
    return this.results().map((o) => toTargetReport(o.context, o.result));
  }

  summarize(durationMs: number): ReportSummary {
    const entries = this.entries();
    return {
      total: entries.length,
      accepted: entries.filter((e) => e.finalState === "accepted").length,
      degraded: entries.filter((e) => e.finalState === "exhausted_warn").length,
      rejected: entries.filter((e) => e.finalState === "exhausted_fail").length,
      regenerations: entries.reduce((sum, e) => sum + Math.max(0, e.attempts - 1), 0),
      successfulRegenerations: entries.filter((e) => e.finalState === "accepted" && e.attempts > 1).length,
      durationMs,
    };
  }

  build(durationMs: number): PipelineReport {
    return {
      targets: this.entries(),
      analysisErrors: [...this.analysisErrors],
      summary: this.summarize(durationMs),
    };
  }
}
