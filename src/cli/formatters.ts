import chalk from "chalk";

import type { AnalysisResult } from "../analyzer/source-analyzer.js";
import { ConfigurationError } from "../lib/errors.js";
import type { PipelineReport, ReportSummary, TargetReport } from "../pipeline/report.js";
import { planStubs } from "../stubs/synthesizer.js";
import type { StubSynthesizer } from "../stubs/synthesizer.js";
import type { QualityTier, TerminalState } from "../testgen/types.js";

/**
 * Tier colors for terminal output
 */
const TIER_COLORS: Record<QualityTier, (text: string) => string> = {
  high: chalk.green,
  medium: chalk.yellow,
  low: chalk.red,
};

const STATE_SYMBOLS: Record<TerminalState, string> = {
  accepted: chalk.green("✓"),
  exhausted_warn: chalk.yellow("!"),
  exhausted_fail: chalk.red("✗"),
};

export function formatTier(tier: QualityTier | undefined): string {
  return tier === undefined ? chalk.gray("n/a") : TIER_COLORS[tier](tier);
}

/**
 * One line per finished target
 */
export function formatTargetLine(entry: TargetReport): string {
  const attempts = `${entry.attempts} attempt${entry.attempts === 1 ? "" : "s"}`;
  const detail = entry.error !== undefined ? chalk.gray(` - ${entry.error}`) : "";
  const degraded = entry.degraded ? chalk.yellow(" (degraded)") : "";
  return `  ${STATE_SYMBOLS[entry.finalState]} ${chalk.bold(entry.target)} ${formatTier(entry.tier)}${degraded} ${chalk.gray(`[${attempts}]`)}${detail}`;
}

export function formatSummary(summary: ReportSummary): string {
  const lines: string[] = [];
  lines.push(chalk.bold("Summary"));
  lines.push(chalk.gray("─".repeat(40)));
  lines.push(`  Targets:      ${summary.total}`);
  lines.push(`  Accepted:     ${chalk.green(String(summary.accepted))}`);
  lines.push(`  Degraded:     ${chalk.yellow(String(summary.degraded))}`);
  lines.push(`  Rejected:     ${chalk.red(String(summary.rejected))}`);
  lines.push(`  Regenerations: ${summary.regenerations} (${summary.successfulRegenerations} successful)`);
  lines.push(`  Duration:     ${(summary.durationMs / 1000).toFixed(1)}s`);
  return lines.join("\n");
}

export function formatRunReport(report: PipelineReport): string {
  const lines: string[] = [];

  if (report.analysisErrors.length > 0) {
    lines.push(chalk.yellow.bold(`Skipped ${report.analysisErrors.length} file(s) that could not be analyzed:`));
    for (const error of report.analysisErrors) {
      const location = error.line === undefined ? error.path : `${error.path}:${error.line}`;
      lines.push(chalk.yellow(`  ${location}: ${error.message}`));
    }
    lines.push("");
  }

  for (const entry of report.targets) {
    lines.push(formatTargetLine(entry));
  }
  lines.push("", formatSummary(report.summary));
  return lines.join("\n");
}

// =============================================================================
// ANALYSIS
// =============================================================================

export interface AnalysisView {
  units: Array<{
    path: string;
    structuralError: string | undefined;
    includes: string[];
    globals: string[];
    functions: Array<{
      name: string;
      line: number;
      signature: string;
      isDefinition: boolean;
      branchCount: number;
      calls: string[];
    }>;
    stubs: string[];
    unresolved: string[];
  }>;
  edges: Array<[string, string]>;
}

export function buildAnalysisView(analysis: AnalysisResult, synthesizer: StubSynthesizer): AnalysisView {
  return {
    units: analysis.units.map((unit) => {
      const plan = planStubs(unit, analysis.graph, synthesizer);
      return {
        path: unit.path,
        structuralError: unit.structuralError,
        includes: unit.includes.map((inc) => (inc.system ? `<${inc.path}>` : `"${inc.path}"`)),
        globals: unit.globals.map((g) => g.name),
        functions: unit.functions.map((fn) => ({
          name: fn.name,
          line: fn.line,
          signature: `${fn.returnType} ${fn.name}(${fn.parameters.map((p) => p.declaration).join(", ")}${fn.variadic ? ", ..." : ""})`,
          isDefinition: fn.isDefinition,
          branchCount: fn.branchCount,
          calls: fn.calls,
        })),
        stubs: plan.stubs.map((stub) => stub.name),
        unresolved: plan.unresolved,
      };
    }),
    edges: analysis.graph.edgeList(),
  };
}

export function formatAnalysis(view: AnalysisView): string {
  const lines: string[] = [];

  for (const unit of view.units) {
    lines.push(chalk.bold.underline(unit.path));
    if (unit.structuralError !== undefined) {
      lines.push(chalk.red(`  structural error: ${unit.structuralError}`), "");
      continue;
    }

    for (const fn of unit.functions) {
      const kind = fn.isDefinition ? chalk.cyan("def ") : chalk.gray("decl");
      lines.push(`  ${kind} ${fn.signature} ${chalk.gray(`:${fn.line}`)}`);
      if (fn.isDefinition) {
        lines.push(chalk.gray(`       branches ${fn.branchCount}; calls ${fn.calls.join(", ") || "-"}`));
      }
    }
    if (unit.stubs.length > 0) {
      lines.push(`  ${chalk.magenta("stubs")} ${unit.stubs.join(", ")}`);
    }
    if (unit.unresolved.length > 0) {
      lines.push(`  ${chalk.yellow("unresolved")} ${unit.unresolved.join(", ")}`);
    }
    lines.push("");
  }

  lines.push(chalk.bold(`Dependency edges (${view.edges.length})`));
  for (const [from, to] of view.edges) {
    lines.push(chalk.gray(`  ${from} -> ${to}`));
  }
  return lines.join("\n");
}

// =============================================================================
// MESSAGES
// =============================================================================

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  if (error instanceof ConfigurationError && error.issues.length > 0) {
    return chalk.red(["Error: Invalid configuration", ...error.issues.map((issue) => `  - ${issue}`)].join("\n"));
  }
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
