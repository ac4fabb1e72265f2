/**
 * Report persistence
 *
 * <outputDir>/<testPath>                                    kept candidates
 * <outputDir>/compilation_report/<test>_compiles_{yes|no}.txt
 * <outputDir>/ctestgen-report.json
 */

import { mkdir, rm, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";

import type { PipelineReport, TargetOutcome } from "../pipeline/report.js";
import { formatIssue } from "../testgen/feedback.js";
import type { GenerationAttempt } from "../testgen/types.js";

export const REPORT_DIR_NAME = "compilation_report";
export const REPORT_FILE_NAME = "ctestgen-report.json";

export interface WrittenFiles {
  tests: string[];
  compilationReports: string[];
  report: string;
}

/**
 * Attempt shown in the compilation report: the kept one, else the last
 */
function reportedAttempt(outcome: TargetOutcome): GenerationAttempt | undefined {
  return outcome.result.selected ?? outcome.result.attempts[outcome.result.attempts.length - 1];
}

export function compilationReportName(testPath: string, compiled: boolean): string {
  return `${basename(testPath, extname(testPath))}_compiles_${compiled ? "yes" : "no"}.txt`;
}

export function formatCompilationReport(outcome: TargetOutcome): string {
  const { context, result } = outcome;
  const attempt = reportedAttempt(outcome);
  const validation = attempt?.validation;

  const lines = [
    `Validation Report for ${context.suggestedTestPath}`,
    `Target: ${result.target.name} (${context.unit.path})`,
    `Final state: ${result.finalState}${result.degraded ? " (degraded)" : ""}`,
    `Quality: ${result.tier ?? "n/a"}`,
    `Compiles: ${validation?.compiled === true ? "yes" : "no"}`,
    `Attempts: ${result.attempts.length}`,
  ];

  if (validation) {
    lines.push(
      `Assertions: ${validation.metrics.assertionCount} across ${validation.metrics.testFunctionCount} test(s), ` +
        `${validation.metrics.branchCount} branch(es)`
    );
  }
  if (result.error !== undefined) {
    lines.push(`Error: ${result.error}`);
  }

  const issues = validation?.issues ?? [];
  lines.push("", `Issues: ${issues.length}`);
  lines.push(...issues.map(formatIssue));

  const diagnostics = validation?.diagnostics ?? [];
  if (diagnostics.length > 0) {
    lines.push("", "Diagnostics:");
    for (const diagnostic of diagnostics) {
      lines.push(`[${diagnostic.severity}] ${diagnostic.message}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Write kept candidates and the reports. Old compilation reports are
 * cleared first so the directory describes only this run.
 */
export async function writeRunOutput(
  outputDir: string,
  outcomes: readonly TargetOutcome[],
  report: PipelineReport
): Promise<WrittenFiles> {
  const reportDir = join(outputDir, REPORT_DIR_NAME);
  await rm(reportDir, { recursive: true, force: true });
  await mkdir(reportDir, { recursive: true });

  const written: WrittenFiles = { tests: [], compilationReports: [], report: join(outputDir, REPORT_FILE_NAME) };

  for (const outcome of outcomes) {
    const attempt = reportedAttempt(outcome);
    const candidate = outcome.result.selected?.candidate;

    if (outcome.result.accepted && candidate !== undefined) {
      const testFile = join(outputDir, outcome.context.suggestedTestPath);
      await writeFile(testFile, candidate, "utf-8");
      written.tests.push(testFile);
    }

    if (attempt !== undefined) {
      const compiled = attempt.validation?.compiled === true;
      const reportFile = join(reportDir, compilationReportName(outcome.context.suggestedTestPath, compiled));
      await writeFile(reportFile, formatCompilationReport(outcome), "utf-8");
      written.compilationReports.push(reportFile);
    }
  }

  await writeFile(written.report, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
  return written;
}
