/**
 * Quality Classifier
 *
 * Pure mapping from a validation outcome to a tier. First match wins:
 *   1. compile failure              -> low
 *   2. any blocking issue           -> low
 *   3. no issues, density >= bar    -> high
 *   4. otherwise                    -> medium
 */

import type { QualityTier, ValidationResult } from "./types.js";

export type ClassifierInput = Pick<ValidationResult, "compiled" | "issues" | "metrics">;

const TIER_RANK: Record<QualityTier, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

export const QUALITY_TIERS: readonly QualityTier[] = ["high", "medium", "low"];

export function classifyQuality(result: ClassifierInput): QualityTier {
  if (!result.compiled) {
    return "low";
  }
  if (result.issues.some((issue) => issue.severity === "blocking")) {
    return "low";
  }
  if (
    result.issues.length === 0 &&
    result.metrics.assertionDensity >= result.metrics.comprehensiveDensity
  ) {
    return "high";
  }
  return "medium";
}

/**
 * Positive when `a` ranks above `b`
 */
export function compareTiers(a: QualityTier, b: QualityTier): number {
  return TIER_RANK[a] - TIER_RANK[b];
}

export function meetsThreshold(tier: QualityTier, threshold: QualityTier): boolean {
  return compareTiers(tier, threshold) >= 0;
}

export function blockingIssueCount(result: Pick<ValidationResult, "issues">): number {
  return result.issues.filter((issue) => issue.severity === "blocking").length;
}
