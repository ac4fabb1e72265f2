import { describe, it, expect } from "vitest";

import { blockingIssueCount, classifyQuality, compareTiers, meetsThreshold } from "@/testgen/classifier.js";
import type { ClassifierInput } from "@/testgen/classifier.js";
import type { Issue } from "@/testgen/types.js";

function input(overrides: Partial<ClassifierInput> & { density?: number } = {}): ClassifierInput {
  const density = overrides.density ?? 1;
  return {
    compiled: overrides.compiled ?? true,
    issues: overrides.issues ?? [],
    metrics: overrides.metrics ?? {
      assertionCount: density * 4,
      testFunctionCount: 2,
      branchCount: 4,
      assertionDensity: density,
      comprehensiveDensity: 1,
    },
  };
}

const WARNING: Issue = { kind: "float-equality", severity: "warning", description: "exact float compare" };
const BLOCKING: Issue = { kind: "no-tests", severity: "blocking", description: "No test functions found" };
const INFO: Issue = { kind: "convention", severity: "info", description: "bad names" };

describe("classifyQuality", () => {
  it("rates a compile failure low regardless of everything else", () => {
    expect(classifyQuality(input({ compiled: false, density: 5 }))).toBe("low");
  });

  it("rates any blocking issue low", () => {
    expect(classifyQuality(input({ issues: [WARNING, BLOCKING] }))).toBe("low");
  });

  it("rates a clean, dense candidate high", () => {
    expect(classifyQuality(input({ density: 1 }))).toBe("high");
  });

  it("rates a clean but sparse candidate medium", () => {
    expect(classifyQuality(input({ density: 0.5 }))).toBe("medium");
  });

  it("rates non-blocking issues medium", () => {
    expect(classifyQuality(input({ issues: [WARNING] }))).toBe("medium");
    expect(classifyQuality(input({ issues: [INFO] }))).toBe("medium");
  });

  it("is a pure function of its input", () => {
    const value = input({ issues: [WARNING] });
    expect(classifyQuality(value)).toBe(classifyQuality(value));
    expect(value.issues).toEqual([WARNING]);
  });
});

describe("tier ordering", () => {
  it("orders high above medium above low", () => {
    expect(compareTiers("high", "medium")).toBeGreaterThan(0);
    expect(compareTiers("low", "medium")).toBeLessThan(0);
    expect(compareTiers("medium", "medium")).toBe(0);
  });

  it("meets a threshold at or above it", () => {
    expect(meetsThreshold("high", "medium")).toBe(true);
    expect(meetsThreshold("medium", "medium")).toBe(true);
    expect(meetsThreshold("medium", "high")).toBe(false);
    expect(meetsThreshold("low", "low")).toBe(true);
  });

  it("counts blocking issues only", () => {
    expect(blockingIssueCount({ issues: [BLOCKING, WARNING, BLOCKING, INFO] })).toBe(2);
  });
});
