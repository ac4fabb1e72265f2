import { describe, it, expect } from "vitest";

import { logger } from "@/lib/logger.js";
import { runPipeline } from "@/pipeline/pipeline.js";
import type { PipelineOptions } from "@/pipeline/pipeline.js";
import type { TargetReport } from "@/pipeline/report.js";

import { FakeProvider, FakeToolchain } from "../helpers/fakes.js";
import { CLAMP_HIGH, CLAMP_MEDIUM, PROJECT_FILES, SENSOR_HIGH } from "../helpers/fixtures.js";

logger.configure({ level: "silent" });

function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    concurrency: 2,
    controller: {
      qualityThreshold: "high",
      regenerateOnLowQuality: false,
      maxRegenerationAttempts: 2,
      providerTimeoutMs: 1000,
      prompt: { minAssertions: 2, testNamePattern: "^test_[A-Za-z0-9_]+$" },
    },
    validator: { minAssertions: 2, comprehensiveDensity: 1, testNamePattern: "^test_[A-Za-z0-9_]+$", compileTimeoutMs: 1000 },
    stubReturnOverrides: {},
    redactSensitive: false,
    skipMain: true,
    ...overrides,
  };
}

function replyByTarget(clampReply: string): (prompt: string) => string {
  return (prompt) => (prompt.includes("Function name: clamp\n") ? clampReply : SENSOR_HIGH);
}

describe("runPipeline", () => {
  it("generates one accepted test per defined function", async () => {
    const provider = new FakeProvider([replyByTarget(CLAMP_HIGH)]);
    const toolchain = new FakeToolchain();

    const run = await runPipeline(PROJECT_FILES, { provider, toolchain }, options());

    expect(run.aborted).toBe(false);
    expect(run.report.targets.map((t) => [t.target, t.finalState, t.tier])).toEqual([
      ["clamp", "accepted", "high"],
      ["read_sensor", "accepted", "high"],
    ]);
    expect(run.report.summary).toMatchObject({
      total: 2,
      accepted: 2,
      degraded: 0,
      rejected: 0,
      regenerations: 0,
      successfulRegenerations: 0,
    });
    expect(run.outcomes.map((o) => o.context.suggestedTestPath)).toEqual([
      "test_clamp_clamp.c",
      "test_sensor_read_sensor.c",
    ]);
    expect(provider.calls).toBe(2);
    expect(toolchain.units).toHaveLength(2);
  });

  it("compiles the sensor test against its stubs", async () => {
    const toolchain = new FakeToolchain();

    await runPipeline(PROJECT_FILES, { provider: new FakeProvider([SENSOR_HIGH]), toolchain }, options({ only: ["read_sensor"] }));

    expect(toolchain.units).toHaveLength(1);
    expect(toolchain.units[0]).toContain("stub_hal_read_adc_t stub_hal_read_adc = {0};");
  });

  it("applies stub return overrides", async () => {
    const toolchain = new FakeToolchain();

    await runPipeline(
      PROJECT_FILES,
      { provider: new FakeProvider([SENSOR_HIGH]), toolchain },
      options({ only: ["read_sensor"], stubReturnOverrides: { hal_read_adc: "512" } })
    );

    expect(toolchain.units[0]).toContain("stub_hal_read_adc_t stub_hal_read_adc = { .return_value = 512 };");
  });

  it("rejects below-threshold targets in strict mode and keeps going", async () => {
    const provider = new FakeProvider([replyByTarget(CLAMP_MEDIUM)]);

    const run = await runPipeline(PROJECT_FILES, { provider, toolchain: new FakeToolchain() }, options({ concurrency: 1 }));

    expect(run.report.targets.map((t) => t.finalState)).toEqual(["exhausted_fail", "accepted"]);
    expect(run.report.summary.rejected).toBe(1);
    expect(run.report.targets[0]?.error).toBe("Rated medium, below the high threshold; regeneration is disabled");
  });

  it("records files it could not analyze", async () => {
    const files = [...PROJECT_FILES, { path: "src/broken.c", text: "void broken(void) {\n" }];

    const run = await runPipeline(
      files,
      { provider: new FakeProvider([replyByTarget(CLAMP_HIGH)]), toolchain: new FakeToolchain() },
      options()
    );

    expect(run.report.analysisErrors).toEqual([
      { path: "src/broken.c", line: 2, message: "Unterminated '{' block at end of file (line 2)" },
    ]);
    expect(run.report.summary.total).toBe(2);
  });

  it("gives same-named units in different directories distinct test files", async () => {
    const files = [
      { path: "a/x.c", text: "int init(void)\n{\n    return 1;\n}\n" },
      { path: "b/x.c", text: "int init(void)\n{\n    return 2;\n}\n" },
    ];

    const run = await runPipeline(
      files,
      { provider: new FakeProvider([CLAMP_HIGH]), toolchain: new FakeToolchain() },
      options()
    );

    expect(run.outcomes.map((o) => o.context.suggestedTestPath)).toEqual(["test_a_x_init.c", "test_b_x_init.c"]);
    expect(run.report.targets.map((t) => t.testPath)).toEqual(["test_a_x_init.c", "test_b_x_init.c"]);
  });

  it("reports progress for every target", async () => {
    const started: string[] = [];
    const completed: Array<[string, number, number]> = [];

    await runPipeline(
      PROJECT_FILES,
      { provider: new FakeProvider([replyByTarget(CLAMP_HIGH)]), toolchain: new FakeToolchain() },
      options({
        concurrency: 1,
        onTargetStart: (context) => started.push(context.target.name),
        onTargetComplete: (entry: TargetReport, done, total) => completed.push([entry.target, done, total]),
      })
    );

    expect(started).toEqual(["clamp", "read_sensor"]);
    expect(completed).toEqual([
      ["clamp", 1, 2],
      ["read_sensor", 2, 2],
    ]);
  });

  it("starts nothing once aborted but still gives every target a verdict", async () => {
    const abort = new AbortController();
    abort.abort();
    const provider = new FakeProvider([CLAMP_HIGH]);

    const run = await runPipeline(PROJECT_FILES, { provider, toolchain: new FakeToolchain() }, options({ signal: abort.signal }));

    expect(run.aborted).toBe(true);
    expect(run.report.targets.map((t) => [t.target, t.finalState, t.error])).toEqual([
      ["clamp", "exhausted_fail", "aborted"],
      ["read_sensor", "exhausted_fail", "aborted"],
    ]);
    expect(run.report.summary).toMatchObject({ total: 2, accepted: 0, rejected: 2 });
    expect(provider.calls).toBe(0);
  });

  it("fails the targets left over when the run is aborted midway", async () => {
    const abort = new AbortController();
    const provider = new FakeProvider([
      () => {
        abort.abort();
        return CLAMP_HIGH;
      },
    ]);

    const run = await runPipeline(
      PROJECT_FILES,
      { provider, toolchain: new FakeToolchain() },
      options({ concurrency: 1, signal: abort.signal })
    );

    expect(run.report.targets.map((t) => [t.target, t.finalState, t.error])).toEqual([
      ["clamp", "exhausted_fail", "aborted"],
      ["read_sensor", "exhausted_fail", "aborted"],
    ]);
    expect(run.outcomes.map((o) => o.index)).toEqual([0, 1]);
    expect(provider.calls).toBe(1);
  });
});
