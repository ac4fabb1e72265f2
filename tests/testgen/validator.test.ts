import { describe, it, expect } from "vitest";

import { ProviderError, ToolchainError } from "@/lib/errors.js";
import { logger } from "@/lib/logger.js";
import type { CompileResult, Toolchain } from "@/toolchain/types.js";
import { Validator, assembleUnit } from "@/testgen/validator.js";

import { FakeToolchain } from "../helpers/fakes.js";
import { CLAMP_HIGH, CLAMP_MEDIUM, CLAMP_SOURCE, clampContext, sensorContext } from "../helpers/fixtures.js";

logger.configure({ level: "silent" });

describe("assembleUnit", () => {
  it("concatenates harness, source and candidate with line markers", () => {
    expect(assembleUnit(CLAMP_HIGH, clampContext())).toBe(
      [
        '#include "unity.h"',
        "#define main ctestgen_source_main",
        '#line 1 "src/clamp.c"',
        CLAMP_SOURCE.trimEnd(),
        "#undef main",
        '#line 1 "test_clamp_clamp.c"',
        CLAMP_HIGH.trimEnd(),
        "",
      ].join("\n")
    );
  });

  it("adds stubs and the hooks a candidate omits", () => {
    const ctx = sensorContext();
    const candidate = "void test_read_sensor_reads(void)\n{\n    TEST_ASSERT_EQUAL_INT(2, read_sensor(1));\n}\n";
    const unit = assembleUnit(candidate, ctx);

    expect(unit).toContain(`#undef main\n#line 1 "ctestgen_stubs.c"\n/* stub: int hal_read_adc(int channel) */\n`);
    expect(unit).toContain(`#line 1 "test_sensor_read_sensor.c"\n${candidate.trimEnd()}\n`);
    expect(unit.endsWith('#line 1 "ctestgen_harness.c"\nvoid setUp(void) {}\nvoid tearDown(void) {}\n')).toBe(true);
  });

  it("does not count commented-out hooks as defined", () => {
    const candidate = "/* void setUp(void) { } */\nvoid tearDown(void) {}\nvoid test_a(void) { TEST_ASSERT(clamp(1, 0, 2) == 1); }\n";
    const unit = assembleUnit(candidate, clampContext());

    expect(unit.endsWith('#line 1 "ctestgen_harness.c"\nvoid setUp(void) {}\n')).toBe(true);
  });
});

describe("Validator", () => {
  it("rates a compiling, thorough candidate high", async () => {
    const toolchain = new FakeToolchain();
    const ctx = clampContext();

    const result = await new Validator(toolchain).validate(CLAMP_HIGH, ctx);

    expect(result.compiled).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.tier).toBe("high");
    expect(result.metrics).toEqual({
      assertionCount: 3,
      testFunctionCount: 3,
      branchCount: 3,
      assertionDensity: 1,
      comprehensiveDensity: 1,
    });
    expect(toolchain.units).toEqual([assembleUnit(CLAMP_HIGH, ctx)]);
    expect(toolchain.options).toEqual([{ includeDirs: ["src"] }]);
  });

  it("rates a sparse candidate medium", async () => {
    const result = await new Validator(new FakeToolchain()).validate(CLAMP_MEDIUM, clampContext());

    expect(result.tier).toBe("medium");
    expect(result.metrics.assertionDensity).toBeCloseTo(1 / 3);
  });

  it("uses the configured density bar", async () => {
    const result = await new Validator(new FakeToolchain(), { comprehensiveDensity: 2 }).validate(CLAMP_HIGH, clampContext());

    expect(result.issues).toEqual([]);
    expect(result.tier).toBe("medium");
  });

  it("turns link errors into blocking issues", async () => {
    const toolchain = new FakeToolchain([
      {
        success: false,
        diagnostics: [
          "unit.c:(.text+0x1a): undefined reference to `missing_helper'",
          "collect2: error: ld returned 1 exit status",
        ],
      },
    ]);

    const result = await new Validator(toolchain).validate(CLAMP_HIGH, clampContext());

    expect(result.compiled).toBe(false);
    expect(result.tier).toBe("low");
    expect(result.issues).toEqual([
      { kind: "compile-error", severity: "blocking", description: "unit.c:(.text+0x1a): undefined reference to `missing_helper'" },
      { kind: "compile-error", severity: "blocking", description: "collect2: error: ld returned 1 exit status" },
    ]);
  });

  it("keeps only warnings located in the candidate", async () => {
    const toolchain = new FakeToolchain([
      {
        success: true,
        diagnostics: [
          "test_clamp_clamp.c:8:9: warning: unused variable 'x' [-Wunused-variable]",
          "src/clamp.c:12:1: warning: control reaches end of non-void function [-Wreturn-type]",
        ],
      },
    ]);

    const result = await new Validator(toolchain).validate(CLAMP_HIGH, clampContext());

    expect(result.diagnostics.map((d) => d.severity)).toEqual(["warning", "warning"]);
    expect(result.issues).toEqual([
      {
        kind: "compile-warning",
        severity: "warning",
        description: "test_clamp_clamp.c:8:9: warning: unused variable 'x' [-Wunused-variable]",
      },
    ]);
    expect(result.tier).toBe("medium");
  });

  it("propagates toolchain launch failures", async () => {
    const toolchain = new FakeToolchain([new ToolchainError("spawn cc ENOENT")]);

    await expect(new Validator(toolchain).validate(CLAMP_HIGH, clampContext())).rejects.toBeInstanceOf(ToolchainError);
  });

  it("times out a compiler that never finishes", async () => {
    const stuck: Toolchain = {
      compile: () => new Promise<CompileResult>(() => undefined),
    };

    const failure = new Validator(stuck, { compileTimeoutMs: 10 }).validate(CLAMP_HIGH, clampContext());

    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow("Compilation did not finish within 10ms");
  });
});
