import { describe, it, expect } from "vitest";

import { ProviderError } from "@/lib/errors.js";
import {
  buildGenerationPrompt,
  formatSignature,
  generateCandidate,
  postProcessCandidate,
  stripMarkdownFences,
} from "@/testgen/generator.js";
import type { PromptOptions } from "@/testgen/generator.js";

import { FakeProvider } from "../helpers/fakes.js";
import { CLAMP_HIGH, clampContext, sensorContext } from "../helpers/fixtures.js";

const PROMPT_OPTIONS: PromptOptions = { minAssertions: 2, testNamePattern: "^test_[A-Za-z0-9_]+$" };

describe("formatSignature", () => {
  it("renders a C declaration", () => {
    expect(formatSignature(clampContext().target)).toBe("int clamp(int value, int lo, int hi)");
  });
});

describe("buildGenerationPrompt", () => {
  it("describes the target function", () => {
    const prompt = buildGenerationPrompt(clampContext(), PROMPT_OPTIONS);
    const lines = prompt.split("\n");

    expect(lines[0]).toBe("Generate a complete Unity unit test file in C for one function.");
    expect(lines).toContain("Function name: clamp");
    expect(lines).toContain("Signature: `int clamp(int value, int lo, int hi)`");
    expect(lines).toContain("Parameter count: 3");
    expect(lines).toContain("Defined in: src/clamp.c (line 3)");
    expect(lines).toContain("Branches: 3");
    expect(lines).toContain("None. The function calls no other analyzed function.");
    expect(lines).toContain("None. Do not write any stubs.");
    expect(lines).toContain("5. Write at least 3 assertions so that each of the 3 branch(es) is exercised and checked.");
    expect(prompt).not.toContain("## Unresolved Calls");
  });

  it("embeds the source between markers", () => {
    const ctx = clampContext();
    const prompt = buildGenerationPrompt(ctx, PROMPT_OPTIONS);

    expect(prompt).toContain(`/* ==== BEGIN src/clamp.c ==== */\n${ctx.unit.text.trimEnd()}\n/* ==== END src/clamp.c ==== */`);
  });

  it("ends with the first-attempt feedback section", () => {
    const prompt = buildGenerationPrompt(clampContext(), PROMPT_OPTIONS);
    expect(prompt.endsWith("## Feedback From Previous Attempt\nNone. This is the first attempt.")).toBe(true);
  });

  it("lists dependencies, globals and stub control structs", () => {
    const lines = buildGenerationPrompt(sensorContext(), PROMPT_OPTIONS).split("\n");

    expect(lines).toContain("File-scope globals it uses: last_reading");
    expect(lines).toContain("- `int hal_read_adc(int channel)` (declared in src/hal.h, stubbed)");
    expect(lines).toContain(
      "- `int hal_read_adc(int channel)` -> `stub_hal_read_adc_t stub_hal_read_adc` { int return_value; unsigned int call_count; int last_channel; }"
    );
    expect(lines).toContain("5. Write at least 2 assertions so that each of the 2 branch(es) is exercised and checked.");
  });

  it("is deterministic and changes only in the feedback section", () => {
    const ctx = clampContext();
    const first = buildGenerationPrompt(ctx, PROMPT_OPTIONS);
    const withFeedback = buildGenerationPrompt(ctx, PROMPT_OPTIONS, {
      attempt: 1,
      tier: "medium",
      issues: [{ kind: "float-equality", severity: "warning", description: "exact float compare" }],
    });
    const marker = "## Feedback From Previous Attempt\n";

    expect(buildGenerationPrompt(ctx, PROMPT_OPTIONS)).toBe(first);
    expect(withFeedback.slice(0, withFeedback.indexOf(marker))).toBe(first.slice(0, first.indexOf(marker)));
    expect(withFeedback).toContain(
      `${marker}PREVIOUS ATTEMPT (#1) WAS RATED MEDIUM WITH THESE ISSUES. FIX ALL OF THEM:\n- [warning] float-equality: exact float compare`
    );
  });
});

describe("generateCandidate", () => {
  it("returns the provider reply", async () => {
    const provider = new FakeProvider([CLAMP_HIGH]);

    await expect(generateCandidate(provider, "prompt", { timeoutMs: 1000 })).resolves.toBe(CLAMP_HIGH);
    expect(provider.prompts).toEqual(["prompt"]);
  });

  it("rejects empty replies as malformed", async () => {
    const provider = new FakeProvider(["  \n"]);
    const failure = generateCandidate(provider, "prompt", { timeoutMs: 1000 });

    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toMatchObject({ kind: "malformed_response" });
  });

  it("times out a provider that never answers", async () => {
    const provider = new FakeProvider([() => new Promise<string>(() => undefined)]);

    await expect(generateCandidate(provider, "prompt", { timeoutMs: 10 })).rejects.toMatchObject({
      kind: "timeout",
      message: "Provider did not respond within 10ms",
    });
  });
});

describe("postProcessCandidate", () => {
  it("strips fences, fixes macros and adds the harness include and main", () => {
    const raw = [
      "```c",
      '#include "clamp.c"',
      "void test_clamp_low(void)",
      "{",
      "    TEST_ASSERT_EQUAL_FLOAT(1.5f, ratio(3, 2));",
      "    TEST_ASSERT_GREATER_THAN_EQUAL_INT(0, clamp(1, 0, 5));",
      "}",
      "```",
    ].join("\n");

    expect(postProcessCandidate(raw, clampContext())).toBe(
      [
        '#include "unity.h"',
        "void test_clamp_low(void)",
        "{",
        "    TEST_ASSERT_FLOAT_WITHIN(0.01f, 1.5f, ratio(3, 2));",
        "    TEST_ASSERT_GREATER_OR_EQUAL_INT(0, clamp(1, 0, 5));",
        "}",
        "",
        "int main(void)",
        "{",
        "    UNITY_BEGIN();",
        "    RUN_TEST(test_clamp_low);",
        "    return UNITY_END();",
        "}",
        "",
      ].join("\n")
    );
  });

  it("leaves a complete candidate as it is", () => {
    expect(postProcessCandidate(CLAMP_HIGH, clampContext())).toBe(CLAMP_HIGH);
  });

  it("removes bare fence lines", () => {
    expect(stripMarkdownFences("```\nint x;\n```")).toBe("int x;");
  });
});
