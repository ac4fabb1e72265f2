import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  applyEnvironment,
  CONFIG_FILE_NAME,
  loadConfig,
  mergeConfig,
  parseConfig,
  readConfigFile,
} from "@/config/loader.js";
import { ConfigurationError } from "@/lib/errors.js";
import { unwrap } from "@/lib/result.js";

describe("parseConfig", () => {
  it("applies defaults to an empty object", () => {
    const config = unwrap(parseConfig({}));

    expect(config.sourceDir).toBe(".");
    expect(config.outputDir).toBe("tests");
    expect(config.qualityThreshold).toBe("high");
    expect(config.regenerateOnLowQuality).toBe(false);
    expect(config.maxRegenerationAttempts).toBe(2);
    expect(config.concurrency).toBe(4);
    expect(config.testNamePattern).toBe("^test_[A-Za-z0-9_]+$");
    expect(config.skipMain).toBe(true);
    expect(config.ai).toEqual({ provider: "anthropic", maxTokens: 4096, temperature: 0.2 });
  });

  it("reports every invalid field at once", () => {
    const result = parseConfig({ qualityThreshold: "perfect", concurrency: 0 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ConfigurationError);
    expect(result.error.code).toBe("CONFIGURATION_ERROR");
    expect(result.error.issues.map((issue) => issue.split(":")[0])).toEqual(["qualityThreshold", "concurrency"]);
    expect(result.error.message.startsWith("Invalid configuration:\n  qualityThreshold: ")).toBe(true);
  });

  it("rejects unknown keys at the root", () => {
    const result = parseConfig({ bogus: 1 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues).toEqual(["(root): Unrecognized key(s) in object: 'bogus'"]);
  });

  it("rejects stub overrides keyed by something other than an identifier", () => {
    const result = parseConfig({ stubReturnOverrides: { "not-ident": "1" } });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues).toEqual(["stubReturnOverrides.not-ident: Stub override keys must be C identifiers"]);
  });

  it("rejects a test name pattern that is not a regular expression", () => {
    const result = parseConfig({ testNamePattern: "([" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues).toEqual(["testNamePattern: Must be a valid regular expression"]);
  });
});

describe("mergeConfig", () => {
  it("lets defined overrides win and merges ai one level deep", () => {
    const merged = mergeConfig(
      { concurrency: 2, ai: { provider: "openai", model: "gpt-4o" } },
      { concurrency: undefined, outputDir: "out", ai: { model: "gpt-4.1", apiKey: undefined } }
    );

    expect(merged).toEqual({ concurrency: 2, outputDir: "out", ai: { provider: "openai", model: "gpt-4.1" } });
  });

  it("keeps file ai settings when no ai overrides are given", () => {
    expect(mergeConfig({ ai: { provider: "mock" } })).toEqual({ ai: { provider: "mock" } });
  });

  it("leaves ai out when neither side sets it", () => {
    expect(Object.keys(mergeConfig({}, {}))).toEqual([]);
  });
});

describe("applyEnvironment", () => {
  const base = unwrap(parseConfig({ ai: { provider: "openai", apiKey: "file-key" } }));

  it("prefers the provider's environment key", () => {
    expect(applyEnvironment(base, { OPENAI_API_KEY: "test-secret" }).ai.apiKey).toBe("test-secret");
  });

  it("keeps the configured key when the variable is absent or empty", () => {
    expect(applyEnvironment(base, {}).ai.apiKey).toBe("file-key");
    expect(applyEnvironment(base, { OPENAI_API_KEY: "" }).ai.apiKey).toBe("file-key");
  });

  it("ignores the other provider's variable", () => {
    expect(applyEnvironment(base, { ANTHROPIC_API_KEY: "test-secret" }).ai.apiKey).toBe("file-key");
  });

  it("returns mock configuration untouched", () => {
    const mock = unwrap(parseConfig({ ai: { provider: "mock" } }));
    expect(applyEnvironment(mock, { ANTHROPIC_API_KEY: "test-secret" })).toBe(mock);
  });
});

describe("config files", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "ctestgen-config-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("treats a missing default file as empty configuration", async () => {
    expect(await readConfigFile(tempDir)).toEqual({ success: true, data: {} });
  });

  it("fails when an explicit file does not exist", async () => {
    const result = await readConfigFile(tempDir, "missing.json");

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(`Config file not found: ${path.join(tempDir, "missing.json")}`);
  });

  it("fails on invalid JSON", async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), "{ nope");

    const result = await readConfigFile(tempDir);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(
      result.error.message.startsWith(`Config file ${path.join(tempDir, CONFIG_FILE_NAME)} is not valid JSON: `)
    ).toBe(true);
  });

  it("fails when the file holds something other than an object", async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), "[1, 2]");

    const result = await readConfigFile(tempDir);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      `Config file ${path.join(tempDir, CONFIG_FILE_NAME)} must contain a JSON object`
    );
  });

  it("loads file values under flag overrides and environment keys", async () => {
    await fs.writeFile(
      path.join(tempDir, CONFIG_FILE_NAME),
      JSON.stringify({ outputDir: "generated", concurrency: 2, ai: { provider: "openai" } })
    );

    const config = await loadConfig({
      cwd: tempDir,
      overrides: { concurrency: 8 },
      env: { OPENAI_API_KEY: "test-secret" },
    });

    expect(config.outputDir).toBe("generated");
    expect(config.concurrency).toBe(8);
    expect(config.ai.provider).toBe("openai");
    expect(config.ai.apiKey).toBe("test-secret");
  });

  it("throws a ConfigurationError before returning invalid settings", async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), JSON.stringify({ concurrency: "many" }));

    await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toBeInstanceOf(ConfigurationError);
  });
});
