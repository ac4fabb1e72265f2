/**
 * Configuration loading
 *
 * Precedence, lowest first: schema defaults, `ctestgen.config.json`, CLI
 * flags. API keys from the environment override all of them.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { z } from "zod";

import { API_KEY_ENV } from "../ai/service.js";
import { ConfigurationError } from "../lib/errors.js";
import { andThen, err, ok, tryCatch, unwrap } from "../lib/result.js";
import type { Result } from "../lib/result.js";

import { ConfigSchema } from "./schema.js";
import type { AISettings, Config } from "./schema.js";

export const CONFIG_FILE_NAME = "ctestgen.config.json";

const ObjectSchema = z.record(z.string(), z.unknown());

/**
 * Unvalidated settings: a parsed config file or values collected from CLI
 * flags. Validation happens once, after merging.
 */
export type RawConfig = Readonly<Record<string, unknown>>;

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  overrides?: RawConfig;
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * `path.to.field: message` for every issue
 */
export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw configuration, reporting every problem at once
 */
export function parseConfig(input: unknown): Result<Config, ConfigurationError> {
  const result = ConfigSchema.safeParse(input);
  if (result.success) {
    return ok(result.data);
  }
  const issues = formatConfigIssues(result.error);
  return err(new ConfigurationError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues));
}

function parseConfigText(text: string, path: string): Result<Record<string, unknown>, ConfigurationError> {
  const json = tryCatch((): unknown => JSON.parse(text));
  if (!json.success) {
    return err(new ConfigurationError(`Config file ${path} is not valid JSON: ${json.error.message}`, [], { path }));
  }
  const object = ObjectSchema.safeParse(json.data);
  if (!object.success) {
    return err(new ConfigurationError(`Config file ${path} must contain a JSON object`, [], { path }));
  }
  return ok(object.data);
}

/**
 * Raw contents of the config file; an absent default file is empty config
 */
export async function readConfigFile(
  cwd: string,
  configPath?: string
): Promise<Result<Record<string, unknown>, ConfigurationError>> {
  const path = resolve(cwd, configPath ?? CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    return configPath === undefined
      ? ok({})
      : err(new ConfigurationError(`Config file not found: ${path}`, [], { path }));
  }

  try {
    return parseConfigText(await readFile(path, "utf-8"), path);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new ConfigurationError(`Cannot read config file ${path}: ${message}`, [], { path }));
  }
}

function withoutUndefined(values: RawConfig): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Flags win over file values; `ai` merges one level deep
 */
export function mergeConfig(file: RawConfig, overrides: RawConfig = {}): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...file, ...withoutUndefined(overrides) };

  const fileAi = ObjectSchema.safeParse(file["ai"]);
  const aiOverrides = ObjectSchema.safeParse(overrides["ai"]);
  if (aiOverrides.success) {
    merged["ai"] = fileAi.success
      ? { ...fileAi.data, ...withoutUndefined(aiOverrides.data) }
      : withoutUndefined(aiOverrides.data);
  } else {
    merged["ai"] = file["ai"];
  }
  if (merged["ai"] === undefined) {
    delete merged["ai"];
  }
  return merged;
}

/**
 * Environment API keys take precedence over configured ones
 */
export function applyEnvironment(config: Config, env: Readonly<Record<string, string | undefined>>): Config {
  const provider = config.ai.provider;
  if (provider === "mock") {
    return config;
  }
  const key = env[API_KEY_ENV[provider]];
  if (key === undefined || key.length === 0) {
    return config;
  }
  const ai: AISettings = { ...config.ai, apiKey: key };
  return { ...config, ai };
}

/**
 * Load, merge and validate. Throws ConfigurationError before any work
 * starts when anything is invalid.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const file = await readConfigFile(cwd, options.configPath);
  const config = andThen(file, (raw) => parseConfig(mergeConfig(raw, options.overrides)));

  return applyEnvironment(unwrap(config), env);
}
