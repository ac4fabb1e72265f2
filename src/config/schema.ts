import { z } from "zod";

/**
 * Quality tiers, best first
 */
export const QualityTierSchema = z.enum(["high", "medium", "low"]);

/**
 * Generation providers
 */
export const ProviderSchema = z.enum(["anthropic", "openai", "mock"]);

/**
 * C identifier, used for stub override keys
 */
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RegexSourceSchema = z.string().refine(
  (value) => {
    try {
      new RegExp(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: "Must be a valid regular expression" }
);

/**
 * Provider settings
 */
export const AISettingsSchema = z
  .object({
    provider: ProviderSchema.default("anthropic"),
    model: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    maxTokens: z.number().int().positive().default(4096),
    temperature: z.number().min(0).max(1).default(0.2),
  })
  .strict();

/**
 * Complete run configuration
 */
export const ConfigSchema = z
  .object({
    /** Explicit list of C files; takes precedence over sourceDir */
    sourceFiles: z.array(z.string().min(1)).default([]),
    sourceDir: z.string().min(1).default("."),
    /** Glob patterns (minimatch) of paths to skip, relative to sourceDir */
    exclude: z.array(z.string().min(1)).default([]),
    outputDir: z.string().min(1).default("tests"),
    /** Only generate for these functions */
    functions: z.array(z.string().regex(IDENTIFIER_PATTERN)).default([]),

    qualityThreshold: QualityTierSchema.default("high"),
    regenerateOnLowQuality: z.boolean().default(false),
    maxRegenerationAttempts: z.number().int().min(0).default(2),

    concurrency: z.number().int().min(1).max(32).default(4),
    providerTimeoutMs: z.number().int().positive().default(60000),
    compileTimeoutMs: z.number().int().positive().default(30000),

    minAssertions: z.number().int().min(1).default(2),
    comprehensiveDensity: z.number().positive().default(1),
    testNamePattern: RegexSourceSchema.default("^test_[A-Za-z0-9_]+$"),

    /** Function name -> C expression returned by its stub */
    stubReturnOverrides: z
      .record(z.string().regex(IDENTIFIER_PATTERN, "Stub override keys must be C identifiers"), z.string().min(1))
      .default({}),
    redactSensitive: z.boolean().default(false),
    skipMain: z.boolean().default(true),

    compiler: z.string().min(1).default("cc"),
    compilerFlags: z.array(z.string()).default([]),
    includeDirs: z.array(z.string().min(1)).default([]),
    harnessDir: z.string().min(1).optional(),

    ai: AISettingsSchema.default({}),
  })
  .strict();

export type QualityTierSetting = z.infer<typeof QualityTierSchema>;
export type ProviderSetting = z.infer<typeof ProviderSchema>;
export type AISettings = z.infer<typeof AISettingsSchema>;

/**
 * Validated configuration with defaults applied
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration as written in a file or passed as flags
 */
export type ConfigInput = z.input<typeof ConfigSchema>;
