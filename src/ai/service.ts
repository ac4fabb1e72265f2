/**
 * AI Service Implementation
 *
 * Provides a unified generation interface across providers.
 * Supports Anthropic Claude and OpenAI GPT models, plus an offline mock.
 */

import { z } from "zod";

import { ProviderError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { tryCatchAsync } from "../lib/result.js";

import type {
  AIConfig,
  AIProvider,
  CompletionRequest,
  GenerationProvider,
} from "./types.js";

const DEFAULT_CONFIG: Required<AIConfig> = {
  provider: "anthropic",
  apiKey: "",
  model: "claude-sonnet-4-20250514",
  maxTokens: 4096,
  temperature: 0.2,
  timeoutMs: 60000,
};

const PROVIDER_MODELS: Record<AIProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o",
  mock: "mock-model",
};

const PROVIDER_ENDPOINTS: Record<AIProvider, string> = {
  anthropic: "https://api.anthropic.com/v1/messages",
  openai: "https://api.openai.com/v1/chat/completions",
  mock: "",
};

export const API_KEY_ENV: Record<Exclude<AIProvider, "mock">, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

const SYSTEM_PROMPT =
  "You are an expert embedded C engineer writing Unity unit tests. " +
  "Reply with one complete C test file and nothing else.";

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

const OpenAIResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

interface ProviderReply {
  content: string;
  usage: { inputTokens: number; outputTokens: number };
}

export interface UsageTotals {
  requests: number;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Map an HTTP failure status to a provider error
 */
function errorForStatus(provider: AIProvider, status: number, body: string): ProviderError {
  const context = { provider, status, body: body.slice(0, 500) };
  if (status === 429) {
    return new ProviderError("rate_limited", `${provider} API rate limit exceeded`, context);
  }
  if (status === 408 || status === 504) {
    return new ProviderError("timeout", `${provider} API timed out (HTTP ${status})`, context);
  }
  return new ProviderError("malformed_response", `${provider} API error: ${status} - ${body.slice(0, 200)}`, context);
}

/**
 * Parsed JSON body of a successful response
 */
async function readJsonBody(provider: AIProvider, response: Response, signal: AbortSignal): Promise<unknown> {
  const body = await tryCatchAsync<unknown>(() => response.json());
  if (body.success) {
    return body.data;
  }
  if (signal.aborted) {
    throw body.error;
  }
  throw new ProviderError("malformed_response", `${provider} API returned a body that is not JSON`, {
    provider,
    cause: body.error.message,
  });
}

/**
 * AI Service for generating candidate tests
 */
export class AIService implements GenerationProvider {
  private readonly config: Required<AIConfig>;
  private readonly log = logger.child("AI");
  private readonly usage: UsageTotals = { requests: 0, inputTokens: 0, outputTokens: 0 };

  constructor(config: Partial<AIConfig> = {}) {
    const provider = config.provider ?? DEFAULT_CONFIG.provider;
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      provider,
      apiKey: config.apiKey ?? this.getApiKeyFromEnv(provider),
      model: config.model ?? PROVIDER_MODELS[provider],
    };
  }

  /**
   * Get API key from environment variable
   */
  private getApiKeyFromEnv(provider: AIProvider): string {
    if (provider === "mock") return "mock-key";
    return process.env[API_KEY_ENV[provider]] ?? "";
  }

  /**
   * Check if the service is configured with an API key
   */
  isConfigured(): boolean {
    return this.config.provider === "mock" || this.config.apiKey.length > 0;
  }

  getProvider(): AIProvider {
    return this.config.provider;
  }

  getModel(): string {
    return this.config.model;
  }

  getUsage(): UsageTotals {
    return { ...this.usage };
  }

  /**
   * One completion for one prompt. Throws ProviderError on timeout, rate
   * limiting, HTTP failure or an empty reply.
   */
  async generate(prompt: string): Promise<string> {
    const request: CompletionRequest = {
      systemPrompt: SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
    };

    const reply =
      this.config.provider === "mock" ? this.mockComplete(request) : await this.callProvider(request);

    this.usage.requests++;
    this.usage.inputTokens += reply.usage.inputTokens;
    this.usage.outputTokens += reply.usage.outputTokens;

    if (reply.content.trim().length === 0) {
      throw new ProviderError("malformed_response", `${this.config.provider} returned an empty response`);
    }
    return reply.content;
  }

  /**
   * Call the AI provider API
   */
  private async callProvider(request: CompletionRequest): Promise<ProviderReply> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      if (this.config.provider === "anthropic") {
        return await this.callAnthropic(request, controller.signal);
      } else {
        return await this.callOpenAI(request, controller.signal);
      }
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new ProviderError(
          "timeout",
          `${this.config.provider} API did not respond within ${this.config.timeoutMs}ms`
        );
      }
      // Network failures: no usable reply arrived
      const message = error instanceof Error ? error.message : String(error);
      this.log.debug(`Request failed: ${message}`);
      throw new ProviderError("timeout", `${this.config.provider} API request failed: ${message}`);
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const response = await fetch(PROVIDER_ENDPOINTS.anthropic, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: request.systemPrompt,
        messages: request.messages.map((m) => ({
          role: m.role,
          content: m.content,
        })),
      }),
      signal,
    });

    if (!response.ok) {
      throw errorForStatus("anthropic", response.status, await response.text());
    }

    const parsed = AnthropicResponseSchema.safeParse(await readJsonBody("anthropic", response, signal));
    if (!parsed.success) {
      throw new ProviderError("malformed_response", "Anthropic API returned an unexpected body", {
        issues: parsed.error.issues.map((i) => i.message),
      });
    }

    return {
      content: parsed.data.content.map((block) => block.text ?? "").join(""),
      usage: {
        inputTokens: parsed.data.usage?.input_tokens ?? 0,
        outputTokens: parsed.data.usage?.output_tokens ?? 0,
      },
    };
  }

  /**
   * Call OpenAI API
   */
  private async callOpenAI(request: CompletionRequest, signal: AbortSignal): Promise<ProviderReply> {
    const messages: Array<{ role: string; content: string }> = [];

    if (request.systemPrompt !== undefined && request.systemPrompt.length > 0) {
      messages.push({ role: "system", content: request.systemPrompt });
    }

    for (const m of request.messages) {
      messages.push({ role: m.role, content: m.content });
    }

    const response = await fetch(PROVIDER_ENDPOINTS.openai, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        messages,
      }),
      signal,
    });

    if (!response.ok) {
      throw errorForStatus("openai", response.status, await response.text());
    }

    const parsed = OpenAIResponseSchema.safeParse(await readJsonBody("openai", response, signal));
    if (!parsed.success) {
      throw new ProviderError("malformed_response", "OpenAI API returned an unexpected body", {
        issues: parsed.error.issues.map((i) => i.message),
      });
    }

    return {
      content: parsed.data.choices[0]?.message.content ?? "",
      usage: {
        inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
        outputTokens: parsed.data.usage?.completion_tokens ?? 0,
      },
    };
  }

  /**
   * Offline completion: a smoke test that calls the target once
   */
  private mockComplete(request: CompletionRequest): ProviderReply {
    const content = request.messages[request.messages.length - 1]?.content ?? "";
    const name = /^Function name: (\w+)$/m.exec(content)?.[1] ?? "target";
    const arity = Number(/^Parameter count: (\d+)$/m.exec(content)?.[1] ?? "0");
    const args = Array.from({ length: arity }, (_, i) => String(i + 1)).join(", ");

    const response = [
      '#include "unity.h"',
      "",
      "void setUp(void) {}",
      "",
      "void tearDown(void) {}",
      "",
      `void test_${name}_smoke(void)`,
      "{",
      `    (void)${name}(${args});`,
      "    TEST_ASSERT_TRUE(1);",
      "}",
      "",
      "int main(void)",
      "{",
      "    UNITY_BEGIN();",
      `    RUN_TEST(test_${name}_smoke);`,
      "    return UNITY_END();",
      "}",
      "",
    ].join("\n");

    return { content: response, usage: { inputTokens: Math.ceil(content.length / 4), outputTokens: 50 } };
  }
}

/**
 * Create an AI service instance
 */
export function createAIService(config?: Partial<AIConfig>): AIService {
  return new AIService(config);
}
