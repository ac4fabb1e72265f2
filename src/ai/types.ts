/**
 * AI Service Types
 */

export type AIProvider = "anthropic" | "openai" | "mock";

export interface AIConfig {
  /** AI provider to use */
  provider: AIProvider;
  /** API key (reads from env if not provided) */
  apiKey?: string;
  /** Model to use (provider-specific) */
  model?: string;
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Temperature (0-1) */
  temperature?: number;
  /** Timeout in milliseconds */
  timeoutMs?: number;
}

export interface Message {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

/**
 * Anything that turns a prompt into candidate test source.
 *
 * Implementations throw ProviderError for timeouts, rate limiting and
 * empty or unreadable responses, and make exactly one external call per
 * invocation.
 */
export interface GenerationProvider {
  generate(prompt: string): Promise<string>;
}
