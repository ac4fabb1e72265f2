/**
 * AI Service Module
 *
 * Generation providers: Anthropic, OpenAI and an offline mock.
 */

export { AIService, createAIService, API_KEY_ENV } from "./service.js";
export type { AIConfig, AIProvider, GenerationProvider, Message, CompletionRequest } from "./types.js";
