/**
 * LLM providers for direct OpenAI and Anthropic API access.
 */

export type {
  LLMProvider,
  ProviderGenerateParams,
  ProviderGenerateResult,
} from "./types.js";
export { createOpenAIProvider } from "./openai.js";
export type { OpenAIProviderConfig } from "./openai.js";
export { createAnthropicProvider } from "./anthropic.js";
export type { AnthropicProviderConfig } from "./anthropic.js";
