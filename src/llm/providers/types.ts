/**
 * Shared types for LLM providers (OpenAI, Anthropic).
 * Allows the client to use either provider through a single interface.
 */

import type { ProviderName } from "../../types/index.js";

/** Normalized result from a provider's generate call */
export interface ProviderGenerateResult {
  text: string;
  /** Why the generation stopped; 'length' means output was truncated (increase maxTokens). */
  finishReason?: string;
}

/** Parameters for a single generation request */
export interface ProviderGenerateParams {
  prompt: string;
  systemPrompt?: string;
  maxTokens: number;
  temperature: number;
  /** Aborts the underlying HTTP request (used for the generator timeout). */
  abortSignal?: AbortSignal;
}

/**
 * Shared interface that both OpenAI and Anthropic providers implement.
 * The client uses this to call the active provider without knowing which one it is.
 */
export interface LLMProvider {
  readonly name: ProviderName;

  /**
   * Generate a completion.
   */
  generate(params: ProviderGenerateParams): Promise<ProviderGenerateResult>;
}
