/**
 * Anthropic provider using the AI SDK and direct Anthropic API.
 * Implements the shared LLMProvider interface.
 */

import { createAnthropic } from "@ai-sdk/anthropic";
import { generateText } from "ai";
import type { LLMProvider, ProviderGenerateParams, ProviderGenerateResult } from "./types.js";
import { logger } from "../../utils/logger.js";

export interface AnthropicProviderConfig {
  apiKey: string;
  model: string;
}

/**
 * Create an Anthropic provider that uses the Anthropic API directly.
 */
export function createAnthropicProvider(config: AnthropicProviderConfig): LLMProvider {
  const anthropic = createAnthropic({
    apiKey: config.apiKey,
  });

  const modelId = config.model;

  const provider: LLMProvider = {
    name: "anthropic",

    async generate(params: ProviderGenerateParams): Promise<ProviderGenerateResult> {
      const { prompt, systemPrompt, maxTokens, temperature, abortSignal } = params;

      logger.debug(`Anthropic generate: model=${modelId}`);

      const result = await generateText({
        model: anthropic(modelId),
        prompt,
        system: systemPrompt,
        maxOutputTokens: maxTokens,
        temperature,
        abortSignal,
        maxRetries: 0,
      });

      logger.debug(`Anthropic finished - finishReason: ${result.finishReason}`);

      return { text: result.text, finishReason: result.finishReason };
    },
  };

  return provider;
}
