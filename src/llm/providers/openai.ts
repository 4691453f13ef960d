/**
 * OpenAI provider using the AI SDK and direct OpenAI API.
 * Implements the shared LLMProvider interface.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText } from "ai";
import type { LLMProvider, ProviderGenerateParams, ProviderGenerateResult } from "./types.js";
import { logger } from "../../utils/logger.js";

export interface OpenAIProviderConfig {
  apiKey: string;
  model: string;
}

/**
 * Create an OpenAI provider that uses the OpenAI API directly.
 */
export function createOpenAIProvider(config: OpenAIProviderConfig): LLMProvider {
  const openai = createOpenAI({
    apiKey: config.apiKey,
  });

  const modelId = config.model;

  const provider: LLMProvider = {
    name: "openai",

    async generate(params: ProviderGenerateParams): Promise<ProviderGenerateResult> {
      const { prompt, systemPrompt, maxTokens, temperature, abortSignal } = params;

      logger.debug(`OpenAI generate: model=${modelId}, maxTokens=${maxTokens}`);

      const result = await generateText({
        model: openai(modelId),
        prompt,
        system: systemPrompt,
        maxOutputTokens: maxTokens,
        temperature,
        abortSignal,
        // Retries are handled by withBackoff so the timeout stays per attempt
        maxRetries: 0,
      });

      logger.debug(`OpenAI finished - finishReason: ${result.finishReason}`);

      return { text: result.text, finishReason: result.finishReason };
    },
  };

  return provider;
}
