import { getConfig } from "../config/index.js";
import { logger } from "../utils/logger.js";
import {
  createOpenAIProvider,
  createAnthropicProvider,
  type LLMProvider,
} from "./providers/index.js";

export interface LLMResponse {
  text: string;
  finishReason?: string;
}

export interface GenerateOptions {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  abortSignal?: AbortSignal;
}

/**
 * LLM Client with direct OpenAI and Anthropic API support.
 * Uses the primary provider named in the configuration.
 */
export class LLMClient {
  private readonly primaryProvider: LLMProvider;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor() {
    const config = getConfig();

    if (config.primaryProvider === "openai") {
      if (!config.openaiApiKey.trim()) {
        throw new Error(
          "OPENAI_API_KEY is required when PRIMARY_PROVIDER=openai. Set OPENAI_API_KEY in your environment."
        );
      }
      this.primaryProvider = createOpenAIProvider({
        apiKey: config.openaiApiKey,
        model: config.openaiModel,
      });
    } else {
      if (!config.anthropicApiKey.trim()) {
        throw new Error(
          "ANTHROPIC_API_KEY is required when PRIMARY_PROVIDER=anthropic. Set ANTHROPIC_API_KEY in your environment."
        );
      }
      this.primaryProvider = createAnthropicProvider({
        apiKey: config.anthropicApiKey,
        model: config.anthropicModel,
      });
    }

    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;

    logger.debug(`LLM client: primary=${this.primaryProvider.name}, model=${config.model}`);
  }

  /**
   * Generate a plain-text completion with the primary provider
   */
  async generate(options: GenerateOptions): Promise<LLMResponse> {
    const {
      prompt,
      systemPrompt,
      maxTokens = this.maxTokens,
      temperature = this.temperature,
      abortSignal,
    } = options;

    const result = await this.primaryProvider.generate({
      prompt,
      systemPrompt,
      maxTokens,
      temperature,
      abortSignal,
    });

    if (result.finishReason === "length") {
      logger.warn(`LLM output was truncated at ${maxTokens} tokens; raise MAX_TOKENS if forms come back incomplete`);
    }

    return {
      text: result.text,
      finishReason: result.finishReason,
    };
  }
}

// Export a singleton instance
let llmClientInstance: LLMClient | null = null;

export function getLLMClient(): LLMClient {
  if (!llmClientInstance) {
    llmClientInstance = new LLMClient();
  }
  return llmClientInstance;
}

export default LLMClient;
