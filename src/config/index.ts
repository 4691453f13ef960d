import { config as dotenvConfig } from "dotenv";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import Conf from "conf";
import type { AppConfig, LogLevel, StoredConfig } from "../types/index.js";

// Get the directory of this module
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env file from the project root (2 levels up from src/config)
dotenvConfig({ path: resolve(__dirname, "../../.env") });

// Also try loading from current working directory as fallback
dotenvConfig();

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

// Persistent store for session preferences
export const configStore = new Conf<StoredConfig>({
  projectName: "formcraft",
  projectVersion: "0.1.0",
  cwd: process.env.FORMCRAFT_CONFIG_DIR || undefined,
  schema: {
    useExternalGenerator: { type: "boolean" },
    outputDir: { type: "string" },
  },
});

function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? "info";
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim().toLowerCase() === "true";
}

/**
 * Get the full configuration from environment variables and stored preferences
 */
export function getConfig(): AppConfig {
  const stored = configStore.store;

  const primaryProviderEnv = process.env.PRIMARY_PROVIDER?.toLowerCase();
  const primaryProvider: AppConfig["primaryProvider"] =
    primaryProviderEnv === "openai" || primaryProviderEnv === "anthropic"
      ? primaryProviderEnv
      : "anthropic";

  const openaiModel = process.env.OPENAI_MODEL?.trim() || "gpt-4o-mini";
  const anthropicModel = process.env.ANTHROPIC_MODEL?.trim() || "claude-3-5-haiku-latest";

  return {
    // API Keys
    openaiApiKey: process.env.OPENAI_API_KEY ?? "",
    anthropicApiKey: process.env.ANTHROPIC_API_KEY ?? "",

    // LLM provider
    primaryProvider,
    openaiModel,
    anthropicModel,
    model: primaryProvider === "openai" ? openaiModel : anthropicModel,
    maxTokens: parseInt(process.env.MAX_TOKENS || "1024", 10),
    temperature: parseFloat(process.env.TEMPERATURE || "0.2"),

    // External generator: env wins over the stored toggle
    useExternalGenerator:
      parseFlag(process.env.USE_EXTERNAL_GENERATOR) ?? stored.useExternalGenerator ?? false,
    generatorTimeoutMs: parseInt(process.env.GENERATOR_TIMEOUT_MS || "15000", 10),
    generatorMaxAttempts: parseInt(process.env.GENERATOR_MAX_ATTEMPTS || "2", 10),
    generatorRetryBaseDelayMs: parseInt(process.env.GENERATOR_RETRY_BASE_DELAY_MS || "500", 10),

    // Export
    outputDir: process.env.OUTPUT_DIR || stored.outputDir || ".",

    // Logging
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
}

/**
 * Validate the configuration.
 * The primary provider's API key is only needed when the external generator is on.
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (config.useExternalGenerator) {
    if (config.primaryProvider === "openai" && !config.openaiApiKey.trim()) {
      errors.push("OPENAI_API_KEY is required when PRIMARY_PROVIDER=openai and the external generator is enabled");
    }
    if (config.primaryProvider === "anthropic" && !config.anthropicApiKey.trim()) {
      errors.push("ANTHROPIC_API_KEY is required when PRIMARY_PROVIDER=anthropic and the external generator is enabled");
    }
  }

  if (!Number.isFinite(config.generatorTimeoutMs) || config.generatorTimeoutMs <= 0) {
    errors.push("GENERATOR_TIMEOUT_MS must be a positive number");
  }
  if (!Number.isFinite(config.generatorMaxAttempts) || config.generatorMaxAttempts < 1) {
    errors.push("GENERATOR_MAX_ATTEMPTS must be at least 1");
  }

  return errors;
}

/**
 * Persist the external generator toggle
 */
export function saveUseExternalGenerator(enabled: boolean): void {
  configStore.set("useExternalGenerator", enabled);
}

/**
 * Persist the default export directory
 */
export function saveOutputDir(dir: string): void {
  configStore.set("outputDir", dir);
}

/**
 * Clear all stored configuration
 */
export function clearConfig(): void {
  configStore.clear();
}

export default {
  getConfig,
  validateConfig,
  configStore,
  saveUseExternalGenerator,
  saveOutputDir,
  clearConfig,
};
