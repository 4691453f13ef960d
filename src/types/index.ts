// ===========================================
// Configuration Types
// ===========================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type ProviderName = "openai" | "anthropic";

export interface AppConfig {
  // API Keys
  openaiApiKey: string;
  anthropicApiKey: string;

  // LLM provider (direct API)
  primaryProvider: ProviderName;
  openaiModel: string;
  anthropicModel: string;

  // Model settings (active provider's model)
  model: string;
  maxTokens: number;
  temperature: number;

  // External generator
  useExternalGenerator: boolean;
  generatorTimeoutMs: number;
  generatorMaxAttempts: number;
  generatorRetryBaseDelayMs: number;

  // Export
  outputDir: string;

  // Logging
  logLevel: LogLevel;
}

/** Preferences persisted between runs. */
export interface StoredConfig {
  useExternalGenerator?: boolean;
  outputDir?: string;
}

// ===========================================
// Result Type
// ===========================================

/** Outcome of an operation that can fail without throwing. */
export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
