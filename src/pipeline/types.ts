/**
 * Classification type definitions for the prompt → FormSpec pipeline.
 */

import type { FormSpec } from "../forms/types.js";
import type { GeneratorError } from "./errors.js";

/** Where a classified FormSpec came from. */
export type ClassificationSource = "template" | "external" | "synthesized";

/** A keyword rule that matched the prompt. */
export interface TemplateMatch {
  /** Rule name from rules.json. */
  rule: string;
  /** The keyword found in the prompt. */
  keyword: string;
  /** Fresh copy of the rule's template. */
  spec: FormSpec;
}

export interface ClassificationResult {
  spec: FormSpec;
  source: ClassificationSource;
  /** Set when source is "template". */
  rule?: string;
  /** Set when the external generator was consulted and failed. */
  fallback?: GeneratorError;
  /** Wall-clock duration of the external generator call, when one was made. */
  generatorMs?: number;
}

/**
 * Produces free-form text expected to contain a FormSpec JSON object.
 * Must stop work when `signal` aborts.
 */
export interface FormSpecGenerator {
  readonly name: string;
  complete(prompt: string, signal: AbortSignal): Promise<string>;
}

export interface GeneratorOptions {
  /** Per-attempt limit. */
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs?: number;
}

export interface ClassifyOptions extends Partial<GeneratorOptions> {
  /** Consult the external generator when no keyword rule matches. */
  useExternal?: boolean;
  /** Defaults to the configured LLM provider. */
  generator?: FormSpecGenerator;
}
