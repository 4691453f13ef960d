/**
 * Classifier orchestrator — keyword rules first, then the optional
 * external generator, then the local synthesizer.
 *
 * Usage:
 *   import { classify } from './pipeline/index.js';
 *   const { spec, source } = await classify(prompt, { useExternal: true });
 */

import { getConfig } from "../config/index.js";
import { logger } from "../utils/logger.js";
import { matchTemplate } from "./classifier.js";
import { EmptyPromptError } from "./errors.js";
import { createLLMFormGenerator, generateFormSpec } from "./generator.js";
import { synthesizeFormSpec } from "./synthesizer.js";
import type { ClassificationResult, ClassifyOptions } from "./types.js";

export { matchTemplate } from "./classifier.js";
export { synthesizeFormSpec, deriveTitle } from "./synthesizer.js";
export { generateFormSpec, createLLMFormGenerator } from "./generator.js";
export { validateFormSpec } from "./validator.js";
export { extractFirstJsonObject, findJsonObjectCandidates } from "./extract.js";
export { ValidationError, GeneratorError, EmptyPromptError } from "./errors.js";
export type {
  ClassificationResult,
  ClassificationSource,
  ClassifyOptions,
  FormSpecGenerator,
  GeneratorOptions,
  TemplateMatch,
} from "./types.js";

/** Utility: run a function and return [result, durationMs]. */
async function timed<T>(fn: () => Promise<T>): Promise<[T, number]> {
  const start = Date.now();
  const result = await fn();
  return [result, Date.now() - start];
}

function requirePrompt(prompt: string): string {
  const trimmed = prompt.trim();
  if (!trimmed) throw new EmptyPromptError();
  return trimmed;
}

/**
 * Classify without the external generator: keyword rules, then the synthesizer.
 * Throws EmptyPromptError for a blank prompt.
 */
export function classifyLocal(prompt: string): ClassificationResult {
  const text = requirePrompt(prompt);

  const match = matchTemplate(text);
  if (match) {
    logger.debug(`Classifier: rule "${match.rule}" matched on "${match.keyword}"`);
    return { spec: match.spec, source: "template", rule: match.rule };
  }

  return { spec: synthesizeFormSpec(text), source: "synthesized" };
}

/**
 * Map a prompt to a FormSpec.
 * Throws EmptyPromptError for a blank prompt; every other failure falls back
 * to the local synthesizer.
 */
export async function classify(prompt: string, options: ClassifyOptions = {}): Promise<ClassificationResult> {
  const text = requirePrompt(prompt);

  if (!options.useExternal) {
    return classifyLocal(text);
  }

  const match = matchTemplate(text);
  if (match) {
    return { spec: match.spec, source: "template", rule: match.rule };
  }

  const config = getConfig();
  const generator = options.generator ?? createLLMFormGenerator();

  logger.debug(`Classifier: no keyword rule matched, asking the ${generator.name} generator`);

  const [result, generatorMs] = await timed(() =>
    generateFormSpec(text, generator, {
      timeoutMs: options.timeoutMs ?? config.generatorTimeoutMs,
      maxAttempts: options.maxAttempts ?? config.generatorMaxAttempts,
      retryBaseDelayMs: options.retryBaseDelayMs ?? config.generatorRetryBaseDelayMs,
    })
  );

  if (result.ok) {
    logger.debug(`Classifier: generator produced "${result.value.title}" in ${generatorMs}ms`);
    return { spec: result.value, source: "external", generatorMs };
  }

  logger.warn(`Classifier: falling back to the local synthesizer (${result.error.reason}: ${result.error.message})`);
  return {
    spec: synthesizeFormSpec(text),
    source: "synthesized",
    fallback: result.error,
    generatorMs,
  };
}
