/**
 * External generator step — asks a language model for a FormSpec and
 * checks what comes back. Every failure is returned, never thrown, so the
 * caller can fall back to the local synthesizer.
 */

import { getLLMClient } from "../llm/client.js";
import { GENERATOR_SYSTEM_PROMPT, assembleGeneratorUserMessage } from "../prompts/index.js";
import type { FormSpec } from "../forms/types.js";
import { err, ok, type Result } from "../types/index.js";
import { withBackoff } from "../utils/backoff.js";
import { logger } from "../utils/logger.js";
import { GeneratorError } from "./errors.js";
import { findJsonObjectCandidates } from "./extract.js";
import type { FormSpecGenerator, GeneratorOptions } from "./types.js";
import { validateFormSpec } from "./validator.js";

/**
 * Generator backed by the configured LLM provider.
 * The client is created on first use so a missing API key surfaces as a failed call.
 */
export function createLLMFormGenerator(): FormSpecGenerator {
  return {
    name: "llm",

    async complete(prompt: string, signal: AbortSignal): Promise<string> {
      const llm = getLLMClient();
      const result = await llm.generate({
        prompt: assembleGeneratorUserMessage({ prompt }),
        systemPrompt: GENERATOR_SYSTEM_PROMPT,
        abortSignal: signal,
      });
      return result.text;
    },
  };
}

/** Run `task`, aborting it and rejecting with a timeout GeneratorError after `timeoutMs`. */
async function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new GeneratorError("timeout", `generator did not answer within ${timeoutMs}ms`);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Ask `generator` for a FormSpec: call (with timeout and retries), take the
 * first balanced JSON object that parses, validate.
 */
export async function generateFormSpec(
  prompt: string,
  generator: FormSpecGenerator,
  options: GeneratorOptions
): Promise<Result<FormSpec, GeneratorError>> {
  let text: string;
  try {
    text = await withBackoff(
      () => withTimeout((signal) => generator.complete(prompt, signal), options.timeoutMs),
      {
        maxAttempts: options.maxAttempts,
        baseDelayMs: options.retryBaseDelayMs,
        onRetry: (error, attempt, delay) =>
          logger.warn(`Generator: attempt ${attempt} failed (${describe(error)}), retrying in ${delay}ms`),
      }
    );
  } catch (error) {
    if (error instanceof GeneratorError) return err(error);
    return err(
      new GeneratorError("unavailable", `${generator.name} generator failed: ${describe(error)}`, { cause: error })
    );
  }

  logger.debug(`Generator: received ${text.length} chars`);

  const candidates = findJsonObjectCandidates(text);
  if (candidates.length === 0) {
    return err(new GeneratorError("no-json", "generator output contains no complete JSON object"));
  }

  // Prose before the payload may hold brace pairs of its own; take the first that parses
  let parsed: unknown;
  let parseError: unknown;
  let found = false;
  for (const candidate of candidates) {
    try {
      parsed = JSON.parse(candidate);
      found = true;
      break;
    } catch (error) {
      if (parseError === undefined) parseError = error;
    }
  }
  if (!found) {
    return err(
      new GeneratorError("parse", `generator output is not valid JSON: ${describe(parseError)}`, { cause: parseError })
    );
  }

  const validated = validateFormSpec(parsed);
  if (!validated.ok) {
    return err(new GeneratorError("schema", validated.error.message, { cause: validated.error }));
  }

  return ok(validated.value);
}
