/**
 * Exponential backoff for calls to the external form generator.
 *
 *   - Retries on HTTP 429 / 5xx / network failures
 *   - Exponential delay with ±25% jitter
 */

type ShouldRetry = (error: unknown, attempt: number) => boolean;
type OnRetry = (error: unknown, attempt: number, nextDelayMs: number) => void;

export interface BackoffOptions {
  maxAttempts?: number;       // default: 2  (matches GENERATOR_MAX_ATTEMPTS default)
  baseDelayMs?: number;       // default: 500 (matches GENERATOR_RETRY_BASE_DELAY_MS default)
  maxDelayMs?: number;        // default: 5000
  jitter?: boolean;           // default: true
  shouldRetry?: ShouldRetry;  // default: isHttpError
  onRetry?: OnRetry;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

// ─────────────────────────────────────────
// Error classifiers
// ─────────────────────────────────────────

function statusOf(error: unknown): number | undefined {
  if (!error || typeof error !== "object") return undefined;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if ("status" in error && typeof error.status === "number") return error.status;
  return undefined;
}

/**
 * Retries on HTTP 429, 5xx, or network-ish errors.
 * Walks the cause chain since the AI SDK wraps provider errors.
 */
export function isHttpError(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;

  const status = statusOf(error);
  if (typeof status === "number" && (status === 429 || status >= 500)) return true;

  const message = error instanceof Error ? error.message : "";
  if (/network|fetch failed|ECONNRESET|ETIMEDOUT|socket hang up/i.test(message)) return true;

  const cause = "cause" in error ? error.cause : undefined;
  if (cause) return isHttpError(cause);

  return false;
}

// ─────────────────────────────────────────
// Core utility
// ─────────────────────────────────────────

/**
 * Run `operation` with exponential backoff retries.
 *
 * @example
 * ```ts
 * const text = await withBackoff(
 *   () => generator.complete(prompt, signal),
 *   {
 *     maxAttempts: config.generatorMaxAttempts,
 *     baseDelayMs: config.generatorRetryBaseDelayMs,
 *     onRetry: (err, attempt, delay) =>
 *       logger.warn(`Generator retry ${attempt}, next in ${delay}ms: ${String(err)}`),
 *   }
 * );
 * ```
 */
export async function withBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const {
    maxAttempts = 2,
    baseDelayMs = 500,
    maxDelayMs = 5_000,
    jitter = true,
    shouldRetry = isHttpError,
    onRetry,
  } = options;

  let attempt = 0;
  let lastError: unknown;

  while (attempt < maxAttempts) {
    try {
      attempt++;
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error, attempt)) {
        // Not retryable
        throw error;
      }
      if (attempt >= maxAttempts) break;

      const expDelay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
      const jitterAmount = jitter ? expDelay * 0.25 * (Math.random() - 0.5) : 0;
      const delay = Math.round(expDelay + jitterAmount);

      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
