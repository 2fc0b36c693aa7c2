/**
 * Backoff
 *
 * Exponential backoff and Retry-After parsing for CRM requests.
 * Defaults: 3 attempts, 1s base delay doubled per attempt, 60s cap, no jitter.
 *
 * @module backoff
 */

// ===========================================
// Types
// ===========================================

export interface RetryConfig {
  /** Consecutive failed attempts before giving up */
  maxAttempts: number;
  /** Base delay in milliseconds (doubled each attempt) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Jitter factor (0-1) to randomize delays */
  jitterFactor: number;
  /** Consecutive 429 answers tolerated before raising a rate-limit error */
  maxRateLimitWaits: number;
  /** Wait applied to a 429 without a usable Retry-After header */
  defaultRetryAfterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitterFactor: 0,
  maxRateLimitWaits: 5,
  defaultRetryAfterMs: 60000,
};

// ===========================================
// Delays
// ===========================================

/**
 * Calculate delay for exponential backoff with optional jitter.
 * Attempt is 0-indexed: 1s, 2s, 4s, ... capped at maxDelayMs.
 */
export function calculateDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs' | 'jitterFactor'> = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitterFactor <= 0) {
    return cappedDelay;
  }

  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 * Returns undefined when the header is absent or unusable.
 */
export function parseRetryAfterMs(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.floor(seconds * 1000);
  }

  const date = Date.parse(value);
  if (Number.isFinite(date)) {
    const ms = date - now;
    return ms > 0 ? ms : 0;
  }

  return undefined;
}
