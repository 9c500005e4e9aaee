/**
 * Exponential Backoff with Jitter
 *
 * Used by the comparison-model clients. Base delay doubles each attempt
 * (1s, 2s, 4s, ... capped at 30s) with +/-25% jitter. OCR vendor calls are
 * not retried: a failed per-page run gets one plain-text fallback instead.
 *
 * @module utils/backoff
 */

import { RateLimitError, RequestCancelledError } from '../services/ocr/errors.js';

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, first one included (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/**
 * Delay for a zero-indexed attempt: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Resolve after delayMs, or reject with RequestCancelledError once the signal aborts
 */
export function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions extends Partial<BackoffConfig> {
  /** Log prefix, e.g. 'OpenAIClient' */
  tag?: string;
  signal?: AbortSignal;
}

/**
 * Execute fn, retrying errors that pass shouldRetry.
 * A RateLimitError's retryAfter (seconds) overrides the computed delay
 * when it is larger, still capped at maxDelayMs.
 *
 * @throws the last error once attempts are exhausted, or a non-retryable error immediately
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: RetryOptions = {}
): Promise<T> {
  const { tag = 'Backoff', signal, ...backoff } = options;
  const cfg = { ...DEFAULT_BACKOFF, ...backoff };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || attempt === cfg.maxAttempts - 1) throw error;

      let delay = calculateBackoffDelay(attempt, cfg);
      if (error instanceof RateLimitError) {
        delay = Math.min(Math.max(delay, error.retryAfter * 1000), cfg.maxDelayMs);
      }
      console.error(
        `[${tag}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed: ${
          error instanceof Error ? error.message : String(error)
        }. Retrying in ${delay}ms`
      );
      await sleep(delay, signal);
    }
  }

  throw lastError;
}
