/**
 * Exponential backoff with jitter for worker → coordinator calls
 */

import { isFleetError } from '../coordinator/errors.js';

export interface RetryConfig {
  /** Attempts after the first; Infinity retries until success or abort */
  maxRetries?: number;
  initialDelayMs?: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  /** Upper bound of the random delay added to each wait */
  jitterMs?: number;
}

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 5,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10_000,
  jitterMs: 1000,
};

/**
 * Sleep for `ms`; rejects with the signal's reason when aborted first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay before retry number `attempt` (0-based), capped at maxDelayMs
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  random: () => number = Math.random
): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt) + random() * config.jitterMs;
  return Math.min(delay, config.maxDelayMs);
}

export interface RetryContext {
  attempt: number;
  maxRetries: number;
  lastError: Error;
  delay: number;
}

export interface WithRetryOptions {
  config?: RetryConfig;
  onRetry?: (context: RetryContext) => void;
  /** Defaults to: FleetErrors by their `retryable` flag, anything else retried */
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
  random?: () => number;
}

function defaultShouldRetry(error: unknown): boolean {
  return isFleetError(error) ? error.retryable : true;
}

export async function withRetry<T>(fn: () => Promise<T>, options: WithRetryOptions = {}): Promise<T> {
  const config: Required<RetryConfig> = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const shouldRetry = options.shouldRetry ?? defaultShouldRetry;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt >= config.maxRetries || !shouldRetry(error) || options.signal?.aborted) {
        throw lastError;
      }

      const delay = calculateDelay(attempt, config, options.random);
      options.onRetry?.({ attempt, maxRetries: config.maxRetries, lastError, delay });
      await sleep(delay, options.signal);
    }
  }
}
