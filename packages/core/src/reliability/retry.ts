/**
 * Retry and Backoff Utilities
 *
 * Exponential backoff with jitter, integrated with the Nodeflow error
 * taxonomy.
 *
 * @module @nodeflow/core/reliability/retry
 */

import { isRetryable, toError } from './errors.js';
import { getLogger } from './observability.js';

const logger = getLogger('retry');

// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Maximum number of attempts, first call included (default: 3) */
  maxAttempts: number;

  /** Initial delay between retries in ms (default: 1000) */
  initialDelayMs: number;

  /** Maximum delay between retries in ms (default: 30000) */
  maxDelayMs: number;

  /** Backoff multiplier (default: 2.0) */
  backoffMultiplier: number;

  /** Jitter factor 0-1 to randomize delays (default: 0.1) */
  jitterFactor: number;

  /** Custom function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;

  /** Callback before each retry attempt */
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;

  /** Abort signal to cancel retries */
  signal?: AbortSignal;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2.0,
  jitterFactor: 0.1,
};

// =============================================================================
// Backoff Calculation
// =============================================================================

/**
 * Calculate delay for a given retry attempt with exponential backoff and jitter
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateBackoff(attempt: number, config: RetryConfig): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // Range is [delay * (1 - jitter), delay * (1 + jitter)]
  const jitter = config.jitterFactor * (2 * Math.random() - 1);
  return Math.round(cappedDelay * (1 + jitter));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Retry aborted'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timeout);
      reject(new Error('Retry aborted'));
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Execute an async function with retry logic
 *
 * @example
 * ```typescript
 * const body = await retry(() => client.get(url), { maxAttempts: 5 });
 * ```
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  config?: Partial<RetryConfig>
): Promise<T> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = fullConfig.isRetryable ?? isRetryable;
  const maxAttempts = Math.max(1, fullConfig.maxAttempts);

  let attempt = 0;
  for (;;) {
    if (fullConfig.signal?.aborted) {
      throw new Error('Retry aborted');
    }

    try {
      return await fn(attempt + 1);
    } catch (error) {
      const isLastAttempt = attempt >= maxAttempts - 1;
      const errorRetryable = shouldRetry(error);

      logger.debug('Retry attempt failed', {
        attempt: attempt + 1,
        maxAttempts,
        retryable: errorRetryable,
        error: toError(error).message,
      });

      if (!errorRetryable || isLastAttempt) {
        throw error;
      }

      const delayMs = calculateBackoff(attempt, fullConfig);
      fullConfig.onRetry?.(attempt + 1, error, delayMs);

      await sleep(delayMs, fullConfig.signal);
      attempt++;
    }
  }
}
