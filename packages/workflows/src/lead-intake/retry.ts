/**
 * Retry Mechanism
 *
 * Implements retry with exponential backoff for transient failures.
 * Used by the intent scorer: every failed attempt (transport fault or an
 * unusable answer) is retried until the attempt budget is spent.
 *
 * @module lead-intake/retry
 */

import { classifyError, type ClassifiedError } from './error-handler';

// ===========================================
// Types
// ===========================================

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first) */
  maxAttempts: number;
  /** Base delay in milliseconds (doubled each attempt) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Jitter factor (0-1) to randomize delays */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000, // 1s, 2s
  maxDelayMs: 30000,
  jitterFactor: 0.1,
};

/**
 * Called after each failed attempt, before any delay
 */
export type AttemptFailedHook = (failure: {
  attempt: number;
  maxAttempts: number;
  error: ClassifiedError;
}) => void;

/**
 * Result of a retryable operation
 */
export type RetryResult<T> =
  | { success: true; result: T; attempts: number; totalTimeMs: number }
  | { success: false; error: ClassifiedError; attempts: number; totalTimeMs: number };

// ===========================================
// Retry Functions
// ===========================================

/**
 * Calculate delay for exponential backoff with jitter.
 */
export function calculateDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Sleep for specified milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an operation with retry logic.
 *
 * @param operation - The async function to execute, given the 0-indexed attempt
 * @param config - Retry configuration
 * @param onAttemptFailed - Observer for individual failures
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onAttemptFailed?: AttemptFailedHook
): Promise<RetryResult<T>> {
  const startTime = Date.now();
  const maxAttempts = Math.max(1, config.maxAttempts);
  let lastError: ClassifiedError = {
    code: 'UNKNOWN',
    message: 'No attempt was made',
  };

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      const result = await operation(attempt);
      return {
        success: true,
        result,
        attempts: attempt + 1,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      lastError = classifyError(error);
      onAttemptFailed?.({ attempt: attempt + 1, maxAttempts, error: lastError });

      const isLastAttempt = attempt >= maxAttempts - 1;
      if (isLastAttempt) {
        return {
          success: false,
          error: lastError,
          attempts: attempt + 1,
          totalTimeMs: Date.now() - startTime,
        };
      }

      await sleep(calculateDelay(attempt, config));
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: maxAttempts,
    totalTimeMs: Date.now() - startTime,
  };
}
