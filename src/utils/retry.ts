/**
 * Retry utility with exponential backoff
 *
 * Used for transient failures of remote backends (secret stores). Errors
 * that are not worth retrying are rethrown immediately through `shouldRetry`.
 */

import type { Logger } from "pino";

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of retry attempts (0 = no retries, just initial attempt)
   */
  maxRetries: number;

  /**
   * Whether an error should trigger a retry
   * @default () => true
   */
  shouldRetry?: (error: Error) => boolean;

  /**
   * Backoff delay in milliseconds before retry `attempt` (0-based)
   * @default 2^attempt * 1000ms
   */
  calculateBackoff?: (attempt: number, error: Error) => number;

  /**
   * Invoked before each retry, for logging or metrics
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Default backoff: 1s, 2s, 4s, 8s, ...
 */
export function defaultExponentialBackoff(attempt: number): number {
  return Math.pow(2, attempt) * 1000;
}

/**
 * Create a standardized retry logger callback
 *
 * @example
 * ```typescript
 * const onRetry = createRetryLogger(logger, "vault read", 2);
 * await withRetry(operation, { maxRetries: 2, onRetry });
 * // { attempt: 1, maxRetries: 2, delayMs: 200, ... } "Retrying vault read"
 * ```
 */
export function createRetryLogger(
  logger: Logger,
  operation: string,
  maxRetries: number
): (attempt: number, error: Error, delayMs: number) => void {
  return (attempt: number, error: Error, delayMs: number): void => {
    logger.warn(
      {
        attempt: attempt + 1,
        maxRetries,
        delayMs,
        error: error.message,
        errorType: error.constructor.name,
      },
      `Retrying ${operation}`
    );
  };
}

/**
 * Execute an async operation, retrying on failure
 *
 * @throws The last error once retries are exhausted or `shouldRetry` declines
 *
 * @example
 * ```typescript
 * const value = await withRetry(() => backend.getSecret("JWT_SECRET_KEY"), {
 *   maxRetries: 2,
 *   shouldRetry: (error) => error instanceof SecretsBackendError && error.retryable,
 * });
 * ```
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxRetries,
    shouldRetry = () => true,
    calculateBackoff = defaultExponentialBackoff,
    onRetry,
  } = options;

  let lastError: Error = new Error("Retry loop completed without success or error");

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries || !shouldRetry(lastError)) {
        throw lastError;
      }

      const delayMs = calculateBackoff(attempt, lastError);
      onRetry?.(attempt, lastError, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
