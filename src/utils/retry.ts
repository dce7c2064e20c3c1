import { setTimeout as sleep } from 'node:timers/promises';
import { formatError } from './errors.js';
import { logger } from './logger.js';

export interface RetryOptions {
  /** Total attempts, the first one included */
  maxAttempts?: number;
  retryDelay?: number;
  backoffMultiplier?: number;
  /** Errors that fail this predicate are rethrown without another attempt */
  isRetryable?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  retryDelay: 1000,
  backoffMultiplier: 2,
  isRetryable: (): boolean => true,
} as const;

/**
 * Run `operation` up to `maxAttempts` times in total, backing off exponentially between attempts.
 * The last error is rethrown unchanged once attempts run out.
 */
export async function retryOperation<T>(
  operation: (attempt: number) => Promise<T>,
  operationName: string,
  options?: RetryOptions,
): Promise<T> {
  const { maxAttempts, retryDelay, backoffMultiplier, isRetryable } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };
  const attempts = Math.max(1, maxAttempts);

  let lastError: unknown;
  let delay = retryDelay;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (!isRetryable(error) || options?.signal?.aborted) {
        throw error;
      }

      if (attempt < attempts) {
        logger.warn(
          `${operationName} failed (attempt ${attempt}/${attempts}), retrying in ${delay}ms...`,
          { error: formatError(error) },
        );

        await sleep(delay, undefined, { signal: options?.signal });
        delay *= backoffMultiplier;
      }
    }
  }

  logger.error(`${operationName} failed after ${attempts} attempts`);
  throw lastError;
}
