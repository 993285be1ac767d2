/**
 * Retry helpers
 */

import { randomUUID } from 'crypto';

export interface RetryOptions {
  maxAttempts: number;
  backoffFactor: number;
  initialDelayMs: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function generateId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}

export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'backoffFactor' | 'initialDelayMs'>): number {
  return options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1);
}

/**
 * Run an operation up to maxAttempts times. The last error is rethrown.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const canRetry = options.shouldRetry ? options.shouldRetry(error, attempt) : true;
      if (attempt >= maxAttempts || !canRetry) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}
