import { createLogger, toError } from './logger.js';

const logger = createLogger('Retry');

export interface RetryOptions {
  /** Attempts after the first one. */
  maxRetries: number;
  baseDelay: number;
  maxDelay?: number;
  backoffFactor: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  backoffFactor: 2,
  onRetry: (attempt, error, delayMs) => {
    logger.warn('Attempt failed, retrying', { attempt, delayMs, error: error.message });
  },
};

/**
 * Delay before the retry that follows `attempt` (1-based), capped at maxDelay.
 */
export function backoffDelay(options: RetryOptions, attempt: number): number {
  const delay = options.baseDelay * Math.pow(options.backoffFactor, attempt - 1);
  return options.maxDelay !== undefined ? Math.min(delay, options.maxDelay) : delay;
}

export async function withRetry<T>(fn: () => Promise<T>, overrides: Partial<RetryOptions> = {}): Promise<T> {
  const options: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...overrides };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = toError(err);
      if (attempt > options.maxRetries || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }

      const delayMs = backoffDelay(options, attempt);
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
