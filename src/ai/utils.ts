import { AiClientError } from './errors.js';
import { HttpRequestError } from '../ops/http.js';
import { sleep } from '../ops/rate-limiter.js';
import { RetryConfig } from './types.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  attempts: 3,
  baseDelayMs: 300,
  maxDelayMs: 3000
};

export const withRetry = async <T>(
  operation: () => Promise<T>,
  config?: Partial<RetryConfig>,
  shouldRetry: (error: unknown) => boolean = defaultShouldRetry
): Promise<T> => {
  const finalConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };

  let lastError: unknown;

  for (let attempt = 1; attempt <= finalConfig.attempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      const hasNextAttempt = attempt < finalConfig.attempts;

      if (!shouldRetry(error) || !hasNextAttempt) {
        throw error;
      }

      const backoffMs = Math.min(finalConfig.maxDelayMs, finalConfig.baseDelayMs * 2 ** (attempt - 1));
      await sleep(backoffMs);
    }
  }

  throw lastError;
};

export const defaultShouldRetry = (error: unknown): boolean => {
  if (error instanceof AiClientError || error instanceof HttpRequestError) {
    return error.retryable;
  }

  return true;
};
