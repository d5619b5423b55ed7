import { describe, expect, it, vi } from 'vitest';
import { AiClientError } from '../errors.js';
import { defaultShouldRetry, withRetry } from '../utils.js';

describe('withRetry', () => {
  it('retries retryable failures until an attempt succeeds', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new AiClientError('busy', 'ollama', { retryable: true }))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, { attempts: 3, baseDelayMs: 1, maxDelayMs: 1 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('gives up at once on non-retryable errors', async () => {
    const error = new AiClientError('bad key', 'anthropic', { retryable: false, statusCode: 401 });
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(operation, { attempts: 3, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('defaultShouldRetry', () => {
  it('follows the retryable flag of client errors', () => {
    expect(defaultShouldRetry(new AiClientError('x', 'ollama', { retryable: true }))).toBe(true);
    expect(defaultShouldRetry(new AiClientError('x', 'ollama'))).toBe(false);
    expect(defaultShouldRetry(new Error('unknown'))).toBe(true);
  });
});
