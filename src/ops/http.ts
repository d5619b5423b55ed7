export class HttpRequestError extends Error {
  public readonly retryable: boolean;

  constructor(message: string, public readonly label: string, options: { retryable: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'HttpRequestError';
    this.retryable = options.retryable;
  }
}

export const fetchWithTimeout = async (
  url: string,
  init: RequestInit,
  timeoutMs: number,
  label: string
): Promise<Response> => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, {
      ...init,
      signal: controller.signal
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new HttpRequestError(`Request timed out after ${timeoutMs}ms`, label, { retryable: true, cause: error });
    }

    throw new HttpRequestError('Network request failed', label, { retryable: true, cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
};

export const isRetryableStatus = (statusCode: number): boolean => {
  return statusCode === 408 || statusCode === 429 || statusCode >= 500;
};
