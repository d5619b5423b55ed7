export class AiClientError extends Error {
  public readonly provider: string;
  public readonly retryable: boolean;
  public readonly statusCode?: number;
  /** Set when the provider refused to produce content for safety reasons. */
  public readonly rejected: boolean;

  constructor(
    message: string,
    provider: string,
    options?: { retryable?: boolean; statusCode?: number; rejected?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AiClientError';
    this.provider = provider;
    this.retryable = options?.retryable ?? false;
    this.statusCode = options?.statusCode;
    this.rejected = options?.rejected ?? false;
  }
}
