import Anthropic from '@anthropic-ai/sdk';
import { env, requireEnv } from '../config/env.js';
import { AiClientError } from './errors.js';
import { AiTextClient, GenerateTextInput, GenerateTextOutput, ModelTier } from './types.js';
import { withRetry } from './utils.js';
import { isRetryableStatus } from '../ops/http.js';
import { RateLimiter } from '../ops/rate-limiter.js';

const PROVIDER = 'anthropic';

interface AnthropicConfig {
  models: Record<ModelTier, string>;
  timeoutMs: number;
  maxTokens: number;
  retryAttempts: number;
  minIntervalMs: number;
}

export class AnthropicClient implements AiTextClient {
  public readonly provider = PROVIDER;

  private readonly client: Anthropic;
  private readonly config: AnthropicConfig;
  private readonly limiter: RateLimiter;

  constructor(config?: Partial<AnthropicConfig>) {
    const apiKey = requireEnv('ANTHROPIC_API_KEY');

    this.config = {
      models: config?.models ?? { fast: env.ANTHROPIC_MODEL_FAST, strong: env.ANTHROPIC_MODEL_STRONG },
      timeoutMs: config?.timeoutMs ?? Number(env.AI_TIMEOUT_MS),
      maxTokens: config?.maxTokens ?? Number(env.ANTHROPIC_MAX_TOKENS),
      retryAttempts: config?.retryAttempts ?? Number(env.AI_RETRY_ATTEMPTS),
      minIntervalMs: config?.minIntervalMs ?? Number(env.ANTHROPIC_MIN_INTERVAL_MS)
    };

    this.client = new Anthropic({ apiKey, timeout: this.config.timeoutMs });
    this.limiter = new RateLimiter(this.config.minIntervalMs);
  }

  modelFor(tier: ModelTier): string {
    return this.config.models[tier];
  }

  public async generateText(input: GenerateTextInput): Promise<GenerateTextOutput> {
    const startedAt = Date.now();
    const model = this.modelFor(input.tier);

    const response = await this.limiter.run(async () => withRetry(
      async () => {
        try {
          return await this.client.messages.create({
            model,
            max_tokens: input.maxTokens ?? this.config.maxTokens,
            temperature: input.temperature,
            system: input.systemPrompt,
            messages: [{ role: 'user', content: input.prompt }]
          });
        } catch (error) {
          throw this.normalizeError(error);
        }
      },
      { attempts: this.config.retryAttempts },
      (error) => error instanceof AiClientError && error.retryable
    ));

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text);
    }
    const text = parts.join('\n').trim();

    if (!text) {
      throw new AiClientError('Anthropic returned no text content', PROVIDER, { retryable: false, rejected: true });
    }

    return {
      provider: this.provider,
      model: response.model,
      text,
      latencyMs: Date.now() - startedAt,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens
    };
  }

  private normalizeError(error: unknown): AiClientError {
    if (error instanceof AiClientError) {
      return error;
    }

    if (error instanceof Anthropic.APIError) {
      return new AiClientError(error.message, PROVIDER, {
        statusCode: error.status,
        retryable: error.status ? isRetryableStatus(error.status) : true,
        cause: error
      });
    }

    return new AiClientError('Unexpected Anthropic error', PROVIDER, { retryable: true, cause: error });
  }
}
