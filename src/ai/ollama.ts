import { z } from 'zod';
import { env, requireEnv } from '../config/env.js';
import { AiClientError } from './errors.js';
import { AiTextClient, GenerateTextInput, GenerateTextOutput, ModelTier } from './types.js';
import { withRetry } from './utils.js';
import { fetchWithTimeout, isRetryableStatus } from '../ops/http.js';
import { RateLimiter } from '../ops/rate-limiter.js';

const PROVIDER = 'ollama';

interface OllamaConfig {
  apiUrl: string;
  models: Record<ModelTier, string>;
  timeoutMs: number;
  retryAttempts: number;
  minIntervalMs: number;
}

const ollamaResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

export class OllamaClient implements AiTextClient {
  public readonly provider = PROVIDER;

  private readonly config: OllamaConfig;
  private readonly limiter: RateLimiter;

  constructor(config?: Partial<OllamaConfig>) {
    this.config = {
      apiUrl: config?.apiUrl ?? requireEnv('AI_API_URL'),
      models: config?.models ?? { fast: env.OLLAMA_MODEL_FAST, strong: env.OLLAMA_MODEL_STRONG },
      timeoutMs: config?.timeoutMs ?? Number(env.AI_TIMEOUT_MS),
      retryAttempts: config?.retryAttempts ?? Number(env.AI_RETRY_ATTEMPTS),
      minIntervalMs: config?.minIntervalMs ?? Number(env.OLLAMA_MIN_INTERVAL_MS)
    };

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
        const httpResponse = await fetchWithTimeout(
          this.config.apiUrl,
          {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({
              model,
              prompt: input.prompt,
              stream: false,
              system: input.systemPrompt,
              options: {
                temperature: input.temperature,
                num_predict: input.maxTokens
              }
            })
          },
          this.config.timeoutMs,
          PROVIDER
        );

        if (!httpResponse.ok) {
          const errorBody = await httpResponse.text();
          throw new AiClientError(
            `Ollama request failed (${httpResponse.status}): ${errorBody}`,
            PROVIDER,
            {
              statusCode: httpResponse.status,
              retryable: isRetryableStatus(httpResponse.status)
            }
          );
        }

        const parsed = ollamaResponseSchema.safeParse(await httpResponse.json());
        if (!parsed.success) {
          throw new AiClientError('Unexpected Ollama payload', PROVIDER, { retryable: false, cause: parsed.error });
        }
        return parsed.data;
      },
      { attempts: this.config.retryAttempts }
    ));

    const text = response.response?.trim();
    if (!text) {
      throw new AiClientError('Ollama returned an empty text response', PROVIDER, { retryable: false });
    }

    return {
      provider: this.provider,
      model: response.model || model,
      text,
      latencyMs: Date.now() - startedAt,
      inputTokens: response.prompt_eval_count,
      outputTokens: response.eval_count
    };
  }
}
