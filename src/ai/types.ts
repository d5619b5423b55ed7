export type AiProvider = 'ollama' | 'anthropic';

/** Backend invocation class with its own cost, quality and quota. */
export type ModelTier = 'fast' | 'strong';

export interface GenerateTextInput {
  prompt: string;
  tier: ModelTier;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerateTextOutput {
  provider: AiProvider;
  model: string;
  text: string;
  latencyMs: number;
  inputTokens?: number;
  outputTokens?: number;
}

export interface AiTextClient {
  provider: AiProvider;
  modelFor(tier: ModelTier): string;
  generateText(input: GenerateTextInput): Promise<GenerateTextOutput>;
}

export interface RetryConfig {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Text-completion contract used by the command pipeline. An empty string means
 * the completion failed for any reason (transport, status, safety rejection).
 */
export interface TextCompletion {
  complete(prompt: string, tier: ModelTier): Promise<string>;
}
