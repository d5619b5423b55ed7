import { AiClientError } from './errors.js';
import { AiTextClient, ModelTier, TextCompletion } from './types.js';

/** Provider chain per tier: the first client that answers wins. */
export type ProviderChains = Record<ModelTier, AiTextClient[]>;

export class CompletionRouter implements TextCompletion {
  constructor(private readonly chains: ProviderChains) {}

  /**
   * Runs the prompt against the tier's provider chain. Every failure, including
   * a safety rejection, collapses into an empty string for the caller.
   */
  async complete(prompt: string, tier: ModelTier): Promise<string> {
    const chain = this.chains[tier];
    const errors: string[] = [];

    for (const [index, client] of chain.entries()) {
      if (index > 0) {
        console.warn(`[CompletionRouter] falling back to ${client.provider} (tier: ${tier})`);
      }

      try {
        const result = await client.generateText({ prompt, tier, temperature: 0.2 });

        console.info(
          `[CompletionRouter] provider=${result.provider} model=${result.model} tier=${tier} latency=${result.latencyMs}ms`
        );

        return result.text;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        errors.push(`${client.provider}: ${message}`);

        if (error instanceof AiClientError && error.rejected) {
          console.warn(`[CompletionRouter] ${client.provider} rejected the prompt (tier: ${tier})`);
          return '';
        }

        console.warn(`[CompletionRouter] provider ${client.provider} failed:`, message);
      }
    }

    if (chain.length === 0) {
      console.error(`[CompletionRouter] no provider configured for tier "${tier}"`);
    } else {
      console.error(`[CompletionRouter] all providers failed for tier "${tier}": ${errors.join(' | ')}`);
    }

    return '';
  }
}
