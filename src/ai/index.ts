import { env } from '../config/env.js';
import { AnthropicClient } from './anthropic.js';
import { OllamaClient } from './ollama.js';
import { CompletionRouter, ProviderChains } from './router.js';
import { AiProvider, AiTextClient, ModelTier } from './types.js';

export { CompletionRouter };
export type { ModelTier, TextCompletion } from './types.js';

export interface AiClients {
  anthropic?: AnthropicClient;
  ollama?: OllamaClient;
}

const parseProvider = (value: string): AiProvider => {
  if (value === 'anthropic' || value === 'ollama') return value;
  throw new Error(`Unknown AI provider "${value}" (expected "anthropic" or "ollama")`);
};

export const createAiClients = (): AiClients => ({
  anthropic: env.ANTHROPIC_API_KEY ? new AnthropicClient() : undefined,
  ollama: env.AI_API_URL ? new OllamaClient() : undefined
});

/**
 * The configured provider for a tier comes first; the other configured
 * provider, if any, is kept as a fallback.
 */
export const createCompletionRouter = (clients: AiClients): CompletionRouter => {
  const chainFor = (tier: ModelTier): AiTextClient[] => {
    const primary = parseProvider(tier === 'fast' ? env.AI_PROVIDER_FAST : env.AI_PROVIDER_STRONG);
    const order: AiProvider[] = primary === 'anthropic' ? ['anthropic', 'ollama'] : ['ollama', 'anthropic'];
    const chain: AiTextClient[] = [];
    for (const provider of order) {
      const client = clients[provider];
      if (client) chain.push(client);
    }
    return chain;
  };

  const chains: ProviderChains = { fast: chainFor('fast'), strong: chainFor('strong') };
  return new CompletionRouter(chains);
};
