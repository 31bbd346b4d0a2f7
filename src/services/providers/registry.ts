import { config } from '../../utils/config.js';
import { AnthropicBackend } from './anthropic.js';
import { GeminiBackend } from './gemini.js';
import { OpenAIBackend } from './openai.js';
import { ProviderDefinition, ProviderId } from './types.js';

export type ProviderRegistry = Record<ProviderId, ProviderDefinition>;

export interface ProviderResolution {
  definition: ProviderDefinition;
  // True when the selection matched nothing and the first provider was substituted
  fallback: boolean;
}

// Declaration order is the enumeration order; the first entry is the fallback.
export const providerRegistry: ProviderRegistry = {
  openai: {
    id: 'openai',
    label: 'OpenAI (GPT-4o)',
    model: config.models.openai,
    create: (options) => new OpenAIBackend(options),
  },
  gemini: {
    id: 'gemini',
    label: 'Google (Gemini 1.5 Pro)',
    model: config.models.gemini,
    create: (options) => new GeminiBackend(options),
  },
  anthropic: {
    id: 'anthropic',
    label: 'Anthropic (Claude 3.5 Sonnet)',
    model: config.models.anthropic,
    create: (options) => new AnthropicBackend(options),
  },
};

export function listProviders(registry: ProviderRegistry = providerRegistry): ProviderDefinition[] {
  return Object.values(registry);
}

/**
 * Match a selection against provider ids and display labels, ignoring case.
 * Anything unrecognised resolves to the first registered provider.
 */
export function resolveProvider(
  selection: string,
  registry: ProviderRegistry = providerRegistry
): ProviderResolution {
  const wanted = selection.trim().toLowerCase();
  const providers = listProviders(registry);
  const match = providers.find((p) => p.id === wanted || p.label.toLowerCase() === wanted);

  if (match) {
    return { definition: match, fallback: false };
  }
  return { definition: providers[0], fallback: true };
}
