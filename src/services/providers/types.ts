export type ProviderId = 'openai' | 'gemini' | 'anthropic';

export interface BackendOptions {
  apiKey: string;
  model: string;
  temperature: number;
}

/**
 * A hosted language model reduced to the one call the engine needs.
 */
export interface ModelBackend {
  readonly provider: ProviderId;
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export interface ProviderDefinition {
  id: ProviderId;
  label: string;
  model: string;
  create(options: BackendOptions): ModelBackend;
}
