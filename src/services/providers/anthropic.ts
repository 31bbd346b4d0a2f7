import Anthropic from '@anthropic-ai/sdk';
import { ProviderError } from '../../utils/errors.js';
import { BackendOptions, ModelBackend } from './types.js';

const MAX_TOKENS = 4096;

export class AnthropicBackend implements ModelBackend {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;
  private temperature: number;

  constructor(options: BackendOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
    this.model = options.model;
    this.temperature = options.temperature;
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      temperature: this.temperature,
      messages: [{ role: 'user', content: prompt }],
    });

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    if (!text) {
      throw new ProviderError('Claude returned no text content');
    }
    return text;
  }
}
