import OpenAI from 'openai';
import { ProviderError } from '../../utils/errors.js';
import { BackendOptions, ModelBackend } from './types.js';

export class OpenAIBackend implements ModelBackend {
  readonly provider = 'openai' as const;
  readonly model: string;
  private client: OpenAI;
  private temperature: number;

  constructor(options: BackendOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model;
    this.temperature = options.temperature;
  }

  async generate(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      messages: [{ role: 'user', content: prompt }],
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new ProviderError('OpenAI returned an empty completion');
    }
    return content;
  }
}
