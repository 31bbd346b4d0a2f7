import { GoogleGenAI } from '@google/genai';
import { ProviderError } from '../../utils/errors.js';
import { BackendOptions, ModelBackend } from './types.js';

export class GeminiBackend implements ModelBackend {
  readonly provider = 'gemini' as const;
  readonly model: string;
  private ai: GoogleGenAI;
  private temperature: number;

  constructor(options: BackendOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model;
    this.temperature = options.temperature;
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: prompt,
      config: { temperature: this.temperature },
    });

    // .text is a getter, not a method
    const text = response.text;
    if (!text) {
      throw new ProviderError('Gemini returned no text');
    }
    return text;
  }
}
