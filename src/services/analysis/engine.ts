import { AnalysisResult, ProductInput } from '../../types/analysis.js';
import { ConfigurationError, ProviderError, describeError, statusOf } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { ProviderRegistry, providerRegistry, resolveProvider } from '../providers/registry.js';
import { ModelBackend } from '../providers/types.js';
import { buildAnalysisPrompt } from './prompt.js';
import { parseAnalysis } from './schema.js';

const TEMPERATURE = 0;

/**
 * Trimmed provider credential; blank credentials fail before any network call.
 */
export function requireCredential(credential: string): string {
  const trimmed = credential.trim();
  if (!trimmed) {
    throw new ConfigurationError('An API key for the selected provider is required');
  }
  return trimmed;
}

export class AnalysisEngine {
  constructor(private registry: ProviderRegistry = providerRegistry) {}

  /**
   * Run the 9-point analysis for one product against one provider.
   * One round-trip, no retry; the caller decides what to show on failure.
   */
  async evaluate(product: ProductInput, provider: string, credential: string): Promise<AnalysisResult> {
    const apiKey = requireCredential(credential);

    const { definition, fallback } = resolveProvider(provider, this.registry);
    if (fallback) {
      logger.warn('Unknown provider selection, using default provider', {
        requested: provider,
        provider: definition.id,
      });
    }

    // Fresh adapter per call; nothing is shared between requests
    const backend = definition.create({
      apiKey,
      model: definition.model,
      temperature: TEMPERATURE,
    });

    const prompt = buildAnalysisPrompt(product);
    const startTime = Date.now();

    logger.info('Running product analysis', {
      product: product.name,
      provider: backend.provider,
      model: backend.model,
    });

    const text = await this.generate(backend, prompt);
    const result = parseAnalysis(text);

    logger.info('Product analysis complete', {
      product: product.name,
      provider: backend.provider,
      verdict: result.verdict,
      durationMs: Date.now() - startTime,
    });

    return result;
  }

  private async generate(backend: ModelBackend, prompt: string): Promise<string> {
    try {
      return await backend.generate(prompt);
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }

      const status = statusOf(error);
      if (status === 401 || status === 403) {
        logger.warn('Provider rejected credential', { provider: backend.provider, status });
        throw new ConfigurationError(`${backend.provider} rejected the API key`, { cause: error });
      }

      logger.error('Provider call failed', { provider: backend.provider, status, error: describeError(error) });
      throw new ProviderError(`${backend.provider} request failed: ${describeError(error)}`, {
        cause: error,
        details: status === undefined ? undefined : { status },
      });
    }
  }
}

export const analysisEngine = new AnalysisEngine();
