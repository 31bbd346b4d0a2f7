import { describe, it, expect, vi } from 'vitest';
import { buildPayload, fenced } from '../../__fixtures__/analysis.js';
import { CRITERIA, ProductInput } from '../../types/analysis.js';
import { ConfigurationError, ProviderError, SchemaValidationError } from '../../utils/errors.js';
import { buildDashboard } from '../dashboard.js';
import { ProviderRegistry } from '../providers/registry.js';
import { BackendOptions, ProviderDefinition, ProviderId } from '../providers/types.js';
import { AnalysisEngine, requireCredential } from './engine.js';

const belt: ProductInput = {
  name: 'Red Light Therapy Belt',
  price: 129.0,
  cost: 28.0,
  businessModel: 'PrivateLabel',
  platform: 'Shopify',
};

function fakeRegistry(reply: (prompt: string) => Promise<string>) {
  const generate = vi.fn(reply);
  const created: Array<BackendOptions & { id: ProviderId }> = [];

  const define = (id: ProviderId): ProviderDefinition => ({
    id,
    label: `Fake ${id}`,
    model: `${id}-model`,
    create: (options) => {
      created.push({ id, ...options });
      return { provider: id, model: options.model, generate };
    },
  });

  const registry: ProviderRegistry = {
    openai: define('openai'),
    gemini: define('gemini'),
    anthropic: define('anthropic'),
  };
  return { registry, generate, created };
}

describe('AnalysisEngine.evaluate', () => {
  it('returns a complete GO analysis for the therapy belt', async () => {
    const { registry, generate } = fakeRegistry(async () => fenced(buildPayload({ verdict: 'GO' })));
    const engine = new AnalysisEngine(registry);

    const result = await engine.evaluate(belt, 'openai', 'test-key');

    expect(result.verdict).toBe('GO');
    expect(Object.keys(result.scores)).toHaveLength(9);
    for (const criterion of CRITERIA) {
      expect(Number.isInteger(result.scores[criterion].score)).toBe(true);
    }
    expect(buildDashboard(belt, result).banner.band).toBe('success');
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('sends the rendered prompt in a single call', async () => {
    const { registry, generate } = fakeRegistry(async () => fenced(buildPayload()));
    await new AnalysisEngine(registry).evaluate(belt, 'openai', 'test-key');

    const prompt = generate.mock.calls[0][0];
    expect(prompt.split('\n')).toContain('Product: Red Light Therapy Belt');
    expect(prompt.split('\n')).toContain('Price: 129');
    expect(prompt.split('\n')).toContain('Cost: 28');
  });

  it('builds the selected backend with temperature 0 and the caller credential', async () => {
    const { registry, created } = fakeRegistry(async () => fenced(buildPayload()));
    await new AnalysisEngine(registry).evaluate(belt, 'gemini', '  test-key  ');

    expect(created).toEqual([{ id: 'gemini', apiKey: 'test-key', model: 'gemini-model', temperature: 0 }]);
  });

  it('creates a fresh backend for every call', async () => {
    const { registry, created } = fakeRegistry(async () => fenced(buildPayload()));
    const engine = new AnalysisEngine(registry);

    await engine.evaluate(belt, 'anthropic', 'test-key');
    await engine.evaluate(belt, 'anthropic', 'test-key');

    expect(created.map((c) => c.id)).toEqual(['anthropic', 'anthropic']);
  });

  // Deliberate: an unrecognised selection runs on the first provider instead of failing.
  // Changing this behaviour must update this test.
  it('falls back to the first provider for an unknown selection', async () => {
    const { registry, created } = fakeRegistry(async () => fenced(buildPayload()));

    const result = await new AnalysisEngine(registry).evaluate(belt, 'Mistral Large', 'test-key');

    expect(result.verdict).toBe('GO');
    expect(created.map((c) => c.id)).toEqual(['openai']);
  });

  it('rejects an empty credential before calling the provider', async () => {
    const { registry, generate, created } = fakeRegistry(async () => fenced(buildPayload()));
    const engine = new AnalysisEngine(registry);

    await expect(engine.evaluate(belt, 'openai', '')).rejects.toBeInstanceOf(ConfigurationError);
    await expect(engine.evaluate(belt, 'openai', '   ')).rejects.toThrow(
      'An API key for the selected provider is required'
    );
    expect(created).toHaveLength(0);
    expect(generate).not.toHaveBeenCalled();
  });

  it('maps a rejected credential to ConfigurationError', async () => {
    const denied = Object.assign(new Error('Incorrect API key provided'), { status: 401 });
    const { registry } = fakeRegistry(async () => {
      throw denied;
    });

    const error = await new AnalysisEngine(registry).evaluate(belt, 'openai', 'test-key').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: 'openai rejected the API key', cause: denied, statusCode: 401 });
  });

  it('wraps other provider failures in ProviderError', async () => {
    const outage = Object.assign(new Error('Service Unavailable'), { status: 503 });
    const { registry } = fakeRegistry(async () => {
      throw outage;
    });

    const error = await new AnalysisEngine(registry).evaluate(belt, 'gemini', 'test-key').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'gemini request failed: Service Unavailable',
      cause: outage,
      details: { status: 503 },
    });
  });

  it('passes ProviderError from the adapter through unchanged', async () => {
    const empty = new ProviderError('OpenAI returned an empty completion');
    const { registry } = fakeRegistry(async () => {
      throw empty;
    });

    await expect(new AnalysisEngine(registry).evaluate(belt, 'openai', 'test-key')).rejects.toBe(empty);
  });

  it('surfaces a malformed reply as SchemaValidationError', async () => {
    const { registry } = fakeRegistry(async () => 'This product looks promising!');

    await expect(new AnalysisEngine(registry).evaluate(belt, 'openai', 'test-key')).rejects.toBeInstanceOf(
      SchemaValidationError
    );
  });

  it('never returns a partial result', async () => {
    const { scores: _scores, ...rest } = buildPayload();
    const partial = { ...rest, scores: { margin: { score: 5, insight: 'ok' } } };
    const { registry } = fakeRegistry(async () => fenced(partial));

    await expect(new AnalysisEngine(registry).evaluate(belt, 'openai', 'test-key')).rejects.toBeInstanceOf(
      SchemaValidationError
    );
  });
});

describe('requireCredential', () => {
  it('trims the credential', () => {
    expect(requireCredential('  test-key \n')).toBe('test-key');
  });

  it('rejects a blank credential', () => {
    expect(() => requireCredential(' \t')).toThrow(ConfigurationError);
  });
});
