import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createClientFromConfig, OpenAICompatibleClient } from '../../../src/ai/generation-client.js';
import { ConfigurationError } from '../../../src/ai/errors.js';
import { createDescriptor } from '../../../src/ai/model-registry.js';
import { ConfigSchema } from '../../../src/types/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// MOCKS
// ═══════════════════════════════════════════════════════════════════════════════

const { create, construct } = vi.hoisted(() => ({ create: vi.fn(), construct: vi.fn() }));

vi.mock('openai', () => {
  return {
    default: vi.fn(function (options: unknown) {
      construct(options);
      return { chat: { completions: { create } } };
    }),
  };
});

const model = createDescriptor('openai/gpt-4o-mini', 'primary', { maxTokens: 1024 });

describe('OpenAICompatibleClient', () => {
  let client: OpenAICompatibleClient;

  beforeEach(() => {
    create.mockReset();
    construct.mockReset();
    client = new OpenAICompatibleClient({ apiKey: 'test-secret', baseURL: 'https://llm.example.test/v1' });
  });

  it('should disable SDK retries', () => {
    expect(construct).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'https://llm.example.test/v1',
      timeout: undefined,
      maxRetries: 0,
    });
  });

  it('should send the model parameters and return the first choice', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: 'Hello!' } }] });

    const result = await client.call(model, 'Say hello');

    expect(create).toHaveBeenCalledWith({
      model: 'openai/gpt-4o-mini',
      messages: [{ role: 'user', content: 'Say hello' }],
      max_tokens: 1024,
      temperature: 0.7,
      top_p: 1,
    });
    expect(result).toMatchObject({ modelName: 'openai/gpt-4o-mini', content: 'Hello!', success: true });
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('should request JSON mode for structured output', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: '{}' } }] });

    await client.call(model, 'Return JSON', { type: 'json_object' });

    expect(create.mock.calls[0]?.[0]).toMatchObject({ response_format: { type: 'json_object' } });
  });

  it('should treat a missing choice as empty content', async () => {
    create.mockResolvedValue({ choices: [] });

    const result = await client.call(model, 'p');

    expect(result).toMatchObject({ content: '', success: true });
  });

  it('should resolve provider errors to a failed result', async () => {
    create.mockRejectedValue(new Error('429 Rate limit exceeded'));

    const result = await client.call(model, 'p');

    expect(result).toMatchObject({
      modelName: 'openai/gpt-4o-mini',
      content: '',
      success: false,
      error: 'Model call failed: 429 Rate limit exceeded',
    });
  });
});

describe('createClientFromConfig', () => {
  const provider = { base_url: 'https://openrouter.example.test/api/v1', api_key: 'test-secret' };

  beforeEach(() => {
    construct.mockReset();
    vi.stubEnv('ROUTER_API_KEY', '');
    vi.stubEnv('OPENROUTER_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should build a client for the default provider', () => {
    const config = ConfigSchema.parse({ providers: { openrouter: provider } });

    expect(createClientFromConfig(config)).toBeInstanceOf(OpenAICompatibleClient);
    expect(construct).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'https://openrouter.example.test/api/v1',
      timeout: 200_000,
      maxRetries: 0,
    });
  });

  it('should prefer the key from the environment', () => {
    vi.stubEnv('ROUTER_API_KEY', 'env-key');
    const config = ConfigSchema.parse({ providers: { openrouter: provider } });

    createClientFromConfig(config);

    expect(construct.mock.calls[0]?.[0]).toMatchObject({ apiKey: 'env-key' });
  });

  it('should reject a missing provider', () => {
    expect(() => createClientFromConfig(ConfigSchema.parse({}))).toThrow(ConfigurationError);
    expect(() => createClientFromConfig(ConfigSchema.parse({}))).toThrow('Provider "openrouter" is not configured');
  });

  it('should reject a provider without a key', () => {
    const config = ConfigSchema.parse({ providers: { openrouter: { base_url: provider.base_url } } });

    expect(() => createClientFromConfig(config)).toThrow(
      'No API key for provider "openrouter": set ROUTER_API_KEY or OPENROUTER_API_KEY',
    );
  });
});
