import { describe, expect, it, vi } from 'vitest';
import {
  autoSelectForRole,
  createDescriptor,
  estimateLatencyMs,
  ModelRegistry,
} from '../../../src/ai/model-registry.js';
import { EventBus } from '../../../src/kernel/event-bus.js';
import { ConfigSchema } from '../../../src/types/index.js';

function entry(name: string) {
  return { name, max_tokens: 2048, context_window: 16000 };
}

describe('ModelRegistry', () => {
  describe('estimateLatencyMs', () => {
    it('should guess from size markers before any call completes', () => {
      expect(estimateLatencyMs(createDescriptor('meta/llama-3.2-1b', 'primary'))).toBe(2000);
      expect(estimateLatencyMs(createDescriptor('openai/gpt-4o-mini', 'primary'))).toBe(2000);
      expect(estimateLatencyMs(createDescriptor('meta/llama-3.1-70b', 'primary'))).toBe(15000);
      expect(estimateLatencyMs(createDescriptor('mistral/mixtral', 'primary'))).toBe(5000);
    });

    it('should use the last observed latency once stats exist', () => {
      const model = createDescriptor('meta/llama-3.1-70b', 'primary', { errorCount: 1, lastResponseTimeMs: 800 });
      expect(estimateLatencyMs(model)).toBe(800);
    });
  });

  describe('autoSelectForRole', () => {
    it('should prefer well-known families for primary', () => {
      const available = ['x/one', 'openai/gpt-4o', 'y/two', 'z/three', 'anthropic/claude-3'];
      expect(autoSelectForRole('primary', available)).toEqual(['openai/gpt-4o', 'anthropic/claude-3', 'x/one', 'y/two']);
    });

    it('should skip very small and very large models for duplicate', () => {
      const available = ['a/llama-1b', 'b/qwen-72b', 'c/mistral-7b', 'd/phi-mini', 'e/gemma-9b'];
      expect(autoSelectForRole('duplicate', available)).toEqual(['c/mistral-7b', 'e/gemma-9b']);
    });

    it('should prefer reliable models for reserve and fall back to any two', () => {
      expect(autoSelectForRole('reserve', ['a/x', 'b/y:free', 'c/phi-3'])).toEqual(['b/y:free', 'c/phi-3']);
      expect(autoSelectForRole('reserve', ['a/x', 'b/y', 'c/z'])).toEqual(['a/x', 'b/y']);
    });

    it('should take up to five leftovers for fallback', () => {
      const available = ['a', 'b', 'c', 'd', 'e', 'f'];
      expect(autoSelectForRole('fallback', available)).toEqual(['a', 'b', 'c', 'd', 'e']);
    });
  });

  describe('fromConfig', () => {
    it('should fill roles automatically from the provider models', () => {
      const config = ConfigSchema.parse({
        providers: {
          openrouter: {
            base_url: 'https://openrouter.example.test/api/v1',
            models: {
              mixed: [
                entry('openai/gpt-4o'),
                entry('anthropic/claude-3-haiku'),
                entry('meta/llama-3.1-70b'),
                entry('mistral/mixtral-8x7b'),
                entry('microsoft/phi-3-mini'),
                entry('qwen/qwen-2-72b'),
                entry('google/gemma-7b:free'),
              ],
            },
          },
        },
      });

      const registry = ModelRegistry.fromConfig(config);

      expect(registry.getModels('primary').map((m) => m.name)).toEqual([
        'openai/gpt-4o',
        'anthropic/claude-3-haiku',
        'meta/llama-3.1-70b',
        'mistral/mixtral-8x7b',
        'microsoft/phi-3-mini',
      ]);
      expect(registry.getModels('duplicate').map((m) => m.name)).toEqual(['google/gemma-7b:free']);
      expect(registry.getModels('reserve').map((m) => m.name)).toEqual(['qwen/qwen-2-72b']);
      expect(registry.getRoleDistribution()).toEqual({ primary: 5, duplicate: 1, reserve: 1, fallback: 0 });
    });

    it('should honour explicit role lists and skip unknown or reassigned names', () => {
      const config = ConfigSchema.parse({
        llm: { model_roles: { primary: ['a', 'missing', 'a'], duplicate: ['b'], reserve: ['a'] } },
        providers: {
          openrouter: {
            base_url: 'https://openrouter.example.test/api/v1',
            models: { vendor: [entry('a'), entry('b'), entry('c')] },
          },
        },
      });

      const registry = ModelRegistry.fromConfig(config);

      expect(registry.get('a')?.role).toBe('primary');
      expect(registry.get('b')?.role).toBe('duplicate');
      expect(registry.get('c')?.role).toBe('fallback');
      expect(registry.getRoleDistribution()).toEqual({ primary: 1, duplicate: 1, reserve: 0, fallback: 1 });
    });

    it('should copy model parameters from the entry', () => {
      const config = ConfigSchema.parse({
        providers: {
          openrouter: {
            base_url: 'https://openrouter.example.test/api/v1',
            models: { vendor: [{ name: 'gpt-x', max_tokens: 1000, context_window: 32000, temperature: 0.2 }] },
          },
        },
      });

      const model = ModelRegistry.fromConfig(config).get('gpt-x');

      expect(model).toMatchObject({ maxTokens: 1000, contextWindow: 32000, temperature: 0.2, topP: 1, enabled: true });
    });

    it('should build an empty registry when the default provider is missing', () => {
      expect(ModelRegistry.fromConfig(ConfigSchema.parse({})).size).toBe(0);
    });
  });

  describe('queries and stats', () => {
    const build = () =>
      new ModelRegistry([
        createDescriptor('model-a', 'primary'),
        createDescriptor('llama-3.2-1b', 'primary'),
        createDescriptor('llama-3.1-70b', 'primary'),
        createDescriptor('backup', 'fallback'),
      ]);

    it('should return the fastest enabled model of a role', () => {
      const registry = build();
      expect(registry.getFastest()?.name).toBe('llama-3.2-1b');
      expect(registry.getFastest('fallback')?.name).toBe('backup');
      expect(registry.getFastest('reserve')).toBeUndefined();
    });

    it('should rank by observed latency after calls complete', () => {
      const registry = build();
      registry.updateStats('model-a', true, 500);

      expect(registry.getFastest()?.name).toBe('model-a');
      expect(registry.getFastest('primary', new Set(['model-a']))?.name).toBe('llama-3.2-1b');
    });

    it('should count successes and errors', () => {
      const registry = build();
      registry.updateStats('model-a', true, 100);
      registry.updateStats('model-a', false, 300);
      registry.updateStats('unknown', true, 1);

      expect(registry.get('model-a')).toMatchObject({ successCount: 1, errorCount: 1, lastResponseTimeMs: 300 });
    });

    it('should hide disabled models from getModels but keep them in getAll', () => {
      const registry = build();
      registry.disable('model-a');

      expect(registry.getModels('primary').map((m) => m.name)).toEqual(['llama-3.2-1b', 'llama-3.1-70b']);
      expect(registry.getAll()).toHaveLength(4);
      expect(registry.getModels()).toHaveLength(3);
    });

    it('should store copies of registered descriptors', () => {
      const descriptor = createDescriptor('model-a', 'primary');
      const registry = new ModelRegistry([descriptor]);
      descriptor.enabled = false;

      expect(registry.get('model-a')?.enabled).toBe(true);
    });
  });

  describe('events', () => {
    it('should emit once per state change', () => {
      const eventBus = new EventBus();
      const disabled = vi.fn();
      const enabled = vi.fn();
      eventBus.on('model:disabled', disabled);
      eventBus.on('model:enabled', enabled);
      const registry = new ModelRegistry([createDescriptor('model-a', 'primary')], eventBus);

      registry.enable('model-a');
      registry.disable('model-a', 'repeated overload errors');
      registry.disable('model-a');
      registry.enable('model-a');

      expect(disabled).toHaveBeenCalledTimes(1);
      expect(disabled.mock.calls[0]?.[0]).toMatchObject({ modelName: 'model-a', reason: 'repeated overload errors' });
      expect(enabled).toHaveBeenCalledTimes(1);
    });
  });
});
