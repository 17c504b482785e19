/**
 * Integration Tests — Routing Pipeline
 *
 * Builds the whole router from configuration with an in-process model
 * client and judge, then drives requests end to end:
 * classify → route → execute → evaluate → learn.
 *
 * Covers:
 * - Consensus over three primaries with judge-based selection
 * - Structured output: fenced JSON accepted, invalid JSON rejected per model
 * - Parallel timeout degrading to the single-model chain
 * - Repeated overload errors disabling a model
 */

import { describe, it, expect } from 'vitest';
import { RoutingOrchestrator } from '../../src/ai/orchestrator.js';
import { createRequest } from '../../src/ai/types.js';
import { EventBus, type EventMap } from '../../src/kernel/event-bus.js';
import { ConfigSchema, type Config } from '../../src/types/index.js';
import { failure, ScriptedClient, ScriptedEvaluator, success } from '../helpers/fakes.js';

const CODE_PROMPT = 'Write a Python function that sorts a list';

interface PipelineOptions {
  primary: string[];
  fallback?: string[];
  routing?: Record<string, number>;
}

/**
 * Duplicate and reserve roles are pinned so that automatic role
 * assignment leaves the fallback list alone.
 */
function buildConfig({ primary, fallback = ['model-f'], routing = {} }: PipelineOptions): Config {
  const names = [...primary, 'model-d', 'model-r', ...fallback];
  return ConfigSchema.parse({
    llm: { model_roles: { primary, duplicate: ['model-d'], reserve: ['model-r'], fallback } },
    providers: {
      openrouter: {
        base_url: 'https://openrouter.example.test/api/v1',
        models: {
          test: names.map((name) => ({ name, max_tokens: 512, context_window: 4096 })),
        },
      },
    },
    routing,
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Routing Pipeline Integration', () => {
  describe('Consensus', () => {
    it('should ask three primaries and keep the best-judged answer', async () => {
      const client = new ScriptedClient()
        .respond('model-a', () => success('review a'))
        .respond('model-b', () => success('review b'))
        .respond('model-c', () => success('review c'));
      const evaluator = new ScriptedEvaluator({ 'review a': 3, 'review b': 5, 'review c': 4 });
      const orchestrator = RoutingOrchestrator.fromConfig(
        buildConfig({ primary: ['model-a', 'model-b', 'model-c'] }),
        { client, evaluator },
      );

      const result = await orchestrator.generate(
        createRequest('Please review this code and fix the bug in the loop'),
        { adaptive: true },
      );

      expect(result).toMatchObject({ modelName: 'model-b', content: 'review b', score: 5 });
      expect(client.calls.map((call) => call.model)).toEqual(['model-a', 'model-b', 'model-c']);
      expect(evaluator.calls.map((call) => call.response)).toEqual(['review a', 'review b', 'review c']);
    });
  });

  describe('Structured output', () => {
    it('should accept fenced JSON without retrying', async () => {
      const client = new ScriptedClient(() => success('Here you go:\n```json\n{"name": "Ada"}\n```'));
      const orchestrator = RoutingOrchestrator.fromConfig(buildConfig({ primary: ['model-a', 'model-b'] }), {
        client,
        evaluator: new ScriptedEvaluator(),
      });

      const result = await orchestrator.generate(
        createRequest('Return a user object', { responseFormat: { type: 'json_object' } }),
      );

      expect(result).toMatchObject({ modelName: 'model-a', content: '{"name": "Ada"}', success: true, score: 3 });
      expect(client.calls).toHaveLength(2);
      expect(client.calls[0].format).toEqual({ type: 'json_object' });
    });

    it('should drop a model that answers without JSON and learn from it', async () => {
      const client = new ScriptedClient()
        .respond('model-a', () => success('Sorry, I cannot help with that'))
        .respond('model-b', () => success('{"name": "Ada"}'));
      const orchestrator = RoutingOrchestrator.fromConfig(buildConfig({ primary: ['model-a', 'model-b'] }), {
        client,
        evaluator: new ScriptedEvaluator(),
      });

      const result = await orchestrator.generate(
        createRequest('Return a user object', { responseFormat: { type: 'json_object' } }),
      );
      await orchestrator.drainLearning();

      // A lone valid response is returned without a judge call
      expect(result).toEqual({ modelName: 'model-b', content: '{"name": "Ada"}', latencyMs: 100, success: true });
      const stats = orchestrator.getLearningStats();
      expect(stats.totalErrorsAnalyzed).toBe(1);
      expect(stats.patternStatistics.unsupported_format).toMatchObject({
        occurrences: 1,
        affectedModels: ['model-a'],
      });
    });
  });

  describe('Parallel timeout', () => {
    it('should fall back to the single-model chain', async () => {
      const client = new ScriptedClient()
        .respond('model-a', async () => {
          await delay(60);
          return success('{"from": "a"}');
        })
        .respond('model-b', async () => {
          await delay(60);
          return success('{"from": "b"}');
        });
      const orchestrator = RoutingOrchestrator.fromConfig(
        buildConfig({ primary: ['model-a', 'model-b'], routing: { parallel_timeout_ms: 20 } }),
        { client, evaluator: new ScriptedEvaluator() },
      );

      const result = await orchestrator.generate(
        createRequest('Return a status object', { responseFormat: { type: 'json_object' } }),
      );

      expect(result).toMatchObject({ modelName: 'model-a', content: '{"from": "a"}', success: true });
      expect(client.calls.map((call) => call.model)).toEqual(['model-a', 'model-b', 'model-a']);
      // Calls abandoned by the timeout are not counted
      expect(orchestrator.registry.get('model-a')?.successCount).toBe(1);
      expect(orchestrator.registry.get('model-b')?.successCount).toBe(0);
    });
  });

  describe('Overload mitigation', () => {
    it('should disable a primary after repeated rate limiting', async () => {
      const eventBus = new EventBus();
      const disabled: Array<EventMap['model:disabled']> = [];
      const actions: string[] = [];
      eventBus.on('model:disabled', (event) => disabled.push(event));
      eventBus.on('mitigation:applied', (event) => actions.push(event.action));

      const client = new ScriptedClient().respond('model-a', () => failure('Rate limit exceeded'));
      const orchestrator = RoutingOrchestrator.fromConfig(buildConfig({ primary: ['model-a'] }), {
        client,
        evaluator: new ScriptedEvaluator(),
        eventBus,
      });

      for (let i = 0; i < 4; i++) {
        const result = await orchestrator.generate(createRequest(CODE_PROMPT));
        await orchestrator.drainLearning();
        expect(result).toMatchObject({ modelName: 'model-f', success: true });
      }
      // Mitigation is active from the third error, but four errors are not enough to disable
      expect(actions).toEqual(['Increased request delays']);
      expect(orchestrator.registry.get('model-a')?.enabled).toBe(true);

      await orchestrator.generate(createRequest(CODE_PROMPT));
      await orchestrator.drainLearning();

      expect(orchestrator.registry.get('model-a')?.enabled).toBe(false);
      expect(disabled).toHaveLength(1);
      expect(disabled[0]).toMatchObject({ modelName: 'model-a', reason: 'repeated overload errors' });
      expect(actions).toEqual(['Increased request delays', 'Disabled model model-a']);

      const result = await orchestrator.generate(createRequest(CODE_PROMPT));

      expect(result).toMatchObject({ modelName: 'model-f', success: true });
      expect(client.callsFor('model-a')).toHaveLength(5);
    });
  });
});
