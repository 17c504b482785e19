import { beforeEach, describe, expect, it, vi } from 'vitest';
import { classifyError, ErrorLearningSystem, scoreErrorRule } from '../../../src/ai/error-learning.js';
import type { ModelRegistry } from '../../../src/ai/model-registry.js';
import { getDefaultErrorRules } from '../../../src/ai/rules.js';
import type { GenerationResult, TaskType } from '../../../src/ai/types.js';
import { EventBus } from '../../../src/kernel/event-bus.js';
import { buildRegistry } from '../../helpers/fakes.js';

const rules = getDefaultErrorRules();

function failed(error: string, modelName = 'model-a'): GenerationResult {
  return { modelName, content: '', latencyMs: 100, success: false, error };
}

describe('ErrorLearningSystem', () => {
  describe('classifyError', () => {
    it('should map rate limit failures to model overload', () => {
      expect(classifyError(rules, undefined, failed('Rate limit exceeded'))).toEqual({
        errorType: 'rate_limit_error',
        pattern: 'model_overload',
        severity: 0.7,
        confidence: expect.closeTo(1.7),
        suggestedFix: 'Reduce request frequency or switch to alternative model',
        preventionMeasures: ['reduce_request_frequency', 'switch_to_alternative_model'],
      });
    });

    it('should map timeouts to context length', () => {
      const analysis = classifyError(rules, 'Request timeout after 30s', undefined);
      expect(analysis).toMatchObject({
        errorType: 'timeout_error',
        pattern: 'context_too_long',
        severity: 0.8,
        confidence: expect.closeTo(1.7),
        suggestedFix: 'Reduce context length or use faster model',
      });
    });

    it('should treat very slow responses as timeouts', () => {
      const slow: GenerationResult = { modelName: 'm', content: 'ok', latencyMs: 45_000, success: true };
      expect(classifyError(rules, undefined, slow)).toMatchObject({ errorType: 'timeout_error', confidence: 0.4 });
    });

    it('should prefer the specific rule over the generic api error bonus', () => {
      expect(classifyError(rules, undefined, failed('network unreachable')).errorType).toBe('network_error');
    });

    it('should recognise low quality reports', () => {
      const analysis = classifyError(rules, 'low quality', { modelName: 'm', content: 'meh', latencyMs: 1, success: true });
      expect(analysis).toMatchObject({
        errorType: 'low_quality',
        pattern: 'complex_query',
        suggestedFix: 'Use parallel generation or improve prompts',
      });
    });

    it('should fall back to a generic analysis below the match threshold', () => {
      const generic = {
        errorType: 'invalid_response',
        severity: 0.5,
        confidence: 0.3,
        suggestedFix: 'Investigate manually',
        preventionMeasures: [],
      };
      expect(classifyError(rules, 'something odd', undefined)).toEqual(generic);
      // The api error bonus alone is not enough
      expect(classifyError(rules, undefined, failed('HTTP 500'))).toEqual(generic);
    });

    it('should only award the phrase bonus when the rule key shares the phrase', () => {
      const timeoutRule = rules.find((rule) => rule.key === 'timeout');
      expect(timeoutRule && scoreErrorRule('rate limit exceeded', timeoutRule)).toBe(0);
    });
  });

  describe('analysis and mitigation', () => {
    let eventBus: EventBus;
    let registry: ModelRegistry;
    let system: ErrorLearningSystem;

    const analyzeTimes = (times: number, error: string, taskType: TaskType = 'translation', modelName = 'model-a') => {
      for (let i = 0; i < times; i++) {
        system.analyze({ prompt: 'p', modelName, response: failed(error, modelName), taskType });
      }
    };

    beforeEach(() => {
      eventBus = new EventBus();
      registry = buildRegistry([
        { name: 'model-a', overrides: { errorCount: 5 } },
        { name: 'model-b', overrides: { errorCount: 4 } },
      ]);
      system = new ErrorLearningSystem(registry, { eventBus });
    });

    it('should record each analysis and publish it', () => {
      const analyzed = vi.fn();
      eventBus.on('error:analyzed', analyzed);

      const analysis = system.analyze({ prompt: 'p', modelName: 'model-a', response: failed('timeout') });

      expect(analysis?.errorType).toBe('timeout_error');
      expect(system.getHistory()).toHaveLength(1);
      expect(system.getHistory()[0]).toMatchObject({ modelName: 'model-a', taskType: 'unknown', retrySucceeded: false });
      expect(analyzed).toHaveBeenCalledTimes(1);
    });

    it('should mitigate overload on the third occurrence and disable an error-prone model', () => {
      const applied = vi.fn();
      eventBus.on('mitigation:applied', applied);

      analyzeTimes(2, 'rate limit exceeded');
      expect(system.hasActiveMitigation('model_overload')).toBe(false);
      expect(registry.get('model-a')?.enabled).toBe(true);

      analyzeTimes(1, 'rate limit exceeded');

      expect(system.hasActiveMitigation('model_overload')).toBe(true);
      expect(registry.get('model-a')).toMatchObject({ enabled: false, errorCount: 5 });
      expect(applied.mock.calls.map((call) => call[0].action)).toEqual([
        'Increased request delays',
        'Disabled model model-a',
      ]);
      expect(system.getActiveMitigations()[0]).toMatchObject({
        key: 'model_overload_auto_mitigation',
        pattern: 'model_overload',
        affectedModels: ['model-a'],
        affectedTaskTypes: ['translation'],
        actions: ['Increased request delays'],
      });
    });

    it('should keep a model with fewer errors enabled', () => {
      analyzeTimes(3, 'rate limit exceeded', 'translation', 'model-b');

      expect(system.hasActiveMitigation('model_overload')).toBe(true);
      expect(registry.get('model-b')?.enabled).toBe(true);
    });

    it('should ignore models the registry does not know', () => {
      analyzeTimes(3, 'rate limit exceeded', 'translation', 'ghost');

      expect(system.hasActiveMitigation('model_overload')).toBe(true);
    });

    it('should enable context truncation after repeated timeouts', () => {
      analyzeTimes(3, 'timeout');

      expect(system.getActiveMitigations().map((m) => m.actions)).toEqual([['Enabled automatic context truncation']]);
    });

    it('should flag format instructions for the affected task type', () => {
      analyzeTimes(3, 'invalid json', 'json_generation');

      expect(system.getActiveMitigations()[0]?.actions).toEqual(['Flagged format instructions for json_generation prompts']);
    });

    it('should count every recurrence as a mitigation attempt', () => {
      analyzeTimes(5, 'rate limit exceeded', 'translation', 'model-b');

      expect(system.getPatternStats('model_overload')).toMatchObject({ occurrences: 5, mitigationAttempts: 3 });
      expect(system.getActiveMitigations()).toHaveLength(1);
    });

    it('should credit successful retries to the active mitigation', () => {
      analyzeTimes(3, 'rate limit exceeded', 'translation', 'model-b');

      expect(system.markRetrySucceeded('p')).toBe(true);
      expect(system.markRetrySucceeded('p')).toBe(false);
      expect(system.markRetrySucceeded('other')).toBe(false);
      expect(system.getPatternStats('model_overload')?.mitigationSuccesses).toBe(1);
      expect(system.getLearningStats().mitigationEffectiveness).toEqual({ model_overload_auto_mitigation: 1 });
    });

    it('should summarise what it has learned', () => {
      analyzeTimes(3, 'rate limit exceeded', 'translation', 'model-b');

      const stats = system.getLearningStats();
      expect(stats).toMatchObject({
        totalErrorsAnalyzed: 3,
        recentErrors24h: 3,
        errorPatternsDetected: 1,
        activeMitigations: 1,
        learningInsightsGenerated: 0,
        autoLearningEnabled: true,
        recentInsights: [],
      });
      expect(stats.patternStatistics.model_overload).toMatchObject({
        occurrences: 3,
        affectedModels: ['model-b'],
        affectedTaskTypes: ['translation'],
        mitigationAttempts: 1,
        mitigationSuccesses: 0,
      });
      expect(stats.patternStatistics.model_overload?.avgSeverity).toBeCloseTo(0.7);
    });

    it('should stop learning while automatic learning is off', () => {
      system.setAutoLearning(false);

      expect(system.analyze({ prompt: 'p', modelName: 'model-a', response: failed('timeout') })).toBeNull();
      expect(system.getHistory()).toHaveLength(0);
      expect(system.getLearningStats().autoLearningEnabled).toBe(false);
    });

    it('should forget everything on reset', () => {
      analyzeTimes(3, 'timeout');
      system.reset();

      expect(system.getLearningStats()).toMatchObject({
        totalErrorsAnalyzed: 0,
        errorPatternsDetected: 0,
        activeMitigations: 0,
      });
    });
  });

  describe('insights', () => {
    it('should generate insights once enough errors accumulate', () => {
      const eventBus = new EventBus();
      const generated = vi.fn();
      eventBus.on('insight:generated', generated);
      const system = new ErrorLearningSystem(buildRegistry(['model-b']), { eventBus });

      for (let i = 0; i < 9; i++) {
        system.analyze({ prompt: 'p', modelName: 'model-b', response: failed('rate limit exceeded', 'model-b'), taskType: 'translation' });
      }
      expect(system.getInsights()).toHaveLength(0);

      system.analyze({ prompt: 'p', modelName: 'model-b', response: failed('rate limit exceeded', 'model-b'), taskType: 'translation' });

      expect(system.getInsights().map((insight) => insight.description)).toEqual([
        'Model model-b has 10 errors in last 24h',
        "Task type 'translation' has 10 errors in last 24h",
        'Detected systemic model_overload pattern (10 occurrences)',
      ]);
      expect(system.getInsights()[0]).toMatchObject({
        category: 'model_reliability',
        confidence: 1,
        affectedComponents: ['model_registry', 'request_router'],
        recommendedActions: [
          'Reduce usage of model model-b',
          'Add model-b to monitoring watchlist',
          'Consider temporary disable of model-b',
        ],
      });
      expect(generated).toHaveBeenCalledTimes(3);
    });

    it('should skip task difficulty insights for unclassified errors', () => {
      const system = new ErrorLearningSystem(buildRegistry(['model-b']));

      for (let i = 0; i < 10; i++) {
        system.analyze({ prompt: 'p', modelName: 'model-b', response: failed('timeout', 'model-b') });
      }

      expect(system.getInsights().map((insight) => insight.category)).toEqual(['model_reliability', 'error_pattern']);
    });
  });

  describe('getPreventionRecommendations', () => {
    it('should warn about sensitive and very long prompts', () => {
      const system = new ErrorLearningSystem(buildRegistry(['model-a']));

      expect(system.getPreventionRecommendations('how to hack the wifi')).toEqual([
        'Request may contain sensitive content - consider content filtering',
      ]);
      expect(system.getPreventionRecommendations('x'.repeat(10_001))).toEqual([
        'Request is very long - consider splitting or truncating',
      ]);
    });

    it('should draw on recent errors for the same task type', () => {
      const system = new ErrorLearningSystem(buildRegistry(['model-a']));
      system.analyze({ prompt: 'a', modelName: 'model-a', response: failed('timeout'), taskType: 'analysis' });
      system.analyze({ prompt: 'b', modelName: 'model-a', response: failed('timeout'), taskType: 'analysis' });
      system.analyze({ prompt: 'c', modelName: 'model-a', errorMessage: 'low quality', taskType: 'summarization' });

      expect(system.getPreventionRecommendations('Analyze the data', 'analysis')).toEqual([
        'Similar requests have timed out - consider using faster models',
      ]);
      expect(system.getPreventionRecommendations('Summarize it', 'summarization')).toEqual([
        'Similar requests had low quality - consider parallel generation',
      ]);
      expect(system.getPreventionRecommendations('Translate it', 'translation')).toEqual([]);
    });
  });
});
