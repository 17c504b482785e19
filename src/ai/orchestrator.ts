import { randomUUID } from 'node:crypto';
import { EventBus } from '../kernel/event-bus.js';
import type { Config } from '../types/index.js';
import { createLogger, redact } from '../utils/logger.js';
import { AdaptiveStrategyManager, type AdaptiveStats, type StrategyRecommendation } from './adaptive-strategy.js';
import { ErrorLearningSystem, type LearningStats } from './error-learning.js';
import { createClientFromConfig, type GenerationClient } from './generation-client.js';
import { LearningQueue } from './learning-queue.js';
import { ModelRegistry } from './model-registry.js';
import { RequestRouter, type RoutingStats } from './request-router.js';
import { ResponseEvaluator, type Evaluator } from './response-evaluator.js';
import { StrategyExecutor } from './strategy-executor.js';
import type { ComplexityLevel, GenerationRequest, GenerationResult, StrategyType, TaskType } from './types.js';

const log = createLogger('orchestrator');

// ═══════════════════════════════════════════════════════════════════════════════
// ROUTING ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * RoutingOrchestrator — route, execute, return, then learn.
 *
 * The caller gets its result as soon as the strategy finishes. Router
 * learning, error analysis and retry bookkeeping run afterwards on the
 * shared LearningQueue, so a failing learning task never touches a result
 * that was already returned.
 */

const CHARS_PER_TOKEN = 4;
const DEFAULT_LOW_QUALITY_SCORE = 2.5;

export interface RoutingComponents {
  eventBus: EventBus;
  registry: ModelRegistry;
  router: RequestRouter;
  executor: StrategyExecutor;
  adaptive: AdaptiveStrategyManager;
  errorLearning: ErrorLearningSystem;
  learningQueue: LearningQueue;
}

export interface RoutingOrchestratorOptions {
  /** Successful results scored below this are analysed as low quality */
  lowQualityScore?: number;
}

export interface GenerateOptions {
  /** Let the Adaptive Strategy Manager pick the strategy */
  adaptive?: boolean;
}

export interface Recommendations {
  taskType: TaskType;
  complexity: ComplexityLevel;
  strategies: StrategyRecommendation[];
  prevention: string[];
}

export interface BuildFromConfigOptions {
  client?: GenerationClient;
  evaluator?: Evaluator;
  eventBus?: EventBus;
}

export class RoutingOrchestrator {
  private readonly lowQualityScore: number;

  constructor(
    private readonly components: RoutingComponents,
    options: RoutingOrchestratorOptions = {},
  ) {
    this.lowQualityScore = options.lowQualityScore ?? DEFAULT_LOW_QUALITY_SCORE;
  }

  /**
   * Wire every component from configuration. Without a client, one is built
   * for the default provider.
   */
  static fromConfig(config: Config, options: BuildFromConfigOptions = {}): RoutingOrchestrator {
    log.debug({ config: redact(config) }, 'Building router from configuration');
    const eventBus = options.eventBus ?? new EventBus();
    const client = options.client ?? createClientFromConfig(config);
    const registry = ModelRegistry.fromConfig(config, eventBus);
    const evaluator =
      options.evaluator ?? new ResponseEvaluator(client, registry, { evaluatorModel: config.llm.evaluator_model });
    const thresholds = config.routing;

    const learningQueue = new LearningQueue(eventBus);
    const router = new RequestRouter(registry, { eventBus });
    const executor = new StrategyExecutor(registry, client, evaluator, {
      eventBus,
      parallelTimeoutMs: thresholds.parallel_timeout_ms,
      evaluationTimeoutMs: thresholds.evaluation_timeout_ms,
    });
    const adaptive = new AdaptiveStrategyManager(router, executor, registry, {
      eventBus,
      learningQueue,
      thresholds: {
        minSuccessRate: thresholds.min_success_rate,
        minAvgScore: thresholds.min_avg_score,
        maxAvgLatencyMs: thresholds.max_avg_latency_ms,
        minSamplesForAdaptation: thresholds.min_samples_for_adaptation,
        adaptationCooldownMs: thresholds.adaptation_cooldown_ms,
        decisionCacheTtlMs: thresholds.decision_cache_ttl_ms,
        decisionCacheSize: thresholds.decision_cache_size,
      },
    });
    const errorLearning = new ErrorLearningSystem(registry, { eventBus });

    return new RoutingOrchestrator(
      { eventBus, registry, router, executor, adaptive, errorLearning, learningQueue },
      { lowQualityScore: thresholds.low_quality_score },
    );
  }

  get eventBus(): EventBus {
    return this.components.eventBus;
  }

  get registry(): ModelRegistry {
    return this.components.registry;
  }

  async generate(input: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationResult> {
    const { eventBus } = this.components;
    const request = this.applyMitigations({ ...input, requestId: input.requestId ?? randomUUID() });

    const attempts: GenerationResult[] = [];
    const unsubscribe = eventBus.on('generation:attempt', (event) => {
      if (event.requestId === request.requestId) {
        attempts.push(event.result);
      }
    });

    const { result, strategy } = await this.execute(request, options).finally(unsubscribe);

    log.info(
      { requestId: request.requestId, model: result.modelName, strategy, success: result.success, latencyMs: result.latencyMs },
      'Generation completed',
    );
    eventBus.emit('generation:completed', {
      requestId: request.requestId,
      strategy,
      result,
      timestamp: new Date(),
    });

    this.components.learningQueue.enqueue('request-learning', () => this.learn(request, result, attempts));
    return result;
  }

  private async execute(
    request: GenerationRequest,
    options: GenerateOptions,
  ): Promise<{ result: GenerationResult; strategy: StrategyType }> {
    const { router, executor, adaptive } = this.components;
    if (options.adaptive === true) {
      const outcome = await adaptive.execute(request);
      return { result: outcome.result, strategy: outcome.decision.strategy };
    }

    const decision = router.route(request);
    const result = await executor.generate({
      ...request,
      modelName: decision.modelName,
      useParallel: decision.mode === 'parallel',
    });
    return { result, strategy: decision.mode };
  }

  /**
   * Request rewrites for active mitigations. Only context truncation is
   * enforced; other mitigations are recorded by the error learning system.
   */
  applyMitigations(request: GenerationRequest): GenerationRequest {
    if (!this.components.errorLearning.hasActiveMitigation('context_too_long')) {
      return request;
    }

    const limit = this.promptCharLimit();
    if (limit === null || request.prompt.length <= limit) {
      return request;
    }

    log.warn(
      { requestId: request.requestId, from: request.prompt.length, to: limit },
      'Truncating prompt under context length mitigation',
    );
    return { ...request, prompt: request.prompt.slice(0, limit) };
  }

  /** Resolves once all queued learning has run */
  async drainLearning(): Promise<void> {
    await this.components.learningQueue.drain();
  }

  getRoutingStats(): RoutingStats {
    return this.components.router.getRoutingStats();
  }

  getAdaptiveStats(): AdaptiveStats {
    return this.components.adaptive.getAdaptiveStats();
  }

  getLearningStats(): LearningStats {
    return this.components.errorLearning.getLearningStats();
  }

  getRecommendations(prompt: string): Recommendations {
    const { router, adaptive, errorLearning } = this.components;
    const analysis = router.analyze({ prompt, useParallel: false, useFastest: false });
    return {
      taskType: analysis.taskType,
      complexity: analysis.complexity,
      strategies: adaptive.getStrategyRecommendations(analysis.taskType),
      prevention: errorLearning.getPreventionRecommendations(prompt, analysis.taskType),
    };
  }

  private learn(request: GenerationRequest, result: GenerationResult, attempts: GenerationResult[]): void {
    const { router, errorLearning } = this.components;
    const { taskType } = router.analyze(request);

    router.learn(request, result, result.score);

    for (const attempt of attempts) {
      if (!attempt.success) {
        errorLearning.analyze({ prompt: request.prompt, modelName: attempt.modelName, response: attempt, taskType });
      }
    }

    if (result.success && result.score !== undefined && result.score < this.lowQualityScore) {
      errorLearning.analyze({
        prompt: request.prompt,
        modelName: result.modelName,
        response: result,
        errorMessage: 'low quality',
        taskType,
      });
    }

    if (result.success && attempts.some((attempt) => !attempt.success)) {
      errorLearning.markRetrySucceeded(request.prompt);
    }
  }

  private promptCharLimit(): number | null {
    const { registry } = this.components;
    let models = registry.getModels('primary');
    if (models.length === 0) {
      models = registry.getModels();
    }
    if (models.length === 0) {
      return null;
    }
    return Math.min(...models.map((model) => model.contextWindow)) * CHARS_PER_TOKEN;
  }
}
