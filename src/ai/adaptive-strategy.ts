/**
 * Adaptive Strategy Manager
 *
 * Chooses one of five strategy types per request from the task type's rule
 * table and the (strategy, task type) performance history, runs it, and
 * learns from the outcome in the background. Single, parallel and fallback
 * delegate to the Strategy Executor; consensus and iterative are built on
 * its per-attempt and evaluation primitives.
 */

import { createHash } from 'node:crypto';
import type { EventBus } from '../kernel/event-bus.js';
import { TTLCache } from '../utils/cache.js';
import { createLogger } from '../utils/logger.js';
import { UnknownStrategyError } from './errors.js';
import { LearningQueue } from './learning-queue.js';
import type { ModelRegistry } from './model-registry.js';
import { PerformanceStore, type PerformanceEntry } from './performance-store.js';
import type { RequestRouter } from './request-router.js';
import type { StrategyExecutor } from './strategy-executor.js';
import {
  StrategyTypeSchema,
  type AdaptationContext,
  type AdaptationTrigger,
  type ComplexityLevel,
  type ExpectedMetrics,
  type GenerationRequest,
  type GenerationResult,
  type PerformanceRecord,
  type RequestAnalysis,
  type StrategyDecision,
  type StrategyType,
  type TaskType,
} from './types.js';

const log = createLogger('adaptive-strategy');

// ═══════════════════════════════════════════════════════════════════════════
// STRATEGY RULES
// ═══════════════════════════════════════════════════════════════════════════

export interface StrategyRule {
  /** Ranked; the first entry is the default choice */
  preferred: StrategyType[];
  /** Where consensus goes when every consensus call fails */
  fallback: Exclude<StrategyType, 'consensus'>;
  successThreshold: number;
  qualityThreshold: number;
  parallelForComplexity?: ComplexityLevel;
  parallelForAccuracy?: boolean;
  parallelForStructured?: boolean;
}

export type StrategyRuleTable = Readonly<Partial<Record<TaskType, StrategyRule>>>;

export const STRATEGY_RULES: StrategyRuleTable = {
  code_generation: {
    preferred: ['single', 'parallel'],
    fallback: 'fallback',
    successThreshold: 0.8,
    qualityThreshold: 3.5,
    parallelForComplexity: 'complex',
  },
  code_review: {
    preferred: ['parallel', 'consensus'],
    fallback: 'fallback',
    successThreshold: 0.85,
    qualityThreshold: 3.8,
    parallelForAccuracy: true,
  },
  analysis: {
    preferred: ['parallel', 'consensus'],
    fallback: 'fallback',
    successThreshold: 0.75,
    qualityThreshold: 3.2,
    parallelForComplexity: 'moderate',
  },
  question_answering: {
    preferred: ['single', 'parallel'],
    fallback: 'fallback',
    successThreshold: 0.8,
    qualityThreshold: 3.0,
    parallelForAccuracy: false,
  },
  json_generation: {
    preferred: ['parallel', 'iterative'],
    fallback: 'fallback',
    successThreshold: 0.9,
    qualityThreshold: 3.5,
    parallelForStructured: true,
  },
  creative_writing: {
    preferred: ['single', 'parallel'],
    fallback: 'fallback',
    successThreshold: 0.7,
    qualityThreshold: 3.2,
  },
  math_problem: {
    preferred: ['parallel', 'iterative'],
    fallback: 'fallback',
    successThreshold: 0.85,
    qualityThreshold: 3.8,
    parallelForAccuracy: true,
  },
  summarization: {
    preferred: ['single', 'parallel'],
    fallback: 'fallback',
    successThreshold: 0.75,
    qualityThreshold: 3.0,
  },
  translation: {
    preferred: ['single', 'parallel'],
    fallback: 'fallback',
    successThreshold: 0.8,
    qualityThreshold: 3.2,
  },
  logical_reasoning: {
    preferred: ['parallel', 'consensus'],
    fallback: 'fallback',
    successThreshold: 0.85,
    qualityThreshold: 3.6,
    parallelForAccuracy: true,
  },
  technical_writing: {
    preferred: ['single', 'iterative'],
    fallback: 'fallback',
    successThreshold: 0.8,
    qualityThreshold: 3.4,
    parallelForComplexity: 'complex',
  },
  chat_conversation: {
    preferred: ['single', 'fallback'],
    fallback: 'fallback',
    successThreshold: 0.7,
    qualityThreshold: 3.0,
  },
};

const DEFAULT_RULE_TASK: TaskType = 'question_answering';

export function getStrategyRule(taskType: TaskType, rules: StrategyRuleTable = STRATEGY_RULES): StrategyRule {
  const rule = rules[taskType] ?? rules[DEFAULT_RULE_TASK];
  return rule ?? { preferred: ['single'], fallback: 'fallback', successThreshold: 0.8, qualityThreshold: 3.0 };
}

export const DEFAULT_EXPECTED_METRICS: Readonly<Record<StrategyType, ExpectedMetrics>> = {
  single: { score: 3.2, latencyMs: 8_000, successRate: 0.8 },
  parallel: { score: 3.6, latencyMs: 15_000, successRate: 0.85 },
  consensus: { score: 3.8, latencyMs: 20_000, successRate: 0.9 },
  fallback: { score: 2.8, latencyMs: 25_000, successRate: 0.95 },
  iterative: { score: 3.9, latencyMs: 30_000, successRate: 0.88 },
};

const CONSENSUS_MODELS = 3;
const MAX_IMPROVEMENT_ROUNDS = 2;
const MIN_HISTORICAL_SAMPLES = 3;

export function buildImprovementPrompt(originalPrompt: string, currentContent: string): string {
  return `Please improve the following response to make it better:

Original request: ${originalPrompt}

Current response: ${currentContent}

Provide an improved version that is more accurate, comprehensive, and well-structured.`;
}

// ═══════════════════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════════════════

/** Weighting used to find the current best strategy when checking triggers */
export function triggerWeight(record: Readonly<PerformanceRecord>): number {
  return record.successRate * 0.4 + record.avgScore * 0.4 + (1 / (1 + record.avgLatencyMs / 1000)) * 0.2;
}

/** Normalised weighting used to pick the historical best strategy */
export function historicalWeight(record: Readonly<PerformanceRecord>): number {
  return (
    record.successRate * 0.4 +
    (record.avgScore / 5) * 0.4 +
    (1 / (1 + record.avgLatencyMs / 1000 / 10)) * 0.2
  );
}

export function decisionConfidence(record: Readonly<PerformanceRecord> | undefined): number {
  if (!record || record.sampleCount < MIN_HISTORICAL_SAMPLES) {
    return 0.5;
  }
  const sampleConfidence = Math.min(1, record.sampleCount / 20);
  const qualityConfidence = record.avgScore / 5;
  const stabilityConfidence = Math.min(1, record.successRate * 1.2);
  return sampleConfidence * 0.4 + qualityConfidence * 0.4 + stabilityConfidence * 0.2;
}

function isComplex(complexity: ComplexityLevel): boolean {
  return complexity === 'complex' || complexity === 'very_complex';
}

/**
 * Rule-based choice for when no adaptation trigger holds.
 */
export function selectStrategyByRules(
  request: GenerationRequest,
  analysis: RequestAnalysis,
  rule: StrategyRule,
): StrategyType {
  const escalate =
    request.useParallel ||
    analysis.requiresStructuredOutput ||
    rule.parallelForStructured === true ||
    (analysis.requiresAccuracy && rule.parallelForAccuracy === true) ||
    (isComplex(analysis.complexity) &&
      (rule.parallelForComplexity === 'complex' || rule.parallelForComplexity === 'moderate')) ||
    (!analysis.requiresSpeed && rule.successThreshold > 0.8);

  if (escalate) {
    return rule.preferred.includes('consensus') ? 'consensus' : 'parallel';
  }
  if (analysis.complexity === 'simple' && analysis.requiresSpeed) {
    return 'single';
  }
  return rule.preferred[0] ?? 'single';
}

// ═══════════════════════════════════════════════════════════════════════════
// MANAGER
// ═══════════════════════════════════════════════════════════════════════════

export interface AdaptiveThresholds {
  minSuccessRate: number;
  minAvgScore: number;
  maxAvgLatencyMs: number;
  minSamplesForAdaptation: number;
  adaptationCooldownMs: number;
  decisionCacheTtlMs: number;
  decisionCacheSize: number;
}

export const DEFAULT_ADAPTIVE_THRESHOLDS: Readonly<AdaptiveThresholds> = {
  minSuccessRate: 0.7,
  minAvgScore: 3.0,
  maxAvgLatencyMs: 30_000,
  minSamplesForAdaptation: 5,
  adaptationCooldownMs: 300_000,
  decisionCacheTtlMs: 600_000,
  decisionCacheSize: 200,
};

export interface AdaptiveStrategyOptions {
  eventBus?: EventBus;
  store?: PerformanceStore<StrategyType>;
  learningQueue?: LearningQueue;
  thresholds?: Partial<AdaptiveThresholds>;
  rules?: StrategyRuleTable;
}

export interface AdaptiveOutcome {
  result: GenerationResult;
  decision: StrategyDecision;
  taskType: TaskType;
  cached: boolean;
}

export interface TriggerCheck {
  trigger: AdaptationTrigger;
  strategy: StrategyType;
  record: Readonly<PerformanceRecord>;
}

export interface StrategyRecommendation {
  strategy: StrategyType;
  weightedScore: number;
  avgScore: number;
  successRate: number;
  avgLatencyMs: number;
  sampleCount: number;
  confidence: number;
  /** Success rate and score both reach the task rule's minimums */
  meetsRule: boolean;
}

export interface TaskStrategyStats {
  strategiesCount: number;
  totalSamples: number;
  bestStrategy: StrategyType;
  bestScore: number;
  bestSuccessRate: number;
}

export interface AdaptiveStats {
  totalStrategiesTracked: number;
  totalSamples: number;
  tasksTracked: number;
  cacheSize: number;
  activeAdaptations: number;
  lastAdaptation: string | null;
  taskStatistics: Record<string, TaskStrategyStats>;
}

export class AdaptiveStrategyManager {
  private readonly eventBus: EventBus | undefined;
  private readonly store: PerformanceStore<StrategyType>;
  private readonly learningQueue: LearningQueue;
  private readonly thresholds: AdaptiveThresholds;
  private readonly rules: StrategyRuleTable;
  private readonly decisionCache: TTLCache<string, StrategyDecision>;
  private readonly activeAdaptations = new Map<TaskType, AdaptationContext>();
  /** Cooldown is tracked per task type */
  private readonly lastAdaptationAt = new Map<TaskType, number>();

  constructor(
    private readonly router: RequestRouter,
    private readonly executor: StrategyExecutor,
    private readonly registry: ModelRegistry,
    options: AdaptiveStrategyOptions = {},
  ) {
    this.eventBus = options.eventBus;
    this.store = options.store ?? new PerformanceStore<StrategyType>();
    this.learningQueue = options.learningQueue ?? new LearningQueue(options.eventBus);
    this.thresholds = { ...DEFAULT_ADAPTIVE_THRESHOLDS, ...options.thresholds };
    this.rules = options.rules ?? STRATEGY_RULES;
    this.decisionCache = new TTLCache({
      defaultTtlMs: this.thresholds.decisionCacheTtlMs,
      maxEntries: this.thresholds.decisionCacheSize,
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const outcome = await this.execute(request);
    return outcome.result;
  }

  /**
   * Decide, run and schedule learning. The result is returned before any
   * learning work runs.
   */
  async execute(request: GenerationRequest): Promise<AdaptiveOutcome> {
    const analysis = this.router.analyze(request);
    const cacheKey = this.cacheKey(request, analysis);

    const cachedDecision = this.decisionCache.get(cacheKey);
    const decision = cachedDecision ?? this.decide(request, analysis);
    if (!cachedDecision) {
      this.decisionCache.set(cacheKey, decision);
    }

    log.info(
      { taskType: analysis.taskType, strategy: decision.strategy, cached: cachedDecision !== undefined },
      'Strategy selected',
    );
    this.eventBus?.emit('strategy:selected', {
      requestId: request.requestId,
      taskType: analysis.taskType,
      strategy: decision.strategy,
      confidence: decision.confidence,
      reasoning: decision.reasoning,
      cached: cachedDecision !== undefined,
      timestamp: new Date(),
    });

    const startTime = Date.now();
    const result = await this.runStrategy(decision.strategy, request);
    const elapsedMs = Date.now() - startTime;

    this.learningQueue.enqueue(`strategy-learning:${analysis.taskType}`, () =>
      this.learnFromResult(request, analysis.taskType, decision.strategy, result, elapsedMs),
    );

    return { result, decision, taskType: analysis.taskType, cached: cachedDecision !== undefined };
  }

  /**
   * Pick a strategy for an analysed request without running it.
   */
  decide(request: GenerationRequest, analysis: RequestAnalysis): StrategyDecision {
    const rule = getStrategyRule(analysis.taskType, this.rules);
    const history = this.store.forTaskType(analysis.taskType);
    const check = this.checkTriggers(analysis.taskType);

    let strategy: StrategyType;
    let reasoning: string;
    if (check) {
      strategy = this.selectHistoricalBest(history, rule);
      reasoning = `Adaptation triggered by ${check.trigger}, using historical best: ${strategy}`;
    } else {
      strategy = selectStrategyByRules(request, analysis, rule);
      reasoning = `Selected ${strategy} based on task rules`;
    }

    const record = this.store.get(strategy, analysis.taskType);
    const expected: ExpectedMetrics =
      record && record.sampleCount > 0
        ? { score: record.avgScore, latencyMs: record.avgLatencyMs, successRate: record.successRate }
        : DEFAULT_EXPECTED_METRICS[strategy];

    return {
      strategy,
      confidence: decisionConfidence(record),
      reasoning,
      expected,
      alternatives: rule.preferred.filter((s) => s !== strategy).slice(0, 2),
      createdAt: Date.now(),
    };
  }

  /**
   * Run a named strategy.
   * @throws UnknownStrategyError when the name is not a strategy type
   */
  async executeStrategy(strategy: string, request: GenerationRequest): Promise<GenerationResult> {
    const parsed = StrategyTypeSchema.safeParse(strategy);
    if (!parsed.success) {
      throw new UnknownStrategyError(strategy);
    }
    return this.runStrategy(parsed.data, request);
  }

  /**
   * Current trigger for a task type, judged on its best strategy among
   * those with enough samples.
   */
  checkTriggers(taskType: TaskType): TriggerCheck | null {
    const candidates = this.store
      .forTaskType(taskType)
      .filter((entry) => entry.record.sampleCount >= this.thresholds.minSamplesForAdaptation);
    if (candidates.length === 0) {
      return null;
    }

    let best = candidates[0];
    for (const entry of candidates.slice(1)) {
      if (triggerWeight(entry.record) > triggerWeight(best.record)) {
        best = entry;
      }
    }

    const { record } = best;
    let trigger: AdaptationTrigger | null = null;
    if (record.successRate < this.thresholds.minSuccessRate) {
      trigger = 'low_success_rate';
    } else if (record.avgScore < this.thresholds.minAvgScore) {
      trigger = 'low_quality';
    } else if (record.avgLatencyMs > this.thresholds.maxAvgLatencyMs) {
      trigger = 'high_latency';
    }

    return trigger ? { trigger, strategy: best.subject, record } : null;
  }

  /**
   * Fold one outcome into the (strategy, task type) record and record an
   * adaptation when a trigger holds outside the cooldown.
   */
  async learnFromResult(
    request: GenerationRequest,
    taskType: TaskType,
    strategy: StrategyType,
    result: GenerationResult,
    latencyMs: number = result.latencyMs,
  ): Promise<void> {
    let score = result.score;
    if (score === undefined && result.success && result.content.trim().length > 0) {
      score = await this.executor.evaluate(request.prompt, result);
    }

    const record = this.store.record(strategy, taskType, { success: result.success, latencyMs, score });
    log.debug(
      {
        strategy,
        taskType,
        avgScore: record.avgScore,
        successRate: record.successRate,
        avgLatencyMs: record.avgLatencyMs,
      },
      'Strategy performance updated',
    );

    const check = this.checkTriggers(taskType);
    if (!check) {
      return;
    }

    const now = Date.now();
    const last = this.lastAdaptationAt.get(taskType);
    if (last !== undefined && now - last < this.thresholds.adaptationCooldownMs) {
      log.debug({ taskType, trigger: check.trigger }, 'Adaptation suppressed by cooldown');
      return;
    }

    const context: AdaptationContext = {
      taskType,
      trigger: check.trigger,
      previousStrategy: strategy,
      metrics: {
        successRate: check.record.successRate,
        avgScore: check.record.avgScore,
        avgLatencyMs: check.record.avgLatencyMs,
        sampleCount: check.record.sampleCount,
      },
      timestamp: now,
    };
    this.lastAdaptationAt.set(taskType, now);
    this.activeAdaptations.set(taskType, context);
    this.decisionCache.clear();

    log.info({ taskType, trigger: check.trigger }, 'Adaptation triggered');
    this.eventBus?.emit('strategy:adapted', context);
  }

  getActiveAdaptation(taskType: TaskType): Readonly<AdaptationContext> | undefined {
    return this.activeAdaptations.get(taskType);
  }

  getPerformance(strategy: StrategyType, taskType: TaskType): Readonly<PerformanceRecord> | undefined {
    return this.store.get(strategy, taskType);
  }

  getStrategyRecommendations(taskType: TaskType): StrategyRecommendation[] {
    const rule = getStrategyRule(taskType, this.rules);
    return this.store
      .forTaskType(taskType)
      .filter((entry) => entry.record.sampleCount >= MIN_HISTORICAL_SAMPLES)
      .map(({ subject, record }) => ({
        strategy: subject,
        weightedScore: historicalWeight(record),
        avgScore: record.avgScore,
        successRate: record.successRate,
        avgLatencyMs: record.avgLatencyMs,
        sampleCount: record.sampleCount,
        confidence: Math.min(1, record.sampleCount / 10),
        meetsRule: record.successRate >= rule.successThreshold && record.avgScore >= rule.qualityThreshold,
      }))
      .sort((a, b) => b.weightedScore - a.weightedScore);
  }

  getAdaptiveStats(): AdaptiveStats {
    const lastAdaptationAt = this.lastAdaptationAt.size > 0 ? Math.max(...this.lastAdaptationAt.values()) : null;
    const taskStatistics: Record<string, TaskStrategyStats> = {};
    for (const taskType of this.store.taskTypes()) {
      const entries = this.store.forTaskType(taskType);
      let best = entries[0];
      for (const entry of entries.slice(1)) {
        if (entry.record.avgScore > best.record.avgScore) {
          best = entry;
        }
      }
      taskStatistics[taskType] = {
        strategiesCount: entries.length,
        totalSamples: entries.reduce((sum, entry) => sum + entry.record.sampleCount, 0),
        bestStrategy: best.subject,
        bestScore: best.record.avgScore,
        bestSuccessRate: best.record.successRate,
      };
    }

    return {
      totalStrategiesTracked: this.store.size,
      totalSamples: this.store.totalSamples(),
      tasksTracked: this.store.taskTypes().size,
      cacheSize: this.decisionCache.size,
      activeAdaptations: this.activeAdaptations.size,
      lastAdaptation: lastAdaptationAt === null ? null : new Date(lastAdaptationAt).toISOString(),
      taskStatistics,
    };
  }

  resetAdaptiveLearning(): void {
    this.store.clear();
    this.decisionCache.clear();
    this.activeAdaptations.clear();
    this.lastAdaptationAt.clear();
    log.info('Adaptive learning data reset');
  }

  // ── Strategy execution ─────────────────────────────────────────────────

  private async runStrategy(strategy: StrategyType, request: GenerationRequest): Promise<GenerationResult> {
    switch (strategy) {
      case 'single':
        return this.executor.generate({ ...request, useParallel: false });
      case 'parallel':
        return this.executor.generate({ ...request, useParallel: true });
      case 'fallback':
        return this.executor.generateSingle({ ...request, modelName: undefined, useFastest: false });
      case 'consensus':
        return this.runConsensus(request);
      case 'iterative':
        return this.runIterative(request);
    }
  }

  private async runConsensus(request: GenerationRequest): Promise<GenerationResult> {
    const primaries = this.registry.getModels('primary');
    if (primaries.length < CONSENSUS_MODELS) {
      log.warn({ available: primaries.length }, 'Not enough primary models for consensus, using parallel');
      return this.runStrategy('parallel', request);
    }

    const responses: GenerationResult[] = [];
    for (const model of primaries.slice(0, CONSENSUS_MODELS)) {
      const result = await this.executor.attempt(model, request);
      if (result.success) {
        responses.push(result);
      }
    }

    if (responses.length === 0) {
      const { fallback } = getStrategyRule(this.router.analyze(request).taskType, this.rules);
      log.warn({ fallback }, 'No consensus response succeeded, using rule fallback');
      return this.runStrategy(fallback, request);
    }
    if (responses.length === 1) {
      return responses[0];
    }
    return this.executor.selectBest(request.prompt, responses);
  }

  private async runIterative(request: GenerationRequest): Promise<GenerationResult> {
    let current = await this.executor.generateSingle({ ...request, useParallel: false });
    if (!current.success) {
      return current;
    }

    for (let round = 1; round <= MAX_IMPROVEMENT_ROUNDS; round++) {
      const candidate = await this.executor.generateSingle({
        ...request,
        prompt: buildImprovementPrompt(request.prompt, current.content),
        useParallel: false,
      });
      if (!candidate.success) {
        break;
      }

      const currentScore = await this.executor.evaluate(request.prompt, current);
      const candidateScore = await this.executor.evaluate(request.prompt, candidate);
      current = { ...current, score: currentScore };
      if (candidateScore > currentScore) {
        log.debug({ round, from: currentScore, to: candidateScore }, 'Iteration improved response');
        current = { ...candidate, score: candidateScore };
      } else {
        log.debug({ round, from: currentScore, to: candidateScore }, 'Iteration did not improve, stopping');
        break;
      }
    }

    return current;
  }

  // ── Helpers ────────────────────────────────────────────────────────────

  private selectHistoricalBest(history: PerformanceEntry<StrategyType>[], rule: StrategyRule): StrategyType {
    let best: StrategyType | null = null;
    let bestWeight = Number.NEGATIVE_INFINITY;
    for (const { subject, record } of history) {
      if (record.sampleCount < MIN_HISTORICAL_SAMPLES || !rule.preferred.includes(subject)) {
        continue;
      }
      const weight = historicalWeight(record);
      if (weight > bestWeight) {
        bestWeight = weight;
        best = subject;
      }
    }
    return best ?? rule.preferred[0] ?? 'single';
  }

  /** Covers every request flag the rule heuristics read */
  private cacheKey(request: GenerationRequest, analysis: RequestAnalysis): string {
    const promptHash = createHash('sha256').update(request.prompt).digest('hex').slice(0, 16);
    const flags = [
      request.useParallel ? 'parallel' : '-',
      request.useFastest ? 'fastest' : '-',
      request.responseFormat?.type ?? 'text',
    ].join(',');
    return `${promptHash}:${analysis.taskType}:${analysis.complexity}:${flags}`;
  }
}
