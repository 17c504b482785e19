/**
 * Request Router
 *
 * Classifies a prompt (task type, complexity, requirements), scores the
 * candidate models against their history for that task type and picks a
 * model plus a low-level execution mode. Classification is a pure function
 * of the prompt text and the rule table.
 */

import { createHash } from 'node:crypto';
import type { EventBus } from '../kernel/event-bus.js';
import { TTLCache } from '../utils/cache.js';
import { createLogger } from '../utils/logger.js';
import { NoModelsAvailableError } from './errors.js';
import type { ModelRegistry } from './model-registry.js';
import { PerformanceStore } from './performance-store.js';
import { getDefaultTaskPatterns, type TaskPatternRule } from './rules.js';
import {
  isStructuredRequest,
  type ComplexityLevel,
  type ExecutionMode,
  type GenerationRequest,
  type GenerationResult,
  type ModelDescriptor,
  type PerformanceRecord,
  type RequestAnalysis,
  type RoutingDecision,
  type TaskType,
} from './types.js';

const log = createLogger('router');

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFICATION CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const KEYWORD_WEIGHT = 0.3;
const PATTERN_WEIGHT = 0.4;
const JSON_MARKER_BONUS = 0.5;
const LANGUAGE_BONUS = 0.3;
const MIN_CLASSIFICATION_SCORE = 0.2;

const LANGUAGE_NAMES = ['python', 'javascript', 'java', 'c++'];
const TECHNICAL_TERMS = ['algorithm', 'optimization', 'architecture', 'framework', 'paradigm'];
const CODE_MARKERS = ['def ', 'class ', 'import ', 'function'];
const ACCURACY_KEYWORDS = ['accurate', 'precise', 'correct', 'exact', 'error-free'];
const CREATIVITY_KEYWORDS = ['creative', 'imagine', 'story', 'fiction', 'innovative'];
const STOP_WORDS = new Set(['that', 'this', 'with', 'from', 'they', 'have', 'what', 'where', 'when', 'which']);

const HIGH_ACCURACY_TASKS: ReadonlySet<TaskType> = new Set([
  'code_generation',
  'code_review',
  'math_problem',
  'json_generation',
  'analysis',
]);
const CREATIVE_TASKS: ReadonlySet<TaskType> = new Set(['creative_writing', 'chat_conversation']);

const CONFIDENCE_MARKERS: Partial<Record<TaskType, string[]>> = {
  code_generation: ['def ', 'class ', 'import '],
  json_generation: ['json', 'format', 'schema'],
  math_problem: ['calculate', 'solve', '='],
};

const MAX_MODEL_SCORE = 2.0;
const ANALYSIS_CACHE_SIZE = 1000;
const DEFAULT_HISTORY_SIZE = 100;

// ═══════════════════════════════════════════════════════════════════════════
// PURE CLASSIFIERS (inputs are lower-cased prompts)
// ═══════════════════════════════════════════════════════════════════════════

export function scoreTaskType(prompt: string, rule: TaskPatternRule): number {
  let score = 0;

  const hits = rule.keywords.filter((keyword) => prompt.includes(keyword)).length;
  score += hits * KEYWORD_WEIGHT;

  if (rule.regexes.some((regex) => regex.test(prompt))) {
    score += PATTERN_WEIGHT;
  }

  if (rule.taskType === 'json_generation' && (prompt.includes('json') || prompt.includes('{'))) {
    score += JSON_MARKER_BONUS;
  } else if (rule.taskType === 'code_generation' && LANGUAGE_NAMES.some((lang) => prompt.includes(lang))) {
    score += LANGUAGE_BONUS;
  }

  return score;
}

/** Highest-scoring task type; the earlier rule wins a tie */
export function classifyTaskType(prompt: string, rules: TaskPatternRule[]): TaskType {
  let best: TaskType = 'unknown';
  let bestScore = 0;

  for (const rule of rules) {
    const score = scoreTaskType(prompt, rule);
    if (score > bestScore) {
      bestScore = score;
      best = rule.taskType;
    }
  }

  return bestScore > MIN_CLASSIFICATION_SCORE ? best : 'chat_conversation';
}

export function assessComplexity(prompt: string): ComplexityLevel {
  let score = 0;

  if (prompt.length > 1000) {
    score += 2;
  } else if (prompt.length > 500) {
    score += 1;
  }

  const sentences = prompt.match(/[.!?]+/g)?.length ?? 0;
  if (sentences > 5) score += 1;

  const longWords = prompt.match(/\b\w{8,}\b/g)?.length ?? 0;
  if (longWords > 10) score += 1;

  if (TECHNICAL_TERMS.some((term) => prompt.includes(term))) score += 1;

  if (score >= 3) return 'very_complex';
  if (score >= 2) return 'complex';
  if (score >= 1) return 'moderate';
  return 'simple';
}

export function estimateTokens(prompt: string): number {
  const divisor = CODE_MARKERS.some((marker) => prompt.includes(marker)) ? 3 : 4;
  const tokens = Math.floor(prompt.length / divisor);
  return Math.max(10, Math.min(tokens, 8000));
}

export function extractKeywords(prompt: string, rule: TaskPatternRule | undefined): string[] {
  const keywords = new Set<string>(rule?.keywords ?? []);

  const counts = new Map<string, number>();
  for (const word of prompt.match(/\b\w{4,}\b/g) ?? []) {
    if (!STOP_WORDS.has(word)) {
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }

  // Stable sort keeps first-appearance order among equal counts
  const top = [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, 5);
  for (const [word] of top) {
    keywords.add(word);
  }

  return [...keywords];
}

export function analysisConfidence(prompt: string, taskType: TaskType): number {
  if (taskType === 'unknown') {
    return 0.1;
  }

  let confidence = 0.5;
  const markers = CONFIDENCE_MARKERS[taskType] ?? [];
  if (markers.some((marker) => prompt.includes(marker))) {
    confidence += 0.3;
  }
  if (prompt.trim().length < 10) {
    confidence -= 0.2;
  }

  return Math.max(0, Math.min(1, confidence));
}

/** Low-level mode for the Strategy Executor */
export function determineMode(analysis: RequestAnalysis): ExecutionMode {
  if (analysis.requiresStructuredOutput) return 'parallel';
  if (analysis.complexity === 'very_complex') return 'parallel';
  if (analysis.requiresAccuracy && analysis.confidence > 0.7) return 'parallel';
  return 'single';
}

// ═══════════════════════════════════════════════════════════════════════════
// ROUTER
// ═══════════════════════════════════════════════════════════════════════════

export interface RequestRouterOptions {
  eventBus?: EventBus;
  store?: PerformanceStore;
  patterns?: TaskPatternRule[];
  historySize?: number;
}

export interface RoutingHistoryEntry {
  timestamp: Date;
  taskType: TaskType;
  modelName: string;
  mode: ExecutionMode;
}

export interface RoutingStats {
  modelsTracked: number;
  taskTypesAnalyzed: number;
  performanceRecords: number;
  totalSamples: number;
  analysisCacheSize: number;
  learningEnabled: boolean;
  totalRoutings: number;
  decisionsByModel: Record<string, number>;
  decisionsByTaskType: Record<string, number>;
}

export class RequestRouter {
  private readonly eventBus: EventBus | undefined;
  private readonly store: PerformanceStore;
  private readonly patterns: TaskPatternRule[];
  private readonly analysisCache = new TTLCache<string, RequestAnalysis>({ maxEntries: ANALYSIS_CACHE_SIZE });
  private readonly historySize: number;
  private routingHistory: RoutingHistoryEntry[] = [];
  private learningEnabled = true;

  constructor(
    private readonly registry: ModelRegistry,
    options: RequestRouterOptions = {},
  ) {
    this.eventBus = options.eventBus;
    this.store = options.store ?? new PerformanceStore();
    this.patterns = options.patterns ?? getDefaultTaskPatterns();
    this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
  }

  analyze(request: GenerationRequest): RequestAnalysis {
    const cacheKey = createHash('sha256')
      .update(request.prompt)
      .update('\u0000')
      .update(JSON.stringify(request.responseFormat ?? null))
      .update(request.useFastest ? '\u0000fast' : '\u0000')
      .digest('hex');

    const cached = this.analysisCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const prompt = request.prompt.toLowerCase();
    const taskType = classifyTaskType(prompt, this.patterns);
    const estimatedTokens = estimateTokens(prompt);
    const rule = this.patterns.find((p) => p.taskType === taskType);

    const analysis: RequestAnalysis = {
      taskType,
      complexity: assessComplexity(prompt),
      estimatedTokens,
      requiresAccuracy: HIGH_ACCURACY_TASKS.has(taskType) || ACCURACY_KEYWORDS.some((k) => prompt.includes(k)),
      requiresCreativity: CREATIVE_TASKS.has(taskType) || CREATIVITY_KEYWORDS.some((k) => prompt.includes(k)),
      requiresSpeed: request.useFastest || estimatedTokens < 100,
      requiresStructuredOutput: isStructuredRequest(request) || taskType === 'json_generation',
      keywords: extractKeywords(prompt, rule),
      confidence: analysisConfidence(prompt, taskType),
    };

    this.analysisCache.set(cacheKey, analysis);
    return analysis;
  }

  /**
   * Pick a model and execution mode for the request.
   * @throws NoModelsAvailableError when no model of any role is enabled
   */
  route(request: GenerationRequest): RoutingDecision {
    const analysis = this.analyze(request);

    let candidates = this.registry.getModels('primary');
    if (candidates.length === 0) {
      candidates = this.registry.getModels();
    }
    if (candidates.length === 0) {
      throw new NoModelsAvailableError('routing');
    }

    const ranked = candidates
      .map((model) => ({ model, score: this.scoreModel(model, analysis) }))
      .sort((a, b) => b.score - a.score);

    let chosen = ranked[0];
    if (request.modelName !== undefined) {
      const requested = this.registry.get(request.modelName);
      if (requested?.enabled) {
        chosen = ranked.find((r) => r.model.name === requested.name) ?? { model: requested, score: 0 };
      } else {
        log.warn({ model: request.modelName }, 'Requested model unavailable, routing by score');
      }
    }

    const alternatives = ranked
      .filter((r) => r.model.name !== chosen.model.name)
      .slice(0, 2)
      .map((r) => r.model.name);
    const mode = determineMode(analysis);

    const decision: RoutingDecision = {
      modelName: chosen.model.name,
      mode,
      reasoning: this.buildReasoning(analysis, chosen.model, mode),
      confidence: analysis.confidence,
      alternatives,
    };

    this.routingHistory.push({ timestamp: new Date(), taskType: analysis.taskType, modelName: decision.modelName, mode });
    if (this.routingHistory.length > this.historySize) {
      this.routingHistory = this.routingHistory.slice(-this.historySize);
    }

    log.debug({ model: decision.modelName, score: chosen.score, taskType: analysis.taskType, mode }, 'Request routed');
    this.eventBus?.emit('routing:decided', {
      requestId: request.requestId,
      modelName: decision.modelName,
      mode,
      taskType: analysis.taskType,
      confidence: decision.confidence,
      alternatives,
      timestamp: new Date(),
    });

    return decision;
  }

  /**
   * Fold a completed request into the (model, task type) record.
   */
  learn(request: GenerationRequest, result: GenerationResult, score?: number): void {
    if (!this.learningEnabled) {
      return;
    }

    const { taskType } = this.analyze(request);
    const record = this.store.record(result.modelName, taskType, {
      success: result.success,
      latencyMs: result.latencyMs,
      score,
    });

    log.debug(
      {
        model: result.modelName,
        taskType,
        avgScore: record.avgScore,
        successRate: record.successRate,
        avgLatencyMs: record.avgLatencyMs,
      },
      'Model performance updated',
    );
  }

  scoreModel(model: Readonly<ModelDescriptor>, analysis: RequestAnalysis): number {
    let score = 1.0;

    const performance = this.store.get(model.name, analysis.taskType);
    if (performance && performance.sampleCount > 0) {
      score =
        performance.avgScore * 0.4 +
        performance.successRate * 0.4 +
        (1 / (1 + performance.avgLatencyMs / 1000)) * 0.2;
    }

    const rule = this.patterns.find((p) => p.taskType === analysis.taskType);
    if (rule) {
      if (analysis.requiresAccuracy && rule.accuracyWeight > 0) {
        score += rule.accuracyWeight * 0.3;
      }
      if (analysis.requiresCreativity && rule.creativityWeight > 0) {
        score += rule.creativityWeight * 0.2;
      }
    }
    if (analysis.requiresSpeed) {
      score += (1 / (1 + model.lastResponseTimeMs / 1000)) * 0.2;
    }

    if (analysis.complexity === 'very_complex') {
      score += 0.1;
    } else if (analysis.complexity === 'simple') {
      score += 0.05;
    }

    return Math.min(MAX_MODEL_SCORE, score);
  }

  private buildReasoning(analysis: RequestAnalysis, model: Readonly<ModelDescriptor>, mode: ExecutionMode): string {
    const reasons = [
      `Task classified as ${analysis.taskType}`,
      `Complexity: ${analysis.complexity}`,
      `Selected model: ${model.name}`,
      mode === 'parallel'
        ? 'Using parallel strategy for better quality/reliability'
        : 'Using single model strategy for speed',
    ];
    if (analysis.requiresStructuredOutput) {
      reasons.push('Structured output required (JSON/schema)');
    }
    if (analysis.requiresAccuracy) {
      reasons.push('High accuracy required');
    }
    return reasons.join('; ');
  }

  getPerformance(modelName: string, taskType: TaskType): Readonly<PerformanceRecord> | undefined {
    return this.store.get(modelName, taskType);
  }

  getRoutingHistory(limit: number = 20): RoutingHistoryEntry[] {
    return this.routingHistory.slice(-limit);
  }

  getRoutingStats(): RoutingStats {
    const decisionsByModel: Record<string, number> = {};
    const decisionsByTaskType: Record<string, number> = {};
    for (const entry of this.routingHistory) {
      decisionsByModel[entry.modelName] = (decisionsByModel[entry.modelName] ?? 0) + 1;
      decisionsByTaskType[entry.taskType] = (decisionsByTaskType[entry.taskType] ?? 0) + 1;
    }

    return {
      modelsTracked: this.store.subjectCount(),
      taskTypesAnalyzed: this.store.taskTypes().size,
      performanceRecords: this.store.size,
      totalSamples: this.store.totalSamples(),
      analysisCacheSize: this.analysisCache.size,
      learningEnabled: this.learningEnabled,
      totalRoutings: this.routingHistory.length,
      decisionsByModel,
      decisionsByTaskType,
    };
  }

  resetLearningData(): void {
    this.store.clear();
    this.analysisCache.clear();
    this.routingHistory = [];
    log.info('Routing learning data reset');
  }

  setLearningEnabled(enabled: boolean): void {
    this.learningEnabled = enabled;
    log.info({ enabled }, 'Routing learning toggled');
  }
}
