/**
 * Error Learning System
 *
 * Classifies failed or low-quality generations against the error rule
 * table, keeps a rolling error history with per-pattern statistics, applies
 * mitigations once a pattern recurs, and distils recent history into
 * learning insights.
 */

import type { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../utils/logger.js';
import type { ModelRegistry } from './model-registry.js';
import { getDefaultErrorRules, type ErrorRule } from './rules.js';
import type {
  ErrorAnalysis,
  ErrorPattern,
  ErrorPatternStats,
  ErrorRecord,
  ErrorType,
  GenerationResult,
  InsightCategory,
  LearningInsight,
  TaskType,
} from './types.js';

const log = createLogger('error-learning');

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const HOUR_MS = 60 * 60 * 1000;

const MAX_HISTORY = 1000;
const MAX_INSIGHTS = 50;
const MIN_ERRORS_FOR_PATTERN = 3;
const MODEL_DISABLE_ERROR_COUNT = 5;
const MODEL_DISABLE_SEVERITY = 0.6;
const INSIGHT_MIN_HISTORY = 10;
const INSIGHT_MIN_RECENT = 5;
const INSIGHT_MIN_COUNT = 3;
const RECENT_WINDOW_MS = 24 * HOUR_MS;
const INSIGHT_DUPLICATE_WINDOW_MS = 6 * HOUR_MS;
const SLOW_RESPONSE_MS = 30_000;
const MIN_MATCH_SCORE = 0.3;
const LONG_PROMPT_CHARS = 10_000;

const SENSITIVE_KEYWORDS = ['hack', 'exploit', 'illegal', 'forbidden', 'restricted'];

/** Checked in order; only the first phrase found in both the text and the rule key counts */
const PHRASE_BONUSES: ReadonlyArray<readonly [string, number]> = [
  ['timeout', 0.9],
  ['rate limit', 0.9],
  ['json', 0.7],
  ['network', 0.7],
];

const SUGGESTED_FIXES: Partial<Record<ErrorType, string>> = {
  rate_limit_error: 'Reduce request frequency or switch to alternative model',
  timeout_error: 'Reduce context length or use faster model',
  content_policy_error: 'Filter sensitive content or use alternative model',
  invalid_response: 'Validate response format and retry',
  low_quality: 'Use parallel generation or improve prompts',
};
const GENERIC_FIX = 'Apply general error mitigation strategies';

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

export interface ErrorContext {
  prompt: string;
  modelName: string;
  response?: GenerationResult;
  errorMessage?: string;
  taskType?: TaskType;
}

export function collectErrorText(errorMessage: string | undefined, response: GenerationResult | undefined): string {
  const parts: string[] = [];
  if (errorMessage) parts.push(errorMessage);
  if (response?.error) parts.push(response.error);
  if (response?.content) parts.push(response.content);
  return parts.join(' ').toLowerCase();
}

export function scoreErrorRule(text: string, rule: ErrorRule, response?: GenerationResult): number {
  let score = 0;

  if (text.includes(rule.key)) {
    score += 0.8;
  }

  const phrase = PHRASE_BONUSES.find(([word]) => text.includes(word) && rule.key.includes(word));
  if (phrase) {
    score += phrase[1];
  }

  if (response) {
    if (!response.success && rule.errorType === 'api_error') {
      score += 0.3;
    } else if (response.latencyMs > SLOW_RESPONSE_MS && rule.errorType === 'timeout_error') {
      score += 0.4;
    }
  }

  return score;
}

/**
 * Best-matching rule for the error text, or the generic invalid-response
 * analysis when nothing scores above the threshold.
 */
export function classifyError(
  rules: ErrorRule[],
  errorMessage: string | undefined,
  response: GenerationResult | undefined,
): ErrorAnalysis {
  const text = collectErrorText(errorMessage, response);

  let best: ErrorRule | null = null;
  let bestScore = 0;
  for (const rule of rules) {
    const score = scoreErrorRule(text, rule, response);
    if (score > bestScore) {
      best = rule;
      bestScore = score;
    }
  }

  if (best && bestScore > MIN_MATCH_SCORE) {
    return {
      errorType: best.errorType,
      pattern: best.pattern,
      severity: best.severity,
      confidence: bestScore,
      suggestedFix: SUGGESTED_FIXES[best.errorType] ?? GENERIC_FIX,
      preventionMeasures: [...best.prevention],
    };
  }

  return {
    errorType: 'invalid_response',
    severity: 0.5,
    confidence: 0.3,
    suggestedFix: 'Investigate manually',
    preventionMeasures: [],
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// SYSTEM
// ═══════════════════════════════════════════════════════════════════════════

export interface ActiveMitigation {
  key: string;
  pattern: ErrorPattern;
  startedAt: number;
  affectedModels: string[];
  affectedTaskTypes: TaskType[];
  severity: number;
  actions: string[];
}

export interface PatternSummary {
  occurrences: number;
  affectedModels: string[];
  affectedTaskTypes: TaskType[];
  avgSeverity: number;
  lastOccurrence: string;
  mitigationAttempts: number;
  mitigationSuccesses: number;
}

export interface LearningStats {
  totalErrorsAnalyzed: number;
  recentErrors24h: number;
  errorPatternsDetected: number;
  activeMitigations: number;
  learningInsightsGenerated: number;
  autoLearningEnabled: boolean;
  patternStatistics: Record<string, PatternSummary>;
  recentInsights: LearningInsight[];
  /** Share of mitigation attempts followed by a successful retry, per mitigation */
  mitigationEffectiveness: Record<string, number>;
}

export interface ErrorLearningOptions {
  eventBus?: EventBus;
  rules?: ErrorRule[];
}

function mitigationKey(pattern: ErrorPattern): string {
  return `${pattern}_auto_mitigation`;
}

function topEntry<K>(counts: Map<K, number>): [K, number] | null {
  let top: [K, number] | null = null;
  for (const entry of counts) {
    if (top === null || entry[1] > top[1]) {
      top = entry;
    }
  }
  return top;
}

function increment<K>(counts: Map<K, number>, key: K): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export class ErrorLearningSystem {
  private readonly eventBus: EventBus | undefined;
  private readonly rules: ErrorRule[];
  private history: ErrorRecord[] = [];
  private readonly patterns = new Map<ErrorPattern, ErrorPatternStats>();
  private readonly mitigations = new Map<string, ActiveMitigation>();
  private insights: LearningInsight[] = [];
  private autoLearning = true;

  constructor(
    private readonly registry: ModelRegistry,
    options: ErrorLearningOptions = {},
  ) {
    this.eventBus = options.eventBus;
    this.rules = options.rules ?? getDefaultErrorRules();
  }

  /**
   * Classify one error and learn from it. Returns null while automatic
   * learning is off.
   */
  analyze(context: ErrorContext): ErrorAnalysis | null {
    if (!this.autoLearning) {
      return null;
    }

    const taskType = context.taskType ?? 'unknown';
    const analysis = classifyError(this.rules, context.errorMessage, context.response);
    const record: ErrorRecord = {
      timestamp: Date.now(),
      prompt: context.prompt,
      modelName: context.modelName,
      response: context.response,
      analysis,
      taskType,
      retrySucceeded: false,
    };

    this.history.push(record);
    if (this.history.length > MAX_HISTORY) {
      this.history = this.history.slice(-MAX_HISTORY);
    }

    if (analysis.pattern) {
      const stats = this.updatePatternStats(analysis.pattern, record);
      this.applyMitigation(analysis.pattern, stats, record);
    }

    this.generateInsights();

    log.debug(
      { model: context.modelName, taskType, errorType: analysis.errorType, pattern: analysis.pattern ?? 'none' },
      'Error analyzed',
    );
    this.eventBus?.emit('error:analyzed', {
      modelName: context.modelName,
      taskType,
      analysis,
      timestamp: new Date(),
    });

    return analysis;
  }

  /**
   * Flag the latest error for this prompt as recovered by a retry.
   */
  markRetrySucceeded(prompt: string): boolean {
    for (let i = this.history.length - 1; i >= 0; i--) {
      const record = this.history[i];
      if (record.prompt !== prompt) continue;
      if (record.retrySucceeded) return false;

      record.retrySucceeded = true;
      const { pattern } = record.analysis;
      if (pattern && this.mitigations.has(mitigationKey(pattern))) {
        const stats = this.patterns.get(pattern);
        if (stats) stats.mitigationSuccesses++;
      }
      return true;
    }
    return false;
  }

  getPreventionRecommendations(prompt: string, taskType: TaskType = 'unknown'): string[] {
    const recommendations: string[] = [];
    const lower = prompt.toLowerCase();

    if (SENSITIVE_KEYWORDS.some((keyword) => lower.includes(keyword))) {
      recommendations.push('Request may contain sensitive content - consider content filtering');
    }
    if (prompt.length > LONG_PROMPT_CHARS) {
      recommendations.push('Request is very long - consider splitting or truncating');
    }

    const errorTypes = new Map<ErrorType, number>();
    for (const record of this.recentErrors()) {
      if (record.taskType === taskType) {
        increment(errorTypes, record.analysis.errorType);
      }
    }
    const top = topEntry(errorTypes);
    if (top) {
      switch (top[0]) {
        case 'timeout_error':
          recommendations.push('Similar requests have timed out - consider using faster models');
          break;
        case 'invalid_response':
          recommendations.push('Similar requests produced invalid responses - consider validation');
          break;
        case 'low_quality':
          recommendations.push('Similar requests had low quality - consider parallel generation');
          break;
        default:
          break;
      }
    }

    return recommendations;
  }

  hasActiveMitigation(pattern: ErrorPattern): boolean {
    return this.mitigations.has(mitigationKey(pattern));
  }

  getActiveMitigations(): Readonly<ActiveMitigation>[] {
    return [...this.mitigations.values()];
  }

  getPatternStats(pattern: ErrorPattern): Readonly<ErrorPatternStats> | undefined {
    return this.patterns.get(pattern);
  }

  getHistory(): readonly Readonly<ErrorRecord>[] {
    return this.history;
  }

  getInsights(): readonly Readonly<LearningInsight>[] {
    return this.insights;
  }

  getLearningStats(): LearningStats {
    const patternStatistics: Record<string, PatternSummary> = {};
    for (const [pattern, stats] of this.patterns) {
      patternStatistics[pattern] = {
        occurrences: stats.occurrences,
        affectedModels: [...stats.affectedModels],
        affectedTaskTypes: [...stats.affectedTaskTypes],
        avgSeverity: stats.avgSeverity,
        lastOccurrence: new Date(stats.lastOccurrence).toISOString(),
        mitigationAttempts: stats.mitigationAttempts,
        mitigationSuccesses: stats.mitigationSuccesses,
      };
    }

    const mitigationEffectiveness: Record<string, number> = {};
    for (const mitigation of this.mitigations.values()) {
      const stats = this.patterns.get(mitigation.pattern);
      mitigationEffectiveness[mitigation.key] =
        stats && stats.mitigationAttempts > 0 ? stats.mitigationSuccesses / stats.mitigationAttempts : 0;
    }

    return {
      totalErrorsAnalyzed: this.history.length,
      recentErrors24h: this.recentErrors().length,
      errorPatternsDetected: this.patterns.size,
      activeMitigations: this.mitigations.size,
      learningInsightsGenerated: this.insights.length,
      autoLearningEnabled: this.autoLearning,
      patternStatistics,
      recentInsights: this.insights.slice(-10),
      mitigationEffectiveness,
    };
  }

  setAutoLearning(enabled: boolean): void {
    this.autoLearning = enabled;
    log.info({ enabled }, 'Automatic error learning toggled');
  }

  reset(): void {
    this.history = [];
    this.patterns.clear();
    this.mitigations.clear();
    this.insights = [];
    log.info('Error learning data reset');
  }

  // ── Pattern statistics & mitigation ────────────────────────────────────

  private updatePatternStats(pattern: ErrorPattern, record: ErrorRecord): ErrorPatternStats {
    let stats = this.patterns.get(pattern);
    if (!stats) {
      stats = {
        pattern,
        occurrences: 0,
        affectedModels: new Set(),
        affectedTaskTypes: new Set(),
        avgSeverity: 0,
        lastOccurrence: 0,
        mitigationAttempts: 0,
        mitigationSuccesses: 0,
      };
      this.patterns.set(pattern, stats);
    }

    stats.occurrences++;
    stats.affectedModels.add(record.modelName);
    stats.affectedTaskTypes.add(record.taskType);
    stats.avgSeverity = (stats.avgSeverity * (stats.occurrences - 1) + record.analysis.severity) / stats.occurrences;
    stats.lastOccurrence = record.timestamp;
    return stats;
  }

  private applyMitigation(pattern: ErrorPattern, stats: ErrorPatternStats, record: ErrorRecord): void {
    if (stats.occurrences < MIN_ERRORS_FOR_PATTERN) {
      return;
    }

    stats.mitigationAttempts++;

    const key = mitigationKey(pattern);
    if (!this.mitigations.has(key)) {
      const mitigation: ActiveMitigation = {
        key,
        pattern,
        startedAt: Date.now(),
        affectedModels: [...stats.affectedModels],
        affectedTaskTypes: [...stats.affectedTaskTypes],
        severity: stats.avgSeverity,
        actions: this.mitigationActions(pattern, record.taskType),
      };
      this.mitigations.set(key, mitigation);

      log.info({ pattern, actions: mitigation.actions }, 'Automatic mitigation activated');
      for (const action of mitigation.actions) {
        this.eventBus?.emit('mitigation:applied', { pattern, action, timestamp: new Date() });
      }
    }

    if (pattern === 'model_overload') {
      this.mitigateModelOverload(record.modelName, record.analysis.severity);
    }
  }

  private mitigationActions(pattern: ErrorPattern, taskType: TaskType): string[] {
    switch (pattern) {
      case 'model_overload':
        return ['Increased request delays'];
      case 'context_too_long':
        return ['Enabled automatic context truncation'];
      case 'sensitive_content':
        return ['Enhanced content filtering'];
      case 'unsupported_format':
        return [`Flagged format instructions for ${taskType} prompts`];
      default:
        return [];
    }
  }

  /**
   * Disable a model whose own error count and the error's severity are both
   * past their thresholds. Error counts come from the executor's attempts.
   */
  private mitigateModelOverload(modelName: string, severity: number): void {
    const model = this.registry.get(modelName);
    if (!model) {
      log.warn({ model: modelName }, 'Model not found in registry for mitigation');
      return;
    }

    if (model.enabled && model.errorCount >= MODEL_DISABLE_ERROR_COUNT && severity > MODEL_DISABLE_SEVERITY) {
      this.registry.disable(modelName, 'repeated overload errors');
      log.warn({ model: modelName, errorCount: model.errorCount }, 'Model disabled after repeated overload errors');
      this.eventBus?.emit('mitigation:applied', {
        pattern: 'model_overload',
        action: `Disabled model ${modelName}`,
        modelName,
        timestamp: new Date(),
      });
    } else {
      log.debug({ model: modelName, errorCount: model.errorCount }, 'Overload noted, model kept enabled');
    }
  }

  // ── Insights ───────────────────────────────────────────────────────────

  private recentErrors(now: number = Date.now()): ErrorRecord[] {
    return this.history.filter((record) => now - record.timestamp < RECENT_WINDOW_MS);
  }

  private generateInsights(): void {
    if (this.history.length < INSIGHT_MIN_HISTORY) {
      return;
    }

    const now = Date.now();
    const recent = this.recentErrors(now);
    if (recent.length < INSIGHT_MIN_RECENT) {
      return;
    }

    const byModel = new Map<string, number>();
    const byTask = new Map<TaskType, number>();
    const byPattern = new Map<ErrorPattern, number>();
    for (const record of recent) {
      increment(byModel, record.modelName);
      increment(byTask, record.taskType);
      if (record.analysis.pattern) {
        increment(byPattern, record.analysis.pattern);
      }
    }

    const candidates: LearningInsight[] = [];

    const worstModel = topEntry(byModel);
    if (worstModel && worstModel[1] >= INSIGHT_MIN_COUNT) {
      const [model, count] = worstModel;
      candidates.push(
        this.buildInsight('model_reliability', `Model ${model} has ${count} errors in last 24h`, count, now, {
          affectedComponents: ['model_registry', 'request_router'],
          recommendedActions: [
            `Reduce usage of model ${model}`,
            `Add ${model} to monitoring watchlist`,
            `Consider temporary disable of ${model}`,
          ],
        }),
      );
    }

    const worstTask = topEntry(byTask);
    if (worstTask && worstTask[1] >= INSIGHT_MIN_COUNT && worstTask[0] !== 'unknown') {
      const [task, count] = worstTask;
      candidates.push(
        this.buildInsight('task_difficulty', `Task type '${task}' has ${count} errors in last 24h`, count, now, {
          affectedComponents: ['adaptive_strategy_manager'],
          recommendedActions: [
            `Review strategies for ${task} tasks`,
            `Add specific error handling for ${task}`,
            `Improve prompts for ${task} tasks`,
          ],
        }),
      );
    }

    const commonPattern = topEntry(byPattern);
    if (commonPattern && commonPattern[1] >= INSIGHT_MIN_COUNT) {
      const [pattern, count] = commonPattern;
      candidates.push(
        this.buildInsight('error_pattern', `Detected systemic ${pattern} pattern (${count} occurrences)`, count, now, {
          affectedComponents: ['error_learning_system', 'adaptive_strategy_manager'],
          recommendedActions: [
            `Implement systemic fix for ${pattern}`,
            `Add monitoring for ${pattern} pattern`,
            `Update mitigation strategies for ${pattern}`,
          ],
        }),
      );
    }

    for (const insight of candidates) {
      if (this.isDuplicateInsight(insight, now)) continue;
      this.insights.push(insight);
      log.info({ category: insight.category, description: insight.description }, 'Learning insight generated');
      this.eventBus?.emit('insight:generated', insight);
    }

    if (this.insights.length > MAX_INSIGHTS) {
      this.insights = this.insights.slice(-MAX_INSIGHTS);
    }
  }

  private buildInsight(
    category: InsightCategory,
    description: string,
    count: number,
    now: number,
    details: Pick<LearningInsight, 'affectedComponents' | 'recommendedActions'>,
  ): LearningInsight {
    return {
      category,
      description,
      confidence: Math.min(count / 10, 1),
      affectedComponents: details.affectedComponents,
      recommendedActions: details.recommendedActions,
      timestamp: now,
    };
  }

  private isDuplicateInsight(insight: LearningInsight, now: number): boolean {
    return this.insights.some(
      (existing) =>
        now - existing.timestamp < INSIGHT_DUPLICATE_WINDOW_MS &&
        existing.category === insight.category &&
        existing.description === insight.description,
    );
  }
}
