/**
 * Routing Core — Public API
 *
 * Registry, router, executor, adaptive strategy and error learning, plus
 * the orchestrator that wires them together.
 */

// Types
export type {
  ModelRole,
  TaskType,
  ComplexityLevel,
  StrategyType,
  ExecutionMode,
  ErrorType,
  ErrorPattern,
  AdaptationTrigger,
  ModelDescriptor,
  ResponseFormat,
  GenerationRequest,
  GenerationResult,
  RequestAnalysis,
  RoutingDecision,
  EvaluationResult,
  PerformanceRecord,
  ExpectedMetrics,
  StrategyDecision,
  AdaptationContext,
  ErrorAnalysis,
  ErrorRecord,
  ErrorPatternStats,
  InsightCategory,
  LearningInsight,
} from './types.js';

export {
  ModelRoleSchema,
  TaskTypeSchema,
  ComplexityLevelSchema,
  StrategyTypeSchema,
  ErrorTypeSchema,
  ErrorPatternSchema,
  MODEL_ROLES,
  createRequest,
  isStructuredRequest,
} from './types.js';

// Errors
export { RouterError, NoModelsAvailableError, UnknownStrategyError, ConfigurationError } from './errors.js';

// Model registry
export { ModelRegistry, createDescriptor, estimateLatencyMs, autoSelectForRole } from './model-registry.js';

// Generation client
export { OpenAICompatibleClient, createClientFromConfig } from './generation-client.js';
export type { GenerationClient, OpenAICompatibleClientOptions } from './generation-client.js';

// Structured output
export { isValidJson, extractJson, attemptRepair, validateAndExtract } from './json-validator.js';

// Evaluation
export { ResponseEvaluator, NEUTRAL_SCORE, buildEvaluationPrompt, parseEvaluation, summarizeEvaluations } from './response-evaluator.js';
export type { Evaluator, EvaluationSummary, ResponseEvaluatorOptions } from './response-evaluator.js';

// Rule tables
export { loadTaskPatterns, loadErrorRules, parseTaskPatterns, parseErrorRules, getDefaultTaskPatterns, getDefaultErrorRules } from './rules.js';
export type { TaskPatternRule, ErrorRule } from './rules.js';

// Performance records
export { PerformanceStore, streamingMean } from './performance-store.js';
export type { PerformanceSample, PerformanceEntry } from './performance-store.js';

// Request router
export { RequestRouter, classifyTaskType, assessComplexity, estimateTokens, determineMode } from './request-router.js';
export type { RequestRouterOptions, RoutingHistoryEntry, RoutingStats } from './request-router.js';

// Strategy executor
export { StrategyExecutor, SERVICE_UNAVAILABLE } from './strategy-executor.js';
export type { StrategyExecutorOptions } from './strategy-executor.js';

// Adaptive strategy
export { AdaptiveStrategyManager, STRATEGY_RULES, getStrategyRule, selectStrategyByRules } from './adaptive-strategy.js';
export type {
  AdaptiveOutcome,
  AdaptiveStats,
  AdaptiveStrategyOptions,
  AdaptiveThresholds,
  StrategyRecommendation,
  StrategyRule,
  StrategyRuleTable,
  TriggerCheck,
} from './adaptive-strategy.js';

// Error learning
export { ErrorLearningSystem, classifyError } from './error-learning.js';
export type { ErrorContext, ActiveMitigation, LearningStats } from './error-learning.js';

// Background learning
export { LearningQueue } from './learning-queue.js';
export type { LearningTask, LearningQueueStats } from './learning-queue.js';

// Orchestrator
export { RoutingOrchestrator } from './orchestrator.js';
export type { RoutingComponents, GenerateOptions, Recommendations, BuildFromConfigOptions } from './orchestrator.js';
