/**
 * Routing domain types.
 *
 * Closed sets (task types, strategies, error kinds) are Zod enums so the
 * JSON rule tables can be validated against the same vocabulary.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// CLOSED VOCABULARIES
// ═══════════════════════════════════════════════════════════════════════════

export const ModelRoleSchema = z.enum(['primary', 'duplicate', 'reserve', 'fallback']);
export type ModelRole = z.infer<typeof ModelRoleSchema>;

export const MODEL_ROLES: readonly ModelRole[] = ModelRoleSchema.options;

export const TaskTypeSchema = z.enum([
  'code_generation',
  'code_review',
  'analysis',
  'question_answering',
  'summarization',
  'translation',
  'math_problem',
  'logical_reasoning',
  'chat_conversation',
  'json_generation',
  'technical_writing',
  'creative_writing',
  'unknown',
]);
export type TaskType = z.infer<typeof TaskTypeSchema>;

export const ComplexityLevelSchema = z.enum(['simple', 'moderate', 'complex', 'very_complex']);
export type ComplexityLevel = z.infer<typeof ComplexityLevelSchema>;

export const StrategyTypeSchema = z.enum(['single', 'parallel', 'fallback', 'consensus', 'iterative']);
export type StrategyType = z.infer<typeof StrategyTypeSchema>;

/** The Strategy Executor's own choice, distinct from the adaptive strategy type */
export type ExecutionMode = 'single' | 'parallel';

export const ErrorTypeSchema = z.enum([
  'api_error',
  'timeout_error',
  'rate_limit_error',
  'content_policy_error',
  'invalid_response',
  'low_quality',
  'hallucination',
  'incomplete_response',
  'irrelevant_response',
  'formatting_error',
  'network_error',
]);
export type ErrorType = z.infer<typeof ErrorTypeSchema>;

export const ErrorPatternSchema = z.enum([
  'model_overload',
  'context_too_long',
  'complex_query',
  'unsupported_format',
  'sensitive_content',
  'ambiguous_request',
  'resource_exhausted',
]);
export type ErrorPattern = z.infer<typeof ErrorPatternSchema>;

export type AdaptationTrigger = 'low_success_rate' | 'low_quality' | 'high_latency';

// ═══════════════════════════════════════════════════════════════════════════
// MODELS
// ═══════════════════════════════════════════════════════════════════════════

export interface ModelDescriptor {
  name: string;
  role: ModelRole;
  maxTokens: number;
  contextWindow: number;
  temperature: number;
  topP: number;
  enabled: boolean;
  /** Latency of the most recent completed call; 0 until one completes */
  lastResponseTimeMs: number;
  successCount: number;
  errorCount: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// REQUESTS & RESULTS
// ═══════════════════════════════════════════════════════════════════════════

export interface ResponseFormat {
  type: 'json_object' | 'text';
}

export interface GenerationRequest {
  prompt: string;
  modelName?: string;
  responseFormat?: ResponseFormat;
  useParallel: boolean;
  useFastest: boolean;
  /** Correlates attempt events with the request that caused them */
  requestId?: string;
}

export interface GenerationResult {
  modelName: string;
  content: string;
  latencyMs: number;
  success: boolean;
  error?: string;
  score?: number;
}

export function createRequest(
  prompt: string,
  overrides: Partial<Omit<GenerationRequest, 'prompt'>> = {},
): GenerationRequest {
  return { prompt, useParallel: false, useFastest: false, ...overrides };
}

export function isStructuredRequest(request: GenerationRequest): boolean {
  return request.responseFormat?.type === 'json_object';
}

// ═══════════════════════════════════════════════════════════════════════════
// ANALYSIS & DECISIONS
// ═══════════════════════════════════════════════════════════════════════════

export interface RequestAnalysis {
  taskType: TaskType;
  complexity: ComplexityLevel;
  estimatedTokens: number;
  requiresAccuracy: boolean;
  requiresCreativity: boolean;
  requiresSpeed: boolean;
  requiresStructuredOutput: boolean;
  keywords: string[];
  confidence: number;
}

export interface RoutingDecision {
  modelName: string;
  mode: ExecutionMode;
  reasoning: string;
  confidence: number;
  alternatives: string[];
}

export interface EvaluationResult {
  score: number;
  reasoning: string;
}

export interface PerformanceRecord {
  avgScore: number;
  avgLatencyMs: number;
  successRate: number;
  sampleCount: number;
  /** Samples that carried a quality score; the divisor for avgScore */
  scoreSampleCount: number;
  lastUsed: number;
}

export interface ExpectedMetrics {
  score: number;
  latencyMs: number;
  successRate: number;
}

export interface StrategyDecision {
  strategy: StrategyType;
  confidence: number;
  reasoning: string;
  expected: ExpectedMetrics;
  alternatives: StrategyType[];
  createdAt: number;
}

export interface AdaptationContext {
  taskType: TaskType;
  trigger: AdaptationTrigger;
  previousStrategy: StrategyType;
  metrics: {
    successRate: number;
    avgScore: number;
    avgLatencyMs: number;
    sampleCount: number;
  };
  timestamp: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// ERROR LEARNING
// ═══════════════════════════════════════════════════════════════════════════

export interface ErrorAnalysis {
  errorType: ErrorType;
  pattern?: ErrorPattern;
  severity: number;
  confidence: number;
  suggestedFix: string;
  preventionMeasures: string[];
}

export interface ErrorRecord {
  timestamp: number;
  prompt: string;
  modelName: string;
  response?: GenerationResult;
  analysis: ErrorAnalysis;
  taskType: TaskType;
  retrySucceeded: boolean;
}

export interface ErrorPatternStats {
  pattern: ErrorPattern;
  occurrences: number;
  affectedModels: Set<string>;
  affectedTaskTypes: Set<TaskType>;
  avgSeverity: number;
  lastOccurrence: number;
  mitigationAttempts: number;
  mitigationSuccesses: number;
}

export type InsightCategory = 'model_reliability' | 'task_difficulty' | 'error_pattern';

export interface LearningInsight {
  category: InsightCategory;
  description: string;
  confidence: number;
  affectedComponents: string[];
  recommendedActions: string[];
  timestamp: number;
}
