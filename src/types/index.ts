/**
 * Core Type Definitions
 *
 * Configuration schemas and the Result type shared by every layer.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const ModelRoleNameSchema = z.enum(['primary', 'duplicate', 'reserve', 'fallback']);

// ═══════════════════════════════════════════════════════════════════════════
// PROVIDER & MODEL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const ModelEntrySchema = z.object({
  name: z.string().min(1).max(256),
  max_tokens: z.number().int().positive(),
  context_window: z.number().int().positive(),
  temperature: z.number().min(0).max(2).default(0.7),
  top_p: z.number().min(0).max(1).default(1.0),
});
export type ModelEntry = z.infer<typeof ModelEntrySchema>;

export const ProviderConfigSchema = z.object({
  base_url: z.string().url(),
  api_key: z.string().optional(),
  // Models grouped by upstream vendor, e.g. { "openai": [...], "meta": [...] }
  models: z.record(z.string(), z.array(ModelEntrySchema)).default({}),
});
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const ModelRolesSchema = z.object({
  primary: z.array(z.string()).optional(),
  duplicate: z.array(z.string()).optional(),
  reserve: z.array(z.string()).optional(),
  fallback: z.array(z.string()).optional(),
});
export type ModelRolesConfig = z.infer<typeof ModelRolesSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// ROUTING THRESHOLDS
// ═══════════════════════════════════════════════════════════════════════════

export const RoutingThresholdsSchema = z.object({
  parallel_timeout_ms: z.number().int().positive().default(90_000),
  evaluation_timeout_ms: z.number().int().positive().default(30_000),
  min_success_rate: z.number().min(0).max(1).default(0.7),
  min_avg_score: z.number().min(1).max(5).default(3.0),
  max_avg_latency_ms: z.number().int().positive().default(30_000),
  min_samples_for_adaptation: z.number().int().positive().default(5),
  adaptation_cooldown_ms: z.number().int().nonnegative().default(300_000),
  decision_cache_ttl_ms: z.number().int().positive().default(600_000),
  decision_cache_size: z.number().int().positive().default(200),
  low_quality_score: z.number().min(1).max(5).default(2.5),
});
export type RoutingThresholds = z.infer<typeof RoutingThresholdsSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const ConfigSchema = z.object({
  llm: z.object({
    default_provider: z.string().min(1).default('openrouter'),
    timeout_ms: z.number().int().positive().default(200_000),
    model_roles: ModelRolesSchema.default({}),
    evaluator_model: z.string().optional(),
  }).default({}),
  providers: z.record(z.string(), ProviderConfigSchema).default({}),
  routing: RoutingThresholdsSchema.default({}),
  logging: z.object({
    level: LogLevelSchema.default('info'),
  }).default({}),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
