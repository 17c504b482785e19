/**
 * Rule tables for classification and error analysis, loaded from `data/`
 * and validated with Zod.
 *
 * @module ai/rules
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { type Result, ok, err } from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { ErrorPatternSchema, ErrorTypeSchema, TaskTypeSchema, type ErrorPattern, type ErrorType, type TaskType } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const RegexSourceSchema = z.string().min(1).refine((source) => {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}, 'Invalid regular expression');

const Weight = z.number().min(0).max(1);

export const TaskPatternSchema = z.object({
  taskType: TaskTypeSchema,
  keywords: z.array(z.string().min(1)),
  patterns: z.array(RegexSourceSchema),
  accuracyWeight: Weight,
  creativityWeight: Weight,
});

export const ErrorRuleSchema = z.object({
  key: z.string().min(1).transform((key) => key.toLowerCase()),
  errorType: ErrorTypeSchema,
  pattern: ErrorPatternSchema.optional(),
  severity: z.number().min(0).max(1).default(0.5),
  prevention: z.array(z.string()).default([]),
});

export interface TaskPatternRule {
  taskType: TaskType;
  keywords: string[];
  regexes: RegExp[];
  accuracyWeight: number;
  creativityWeight: number;
}

export interface ErrorRule {
  key: string;
  errorType: ErrorType;
  pattern?: ErrorPattern;
  severity: number;
  prevention: string[];
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

const TASK_PATTERNS_FILE = new URL('../../data/task-patterns.json', import.meta.url);
const ERROR_RULES_FILE = new URL('../../data/error-rules.json', import.meta.url);

function readJson(file: URL | string): Result<unknown, Error> {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    return ok(parsed);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function parseTaskPatterns(raw: unknown): Result<TaskPatternRule[], Error> {
  const result = z.array(TaskPatternSchema).safeParse(raw);
  if (!result.success) {
    return err(new Error(`Invalid task pattern table: ${result.error.message}`));
  }

  return ok(
    result.data.map((entry) => ({
      taskType: entry.taskType,
      keywords: entry.keywords,
      regexes: entry.patterns.map((source) => new RegExp(source, 'i')),
      accuracyWeight: entry.accuracyWeight,
      creativityWeight: entry.creativityWeight,
    })),
  );
}

export function parseErrorRules(raw: unknown): Result<ErrorRule[], Error> {
  const result = z.array(ErrorRuleSchema).safeParse(raw);
  if (!result.success) {
    return err(new Error(`Invalid error rule table: ${result.error.message}`));
  }
  return ok(result.data);
}

export function loadTaskPatterns(file: URL | string = TASK_PATTERNS_FILE): Result<TaskPatternRule[], Error> {
  const raw = readJson(file);
  return raw.success ? parseTaskPatterns(raw.data) : raw;
}

export function loadErrorRules(file: URL | string = ERROR_RULES_FILE): Result<ErrorRule[], Error> {
  const raw = readJson(file);
  return raw.success ? parseErrorRules(raw.data) : raw;
}

let defaultTaskPatterns: TaskPatternRule[] | null = null;
let defaultErrorRules: ErrorRule[] | null = null;

/**
 * Bundled task pattern table.
 * @throws ConfigurationError when the bundled file is missing or invalid
 */
export function getDefaultTaskPatterns(): TaskPatternRule[] {
  if (defaultTaskPatterns === null) {
    const result = loadTaskPatterns();
    if (!result.success) {
      throw new ConfigurationError(result.error.message);
    }
    defaultTaskPatterns = result.data;
  }
  return defaultTaskPatterns;
}

/**
 * Bundled error rule table.
 * @throws ConfigurationError when the bundled file is missing or invalid
 */
export function getDefaultErrorRules(): ErrorRule[] {
  if (defaultErrorRules === null) {
    const result = loadErrorRules();
    if (!result.success) {
      throw new ConfigurationError(result.error.message);
    }
    defaultErrorRules = result.data;
  }
  return defaultErrorRules;
}
