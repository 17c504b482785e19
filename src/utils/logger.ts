/**
 * Logging Utilities
 *
 * Structured logging using Pino with automatic redaction
 * of sensitive fields and consistent formatting.
 *
 * @module utils/logger
 */

import pino from 'pino';
import { getConfig } from '../config/config.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function resolveLogLevel(explicit?: string): string {
  return explicit ?? process.env.ROUTER_LOG_LEVEL ?? getConfig().logging.level;
}

export function createLogger(name: string, options?: { level?: string }): pino.Logger {
  const opts: pino.LoggerOptions = {
    name,
    level: resolveLogLevel(options?.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  return pino(opts);
}

// ═══════════════════════════════════════════════════════════════════════════
// PRE-CONFIGURED LOGGERS
// ═══════════════════════════════════════════════════════════════════════════

export const logger = createLogger('llm-router');
export const cliLogger = createLogger('llm-router:cli');

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

// Matched against the end of a lower-cased key, so `max_tokens` stays visible
const SENSITIVE_FIELDS = [
  'password',
  'secret',
  'token',
  'auth',
  'authorization',
  'credential',
  'credentials',
  'api_key',
  'apikey',
  'private_key',
];

function isSensitive(key: string, fields: string[]): boolean {
  const lowerKey = key.toLowerCase();
  return fields.some((field) => lowerKey.endsWith(field));
}

function redactValue(value: unknown, fields: string[]): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, fields));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = isSensitive(key, fields) ? '[REDACTED]' : redactValue(item, fields);
    }
    return result;
  }
  return value;
}

/**
 * Copy of `obj` with every secret-bearing key masked, recursively.
 */
export function redact(
  obj: Record<string, unknown>,
  additionalFields: string[] = [],
): Record<string, unknown> {
  const fields = [...SENSITIVE_FIELDS, ...additionalFields.map((f) => f.toLowerCase())];
  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(obj)) {
    result[key] = isSensitive(key, fields) ? '[REDACTED]' : redactValue(item, fields);
  }
  return result;
}

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    if ('code' in error && typeof error.code === 'string') {
      result.code = error.code;
    }
    return result;
  }

  return { message: String(error) };
}
