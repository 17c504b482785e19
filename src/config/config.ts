/**
 * Configuration Management
 *
 * Loads the JSON router configuration, resolves `${NAME}` / `${NAME:default}`
 * environment references and validates the result with Zod.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, ConfigSchema, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_CONFIG_FILE = path.join('config', 'router.json');

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getConfigPath(): string {
  return expandPath(process.env.ROUTER_CONFIG ?? DEFAULT_CONFIG_FILE);
}

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT SUBSTITUTION
// ═══════════════════════════════════════════════════════════════════════════

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::([^}]*))?\}/g;

function substituteString(value: string, env: NodeJS.ProcessEnv, missing: string[]): string {
  return value.replace(ENV_REFERENCE, (_match, name: string, fallback: string | undefined) => {
    const resolved = env[name];
    if (resolved !== undefined) {
      return resolved;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    missing.push(name);
    return '';
  });
}

function substituteValue(value: unknown, env: NodeJS.ProcessEnv, missing: string[]): unknown {
  if (typeof value === 'string') {
    return substituteString(value, env, missing);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteValue(item, env, missing));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteValue(item, env, missing);
    }
    return result;
  }
  return value;
}

/**
 * Replace every `${NAME}` / `${NAME:default}` reference in string values.
 * Fails when a variable without a default is not set.
 */
export function substituteEnv(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Result<unknown, Error> {
  const missing: string[] = [];
  const substituted = substituteValue(raw, env, missing);
  if (missing.length > 0) {
    const names = [...new Set(missing)].join(', ');
    return err(new Error(`Missing environment variable(s): ${names}`));
  }
  return ok(substituted);
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse and validate an already-decoded configuration object.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Result<Config, Error> {
  const substituted = substituteEnv(raw, env);
  if (!substituted.success) {
    return substituted;
  }

  const result = ConfigSchema.safeParse(substituted.data);
  if (!result.success) {
    return err(new Error(`Invalid configuration: ${result.error.message}`));
  }
  return ok(result.data);
}

/**
 * Load configuration from file. An absent default file yields the defaults;
 * an explicitly requested file must exist.
 */
export function loadConfig(customPath?: string): Result<Config, Error> {
  try {
    const configPath = customPath !== undefined ? expandPath(customPath) : getConfigPath();

    if (!fs.existsSync(configPath)) {
      if (customPath !== undefined) {
        return err(new Error(`Configuration file not found: ${configPath}`));
      }
      return ok(DEFAULT_CONFIG);
    }

    const content = fs.readFileSync(configPath, 'utf-8');
    const raw: unknown = JSON.parse(content);
    return parseConfig(raw);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// API KEY RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

export interface ResolvedApiKey {
  apiKey: string;
  source: 'env' | 'config';
}

/**
 * Environment first (`ROUTER_API_KEY`, then `OPENROUTER_API_KEY`), then the
 * provider's configured key.
 */
export function resolveApiKey(
  config: Config,
  providerName: string = config.llm.default_provider,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedApiKey | null {
  const fromEnv = env.ROUTER_API_KEY ?? env.OPENROUTER_API_KEY;
  if (fromEnv !== undefined && fromEnv.length > 0) {
    return { apiKey: fromEnv, source: 'env' };
  }

  const fromConfig = config.providers[providerName]?.api_key;
  if (fromConfig !== undefined && fromConfig.length > 0) {
    return { apiKey: fromConfig, source: 'config' };
  }

  return null;
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function reloadConfig(customPath?: string): Result<Config, Error> {
  clearConfigCache();
  const result = loadConfig(customPath);
  if (result.success) {
    cachedConfig = result.data;
  }
  return result;
}
