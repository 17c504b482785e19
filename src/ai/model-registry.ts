/**
 * Model Registry
 *
 * Owns every model descriptor, its role and its running call statistics.
 * Descriptors are never removed; `enabled` is the soft-delete switch.
 */

import type { EventBus } from '../kernel/event-bus.js';
import type { Config, ModelEntry } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { MODEL_ROLES, type ModelDescriptor, type ModelRole } from './types.js';

const log = createLogger('model-registry');

// ═══════════════════════════════════════════════════════════════════════════
// NAME HEURISTICS
// ═══════════════════════════════════════════════════════════════════════════

const PRIMARY_PATTERNS = ['wizard', 'gpt', 'claude', 'llama-3'];
const SMALL_MARKERS = ['1b', 'mini', 'small'];
const LARGE_MARKERS = ['70b', '72b', '405b'];
const RESERVE_PATTERNS = ['free', 'stable', 'reliable', 'phi-3', 'llama-3.2-3b'];

const FAST_MODEL_ESTIMATE_MS = 2_000;
const SLOW_MODEL_ESTIMATE_MS = 15_000;
const DEFAULT_MODEL_ESTIMATE_MS = 5_000;

function nameMatches(name: string, patterns: string[]): boolean {
  const lower = name.toLowerCase();
  return patterns.some((pattern) => lower.includes(pattern));
}

/**
 * Latency used to order models: the last observed one once a call has
 * completed, otherwise a guess from size markers in the name.
 */
export function estimateLatencyMs(model: Readonly<ModelDescriptor>): number {
  if (model.successCount + model.errorCount > 0) {
    return model.lastResponseTimeMs;
  }
  if (nameMatches(model.name, ['1b', 'mini'])) {
    return FAST_MODEL_ESTIMATE_MS;
  }
  if (nameMatches(model.name, LARGE_MARKERS)) {
    return SLOW_MODEL_ESTIMATE_MS;
  }
  return DEFAULT_MODEL_ESTIMATE_MS;
}

/**
 * Pick up to the role's cap from `available` (names not yet assigned).
 */
export function autoSelectForRole(role: ModelRole, available: string[]): string[] {
  switch (role) {
    case 'primary': {
      const preferred = available.filter((name) => nameMatches(name, PRIMARY_PATTERNS));
      const others = available.filter((name) => !nameMatches(name, PRIMARY_PATTERNS));
      return [...preferred.slice(0, 3), ...others.slice(0, 2)];
    }
    case 'duplicate':
      return available
        .filter((name) => !nameMatches(name, SMALL_MARKERS) && !nameMatches(name, LARGE_MARKERS))
        .slice(0, 3);
    case 'reserve': {
      const reliable = available.filter((name) => nameMatches(name, RESERVE_PATTERNS));
      return reliable.length > 0 ? reliable.slice(0, 3) : available.slice(0, 2);
    }
    case 'fallback':
      return available.slice(0, 5);
  }
}

export function createDescriptor(
  name: string,
  role: ModelRole,
  overrides: Partial<Omit<ModelDescriptor, 'name' | 'role'>> = {},
): ModelDescriptor {
  return {
    name,
    role,
    maxTokens: 4096,
    contextWindow: 8192,
    temperature: 0.7,
    topP: 1.0,
    enabled: true,
    lastResponseTimeMs: 0,
    successCount: 0,
    errorCount: 0,
    ...overrides,
  };
}

function descriptorFromEntry(entry: ModelEntry, role: ModelRole): ModelDescriptor {
  return createDescriptor(entry.name, role, {
    maxTokens: entry.max_tokens,
    contextWindow: entry.context_window,
    temperature: entry.temperature,
    topP: entry.top_p,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

export class ModelRegistry {
  private readonly models = new Map<string, ModelDescriptor>();

  constructor(
    descriptors: ModelDescriptor[] = [],
    private readonly eventBus?: EventBus,
  ) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Build from the default provider's models. Explicit role lists win;
   * roles without one are filled automatically from the unassigned rest.
   */
  static fromConfig(config: Config, eventBus?: EventBus): ModelRegistry {
    const registry = new ModelRegistry([], eventBus);
    const provider = config.providers[config.llm.default_provider];
    if (!provider) {
      log.warn({ provider: config.llm.default_provider }, 'Default provider not configured');
      return registry;
    }

    const entries = new Map<string, ModelEntry>();
    for (const group of Object.values(provider.models)) {
      for (const entry of group) {
        if (!entries.has(entry.name)) {
          entries.set(entry.name, entry);
        }
      }
    }

    const assigned = new Set<string>();
    for (const role of MODEL_ROLES) {
      const explicit = config.llm.model_roles[role] ?? [];
      let names: string[];

      if (explicit.length > 0) {
        names = [];
        for (const name of explicit) {
          if (assigned.has(name) || names.includes(name)) {
            log.warn({ model: name, role }, 'Model already assigned to a role, skipping');
          } else if (!entries.has(name)) {
            log.warn({ model: name, role }, 'Model not found in provider config');
          } else {
            names.push(name);
          }
        }
      } else {
        const available = [...entries.keys()].filter((name) => !assigned.has(name));
        names = autoSelectForRole(role, available);
        log.debug({ role, models: names }, 'Auto-selected models for role');
      }

      for (const name of names) {
        const entry = entries.get(name);
        if (entry) {
          registry.register(descriptorFromEntry(entry, role));
          assigned.add(name);
        }
      }
    }

    log.info({ distribution: registry.getRoleDistribution() }, 'Model registry initialized');
    return registry;
  }

  register(descriptor: ModelDescriptor): void {
    if (this.models.has(descriptor.name)) {
      log.warn({ model: descriptor.name }, 'Model already registered, replacing');
    }
    this.models.set(descriptor.name, { ...descriptor });
  }

  /** Enabled models, optionally restricted to one role, in registration order */
  getModels(role?: ModelRole): Readonly<ModelDescriptor>[] {
    const result: ModelDescriptor[] = [];
    for (const model of this.models.values()) {
      if (model.enabled && (role === undefined || model.role === role)) {
        result.push(model);
      }
    }
    return result;
  }

  /** Every model, disabled ones included */
  getAll(): Readonly<ModelDescriptor>[] {
    return [...this.models.values()];
  }

  get(name: string): Readonly<ModelDescriptor> | undefined {
    return this.models.get(name);
  }

  getFastest(
    role: ModelRole = 'primary',
    excluding: ReadonlySet<string> = new Set(),
  ): Readonly<ModelDescriptor> | undefined {
    let fastest: Readonly<ModelDescriptor> | undefined;
    let fastestMs = Number.POSITIVE_INFINITY;
    for (const model of this.getModels(role)) {
      if (excluding.has(model.name)) continue;
      const estimate = estimateLatencyMs(model);
      if (estimate < fastestMs) {
        fastest = model;
        fastestMs = estimate;
      }
    }
    return fastest;
  }

  updateStats(name: string, success: boolean, latencyMs: number): void {
    const model = this.models.get(name);
    if (!model) {
      log.warn({ model: name }, 'Stats update for unknown model ignored');
      return;
    }
    model.lastResponseTimeMs = latencyMs;
    if (success) {
      model.successCount++;
    } else {
      model.errorCount++;
    }
  }

  enable(name: string): void {
    const model = this.models.get(name);
    if (!model) {
      log.warn({ model: name }, 'Cannot enable unknown model');
      return;
    }
    if (model.enabled) return;
    model.enabled = true;
    log.info({ model: name }, 'Model enabled');
    this.eventBus?.emit('model:enabled', { modelName: name, timestamp: new Date() });
  }

  disable(name: string, reason = 'manual'): void {
    const model = this.models.get(name);
    if (!model) {
      log.warn({ model: name }, 'Cannot disable unknown model');
      return;
    }
    if (!model.enabled) return;
    model.enabled = false;
    log.info({ model: name, reason }, 'Model disabled');
    this.eventBus?.emit('model:disabled', { modelName: name, reason, timestamp: new Date() });
  }

  getRoleDistribution(): Record<ModelRole, number> {
    const distribution: Record<ModelRole, number> = { primary: 0, duplicate: 0, reserve: 0, fallback: 0 };
    for (const model of this.models.values()) {
      distribution[model.role]++;
    }
    return distribution;
  }

  get size(): number {
    return this.models.size;
  }
}
