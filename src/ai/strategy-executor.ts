import type { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../utils/logger.js';
import { isTimeoutError, withTimeout } from '../utils/timeout.js';
import type { GenerationClient } from './generation-client.js';
import { validateAndExtract } from './json-validator.js';
import type { ModelRegistry } from './model-registry.js';
import { NEUTRAL_SCORE, type Evaluator } from './response-evaluator.js';
import { isStructuredRequest, type GenerationRequest, type GenerationResult, type ModelDescriptor } from './types.js';

const log = createLogger('strategy-executor');

// ═══════════════════════════════════════════════════════════════════════════════
// STRATEGY EXECUTOR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * StrategyExecutor — runs one request in single (fallback chain) or
 * parallel (best-of-two) mode.
 *
 * Expected failures never throw: every path resolves to a GenerationResult.
 * Every attempt updates the registry's call statistics and is reported on
 * the event bus as `generation:attempt`.
 */

export const DEFAULT_PARALLEL_TIMEOUT_MS = 90_000;
export const DEFAULT_EVALUATION_TIMEOUT_MS = 30_000;

export const SERVICE_UNAVAILABLE: Readonly<GenerationResult> = {
  modelName: 'unknown',
  content: 'Service temporarily unavailable',
  latencyMs: 0,
  success: false,
  error: 'All models failed',
};

export interface StrategyExecutorOptions {
  eventBus?: EventBus;
  parallelTimeoutMs?: number;
  evaluationTimeoutMs?: number;
}

export class StrategyExecutor {
  private readonly eventBus: EventBus | undefined;
  private readonly parallelTimeoutMs: number;
  private readonly evaluationTimeoutMs: number;

  constructor(
    private readonly registry: ModelRegistry,
    private readonly client: GenerationClient,
    private readonly evaluator: Evaluator,
    options: StrategyExecutorOptions = {},
  ) {
    this.eventBus = options.eventBus;
    this.parallelTimeoutMs = options.parallelTimeoutMs ?? DEFAULT_PARALLEL_TIMEOUT_MS;
    this.evaluationTimeoutMs = options.evaluationTimeoutMs ?? DEFAULT_EVALUATION_TIMEOUT_MS;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    return request.useParallel ? this.generateParallel(request) : this.generateSingle(request);
  }

  /**
   * Fallback chain: the selected primary model, then every enabled
   * fallback-role model. Returns the first success, else the last failure.
   */
  async generateSingle(request: GenerationRequest): Promise<GenerationResult> {
    const first = this.selectSingleModel(request);
    const chain: Readonly<ModelDescriptor>[] = first ? [first] : [];
    for (const model of this.registry.getModels('fallback')) {
      if (model.name !== first?.name) {
        chain.push(model);
      }
    }

    let last: GenerationResult | null = null;
    for (const model of chain) {
      log.debug({ model: model.name }, 'Trying model');
      const result = await this.attempt(model, request);
      if (result.success) {
        return result;
      }
      log.warn({ model: model.name, error: result.error }, 'Model attempt failed');
      last = result;
    }

    if (last) {
      log.error({ attempts: chain.length }, 'All models failed, returning last failure');
      return last;
    }

    log.error('No models available for generation');
    return { ...SERVICE_UNAVAILABLE };
  }

  /**
   * Best-of-two over the fastest pair of primary models, bounded by the
   * parallel timeout. Degrades to single mode when fewer than two primaries
   * exist, on timeout, or when neither response is usable.
   */
  async generateParallel(request: GenerationRequest): Promise<GenerationResult> {
    const first = this.registry.getFastest('primary');
    const second = first ? this.registry.getFastest('primary', new Set([first.name])) : undefined;
    if (!first || !second) {
      log.warn('Not enough primary models for parallel generation, falling back to single');
      return this.generateSingle(request);
    }

    let results: GenerationResult[];
    try {
      results = await withTimeout(
        Promise.all([this.callModel(first, request), this.callModel(second, request)]),
        this.parallelTimeoutMs,
        'parallel generation',
      );
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      log.error({ timeoutMs: this.parallelTimeoutMs }, 'Parallel generation timed out, falling back to single');
      return this.generateSingle(request);
    }

    for (const result of results) {
      this.recordAttempt(request, result);
    }

    const valid = results.filter((result) => result.success);
    if (valid.length === 0) {
      log.warn('All parallel models failed or returned invalid JSON');
      return this.generateSingle(request);
    }
    if (valid.length === 1) {
      return valid[0];
    }

    return this.selectBest(request.prompt, valid);
  }

  /**
   * One call to one model with stats and event reporting.
   */
  async attempt(model: Readonly<ModelDescriptor>, request: GenerationRequest): Promise<GenerationResult> {
    const result = await this.callModel(model, request);
    this.recordAttempt(request, result);
    return result;
  }

  /**
   * Score every response (timeouts and evaluator failures count as the
   * neutral score) and return the highest; the earliest wins a tie.
   */
  async selectBest(prompt: string, responses: GenerationResult[]): Promise<GenerationResult> {
    const scored = await this.scoreAll(prompt, responses);
    let best = scored[0];
    for (const candidate of scored.slice(1)) {
      if ((candidate.score ?? 0) > (best.score ?? 0)) {
        best = candidate;
      }
    }
    log.info({ model: best.modelName, score: best.score }, 'Selected best response');
    return best;
  }

  async scoreAll(prompt: string, responses: GenerationResult[]): Promise<GenerationResult[]> {
    const scored: GenerationResult[] = [];
    for (const response of responses) {
      scored.push({ ...response, score: await this.evaluate(prompt, response) });
    }
    return scored;
  }

  async evaluate(prompt: string, response: GenerationResult): Promise<number> {
    try {
      const evaluation = await withTimeout(
        this.evaluator.evaluate(prompt, response.content),
        this.evaluationTimeoutMs,
        'evaluation',
      );
      return evaluation.score;
    } catch (error) {
      log.warn(
        { model: response.modelName, error: error instanceof Error ? error.message : String(error) },
        'Evaluation failed, using neutral score',
      );
      return NEUTRAL_SCORE;
    }
  }

  private selectSingleModel(request: GenerationRequest): Readonly<ModelDescriptor> | undefined {
    const primaries = this.registry.getModels('primary');
    if (request.modelName !== undefined) {
      const explicit = primaries.find((model) => model.name === request.modelName);
      if (explicit) {
        return explicit;
      }
    }
    if (request.useFastest) {
      return this.registry.getFastest('primary');
    }
    return primaries[0];
  }

  /**
   * Call the client; structured requests must yield JSON, which replaces
   * the content. Never rejects.
   */
  private async callModel(model: Readonly<ModelDescriptor>, request: GenerationRequest): Promise<GenerationResult> {
    const startTime = Date.now();
    let result: GenerationResult;
    try {
      result = await this.client.call(model, request.prompt, request.responseFormat);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ model: model.name, error: message }, 'Unexpected error from model client');
      return { modelName: model.name, content: '', latencyMs: Date.now() - startTime, success: false, error: message };
    }

    if (result.success && isStructuredRequest(request)) {
      const validation = validateAndExtract(result.content);
      if (validation.json === null) {
        log.warn({ model: model.name }, 'Model returned invalid JSON');
        return { ...result, success: false, error: 'Invalid JSON response' };
      }
      return { ...result, content: validation.json };
    }

    return result;
  }

  private recordAttempt(request: GenerationRequest, result: GenerationResult): void {
    this.registry.updateStats(result.modelName, result.success, result.latencyMs);
    this.eventBus?.emit('generation:attempt', {
      requestId: request.requestId,
      prompt: request.prompt,
      result,
      timestamp: new Date(),
    });
  }
}
