/**
 * In-process stand-ins for the model provider and the judge model.
 */

import type { GenerationClient } from '../../src/ai/generation-client.js';
import { createDescriptor, ModelRegistry } from '../../src/ai/model-registry.js';
import type { Evaluator } from '../../src/ai/response-evaluator.js';
import type {
  EvaluationResult,
  GenerationResult,
  ModelDescriptor,
  ModelRole,
  ResponseFormat,
} from '../../src/ai/types.js';

export type Reply = Omit<GenerationResult, 'modelName'>;
export type Responder = (prompt: string, format?: ResponseFormat) => Reply | Promise<Reply>;

export function success(content: string, latencyMs = 100): Reply {
  return { content, latencyMs, success: true };
}

export function failure(error: string, latencyMs = 100): Reply {
  return { content: '', latencyMs, success: false, error };
}

export interface RecordedCall {
  model: string;
  prompt: string;
  format?: ResponseFormat;
}

/**
 * GenerationClient whose replies are scripted per model name.
 */
export class ScriptedClient implements GenerationClient {
  readonly calls: RecordedCall[] = [];
  private readonly responders = new Map<string, Responder>();

  constructor(private readonly fallback: Responder = () => success('default response')) {}

  respond(modelName: string, responder: Responder): this {
    this.responders.set(modelName, responder);
    return this;
  }

  callsFor(modelName: string): RecordedCall[] {
    return this.calls.filter((call) => call.model === modelName);
  }

  async call(model: Readonly<ModelDescriptor>, prompt: string, format?: ResponseFormat): Promise<GenerationResult> {
    this.calls.push({ model: model.name, prompt, format });
    const responder = this.responders.get(model.name) ?? this.fallback;
    const reply = await responder(prompt, format);
    return { modelName: model.name, ...reply };
  }
}

/**
 * Evaluator scoring by exact response text; unknown responses get the
 * default score.
 */
export class ScriptedEvaluator implements Evaluator {
  readonly calls: Array<{ prompt: string; response: string }> = [];

  constructor(
    private readonly scores: Record<string, number> = {},
    private readonly defaultScore = 3,
  ) {}

  async evaluate(prompt: string, response: string): Promise<EvaluationResult> {
    this.calls.push({ prompt, response });
    return { score: this.scores[response] ?? this.defaultScore, reasoning: 'scripted' };
  }
}

export interface ModelSpec {
  name: string;
  role?: ModelRole;
  overrides?: Partial<Omit<ModelDescriptor, 'name' | 'role'>>;
}

export function buildRegistry(models: Array<string | ModelSpec>): ModelRegistry {
  return new ModelRegistry(
    models.map((model) =>
      typeof model === 'string'
        ? createDescriptor(model, 'primary')
        : createDescriptor(model.name, model.role ?? 'primary', model.overrides),
    ),
  );
}
