import type { GenerationClient } from './generation-client.js';
import type { ModelRegistry } from './model-registry.js';
import { RouterError } from './errors.js';
import type { EvaluationResult, ModelDescriptor } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('response-evaluator');

export const NEUTRAL_SCORE = 3.0;

/** Scores a response to a prompt on a 1-5 scale */
export interface Evaluator {
  evaluate(prompt: string, response: string): Promise<EvaluationResult>;
}

export interface EvaluationSummary {
  count: number;
  averageScore: number;
  minScore: number;
  maxScore: number;
  /** Keyed by the score with one decimal, e.g. "4.0" */
  distribution: Record<string, number>;
}

export function buildEvaluationPrompt(prompt: string, response: string): string {
  return `Please evaluate the quality of this response to the given prompt.

Prompt: ${prompt}

Response: ${response}

Evaluate the response on a scale from 1 to 5, where:
1 = Very poor quality, incorrect, irrelevant, or harmful
2 = Poor quality, has some issues but minimally useful
3 = Average quality, acceptable but could be better
4 = Good quality, well-structured and helpful
5 = Excellent quality, comprehensive, accurate, and insightful

Consider factors like:
- Accuracy and correctness
- Relevance to the prompt
- Clarity and coherence
- Completeness of information
- Helpfulness and usefulness

Provide your evaluation in this format:
Score: [1-5]
Reasoning: [brief explanation of your evaluation]

Your response should be concise and follow the exact format above.`;
}

/**
 * Read `Score:` and `Reasoning:` lines. The score is clamped to [1, 5];
 * anything unreadable keeps the neutral default.
 */
export function parseEvaluation(content: string): EvaluationResult {
  let score = NEUTRAL_SCORE;
  let reasoning = 'No reasoning provided';

  for (const rawLine of content.trim().split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('Score:')) {
      const match = /(-?\d+(?:\.\d+)?)/.exec(line.slice('Score:'.length));
      if (match) {
        score = Math.max(1, Math.min(5, Number.parseFloat(match[1])));
      } else {
        log.warn({ line }, 'Could not parse evaluation score');
      }
    } else if (line.startsWith('Reasoning:')) {
      reasoning = line.slice('Reasoning:'.length).trim();
    }
  }

  return { score, reasoning };
}

export function summarizeEvaluations(evaluations: EvaluationResult[]): EvaluationSummary | null {
  if (evaluations.length === 0) {
    return null;
  }

  const scores = evaluations.map((e) => e.score);
  const distribution: Record<string, number> = {};
  for (const score of scores) {
    const key = score.toFixed(1);
    distribution[key] = (distribution[key] ?? 0) + 1;
  }

  return {
    count: scores.length,
    averageScore: scores.reduce((sum, s) => sum + s, 0) / scores.length,
    minScore: Math.min(...scores),
    maxScore: Math.max(...scores),
    distribution,
  };
}

export interface ResponseEvaluatorOptions {
  /** Registered model used as judge; defaults to the fastest primary model */
  evaluatorModel?: string;
}

/**
 * LLM-as-judge evaluator. Failures never propagate: they resolve to the
 * neutral score with the failure recorded as reasoning.
 */
export class ResponseEvaluator implements Evaluator {
  private evaluatorModel: string | undefined;

  constructor(
    private readonly client: GenerationClient,
    private readonly registry: ModelRegistry,
    options: ResponseEvaluatorOptions = {},
  ) {
    this.evaluatorModel = options.evaluatorModel;
  }

  setEvaluatorModel(name: string | undefined): void {
    this.evaluatorModel = name;
  }

  private resolveJudge(): Readonly<ModelDescriptor> | undefined {
    if (this.evaluatorModel !== undefined) {
      const configured = this.registry.get(this.evaluatorModel);
      if (configured?.enabled) {
        return configured;
      }
    }
    return this.registry.getFastest('primary');
  }

  async evaluate(prompt: string, response: string): Promise<EvaluationResult> {
    const judge = this.resolveJudge();
    if (!judge) {
      log.warn('No evaluator model available, returning neutral score');
      return { score: NEUTRAL_SCORE, reasoning: 'No evaluator available' };
    }

    try {
      const result = await this.client.call(judge, buildEvaluationPrompt(prompt, response));
      if (!result.success) {
        log.warn({ model: judge.name, error: result.error }, 'Evaluation model failed');
        return { score: NEUTRAL_SCORE, reasoning: 'Evaluation failed' };
      }
      return parseEvaluation(result.content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ model: judge.name, error: message }, 'Error during response evaluation');
      return { score: NEUTRAL_SCORE, reasoning: `Evaluation error: ${message}` };
    }
  }

  /** Evaluate each response in turn */
  async compare(prompt: string, responses: string[]): Promise<EvaluationResult[]> {
    const results: EvaluationResult[] = [];
    for (const response of responses) {
      results.push(await this.evaluate(prompt, response));
    }
    return results;
  }

  /**
   * Highest-scored response; the earliest wins a tie.
   * @throws RouterError when `responses` is empty
   */
  async selectBest(
    prompt: string,
    responses: string[],
  ): Promise<{ index: number; evaluation: EvaluationResult }> {
    if (responses.length === 0) {
      throw new RouterError('No responses to evaluate', 'EMPTY_EVALUATION');
    }

    const evaluations = await this.compare(prompt, responses);
    let bestIndex = 0;
    for (let i = 1; i < evaluations.length; i++) {
      if (evaluations[i].score > evaluations[bestIndex].score) {
        bestIndex = i;
      }
    }
    return { index: bestIndex, evaluation: evaluations[bestIndex] };
  }

  summarize(evaluations: EvaluationResult[]): EvaluationSummary | null {
    return summarizeEvaluations(evaluations);
  }
}
