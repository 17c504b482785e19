/**
 * Generation Client
 *
 * The one boundary that talks to a model provider. The routing core only
 * sees `GenerationClient`; `OpenAICompatibleClient` is the production
 * implementation over any OpenAI-compatible endpoint (OpenRouter by default).
 */

import OpenAI from 'openai';
import { resolveApiKey } from '../config/config.js';
import type { Config } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from './errors.js';
import type { GenerationResult, ModelDescriptor, ResponseFormat } from './types.js';

const log = createLogger('generation-client');

export interface GenerationClient {
  /** Never rejects: failures resolve to `success: false` with an error message */
  call(model: Readonly<ModelDescriptor>, prompt: string, format?: ResponseFormat): Promise<GenerationResult>;
}

export interface OpenAICompatibleClientOptions {
  apiKey: string;
  baseURL: string;
  timeoutMs?: number;
}

export class OpenAICompatibleClient implements GenerationClient {
  private readonly client: OpenAI;

  constructor(options: OpenAICompatibleClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async call(
    model: Readonly<ModelDescriptor>,
    prompt: string,
    format?: ResponseFormat,
  ): Promise<GenerationResult> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: model.name,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: model.maxTokens,
        temperature: model.temperature,
        top_p: model.topP,
        ...(format?.type === 'json_object' ? { response_format: { type: 'json_object' as const } } : {}),
      });

      const content = response.choices[0]?.message.content ?? '';
      const latencyMs = Date.now() - startTime;
      log.debug({ model: model.name, latencyMs, length: content.length }, 'Model call completed');

      return { modelName: model.name, content, latencyMs, success: true };
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ model: model.name, latencyMs, error: message }, 'Model call failed');

      return {
        modelName: model.name,
        content: '',
        latencyMs,
        success: false,
        error: `Model call failed: ${message}`,
      };
    }
  }
}

/**
 * Client for the configured default provider.
 * @throws ConfigurationError when the provider or its API key is missing
 */
export function createClientFromConfig(config: Config): OpenAICompatibleClient {
  const providerName = config.llm.default_provider;
  const provider = config.providers[providerName];
  if (!provider) {
    throw new ConfigurationError(`Provider "${providerName}" is not configured`);
  }

  const resolved = resolveApiKey(config, providerName);
  if (!resolved) {
    throw new ConfigurationError(
      `No API key for provider "${providerName}": set ROUTER_API_KEY or OPENROUTER_API_KEY`,
    );
  }
  if (resolved.source === 'config') {
    log.warn({ provider: providerName }, 'API key loaded from configuration file; prefer an environment variable');
  }

  return new OpenAICompatibleClient({
    apiKey: resolved.apiKey,
    baseURL: provider.base_url,
    timeoutMs: config.llm.timeout_ms,
  });
}
