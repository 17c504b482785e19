import type {
  AdaptationContext,
  ErrorAnalysis,
  ErrorPattern,
  ExecutionMode,
  GenerationResult,
  LearningInsight,
  StrategyType,
  TaskType,
} from '../ai/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 * Components report through the bus instead of holding references to each other.
 */
export interface EventMap {
  // ── Routing events ─────────────────────────────────────────────────────
  'routing:decided': {
    requestId?: string;
    modelName: string;
    mode: ExecutionMode;
    taskType: TaskType;
    confidence: number;
    alternatives: string[];
    timestamp: Date;
  };
  'generation:attempt': {
    requestId?: string;
    prompt: string;
    result: GenerationResult;
    timestamp: Date;
  };
  'generation:completed': {
    requestId?: string;
    strategy: StrategyType;
    result: GenerationResult;
    timestamp: Date;
  };

  // ── Adaptive strategy events ───────────────────────────────────────────
  'strategy:selected': {
    requestId?: string;
    taskType: TaskType;
    strategy: StrategyType;
    confidence: number;
    reasoning: string;
    cached: boolean;
    timestamp: Date;
  };
  'strategy:adapted': AdaptationContext;

  // ── Registry events ────────────────────────────────────────────────────
  'model:disabled': { modelName: string; reason: string; timestamp: Date };
  'model:enabled': { modelName: string; timestamp: Date };

  // ── Error learning events ──────────────────────────────────────────────
  'error:analyzed': { modelName: string; taskType: TaskType; analysis: ErrorAnalysis; timestamp: Date };
  'mitigation:applied': { pattern: ErrorPattern; action: string; modelName?: string; timestamp: Date };
  'insight:generated': LearningInsight;
  'learning:failed': { task: string; error: string; timestamp: Date };

  // ── System events ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

type Handler<K extends keyof EventMap> = (payload: EventMap[K]) => void;

type AnyHandler = (payload: unknown) => void;

/**
 * Typed pub/sub event system for the router
 */
export class EventBus {
  private listeners: Map<keyof EventMap, Set<AnyHandler>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(event: K, handler: Handler<K>): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    handlers.add(handler as AnyHandler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(event: K, handler: Handler<K>): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler as AnyHandler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event to all subscribers
   */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    // One failing handler must not prevent delivery to the rest
    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event: String(event), err: error }, 'Error in event handler');

        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event: String(event),
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  /**
   * Subscribe to an event for a single occurrence
   */
  once<K extends keyof EventMap>(event: K, handler: Handler<K>): () => void {
    const wrappedHandler: Handler<K> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
