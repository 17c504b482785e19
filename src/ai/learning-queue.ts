/**
 * LearningQueue — detached FIFO worker for post-response learning.
 *
 * Callers enqueue and return immediately; tasks run one at a time after the
 * current call stack unwinds. A failing task is logged and reported as
 * `learning:failed`, and never reaches the caller that enqueued it.
 */

import type { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../utils/logger.js';

const log = createLogger('learning-queue');

// ── Types ────────────────────────────────────────────────────────────────────

export type LearningTask = () => Promise<void> | void;

interface QueuedTask {
  name: string;
  task: LearningTask;
}

export interface LearningQueueStats {
  pending: number;
  running: boolean;
  completed: number;
  failed: number;
}

// ── LearningQueue ────────────────────────────────────────────────────────────

export class LearningQueue {
  private readonly pending: QueuedTask[] = [];
  private running = false;
  private idleWaiters: Array<() => void> = [];
  private completed = 0;
  private failed = 0;

  constructor(private readonly eventBus?: EventBus) {}

  enqueue(name: string, task: LearningTask): void {
    this.pending.push({ name, task });
    if (!this.running) {
      this.running = true;
      this.run().catch((error: unknown) => {
        log.error({ err: error }, 'Learning worker stopped unexpectedly');
      });
    }
  }

  /**
   * Resolves once every queued task has finished.
   */
  drain(): Promise<void> {
    if (!this.running && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  getStats(): LearningQueueStats {
    return {
      pending: this.pending.length,
      running: this.running,
      completed: this.completed,
      failed: this.failed,
    };
  }

  private async run(): Promise<void> {
    // One microtask hop: enqueue() returns before the first task starts, but a
    // synchronous task can still finish before an awaiting caller resumes
    await Promise.resolve();

    try {
      let next = this.pending.shift();
      while (next) {
        try {
          await next.task();
          this.completed++;
        } catch (error) {
          this.failed++;
          const details = formatError(error);
          log.warn({ task: next.name, err: details }, 'Learning task failed');
          this.eventBus?.emit('learning:failed', { task: next.name, error: details.message, timestamp: new Date() });
        }
        next = this.pending.shift();
      }
    } finally {
      this.running = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
