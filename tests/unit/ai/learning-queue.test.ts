import { describe, expect, it, vi } from 'vitest';
import { LearningQueue } from '../../../src/ai/learning-queue.js';
import { EventBus } from '../../../src/kernel/event-bus.js';

describe('LearningQueue', () => {
  it('should not run tasks before the enqueuing call returns', async () => {
    const queue = new LearningQueue();
    const order: string[] = [];

    queue.enqueue('task', () => {
      order.push('task');
    });
    order.push('caller');
    await queue.drain();

    expect(order).toEqual(['caller', 'task']);
  });

  it('should run tasks one at a time in order', async () => {
    const queue = new LearningQueue();
    const order: string[] = [];

    queue.enqueue('slow', async () => {
      order.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push('slow:end');
    });
    queue.enqueue('fast', () => {
      order.push('fast');
    });
    await queue.drain();

    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
    expect(queue.getStats()).toEqual({ pending: 0, running: false, completed: 2, failed: 0 });
  });

  it('should report failures and keep going', async () => {
    const eventBus = new EventBus();
    const failed = vi.fn();
    eventBus.on('learning:failed', failed);
    const queue = new LearningQueue(eventBus);
    const after = vi.fn();

    queue.enqueue('broken', () => {
      throw new Error('store unavailable');
    });
    queue.enqueue('after', after);
    await queue.drain();

    expect(after).toHaveBeenCalledTimes(1);
    expect(failed).toHaveBeenCalledTimes(1);
    expect(failed.mock.calls[0]?.[0]).toMatchObject({ task: 'broken', error: 'store unavailable' });
    expect(queue.getStats()).toMatchObject({ completed: 1, failed: 1 });
  });

  it('should resolve drain immediately when idle', async () => {
    await expect(new LearningQueue().drain()).resolves.toBeUndefined();
  });

  it('should pick up tasks enqueued while draining', async () => {
    const queue = new LearningQueue();
    const order: string[] = [];

    queue.enqueue('first', () => {
      order.push('first');
      queue.enqueue('nested', () => {
        order.push('nested');
      });
    });
    await queue.drain();

    expect(order).toEqual(['first', 'nested']);
  });
});
