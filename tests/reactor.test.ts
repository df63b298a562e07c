import { threadId } from 'node:worker_threads';
import { describe, expect, it } from 'vitest';
import { EventLoopReactor } from '../src/reactor.js';
import { createDeferred, createMockLogger } from './helpers.js';

describe('EventLoopReactor', () => {
  it('should run on the thread that created it', () => {
    expect(new EventLoopReactor().threadId).toBe(threadId);
  });

  it('should start spawned tasks asynchronously', async () => {
    const reactor = new EventLoopReactor();
    let started = false;

    reactor.spawn(async () => {
      started = true;
    });

    expect(started).toBe(false);
    expect(reactor.activeTasks).toBe(1);
    await reactor.idle();
    expect(started).toBe(true);
    expect(reactor.activeTasks).toBe(0);
  });

  it('should wait for tasks spawned while idling', async () => {
    const reactor = new EventLoopReactor();
    const gate = createDeferred<void>();
    const order: string[] = [];

    reactor.spawn(async () => {
      reactor.spawn(async () => {
        await gate.promise;
        order.push('inner');
      });
      order.push('outer');
    });

    const idle = reactor.idle().then(() => order.push('idle'));
    gate.resolve();
    await idle;

    expect(order).toEqual(['outer', 'inner', 'idle']);
  });

  it('should log a failed task and keep running others', async () => {
    const logger = createMockLogger();
    const reactor = new EventLoopReactor({ logger });
    const failure = new Error('task failed');
    let completed = false;

    reactor.spawn(async () => {
      throw failure;
    });
    reactor.spawn(async () => {
      completed = true;
    });
    await reactor.idle();

    expect(completed).toBe(true);
    expect(logger.error).toHaveBeenCalledWith('Reactor task failed:', failure);
  });
});
