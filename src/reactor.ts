import { threadId } from 'node:worker_threads';
import { type Logger, noopLogger } from './logger.js';

/**
 * An event loop that background tasks can be scheduled on
 *
 * A transport built with a reactor runs its dispatch loop as a task on it and
 * never starts a thread of its own. The client strategy receives the reactor
 * it will run on, whether it was supplied by the caller or created inside the
 * standalone worker.
 */
export interface Reactor {
  /**
   * Id of the thread whose event loop runs the tasks (0 for the main thread)
   */
  readonly threadId: number;

  /**
   * Number of spawned tasks that have not settled yet
   */
  readonly activeTasks: number;

  /**
   * Schedule a task. The task starts asynchronously, never inside this call.
   */
  spawn(task: () => Promise<void>): void;

  /**
   * Resolve once every spawned task has settled
   */
  idle(): Promise<void>;
}

/**
 * Reactor backed by the event loop of the thread that creates it
 *
 * @example
 * ```typescript
 * const reactor = new EventLoopReactor();
 * const transport = await HttpTransport.builder().reactor(reactor).build();
 *
 * // ... use the transport, then release it
 * transport.close();
 * await reactor.idle(); // dispatch loop has finished
 * ```
 */
export class EventLoopReactor implements Reactor {
  readonly threadId = threadId;
  private tasks = new Set<Promise<void>>();
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  get activeTasks(): number {
    return this.tasks.size;
  }

  spawn(task: () => Promise<void>): void {
    const running: Promise<void> = Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        this.logger.error('Reactor task failed:', error);
      })
      .finally(() => {
        this.tasks.delete(running);
      });
    this.tasks.add(running);
  }

  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }
}
