/**
 * Channel primitives used between callers and the dispatch loop
 *
 * - Request channel: unbounded, many producers, one consumer. Closes when the
 *   last producer is released or when the consumer closes it.
 * - Response slot: carries exactly one outcome from one writer to one reader.
 *   Either side going away is observable by the other.
 */

/**
 * Result handed through a response slot
 */
export type Outcome<T, E> = { ok: true; value: T } | { ok: false; error: E };

const COMPACT_THRESHOLD = 1024;

interface ChannelState<T> {
  buffer: T[];
  // Index of the next value to consume; consumed slots are compacted away in batches
  head: number;
  producers: number;
  closed: boolean;
  waiter: ((result: IteratorResult<T, undefined>) => void) | null;
}

/**
 * Producer side of a request channel
 */
export class Sender<T> {
  private released: boolean;

  /** @internal */
  constructor(
    private readonly state: ChannelState<T>,
    released = false
  ) {
    this.released = released;
    if (!released) {
      state.producers++;
    }
  }

  /**
   * Enqueue a value
   *
   * @returns false if the channel is closed or this sender was released
   */
  send(value: T): boolean {
    if (this.released || this.state.closed) {
      return false;
    }

    const waiter = this.state.waiter;
    if (waiter) {
      this.state.waiter = null;
      waiter({ done: false, value });
    } else {
      this.state.buffer.push(value);
    }
    return true;
  }

  /**
   * Create another producer for the same channel
   * A clone of a released or closed sender is released as well.
   */
  clone(): Sender<T> {
    return new Sender(this.state, this.isClosed());
  }

  /**
   * Release this producer. The channel closes when the last one is released.
   */
  close(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.state.producers--;

    if (this.state.producers === 0) {
      this.state.closed = true;
      this.wakeIfDrained();
    }
  }

  isClosed(): boolean {
    return this.released || this.state.closed;
  }

  private wakeIfDrained(): void {
    const waiter = this.state.waiter;
    if (waiter && this.state.buffer.length === this.state.head) {
      this.state.waiter = null;
      waiter({ done: true, value: undefined });
    }
  }
}

/**
 * Consumer side of a request channel
 *
 * Iterating yields values in submission order and ends once the channel is
 * closed and its buffer is drained.
 */
export class Receiver<T> implements AsyncIterable<T> {
  private iterating = false;

  /** @internal */
  constructor(private readonly state: ChannelState<T>) {}

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.iterating) {
      throw new Error('Receiver can only be iterated once');
    }
    this.iterating = true;

    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }

  /**
   * Stop accepting values
   *
   * @param onDropped - Called for every value still buffered, so its owner can be told
   */
  close(onDropped?: (value: T) => void): void {
    this.state.closed = true;
    const dropped = this.state.buffer.slice(this.state.head);
    this.state.buffer = [];
    this.state.head = 0;
    if (onDropped) {
      dropped.forEach(onDropped);
    }

    const waiter = this.state.waiter;
    if (waiter) {
      this.state.waiter = null;
      waiter({ done: true, value: undefined });
    }
  }

  isClosed(): boolean {
    return this.state.closed;
  }

  /**
   * Number of values waiting to be consumed
   */
  get size(): number {
    return this.state.buffer.length - this.state.head;
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const state = this.state;
    if (state.head < state.buffer.length) {
      const value = state.buffer[state.head];
      state.head++;
      if (state.head === state.buffer.length) {
        state.buffer = [];
        state.head = 0;
      } else if (state.head >= COMPACT_THRESHOLD && state.head * 2 >= state.buffer.length) {
        state.buffer = state.buffer.slice(state.head);
        state.head = 0;
      }
      return Promise.resolve({ done: false, value });
    }
    if (this.state.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.state.waiter = resolve;
    });
  }
}

/**
 * Create an unbounded multi-producer, single-consumer channel
 *
 * @example
 * ```typescript
 * const [tx, rx] = createRequestChannel<string>();
 * const tx2 = tx.clone();
 * tx.send('a');
 * tx2.send('b');
 * tx.close();
 * tx2.close();
 *
 * for await (const value of rx) {
 *   console.log(value); // 'a', then 'b'
 * }
 * ```
 */
export function createRequestChannel<T>(): [Sender<T>, Receiver<T>] {
  const state: ChannelState<T> = {
    buffer: [],
    head: 0,
    producers: 0,
    closed: false,
    waiter: null,
  };
  return [new Sender(state), new Receiver(state)];
}

type SlotState = 'open' | 'sent' | 'dropped' | 'abandoned';

interface SlotShared<T, E> {
  state: SlotState;
  outcome: Outcome<T, E> | undefined;
  notify: (() => void) | null;
}

/**
 * Write side of a response slot
 */
export class SlotWriter<T, E> {
  /** @internal */
  constructor(private readonly shared: SlotShared<T, E>) {}

  /**
   * Deliver the outcome
   *
   * @returns false if the reader is gone or an outcome was already delivered
   */
  send(outcome: Outcome<T, E>): boolean {
    if (this.shared.state !== 'open') {
      return false;
    }
    this.shared.state = 'sent';
    this.shared.outcome = outcome;
    this.shared.notify?.();
    return true;
  }

  /**
   * Release the writer without a value. A waiting reader resolves with undefined.
   */
  drop(): void {
    if (this.shared.state !== 'open') {
      return;
    }
    this.shared.state = 'dropped';
    this.shared.notify?.();
  }

  /**
   * Whether the reader still waits for an outcome
   */
  isOpen(): boolean {
    return this.shared.state === 'open';
  }
}

/**
 * Read side of a response slot
 */
export class SlotReader<T, E> {
  private received = false;

  /** @internal */
  constructor(private readonly shared: SlotShared<T, E>) {}

  /**
   * Wait for the outcome
   *
   * @param signal - Aborting it abandons the slot and rejects with the abort reason
   * @returns The outcome, or undefined if the writer was dropped without one
   */
  receive(signal?: AbortSignal): Promise<Outcome<T, E> | undefined> {
    if (this.received) {
      return Promise.reject(new Error('Response slot already received'));
    }
    this.received = true;

    return new Promise((resolve, reject) => {
      const settle = (): void => {
        this.shared.notify = null;
        signal?.removeEventListener('abort', onAbort);
        resolve(this.shared.outcome);
      };

      const onAbort = (): void => {
        this.shared.notify = null;
        this.abandon();
        reject(signal?.reason);
      };

      if (this.shared.state === 'sent' || this.shared.state === 'dropped') {
        settle();
        return;
      }

      if (signal?.aborted) {
        onAbort();
        return;
      }

      this.shared.notify = settle;
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Give up on the outcome. Later sends on the writer return false.
   */
  abandon(): void {
    if (this.shared.state === 'open') {
      this.shared.state = 'abandoned';
    }
  }
}

/**
 * Create a single-use handoff for one outcome
 *
 * @example
 * ```typescript
 * const [writer, reader] = createResponseSlot<Buffer, Error>();
 * writer.send({ ok: true, value: Buffer.from('ok') });
 * const outcome = await reader.receive(); // { ok: true, value: <Buffer 6f 6b> }
 * ```
 */
export function createResponseSlot<T, E>(): [SlotWriter<T, E>, SlotReader<T, E>] {
  const shared: SlotShared<T, E> = { state: 'open', outcome: undefined, notify: null };
  return [new SlotWriter(shared), new SlotReader(shared)];
}
