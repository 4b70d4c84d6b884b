/**
 * gatehouse - Execution Strategies
 *
 * Every upstream call the identity adapter makes goes through an
 * `ExecutionStrategy`. The adapter's cache, lease and invalidation logic is
 * written once; the strategy only decides when a call is allowed to start.
 *
 * - `createDirectExecution()` starts each call immediately.
 * - `createQueuedExecution({ concurrency })` admits at most `concurrency`
 *   calls at a time and queues the rest in arrival order.
 *
 * Neither strategy retries or imposes a timeout; the transport's request
 * timeout is the only bound on a call.
 */

export interface ExecutionStrategy {
  readonly kind: 'direct' | 'queued';
  run<T>(task: () => Promise<T>): Promise<T>;
}

export function createDirectExecution(): ExecutionStrategy {
  return {
    kind: 'direct',
    run: (task) => task(),
  };
}

export interface QueuedExecutionOptions {
  /** Maximum number of calls in flight (default: 10). */
  concurrency?: number;
}

export interface QueuedExecution extends ExecutionStrategy {
  readonly kind: 'queued';
  /** Calls currently running. */
  readonly active: number;
  /** Calls waiting for a slot. */
  readonly pending: number;
}

export function createQueuedExecution(options: QueuedExecutionOptions = {}): QueuedExecution {
  const concurrency = options.concurrency ?? 10;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError('concurrency must be a positive integer');
  }

  const waiting: Array<() => void> = [];
  let active = 0;

  const acquireSlot = (): Promise<void> => {
    if (active < concurrency) {
      active++;
      return Promise.resolve();
    }
    // The slot is handed over by releaseSlot without decrementing `active`
    return new Promise<void>((resolve) => waiting.push(resolve));
  };

  const releaseSlot = (): void => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active--;
    }
  };

  return {
    kind: 'queued',
    get active() {
      return active;
    },
    get pending() {
      return waiting.length;
    },
    async run<T>(task: () => Promise<T>): Promise<T> {
      await acquireSlot();
      try {
        return await task();
      } finally {
        releaseSlot();
      }
    },
  };
}
