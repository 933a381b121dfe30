/**
 * Executor pool: runs submitted units of work with at most `maxWorkers` in flight.
 *
 * Work beyond the limit waits in FIFO order. There is no queue limit and no timeout: every
 * submission eventually runs, and its handle settles with the work's value or error.
 *
 * @example
 * ```ts
 * const pool = createExecutorPool('scrapers', { maxWorkers: 4 });
 *
 * const pages = await Promise.all(urls.map((url) => pool.submit(() => fetchPage(url))));
 * await pool.shutdown();
 * ```
 */

import { createExecutorPoolShutdownError } from '../errors/combinatorErrors';
import { maxWorkersSchema, parsePolicyParameter } from '../schemas';

export type ExecutorPoolConfig = {
  /** Maximum concurrent units of work; `Infinity` for an unbounded pool */
  maxWorkers: number;
};

export type ExecutorPoolEvents = {
  onStart?: (poolName: string, active: number, queued: number) => void;
  onSettle?: (poolName: string, active: number, queued: number) => void;
};

export type ExecutorPool = {
  /** Schedules `work`; it never runs synchronously inside `submit`. */
  submit<T>(work: () => T): Promise<Awaited<T>>;
  /** Resolves once nothing is running or queued. */
  drain(): Promise<void>;
  /** Rejects further submissions, then drains what was already submitted. */
  shutdown(): Promise<void>;
  isShutdown(): boolean;
  getActiveCount(): number;
  getQueueLength(): number;
  getName(): string;
};

const DEFAULT_CONFIG: ExecutorPoolConfig = {
  maxWorkers: Number.POSITIVE_INFINITY,
};

export function createExecutorPool(
  poolName: string,
  config?: Partial<ExecutorPoolConfig>,
  events?: ExecutorPoolEvents,
): ExecutorPool {
  const cfg: ExecutorPoolConfig = { ...DEFAULT_CONFIG, ...config };
  const maxWorkers = parsePolicyParameter(maxWorkersSchema, cfg.maxWorkers, 'executorPool', 'maxWorkers');

  let activeCount = 0;
  let shutdown = false;
  const queue: Array<() => void> = [];
  let idleWaiters: Array<() => void> = [];

  const notifyIfIdle = (): void => {
    if (activeCount > 0 || queue.length > 0) {
      return;
    }
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const wake of waiters) {
      wake();
    }
  };

  const acquire = (): Promise<void> => {
    if (activeCount < maxWorkers) {
      activeCount++;
      events?.onStart?.(poolName, activeCount, queue.length);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      queue.push(resolve);
    });
  };

  const release = (): void => {
    activeCount--;
    events?.onSettle?.(poolName, activeCount, queue.length);

    const next = queue.shift();
    if (next) {
      activeCount++;
      events?.onStart?.(poolName, activeCount, queue.length);
      next();
      return;
    }
    notifyIfIdle();
  };

  const submit = async <T>(work: () => T): Promise<Awaited<T>> => {
    if (shutdown) {
      throw createExecutorPoolShutdownError(poolName);
    }

    await acquire();
    try {
      return await work();
    } finally {
      release();
    }
  };

  const drain = (): Promise<void> => {
    if (activeCount === 0 && queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      idleWaiters.push(() => resolve());
    });
  };

  return {
    submit,
    drain,
    shutdown: () => {
      shutdown = true;
      return drain();
    },
    isShutdown: () => shutdown,
    getActiveCount: () => activeCount,
    getQueueLength: () => queue.length,
    getName: () => poolName,
  };
}
