import { getConfig } from '../config/callwrapConfig';
import { createLazyValue } from '../lifecycle/lazyValue';
import { createExecutorPool, type ExecutorPool, type ExecutorPoolEvents } from './executorPool';

export const DEFAULT_POOL_NAME = 'callwrap-default';

/**
 * Builds a pool sized from `CALLWRAP_POOL_MAX_WORKERS` (see `loadCallwrapConfig`).
 * Prefer creating one explicitly and passing it to `threadedRepeat`.
 */
export function createDefaultExecutorPool(events?: ExecutorPoolEvents): ExecutorPool {
  return createExecutorPool(DEFAULT_POOL_NAME, { maxWorkers: getConfig().poolMaxWorkers }, events);
}

const defaultPool = createLazyValue(() => createDefaultExecutorPool(), {
  // shutdown() only waits for the drain and never rejects
  onReset: (pool) => {
    void pool.shutdown();
  },
});

/** Shared fallback pool for callers that omit one. Created on first use. */
export function getDefaultExecutorPool(): ExecutorPool {
  return defaultPool.get();
}

/** Drops the shared pool; it stops taking work and drains in the background. */
export function resetDefaultExecutorPoolForTests(): void {
  defaultPool.reset();
}
