export {
  createExecutorPool,
  type ExecutorPool,
  type ExecutorPoolConfig,
  type ExecutorPoolEvents,
} from './executorPool';
export { collectInCompletionOrder, type SettledHandle } from './completion';
export {
  createDefaultExecutorPool,
  DEFAULT_POOL_NAME,
  getDefaultExecutorPool,
  resetDefaultExecutorPoolForTests,
} from './defaultPool';
