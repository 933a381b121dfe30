export { ensureError } from './ensureError';
export {
  createCombinatorConfigurationError,
  createExecutorPoolShutdownError,
  isCombinatorConfigurationError,
  isExecutorPoolShutdownError,
  type CombinatorConfigurationError,
  type CombinatorName,
  type ExecutorPoolShutdownError,
} from './combinatorErrors';
