/**
 * Function-wrapping combinators: repetition, pooled repetition, error interception,
 * timing and a generic decorator builder.
 *
 * @example
 * ```ts
 * import { catchErrors, createExecutorPool, threadedRepeat, timeit } from '@callwrap/combinators';
 *
 * const pool = createExecutorPool('probes', { maxWorkers: 4 });
 * const probe = threadedRepeat(3, pool)(checkEndpoint);
 * const safeParse = catchErrors({ exception: SyntaxError, silent: true })(JSON.parse);
 * const timedBuild = timeit(build);
 * ```
 */

export * from './combinators';
export {
  functionName,
  getWrappedTarget,
  linkWrapper,
  unwrapAll,
  wrapCall,
  type CallPolicy,
  type Named,
} from './core/wrapCall';
export * from './pool';
export * from './diagnostics';
export { cpuClock, monotonicClock, type Clock } from './timing/clock';
export * from './errors';
export { err, isErr, isOk, mapResult, ok, unwrap, unwrapOr, type Err, type Ok, type Result } from './result';
export * from './config';
export { createLazyValue, type LazyValue, type LazyValueOptions } from './lifecycle/lazyValue';
export { logLevelSchema, maxWorkersSchema, repeatCountSchema, type LogLevel } from './schemas';
