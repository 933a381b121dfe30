import { wrapCall } from '../core/wrapCall';
import { collectInCompletionOrder } from '../pool/completion';
import { getDefaultExecutorPool } from '../pool/defaultPool';
import type { ExecutorPool } from '../pool/executorPool';
import { parsePolicyParameter, repeatCountSchema } from '../schemas';

/**
 * Submits `n` invocations of the target to an executor pool on every call and waits for all of them.
 *
 * The wrapper resolves to the value of whichever invocation settled *last*. That is neither the
 * first success nor the last one submitted; for an impure target it is effectively arbitrary.
 * If any invocation failed, the first failure observed is rethrown once all `n` have settled.
 *
 * `pool` defaults to `getDefaultExecutorPool()`, looked up at call time.
 *
 * @throws CombinatorConfigurationError when `n` is not a positive integer
 */
export function threadedRepeat(n: number, pool?: ExecutorPool) {
  const count = parsePolicyParameter(repeatCountSchema, n, 'threadedRepeat', 'n');

  return <TArgs extends unknown[], TResult>(
    target: (...args: TArgs) => TResult,
  ): ((...args: TArgs) => Promise<Awaited<TResult>>) => {
    return wrapCall(target, async (proceed): Promise<Awaited<TResult>> => {
      const executor = pool ?? getDefaultExecutorPool();
      const handles = Array.from({ length: count }, () => executor.submit(proceed));
      const outcomes = await collectInCompletionOrder(handles);

      const failure = outcomes.find((outcome) => outcome.status === 'rejected');
      if (failure?.status === 'rejected') {
        throw failure.reason;
      }

      // With no failure every outcome is fulfilled, and `count >= 1` keeps the list non-empty.
      const values = outcomes.flatMap((outcome): Awaited<TResult>[] =>
        outcome.status === 'fulfilled' ? [outcome.value] : [],
      );
      return values[values.length - 1];
    });
  };
}
