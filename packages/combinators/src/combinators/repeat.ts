import { wrapCall } from '../core/wrapCall';
import { parsePolicyParameter, repeatCountSchema } from '../schemas';

/**
 * Calls the target `n` times in sequence with the same arguments and returns the last result.
 *
 * `repeat(1)` hands the target back unwrapped. A throw stops the sequence and propagates;
 * later repetitions do not run.
 *
 * @throws CombinatorConfigurationError when `n` is not a positive integer
 */
export function repeat(n: number) {
  const count = parsePolicyParameter(repeatCountSchema, n, 'repeat', 'n');

  return <TArgs extends unknown[], TResult>(
    target: (...args: TArgs) => TResult,
  ): ((...args: TArgs) => TResult) => {
    if (count === 1) {
      return target;
    }

    return wrapCall(target, (proceed) => {
      for (let i = 1; i < count; i++) {
        proceed();
      }
      return proceed();
    });
  };
}

/**
 * `repeat` for promise-returning targets: each repetition settles before the next one starts.
 */
export function repeatAsync(n: number) {
  const count = parsePolicyParameter(repeatCountSchema, n, 'repeatAsync', 'n');

  return <TArgs extends unknown[], TResult>(
    target: (...args: TArgs) => TResult,
  ): ((...args: TArgs) => Promise<Awaited<TResult>>) => {
    return wrapCall(target, async (proceed): Promise<Awaited<TResult>> => {
      for (let i = 1; i < count; i++) {
        await proceed();
      }
      return await proceed();
    });
  };
}
