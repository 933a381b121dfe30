import { functionName, wrapCall, type Named } from '../core/wrapCall';
import { getDefaultDiagnosticSink, type DiagnosticSink } from '../diagnostics/sink';
import { createCombinatorConfigurationError, type CombinatorName } from '../errors/combinatorErrors';
import { monotonicClock, type Clock } from '../timing/clock';

export type TimingHandler = (functionName: string, elapsed: number) => void;

export type TimeitOptions = {
  /** Defaults to `monotonicClock` (seconds) */
  timer?: Clock;
  handler?: TimingHandler;
  /** Default: `getDefaultDiagnosticSink()` */
  sink?: DiagnosticSink;
};

export type Timer = <TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
) => (...args: TArgs) => TResult;

export type AsyncTimer = <TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
) => (...args: TArgs) => Promise<Awaited<TResult>>;

type Stopwatch = {
  start(): number;
  stop(target: Named, startedAt: number): void;
};

function createStopwatch(options: TimeitOptions, combinator: CombinatorName): Stopwatch {
  const { timer = monotonicClock, handler, sink } = options;

  if (typeof timer !== 'function') {
    throw createCombinatorConfigurationError(combinator, 'timer', 'must be a function');
  }

  return {
    start: () => timer(),
    stop: (target, startedAt) => {
      const elapsed = timer() - startedAt;
      const name = functionName(target);
      handler?.(name, elapsed);
      (sink ?? getDefaultDiagnosticSink()).reportTiming(name, elapsed);
    },
  };
}

function createTimer(options: TimeitOptions): Timer {
  const stopwatch = createStopwatch(options, 'timeit');

  return <TArgs extends unknown[], TResult>(target: (...args: TArgs) => TResult) =>
    wrapCall(target, (proceed): TResult => {
      const startedAt = stopwatch.start();
      const result = proceed();
      stopwatch.stop(target, startedAt);
      return result;
    });
}

function createAsyncTimer(options: TimeitOptions): AsyncTimer {
  const stopwatch = createStopwatch(options, 'timeitAsync');

  return <TArgs extends unknown[], TResult>(target: (...args: TArgs) => TResult) =>
    wrapCall(target, async (proceed): Promise<Awaited<TResult>> => {
      const startedAt = stopwatch.start();
      const result = await proceed();
      stopwatch.stop(target, startedAt);
      return result;
    });
}

/**
 * Measures one run of the target and reports `(name, elapsed)`.
 *
 * `handler` is called when given, and the sink always receives the timing as
 * `"<name> executed in <elapsed> seconds"`. The result is returned untouched; a throw
 * propagates without any report.
 *
 * Usable bare, `timeit(fn)`, or configured, `timeit({ timer, handler })(fn)`.
 */
export function timeit<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
): (...args: TArgs) => TResult;
export function timeit(options?: TimeitOptions): Timer;
export function timeit(targetOrOptions?: ((...args: never[]) => unknown) | TimeitOptions): unknown {
  if (typeof targetOrOptions === 'function') {
    return createTimer({})(targetOrOptions);
  }
  return createTimer(targetOrOptions ?? {});
}

timeit.configure = (options: TimeitOptions = {}): Timer => createTimer(options);

/** `timeit` for promise-returning targets; the clock stops when the promise settles. */
export function timeitAsync<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
): (...args: TArgs) => Promise<Awaited<TResult>>;
export function timeitAsync(options?: TimeitOptions): AsyncTimer;
export function timeitAsync(
  targetOrOptions?: ((...args: never[]) => unknown) | TimeitOptions,
): unknown {
  if (typeof targetOrOptions === 'function') {
    return createAsyncTimer({})(targetOrOptions);
  }
  return createAsyncTimer(targetOrOptions ?? {});
}

timeitAsync.configure = (options: TimeitOptions = {}): AsyncTimer => createAsyncTimer(options);
