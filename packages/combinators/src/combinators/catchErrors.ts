import { functionName, wrapCall, type Named } from '../core/wrapCall';
import { getDefaultDiagnosticSink, type DiagnosticSink } from '../diagnostics/sink';
import { createCombinatorConfigurationError, type CombinatorName } from '../errors/combinatorErrors';
import { ensureError } from '../errors/ensureError';
import { err, ok, type Result } from '../result';

export type ErrorClass = abstract new (...args: never[]) => unknown;

export type CatchOptions = {
  /** Error class(es) to intercept; omitted means every thrown value */
  exception?: ErrorClass | readonly ErrorClass[];
  /** Receives the intercepted error instead of the sink */
  handler?: (error: Error) => void;
  /** Suppress without reporting anything, even to `handler` */
  silent?: boolean;
  /** Where unhandled, non-silent errors are reported (default: `getDefaultDiagnosticSink()`) */
  sink?: DiagnosticSink;
};

export type SuppressedCall = {
  error: Error;
  functionName: string;
  reportedTo: 'handler' | 'sink' | 'none';
};

export type Guarded<T> = Result<T, SuppressedCall>;

export type Guard = <TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
) => (...args: TArgs) => Guarded<TResult>;

export type AsyncGuard = <TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
) => (...args: TArgs) => Promise<Guarded<Awaited<TResult>>>;

type Interceptor = {
  matches(thrown: unknown): boolean;
  suppress(target: Named, thrown: unknown): SuppressedCall;
};

function createInterceptor(options: CatchOptions, combinator: CombinatorName): Interceptor {
  const { exception, handler, silent = false, sink } = options;
  const classes = exception === undefined ? null : normalizeErrorClasses(exception, combinator);

  if (handler !== undefined && typeof handler !== 'function') {
    throw createCombinatorConfigurationError(combinator, 'handler', 'must be a function');
  }

  return {
    matches: (thrown) => classes === null || classes.some((cls) => thrown instanceof cls),
    suppress: (target, thrown) => {
      const error = ensureError(thrown);
      const name = functionName(target);

      if (silent) {
        return { error, functionName: name, reportedTo: 'none' };
      }
      if (handler) {
        handler(error);
        return { error, functionName: name, reportedTo: 'handler' };
      }
      (sink ?? getDefaultDiagnosticSink()).reportSuppressedError(name, error);
      return { error, functionName: name, reportedTo: 'sink' };
    },
  };
}

function normalizeErrorClasses(
  exception: ErrorClass | readonly ErrorClass[],
  combinator: CombinatorName,
): readonly ErrorClass[] {
  const classes: readonly unknown[] = Array.isArray(exception) ? exception : [exception];
  if (classes.length === 0) {
    throw createCombinatorConfigurationError(combinator, 'exception', 'must name at least one error class');
  }

  return classes.map((cls, index) => {
    if (!isErrorClass(cls)) {
      throw createCombinatorConfigurationError(
        combinator,
        'exception',
        `entry ${index} is not an error class (got ${typeof cls})`,
      );
    }
    return cls;
  });
}

// Arrow functions have no prototype and would make `instanceof` throw.
function isErrorClass(value: unknown): value is ErrorClass {
  return typeof value === 'function' && typeof value.prototype === 'object';
}

function createGuard(options: CatchOptions): Guard {
  const interceptor = createInterceptor(options, 'catchErrors');

  return <TArgs extends unknown[], TResult>(target: (...args: TArgs) => TResult) =>
    wrapCall(target, (proceed): Guarded<TResult> => {
      try {
        return ok(proceed());
      } catch (thrown: unknown) {
        if (!interceptor.matches(thrown)) {
          throw thrown;
        }
        return err(interceptor.suppress(target, thrown));
      }
    });
}

function createAsyncGuard(options: CatchOptions): AsyncGuard {
  const interceptor = createInterceptor(options, 'catchErrorsAsync');

  return <TArgs extends unknown[], TResult>(target: (...args: TArgs) => TResult) =>
    wrapCall(target, async (proceed): Promise<Guarded<Awaited<TResult>>> => {
      try {
        return ok(await proceed());
      } catch (thrown: unknown) {
        if (!interceptor.matches(thrown)) {
          throw thrown;
        }
        return err(interceptor.suppress(target, thrown));
      }
    });
}

/**
 * Intercepts errors thrown by the target and turns them into an `err(SuppressedCall)` result.
 *
 * Usable bare, `catchErrors(fn)`, or configured, `catchErrors({ exception: TypeError })(fn)`.
 * A function argument selects the bare form; anything else is configuration.
 *
 * Unless `silent`, each intercepted error is reported exactly once: to `handler` when given,
 * otherwise to the sink. Errors outside the configured classes propagate unchanged, as does
 * anything thrown by `handler`.
 *
 * Only synchronous throws are seen; use `catchErrorsAsync` for promise-returning targets.
 */
export function catchErrors<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
): (...args: TArgs) => Guarded<TResult>;
export function catchErrors(options?: CatchOptions): Guard;
export function catchErrors(targetOrOptions?: ((...args: never[]) => unknown) | CatchOptions): unknown {
  if (typeof targetOrOptions === 'function') {
    return createGuard({})(targetOrOptions);
  }
  return createGuard(targetOrOptions ?? {});
}

/** The configured form without the call-shape check. */
catchErrors.configure = (options: CatchOptions = {}): Guard => createGuard(options);

/**
 * `catchErrors` for promise-returning targets: rejections are intercepted the same way as throws.
 */
export function catchErrorsAsync<TArgs extends unknown[], TResult>(
  target: (...args: TArgs) => TResult,
): (...args: TArgs) => Promise<Guarded<Awaited<TResult>>>;
export function catchErrorsAsync(options?: CatchOptions): AsyncGuard;
export function catchErrorsAsync(
  targetOrOptions?: ((...args: never[]) => unknown) | CatchOptions,
): unknown {
  if (typeof targetOrOptions === 'function') {
    return createAsyncGuard({})(targetOrOptions);
  }
  return createAsyncGuard(targetOrOptions ?? {});
}

catchErrorsAsync.configure = (options: CatchOptions = {}): AsyncGuard => createAsyncGuard(options);
