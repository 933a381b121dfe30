/**
 * Call Wrapper Core.
 *
 * Every combinator is a policy around one call of its target: the policy decides how often the
 * call runs and what comes back, while the wrapper keeps the target's arguments, `this` and name.
 */

/** Anything with a function name; every function type satisfies it. */
export type Named = { readonly name: string };

/**
 * Runs around one invocation. `proceed()` calls the target with the caller's `this` and arguments;
 * it can be called any number of times, including zero.
 */
export type CallPolicy<TArgs extends unknown[], TResult, TWrapped> = (
  proceed: () => TResult,
  args: TArgs,
) => TWrapped;

const wrappedTargets = new WeakMap<object, Named>();

/**
 * Gives `wrapper` the target's `name` and records the link returned by `getWrappedTarget`.
 */
export function linkWrapper<TWrapper extends Named>(target: Named, wrapper: TWrapper): TWrapper {
  Object.defineProperty(wrapper, 'name', { value: target.name, configurable: true });
  wrappedTargets.set(wrapper, target);
  return wrapper;
}

export function wrapCall<TArgs extends unknown[], TResult, TWrapped>(
  target: (...args: TArgs) => TResult,
  policy: CallPolicy<TArgs, TResult, TWrapped>,
): (...args: TArgs) => TWrapped {
  const wrapper = function (this: unknown, ...args: TArgs): TWrapped {
    return policy(() => target.apply(this, args), args);
  };
  return linkWrapper(target, wrapper);
}

/** The callable a wrapper was built around, or `undefined` for anything not built by this library. */
export function getWrappedTarget(fn: Named): Named | undefined {
  return wrappedTargets.get(fn);
}

/** Follows wrapper links down to the innermost callable. */
export function unwrapAll(fn: Named): Named {
  let current = fn;
  for (let next = wrappedTargets.get(current); next; next = wrappedTargets.get(current)) {
    current = next;
  }
  return current;
}

export function functionName(fn: Named): string {
  return fn.name.length > 0 ? fn.name : 'anonymous';
}
