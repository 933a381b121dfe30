export type LazyValue<T> = {
  get(): T;
  peek(): T | undefined;
  reset(): void;
};

export type LazyValueOptions<T> = {
  /** Called with the current value when `reset()` drops it. */
  onReset?: (value: T) => void;
};

/**
 * Creates `T` on first `get()` and caches it until `reset()`.
 */
export function createLazyValue<T>(create: () => T, options: LazyValueOptions<T> = {}): LazyValue<T> {
  type State = { type: 'empty' } | { type: 'filled'; value: T };
  let state: State = { type: 'empty' };

  return {
    get: () => {
      if (state.type === 'filled') {
        return state.value;
      }

      const value = create();
      state = { type: 'filled', value };
      return value;
    },
    peek: () => (state.type === 'filled' ? state.value : undefined),
    reset: () => {
      const previous = state;
      state = { type: 'empty' };
      if (previous.type === 'filled') {
        options.onReset?.(previous.value);
      }
    },
  };
}
