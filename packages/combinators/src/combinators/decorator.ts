/**
 * Generic decorator builder.
 *
 * Turns a plain `body(target, args, keywords)` function into a decorator that can be applied
 * directly to a target or first given its own configuration arguments.
 *
 * Keyword arguments travel as a trailing `kw({ ... })` value, both when configuring the
 * decorator and when calling the decorated function. Configuration keywords are defaults:
 * a call-time keyword with the same name wins.
 *
 * @example
 * ```ts
 * const tagged = decorator((target: DecoratorTarget, args, keywords) => {
 *   console.log(keywords.tag, args);
 *   return target(...args);
 * });
 *
 * const a = tagged(send);                        // bare
 * const b = tagged('prefix', kw({ tag: 'x' }))(send); // configured
 * b('payload', kw({ tag: 'y' }));                // body(send, ['prefix', 'payload'], { tag: 'y' })
 * ```
 */

import { linkWrapper, type Named } from '../core/wrapCall';

export type Keywords = Readonly<Record<string, unknown>>;

export class KeywordArguments {
  readonly values: Keywords;

  constructor(values: Keywords) {
    this.values = Object.freeze({ ...values });
  }
}

/** Marks an object as keyword arguments rather than a positional value. */
export function kw(values: Keywords): KeywordArguments {
  return new KeywordArguments(values);
}

/**
 * Any function. Declared through a method signature so its parameters are compared bivariantly:
 * a target with typed parameters, such as `(payload: string) => void`, is still accepted.
 */
export type DecoratorTarget = { call(...args: unknown[]): unknown }['call'];

export type DecoratorBody<TTarget extends Named, TResult> = (
  target: TTarget,
  args: readonly unknown[],
  keywords: Keywords,
) => TResult;

export type Decorated<TResult> = (...args: unknown[]) => TResult;

export type ConfiguredDecorator<TTarget extends Named, TResult> = (target: TTarget) => Decorated<TResult>;

export interface DecoratorFactory<TTarget extends Named, TResult> {
  (target: TTarget): Decorated<TResult>;
  (...config: unknown[]): ConfiguredDecorator<TTarget, TResult>;
  /** Applies directly to `target`, whatever it is. */
  bare(target: TTarget): Decorated<TResult>;
  /** Treats every argument as configuration, even a lone function. */
  configure(...config: unknown[]): ConfiguredDecorator<TTarget, TResult>;
}

type SplitArguments = {
  args: readonly unknown[];
  keywords: Keywords;
};

export function splitKeywordArguments(values: readonly unknown[]): SplitArguments {
  const last = values.at(-1);
  if (last instanceof KeywordArguments) {
    return { args: values.slice(0, -1), keywords: last.values };
  }
  return { args: values, keywords: {} };
}

/**
 * The one call-shape rule: a single argument that is a function, with no keyword
 * arguments, is the target. Every other shape is configuration.
 */
export function isBareApplication<TTarget extends Named>(
  config: readonly unknown[],
): config is readonly [TTarget] {
  return config.length === 1 && typeof config[0] === 'function';
}

export function decorator<TTarget extends Named = DecoratorTarget, TResult = unknown>(
  body: DecoratorBody<TTarget, TResult>,
): DecoratorFactory<TTarget, TResult> {
  const bind = (target: TTarget, configuration: SplitArguments): Decorated<TResult> =>
    linkWrapper(target, (...callArgs: unknown[]): TResult => {
      const call = splitKeywordArguments(callArgs);
      return body(
        target,
        [...configuration.args, ...call.args],
        { ...configuration.keywords, ...call.keywords },
      );
    });

  const bare = (target: TTarget): Decorated<TResult> =>
    bind(target, { args: [], keywords: {} });

  const configure = (...config: unknown[]): ConfiguredDecorator<TTarget, TResult> => {
    const configuration = splitKeywordArguments(config);
    return (target) => bind(target, configuration);
  };

  function factory(target: TTarget): Decorated<TResult>;
  function factory(...config: unknown[]): ConfiguredDecorator<TTarget, TResult>;
  function factory(
    ...config: unknown[]
  ): Decorated<TResult> | ConfiguredDecorator<TTarget, TResult> {
    if (isBareApplication<TTarget>(config)) {
      return bare(config[0]);
    }
    return configure(...config);
  }

  return Object.assign(factory, { bare, configure });
}
