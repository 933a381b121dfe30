/**
 * Result type returned by the guard combinators.
 *
 * A suppressed call is a visible, typed outcome instead of a bare `undefined`, so a target that
 * legitimately returns `undefined` or `null` is never confused with one whose error was swallowed.
 *
 * @example
 * ```ts
 * const parse = catchErrors({ exception: SyntaxError, silent: true })(JSON.parse);
 *
 * const result = parse('{"a":1}');
 * if (result.ok) {
 *   console.log(result.value);
 * } else {
 *   console.log(result.error.functionName, result.error.reportedTo);
 * }
 * ```
 */

import { ensureError } from '../errors/ensureError';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Maps the success value, leaving an error untouched.
 */
export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  if (result.ok) {
    return ok(fn(result.value));
  }
  return result;
}

/**
 * Returns the value or throws. An error payload carrying its own `error` (such as a suppressed
 * call record) rethrows that original error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }

  const payload: unknown = result.error;
  if (payload !== null && typeof payload === 'object' && 'error' in payload) {
    throw ensureError(payload.error);
  }
  throw ensureError(payload);
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  if (result.ok) {
    return result.value;
  }
  return defaultValue;
}
