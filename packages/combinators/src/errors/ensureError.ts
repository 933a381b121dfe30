/**
 * Normalizes a thrown value into an `Error`.
 *
 * `Error` instances are returned as-is, so identity checks against the thrown value still hold.
 * Strings become the message; anything else is kept as the `cause`.
 */
export function ensureError(value: unknown, fallbackMessage?: string): Error {
  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'string') {
    return new Error(value);
  }

  const message = fallbackMessage ?? `Non-error value thrown (${describeThrownValue(value)})`;
  return new Error(message, { cause: value });
}

function describeThrownValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
