export type Env = Record<string, string | undefined>;

/**
 * - "fallback" (default): skip invalid values and try the next key; if none is valid, return fallback.
 * - "throw": throw an Error as soon as a non-empty value fails to parse.
 */
export type InvalidEnvPolicy = 'fallback' | 'throw';

export type ReadIntEnvOptions = {
  min?: number;
  max?: number;
  onInvalid?: InvalidEnvPolicy;
};

export type ReadBoolEnvOptions = {
  onInvalid?: InvalidEnvPolicy;
};

export type ReadStringEnvOptions = {
  trim?: boolean;
  /** Empty values are skipped by default; "throw" rejects them. */
  onEmpty?: InvalidEnvPolicy;
};

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

const TRUE_VALUES = ['true', '1', 'yes', 'y', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'n', 'off'];

function asKeyList(keys: readonly string[] | string): readonly string[] {
  return typeof keys === 'string' ? [keys] : keys;
}

/**
 * Walks `keys` in order and returns the first value `parse` accepts.
 * Unset and blank values are always skipped.
 */
function readEnv<T>(
  env: Env,
  keys: readonly string[] | string,
  fallback: T,
  parse: (trimmed: string) => Parsed<T>,
  onInvalid: InvalidEnvPolicy,
): T {
  for (const key of asKeyList(keys)) {
    const raw = env[key];
    if (raw === undefined) {
      continue;
    }

    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      continue;
    }

    const parsed = parse(trimmed);
    if (parsed.ok) {
      return parsed.value;
    }
    if (onInvalid === 'throw') {
      throw new Error(`${key} ${parsed.reason} (got "${trimmed}")`);
    }
  }

  return fallback;
}

export function readIntEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: number,
  options: ReadIntEnvOptions = {},
): number {
  return readEnv(
    env,
    keys,
    fallback,
    (trimmed): Parsed<number> => {
      const parsed = Number(trimmed);
      if (!Number.isSafeInteger(parsed)) {
        return { ok: false, reason: 'must be an integer' };
      }
      if (options.min !== undefined && parsed < options.min) {
        return { ok: false, reason: `must be >= ${options.min}` };
      }
      if (options.max !== undefined && parsed > options.max) {
        return { ok: false, reason: `must be <= ${options.max}` };
      }
      return { ok: true, value: parsed };
    },
    options.onInvalid ?? 'fallback',
  );
}

export function readBoolEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: boolean,
  options: ReadBoolEnvOptions = {},
): boolean {
  return readEnv(
    env,
    keys,
    fallback,
    (trimmed): Parsed<boolean> => {
      const normalized = trimmed.toLowerCase();
      if (TRUE_VALUES.includes(normalized)) {
        return { ok: true, value: true };
      }
      if (FALSE_VALUES.includes(normalized)) {
        return { ok: true, value: false };
      }
      return { ok: false, reason: 'must be a boolean (true/false, 1/0, yes/no, on/off)' };
    },
    options.onInvalid ?? 'fallback',
  );
}

export function readStringEnv(
  env: Env,
  keys: readonly string[] | string,
  fallback: string,
  options: ReadStringEnvOptions = {},
): string {
  const trim = options.trim ?? true;
  const onEmpty = options.onEmpty ?? 'fallback';

  for (const key of asKeyList(keys)) {
    const raw = env[key];
    if (raw === undefined) {
      continue;
    }

    const value = trim ? raw.trim() : raw;
    if (value.length === 0) {
      if (onEmpty === 'throw') {
        throw new Error(`${key} must be a non-empty string`);
      }
      continue;
    }

    return value;
  }

  return fallback;
}
