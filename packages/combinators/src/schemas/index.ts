import { z } from 'zod';

import { createCombinatorConfigurationError, type CombinatorName } from '../errors/combinatorErrors';

export const repeatCountSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .positive('must be >= 1')
  .max(Number.MAX_SAFE_INTEGER, 'must be a safe integer');

export const maxWorkersSchema = z.union(
  [
    z.number().int('must be an integer or Infinity').positive('must be >= 1'),
    z.literal(Number.POSITIVE_INFINITY),
  ],
  { errorMap: () => ({ message: 'must be a positive integer or Infinity' }) },
);

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Parses a decoration-time parameter, turning validation issues into a
 * `CombinatorConfigurationError`.
 */
export function parsePolicyParameter<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
  combinator: CombinatorName,
  parameter: string,
): z.output<TSchema> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw createCombinatorConfigurationError(combinator, parameter, `${reason} (got ${String(value)})`);
  }
  return parsed.data;
}
