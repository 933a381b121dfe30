import { availableParallelism } from 'node:os';

import { logLevelSchema, type LogLevel } from '../schemas';
import { createConfigAccessors } from './configAccessors';
import { createConfigBuilder } from './configBuilder';
import type { Env } from './env';

export type CallwrapConfig = {
  poolMaxWorkers: number;
  logLevel: LogLevel;
  logTraceContext: boolean;
};

/** Same sizing rule as a typical I/O-bound thread pool: a few more workers than cores, capped. */
export function defaultPoolMaxWorkers(): number {
  return Math.min(32, availableParallelism() + 4);
}

export function loadCallwrapConfig(env: Env = process.env): CallwrapConfig {
  const raw = createConfigBuilder(env)
    .int('poolMaxWorkers', 'CALLWRAP_POOL_MAX_WORKERS', defaultPoolMaxWorkers(), {
      min: 1,
      onInvalid: 'throw',
    })
    // Only the prefixed key: a process-wide LOG_LEVEL must not hide suppressed-error reports.
    .string('logLevel', 'CALLWRAP_LOG_LEVEL', 'info')
    .bool('logTraceContext', 'CALLWRAP_LOG_TRACE_CONTEXT', true, { onInvalid: 'throw' })
    .build();

  const logLevel = logLevelSchema.safeParse(raw.logLevel.toLowerCase());
  if (!logLevel.success) {
    throw new Error(
      `CALLWRAP_LOG_LEVEL must be one of ${logLevelSchema.options.join(', ')} (got "${raw.logLevel}")`,
    );
  }

  return {
    poolMaxWorkers: raw.poolMaxWorkers,
    logLevel: logLevel.data,
    logTraceContext: raw.logTraceContext,
  };
}

export const { getConfig, resetConfigForTests } = createConfigAccessors(() => loadCallwrapConfig());
