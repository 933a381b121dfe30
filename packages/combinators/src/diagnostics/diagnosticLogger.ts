import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { context, trace } from '@opentelemetry/api';

import type { LogLevel } from '../schemas';

export type CreateDiagnosticLoggerOptions = {
  level: LogLevel;
  destination?: DestinationStream;
  /** Adds `traceId` and `spanId` of the active OpenTelemetry span (default: true). */
  includeTraceContext?: boolean;
  /** `false` drops the timestamp, mostly for tests. */
  timestamp?: boolean;
  base?: LoggerOptions['base'];
};

const traceContextMixin = (): Record<string, unknown> => {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const spanContext = span.spanContext();
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  };
};

/**
 * Creates the pino logger behind the default diagnostic sink.
 *
 * Levels are written as labels, timestamps as ISO strings, and errors logged under `err`
 * go through pino's standard serializer so the stack is kept.
 */
export function createDiagnosticLogger(options: CreateDiagnosticLoggerOptions): Logger {
  const includeTraceContext = options.includeTraceContext ?? true;

  const loggerOptions: LoggerOptions = {
    name: 'callwrap',
    level: options.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: { err: pino.stdSerializers.err },
    timestamp: options.timestamp === false ? false : pino.stdTimeFunctions.isoTime,
    ...(options.base !== undefined ? { base: options.base } : {}),
    ...(includeTraceContext ? { mixin: traceContextMixin } : {}),
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
