import type { Logger } from 'pino';

import { getConfig } from '../config/callwrapConfig';
import { createLazyValue } from '../lifecycle/lazyValue';
import { createDiagnosticLogger } from './diagnosticLogger';

/**
 * Side channel for what the combinators observe but do not return: errors a guard
 * swallowed and elapsed times measured by a timer.
 */
export interface DiagnosticSink {
  reportSuppressedError(functionName: string, error: Error): void;
  reportTiming(functionName: string, elapsedSeconds: number): void;
}

export function formatTiming(functionName: string, elapsedSeconds: number): string {
  return `${functionName} executed in ${elapsedSeconds} seconds`;
}

export function createLoggerSink(logger: Logger): DiagnosticSink {
  return {
    reportSuppressedError: (functionName, error) => {
      logger.error({ err: error, fn: functionName }, `${functionName} raised a suppressed error`);
    },
    reportTiming: (functionName, elapsedSeconds) => {
      logger.info({ fn: functionName, elapsedSeconds }, formatTiming(functionName, elapsedSeconds));
    },
  };
}

export const silentSink: DiagnosticSink = {
  reportSuppressedError: () => undefined,
  reportTiming: () => undefined,
};

const defaultSink = createLazyValue(() => {
  const config = getConfig();
  const logger = createDiagnosticLogger({
    level: config.logLevel,
    includeTraceContext: config.logTraceContext,
  });
  return createLoggerSink(logger);
});

/** Process-wide sink used by combinators that were not given one. Created on first use. */
export function getDefaultDiagnosticSink(): DiagnosticSink {
  return defaultSink.get();
}

export function resetDefaultDiagnosticSinkForTests(): void {
  defaultSink.reset();
}
