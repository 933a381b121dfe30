export type CombinatorName =
  | 'repeat'
  | 'repeatAsync'
  | 'threadedRepeat'
  | 'catchErrors'
  | 'catchErrorsAsync'
  | 'timeit'
  | 'timeitAsync'
  | 'decorator'
  | 'executorPool';

/**
 * Raised at decoration time when a policy parameter is invalid
 * (e.g. a repeat count of zero). Never raised from a wrapped call.
 */
export type CombinatorConfigurationError = Error & {
  name: 'CombinatorConfigurationError';
  combinator: CombinatorName;
  parameter: string;
};

export type ExecutorPoolShutdownError = Error & {
  name: 'ExecutorPoolShutdownError';
  poolName: string;
};

export function createCombinatorConfigurationError(
  combinator: CombinatorName,
  parameter: string,
  reason: string,
): CombinatorConfigurationError {
  return Object.assign(new Error(`Invalid '${parameter}' for ${combinator}: ${reason}`), {
    name: 'CombinatorConfigurationError' as const,
    combinator,
    parameter,
  });
}

export function isCombinatorConfigurationError(
  error: unknown,
): error is CombinatorConfigurationError {
  return (
    error instanceof Error &&
    error.name === 'CombinatorConfigurationError' &&
    'combinator' in error &&
    'parameter' in error
  );
}

export function createExecutorPoolShutdownError(poolName: string): ExecutorPoolShutdownError {
  return Object.assign(new Error(`Cannot submit work to executor pool '${poolName}' after shutdown`), {
    name: 'ExecutorPoolShutdownError' as const,
    poolName,
  });
}

export function isExecutorPoolShutdownError(error: unknown): error is ExecutorPoolShutdownError {
  return error instanceof Error && error.name === 'ExecutorPoolShutdownError' && 'poolName' in error;
}
