import { describe, expect, it, vi } from 'vitest';

import { catchErrors, catchErrorsAsync } from '../src/combinators/catchErrors';
import { getWrappedTarget } from '../src/core/wrapCall';
import { isCombinatorConfigurationError } from '../src/errors/combinatorErrors';
import { unwrap } from '../src/result';
import { createRecordingSink } from './support';

class ValidationError extends Error {
  override name = 'ValidationError';
}

class LookupError extends Error {
  override name = 'LookupError';
}

function failWith(error: unknown): () => never {
  return () => {
    throw error;
  };
}

describe('catchErrors', () => {
  describe('bare form', () => {
    it('returns ok with the target result when nothing is thrown', () => {
      const wrapped = catchErrors((a: number, b: number) => a / b);

      expect(wrapped(6, 3)).toEqual({ ok: true, value: 2 });
    });

    it('keeps undefined results distinct from suppressed calls', () => {
      const wrapped = catchErrors(() => undefined);

      expect(wrapped()).toEqual({ ok: true, value: undefined });
    });

    it('keeps the target name and link', () => {
      function loadProfile(): string {
        return 'profile';
      }

      const wrapped = catchErrors(loadProfile);

      expect(wrapped.name).toBe('loadProfile');
      expect(getWrappedTarget(wrapped)).toBe(loadProfile);
    });
  });

  describe('matching', () => {
    it('suppresses a matched error and reports it to the sink', () => {
      const sink = createRecordingSink();
      const failure = new ValidationError('bad input');
      function parseOrder(): never {
        throw failure;
      }
      const wrapped = catchErrors({ exception: ValidationError, sink })(parseOrder);

      const result = wrapped();

      expect(result).toEqual({
        ok: false,
        error: { error: failure, functionName: 'parseOrder', reportedTo: 'sink' },
      });
      expect(sink.reportSuppressedError).toHaveBeenCalledTimes(1);
      expect(sink.reportSuppressedError).toHaveBeenCalledWith('parseOrder', failure);
    });

    it('lets unmatched errors propagate unchanged', () => {
      const sink = createRecordingSink();
      const failure = new LookupError('missing key');
      const wrapped = catchErrors({ exception: ValidationError, sink })(failWith(failure));

      let caught: unknown;
      try {
        wrapped();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBe(failure);
      expect(sink.reportSuppressedError).not.toHaveBeenCalled();
    });

    it('matches any class of a list', () => {
      const sink = createRecordingSink();
      const guard = catchErrors({ exception: [ValidationError, LookupError], sink });

      expect(guard(failWith(new LookupError('x')))().ok).toBe(false);
      expect(guard(failWith(new ValidationError('y')))().ok).toBe(false);
      expect(() => guard(failWith(new TypeError('z')))()).toThrow(TypeError);
    });

    it('matches subclasses of a configured class', () => {
      const sink = createRecordingSink();
      const wrapped = catchErrors({ exception: Error, sink })(failWith(new ValidationError('sub')));

      expect(wrapped().ok).toBe(false);
    });

    it('catches every thrown value when no class is configured', () => {
      const sink = createRecordingSink();
      const wrapped = catchErrors({ sink })(failWith('plain string'));

      const result = wrapped();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.error).toBeInstanceOf(Error);
        expect(result.error.error.message).toBe('plain string');
      }
    });

    it('keeps a non-error thrown value as the cause', () => {
      const thrown = { code: 42 };
      const wrapped = catchErrors({ silent: true })(failWith(thrown));

      const result = wrapped();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.error.message).toBe('Non-error value thrown (object)');
        expect(result.error.error.cause).toBe(thrown);
      }
    });
  });

  describe('reporting', () => {
    it('routes the error to the handler exactly once and skips the sink', () => {
      const sink = createRecordingSink();
      const handler = vi.fn();
      const failure = new ValidationError('handled');
      const wrapped = catchErrors({ handler, sink })(failWith(failure));

      const result = wrapped();

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(failure);
      expect(sink.reportSuppressedError).not.toHaveBeenCalled();
      expect(result).toMatchObject({ ok: false, error: { reportedTo: 'handler' } });
    });

    it('reports nothing when silent, even with a handler', () => {
      const sink = createRecordingSink();
      const handler = vi.fn();
      const wrapped = catchErrors({ handler, sink, silent: true })(failWith(new Error('quiet')));

      expect(wrapped()).toMatchObject({ ok: false, error: { reportedTo: 'none' } });
      expect(handler).not.toHaveBeenCalled();
      expect(sink.reportSuppressedError).not.toHaveBeenCalled();
    });

    it('propagates errors thrown by the handler', () => {
      const wrapped = catchErrors({
        handler: () => {
          throw new Error('handler broke');
        },
      })(failWith(new Error('original')));

      expect(() => wrapped()).toThrow('handler broke');
    });

    it('performs no reporting on success', () => {
      const handler = vi.fn();

      expect(catchErrors({ handler })(() => 'fine')()).toEqual({ ok: true, value: 'fine' });
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('configuration', () => {
    it('configure() skips the call-shape check', () => {
      const sink = createRecordingSink();
      const wrapped = catchErrors.configure({ sink })(failWith(new Error('x')));

      expect(wrapped().ok).toBe(false);
      expect(sink.reportSuppressedError).toHaveBeenCalledTimes(1);
    });

    it('accepts being called with no options', () => {
      const wrapped = catchErrors()(() => 3);

      expect(wrapped()).toEqual({ ok: true, value: 3 });
    });

    it('rejects an empty class list', () => {
      let caught: unknown;
      try {
        catchErrors({ exception: [] });
      } catch (error) {
        caught = error;
      }

      expect(isCombinatorConfigurationError(caught)).toBe(true);
      expect(caught).toMatchObject({ combinator: 'catchErrors', parameter: 'exception' });
    });
  });

  it('rethrows the original error through unwrap', () => {
    const failure = new ValidationError('unwrap me');
    const result = catchErrors({ silent: true })(failWith(failure))();

    expect(() => unwrap(result)).toThrow(failure);
  });
});

describe('catchErrorsAsync', () => {
  it('resolves ok with the awaited value', async () => {
    const wrapped = catchErrorsAsync(async (id: string) => ({ id }));

    await expect(wrapped('u1')).resolves.toEqual({ ok: true, value: { id: 'u1' } });
  });

  it('suppresses a matched rejection', async () => {
    const sink = createRecordingSink();
    const failure = new ValidationError('rejected');
    const wrapped = catchErrorsAsync({ exception: ValidationError, sink })(async () => {
      throw failure;
    });

    await expect(wrapped()).resolves.toMatchObject({
      ok: false,
      error: { error: failure, reportedTo: 'sink' },
    });
    expect(sink.reportSuppressedError).toHaveBeenCalledWith('anonymous', failure);
  });

  it('propagates an unmatched rejection', async () => {
    const failure = new LookupError('gone');
    const wrapped = catchErrorsAsync({ exception: ValidationError, silent: true })(async () => {
      throw failure;
    });

    await expect(wrapped()).rejects.toBe(failure);
  });
});
