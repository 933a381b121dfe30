import { describe, expect, it, vi } from 'vitest';

import { catchErrors } from '../src/combinators/catchErrors';
import { repeat } from '../src/combinators/repeat';
import { timeit } from '../src/combinators/timeit';
import { functionName, getWrappedTarget, unwrapAll, wrapCall } from '../src/core/wrapCall';
import { createFakeClock, createRecordingSink } from './support';

describe('wrapCall', () => {
  it('hands the policy a proceed function and the call arguments', () => {
    const target = vi.fn((a: number, b: string) => `${b}${a}`);
    const policy = vi.fn((proceed: () => string, args: [number, string]) => ({
      result: proceed(),
      args,
    }));

    const wrapped = wrapCall(target, policy);

    expect(wrapped(1, 'x')).toEqual({ result: 'x1', args: [1, 'x'] });
    expect(target).toHaveBeenCalledWith(1, 'x');
  });

  it('does not call the target unless the policy proceeds', () => {
    const target = vi.fn(() => 'never');

    const wrapped = wrapCall(target, () => 'skipped');

    expect(wrapped()).toBe('skipped');
    expect(target).not.toHaveBeenCalled();
  });

  it('returns a fresh wrapper that links back to the target', () => {
    function settle(): number {
      return 1;
    }

    const wrapped = wrapCall(settle, (proceed) => proceed());

    expect(wrapped).not.toBe(settle);
    expect(wrapped.name).toBe('settle');
    expect(getWrappedTarget(wrapped)).toBe(settle);
    expect(getWrappedTarget(settle)).toBeUndefined();
  });
});

describe('composition', () => {
  it('unwrapAll follows stacked combinators to the original', () => {
    function reconcile(): string {
      return 'done';
    }

    const sink = createRecordingSink();
    const timed = timeit({ timer: createFakeClock(0, 1), sink })(repeat(2)(reconcile));
    const stacked = catchErrors({ sink })(timed);

    expect(stacked()).toEqual({ ok: true, value: 'done' });
    expect(stacked.name).toBe('reconcile');
    expect(unwrapAll(stacked)).toBe(reconcile);
    expect(sink.reportTiming).toHaveBeenCalledWith('reconcile', 1);
  });
});

describe('functionName', () => {
  it('falls back for anonymous functions', () => {
    expect(functionName(() => undefined)).toBe('anonymous');
    expect(functionName(function named() {})).toBe('named');
  });
});
