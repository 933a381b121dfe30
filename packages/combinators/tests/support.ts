import { Writable } from 'node:stream';
import type { DestinationStream } from 'pino';
import { vi } from 'vitest';

import type { DiagnosticSink } from '../src/diagnostics/sink';

export type Deferred<T> = {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
};

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Resolves after every pending microtask has run. */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function createRecordingSink() {
  const sink = {
    reportSuppressedError: vi.fn<(functionName: string, error: Error) => void>(),
    reportTiming: vi.fn<(functionName: string, elapsedSeconds: number) => void>(),
  } satisfies DiagnosticSink;
  return sink;
}

export function createMemoryDestination(): { destination: DestinationStream; lines: string[] } {
  const lines: string[] = [];
  const writable = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  return { destination: writable, lines };
}

/** Returns the queued values one per call, then keeps returning the last one. */
export function createFakeClock(...readings: number[]): () => number {
  let index = 0;
  return () => {
    const value = readings[Math.min(index, readings.length - 1)];
    index += 1;
    return value ?? 0;
  };
}
