export type SettledHandle<T> =
  | { index: number; status: 'fulfilled'; value: T }
  | { index: number; status: 'rejected'; reason: unknown };

/**
 * Waits for every handle and resolves to their outcomes in the order they settled.
 * `index` is the handle's position in `handles`. Never rejects.
 */
export function collectInCompletionOrder<T>(
  handles: readonly PromiseLike<T>[],
): Promise<SettledHandle<T>[]> {
  if (handles.length === 0) {
    return Promise.resolve([]);
  }

  return new Promise((resolve) => {
    const settled: SettledHandle<T>[] = [];
    const record = (outcome: SettledHandle<T>): void => {
      settled.push(outcome);
      if (settled.length === handles.length) {
        resolve(settled);
      }
    };

    handles.forEach((handle, index) => {
      void handle.then(
        (value) => record({ index, status: 'fulfilled', value }),
        (reason: unknown) => record({ index, status: 'rejected', reason }),
      );
    });
  });
}
