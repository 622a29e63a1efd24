const keyTails = new Map<string, Promise<void>>();

/**
 * Serializes async work per key. Calls for different keys run concurrently;
 * calls for the same key run in arrival order, one at a time.
 */
export async function withKeyLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const previous = keyTails.get(key) ?? Promise.resolve();
  let release: () => void = () => {};
  const current = new Promise<void>((resolve) => {
    release = resolve;
  });
  const tail = previous.then(() => current);
  keyTails.set(key, tail);

  await previous;
  try {
    return await fn();
  } finally {
    release();
    if (keyTails.get(key) === tail) {
      keyTails.delete(key);
    }
  }
}

export function isKeyLocked(key: string): boolean {
  return keyTails.has(key);
}

export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Runs `fn` over `items` with at most `limit` calls in flight.
 * Results keep the input order.
 */
export async function runWithConcurrency<I, T>(
  items: readonly I[],
  limit: number,
  fn: (item: I) => Promise<T>
): Promise<Settled<T>[]> {
  const results: Settled<T>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { ok: true, value: await fn(items[index]) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  const width = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: width }, () => worker()));
  return results;
}
