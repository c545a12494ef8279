import { setTimeout as delay } from 'node:timers/promises';

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. A slot is
 * refilled as soon as one call settles. Every item is settled; results keep
 * input order.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(limit) || limit <= 0) throw new Error('limit must be a positive integer');

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  // Workers share one iterator, so each entry is taken exactly once.
  const queue = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      try {
        // eslint-disable-next-line no-await-in-loop
        results[index] = { status: 'fulfilled', value: await fn(item, index) };
      } catch (e) {
        results[index] = { status: 'rejected', reason: e };
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

/** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, signal ? { signal } : undefined);
  } catch (e) {
    if (signal?.aborted) return;
    throw e;
  }
}
