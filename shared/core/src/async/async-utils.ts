/**
 * Shared Async Utilities
 *
 * Bounded fan-out used by the classification stage and the data source's
 * detail lookups.
 */

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Index generator shared by the fan-out workers.
 * The check and the increment run in one synchronous block, so each index
 * is handed out exactly once.
 */
function createIndexGenerator(length: number): () => number | null {
  let currentIndex = 0;

  return (): number | null => {
    if (currentIndex >= length) {
      return null;
    }
    return currentIndex++;
  };
}

/**
 * Map items through fn with at most `concurrency` calls in flight.
 * Results keep the input order. The first rejection rejects the whole call,
 * so callers that must not abort wrap fn themselves.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new TypeError(`mapConcurrent: concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: R[] = new Array(items.length);
  const getNextIndex = createIndexGenerator(items.length);

  async function worker(): Promise<void> {
    let index: number | null;
    while ((index = getNextIndex()) !== null) {
      results[index] = await fn(items[index], index);
    }
  }

  const workers: Promise<void>[] = [];
  const workerCount = Math.min(concurrency, items.length);
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);
  return results;
}
