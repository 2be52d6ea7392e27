import pLimit from 'p-limit';

/**
 * Default number of concurrent note reads
 */
export const DEFAULT_CONCURRENCY = 8;

/**
 * Map items through an async function with at most `concurrency` calls in
 * flight. Results come back in input order, whatever order the calls
 * settle in. The first rejection rejects the whole map.
 *
 * @example
 * ```typescript
 * const notes = await mapConcurrent(commits, 4, (commit) => loadNote(commit, store, validator));
 * ```
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const limiter = pLimit(concurrency);
  return Promise.all(items.map((item, index) => limiter(() => fn(item, index))));
}
