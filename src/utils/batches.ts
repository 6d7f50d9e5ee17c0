/**
 * Batched Promise.all with a concurrency cap
 *
 * @module utils/batches
 */

/**
 * Map `items` through `fn`, at most `batchSize` calls in flight.
 * Results keep input order. The first rejection rejects the whole call and
 * no later batch is started.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const results: R[] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    const batchResults = await Promise.all(batch.map((item, offset) => fn(item, i + offset)));
    results.push(...batchResults);
  }
  return results;
}
