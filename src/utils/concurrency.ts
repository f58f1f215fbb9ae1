import pMap from 'p-map';

/**
 * Map over items with limited concurrency, keeping input order in the result
 */
export async function mapInParallel<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  return pMap(items, fn, { concurrency: Math.max(1, concurrency) });
}
