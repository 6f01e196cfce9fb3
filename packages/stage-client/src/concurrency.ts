/**
 * Bounded fan-out for stage requests
 */

/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 *
 * Resolves only after every started call has settled, so no request is
 * still running when the caller moves on. After the first failure no new
 * items are started, and that failure is rethrown once the rest settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;
  const failures: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index]!, index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: workerCount }, worker));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}

/**
 * Split `items` into at most `parts` contiguous, near-equal chunks
 */
export function chunk<T>(items: readonly T[], parts: number): T[][] {
  if (items.length === 0) return [];
  const size = Math.ceil(items.length / Math.max(1, Math.min(parts, items.length)));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
