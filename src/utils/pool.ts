/**
 * Maps `items` through `worker` with at most `limit` calls in flight.
 * Results keep input order. `shouldStop` is checked before each item is picked up;
 * items never started are left out of the result.
 *
 * A worker that throws stops every lane from picking up further items. The first error
 * is rethrown once the calls already in flight have settled.
 */
export async function runWithConcurrency<T, U>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<U>,
  shouldStop: () => boolean = () => false
): Promise<U[]> {
  const results: { index: number; value: U }[] = [];
  let nextIndex = 0;
  let failed = false;

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (nextIndex < items.length) {
      if (failed || shouldStop()) return;
      const index = nextIndex++;
      try {
        results.push({ index, value: await worker(items[index], index) });
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  });

  const settled = await Promise.allSettled(lanes);
  for (const lane of settled) {
    if (lane.status === 'rejected') throw lane.reason;
  }
  return results.sort((a, b) => a.index - b.index).map((r) => r.value);
}
