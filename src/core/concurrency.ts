/**
 * Run `task` over `items` with at most `limit` in flight, keeping results
 * in input order whatever order they complete in.
 *
 * The first rejection stops new tasks from starting; tasks already running
 * are awaited before it is rethrown, so no work is left behind.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failure: { error: unknown } | undefined;

  const worker = async (): Promise<void> => {
    while (failure === undefined && next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = await task(item, index);
      } catch (error) {
        failure ??= { error };
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);

  if (failure !== undefined) throw failure.error;
  return results;
}
