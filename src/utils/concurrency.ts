/**
 * Runs `task` over `items` with at most `limit` calls in flight. Results keep the
 * input order. After the first rejection no new item is started, and that rejection
 * is rethrown once the calls already in flight have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (items.length === 0) {
    return [];
  }

  const workers = Math.max(1, Math.min(Math.floor(limit), items.length));
  const results: R[] = new Array(items.length);
  let cursor = 0;
  let failed = false;
  let firstError: unknown = null;

  const runWorker = async () => {
    while (!failed) {
      const index = cursor;
      cursor += 1;
      if (index >= items.length) {
        return;
      }
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
        return;
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, () => runWorker()));
  if (failed) {
    throw firstError;
  }
  return results;
}
