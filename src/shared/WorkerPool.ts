export type PoolOutcome<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: unknown };

/**
 * 固定大小的工作池：最多 concurrency 個 worker 同時執行。
 * 單一項目失敗只會記錄在其 outcome，不會取消其他項目。
 * 回傳順序為完成順序。
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>,
): Promise<Array<PoolOutcome<T, R>>> {
  const outcomes: Array<PoolOutcome<T, R>> = [];
  if (items.length === 0) return outcomes;

  let next = 0;
  const size = Math.max(1, Math.min(concurrency, items.length));

  const runWorker = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next++];
      try {
        const value = await worker(item);
        outcomes.push({ item, ok: true, value });
      } catch (error) {
        outcomes.push({ item, ok: false, error });
      }
    }
  };

  await Promise.all(Array.from({ length: size }, () => runWorker()));
  return outcomes;
}
