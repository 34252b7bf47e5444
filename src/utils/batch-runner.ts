import { errorMessage } from './errors.js';

export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export interface BatchOutcome<T, R> {
  item: T;
  result: Result<R>;
}

export interface BatchProgress<T> {
  completed: number;
  total: number;
  item: T;
}

export interface RunBatchOptions<T> {
  concurrency: number;
  onProgress?: (progress: BatchProgress<T>) => void;
}

/**
 * Runs `worker` once per item with at most `concurrency` calls in flight.
 * Outcomes arrive in completion order; a rejected worker becomes
 * `{ ok: false }` and never stops the rest of the batch.
 */
export async function runBatch<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: RunBatchOptions<T>
): Promise<Array<BatchOutcome<T, R>>> {
  const outcomes: Array<BatchOutcome<T, R>> = [];
  const total = items.length;
  const limit = Math.max(1, Math.floor(options.concurrency) || 1);
  let nextIndex = 0;

  async function drain(): Promise<void> {
    while (true) {
      const index = nextIndex++;
      if (index >= total) break;
      const item = items[index];
      let result: Result<R>;
      try {
        result = { ok: true, value: await worker(item, index) };
      } catch (error) {
        result = { ok: false, error: errorMessage(error) };
      }
      outcomes.push({ item, result });
      options.onProgress?.({ completed: outcomes.length, total, item });
    }
  }

  const workers = Array.from({ length: Math.min(limit, total) }, () => drain());
  await Promise.all(workers);
  return outcomes;
}
