import { throwIfAborted } from "./errors.js";

/**
 * Fixed-size worker pool: `concurrency` workers drain a shared queue of
 * items. Results land at the index of their input, so output order does not
 * depend on completion order. The first failure stops workers from taking
 * new items and is rethrown once in-flight tasks settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;
  let firstError: unknown;

  async function worker(): Promise<void> {
    while (!failed && next < items.length) {
      throwIfAborted(signal);
      const index = next++;
      try {
        results[index] = await task(items[index], index);
      } catch (e) {
        if (!failed) {
          failed = true;
          firstError = e;
        }
        return;
      }
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(
      worker().catch((e: unknown) => {
        if (!failed) {
          failed = true;
          firstError = e;
        }
      }),
    );
  }
  await Promise.all(workers);

  if (failed) throw firstError;
  return results;
}
