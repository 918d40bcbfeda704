/*
Purpose: run async work over a list with at most N items in flight.
Assumptions: items are admitted in list order; a slot frees as soon as its item settles.
Usage: await runWithConcurrency(jobs, (job) => compile(job), { concurrency: 4 }).
*/

import { ConfigurationError } from "./errors.js";

export type PoolSlot<R> = { status: "done"; value: R } | { status: "skipped" };

export type PoolOptions = {
  concurrency: number;
  signal?: AbortSignal;
};

// A worker that throws stops admission; items already running finish, then the first
// error is rethrown. Items never admitted (abort or error) come back as "skipped".
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PoolSlot<R>[]> {
  assertConcurrency(options.concurrency);

  const slots: PoolSlot<R>[] = items.map(() => ({ status: "skipped" }));
  const errors: unknown[] = [];
  let next = 0;

  const canAdmit = (): boolean =>
    errors.length === 0 && !options.signal?.aborted && next < items.length;

  const lane = async (): Promise<void> => {
    while (canAdmit()) {
      const index = next;
      next += 1;
      try {
        slots[index] = { status: "done", value: await worker(items[index], index) };
      } catch (err) {
        errors.push(err);
      }
    }
  };

  const laneCount = Math.min(options.concurrency, items.length);
  await Promise.all(Array.from({ length: laneCount }, () => lane()));

  if (errors.length > 0) {
    throw errors[0];
  }
  return slots;
}

export function assertConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(
      `Concurrency limit must be a positive integer (received ${concurrency}).`,
    );
  }
}
