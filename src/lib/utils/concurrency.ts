export type Settled<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown }
  | { status: "skipped" };

/**
 * Runs `worker` over `items` with at most `limit` in flight. One failing item
 * never fails the batch: results come back per item, in input order.
 *
 * Once `signal` is aborted no new item is started; items already running are
 * left to finish (or time out) and unstarted items are reported as skipped.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Settled<R>[]> {
  const results = items.map((): Settled<R> => ({ status: "skipped" }));
  const queue = items.map((item, index) => ({ item, index }));

  async function run(): Promise<void> {
    while (!signal?.aborted) {
      const entry = queue.shift();
      if (!entry) return;
      const { item, index } = entry;
      try {
        results[index] = { status: "fulfilled", value: await worker(item, index) };
      } catch (err) {
        results[index] = { status: "rejected", reason: err };
      }
    }
  }

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => run()));
  return results;
}

/**
 * Collects fulfilled values, dropping rejected and skipped entries.
 */
export function fulfilledValues<R>(results: Settled<R>[]): R[] {
  const values: R[] = [];
  for (const result of results) {
    if (result.status === "fulfilled") {
      values.push(result.value);
    }
  }
  return values;
}

/**
 * Serializes async tasks: each task starts after the previous one settles.
 * Used to keep a single completion request in flight per assessment.
 */
export function createSerialQueue(): <T>(task: () => Promise<T>) => Promise<T> {
  let tail: Promise<unknown> = Promise.resolve();

  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task, task);
    tail = run.catch(() => undefined);
    return run;
  };
}
