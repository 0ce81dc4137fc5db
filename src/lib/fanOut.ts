import pLimit from 'p-limit';

export type TaskOutcome<R> = { ok: true; value: R } | { ok: false; error: unknown };

export interface FanOutOptions {
  concurrency: number;
  /** Absolute epoch ms; tasks still pending then resolve as failures. */
  deadline: number;
  now?: () => number;
  onTimeout?: (index: number) => Error;
}

/**
 * Runs `worker` over every item with at most `concurrency` in flight and joins
 * them no later than `deadline`. Outcomes keep the input order. Tasks left in
 * the queue still start afterwards, so the worker must honour the deadline too.
 */
export async function fanOut<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: FanOutOptions
): Promise<TaskOutcome<R>[]> {
  const now = options.now ?? Date.now;
  const limit = pLimit(Math.max(1, options.concurrency));
  const timeoutError = options.onTimeout ?? ((index: number) => new Error(`task ${index} did not finish before the deadline`));

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<'expired'>((resolve) => {
    timer = setTimeout(() => resolve('expired'), Math.max(0, options.deadline - now()));
  });

  const tasks = items.map((item, index) =>
    limit(() => worker(item, index)).then(
      (value): TaskOutcome<R> => ({ ok: true, value }),
      (error: unknown): TaskOutcome<R> => ({ ok: false, error })
    )
  );

  const settled: Array<TaskOutcome<R> | undefined> = new Array(items.length).fill(undefined);
  const joined = Promise.all(
    tasks.map((task, index) =>
      task.then((outcome) => {
        settled[index] = outcome;
      })
    )
  ).then(() => 'done' as const);

  try {
    await Promise.race([joined, expired]);
  } finally {
    clearTimeout(timer);
  }

  return settled.map((outcome, index) => outcome ?? { ok: false, error: timeoutError(index) });
}
