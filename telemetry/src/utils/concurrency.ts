export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class AbortedError extends Error {
  constructor(label: string) {
    super(`${label} aborted`);
    this.name = "AbortedError";
  }
}

export interface TimeoutOptions {
  /** Aborts the task, and rejects with AbortedError, when this signal fires */
  signal?: AbortSignal;
  /**
   * Time the task gets to settle after its signal is aborted at the deadline.
   * A task that answers within it wins over the TimeoutError.
   */
  graceMs?: number;
}

/**
 * Races `task` against a timer. The controller passed to the task is aborted
 * on timeout so that the underlying work can be cancelled.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions = {}
): Promise<T> {
  const { signal: parent, graceMs = 0 } = options;
  const controller = new AbortController();
  let fail: (error: Error) => void = () => {};
  const deadline = new Promise<never>((_, reject) => {
    fail = reject;
  });

  const expire = () => fail(new TimeoutError(label, timeoutMs));
  const onParentAbort = () => {
    controller.abort();
    fail(new AbortedError(label));
  };

  let timer: ReturnType<typeof setTimeout> = setTimeout(() => {
    controller.abort();
    if (graceMs > 0) {
      timer = setTimeout(expire, graceMs);
    } else {
      expire();
    }
  }, timeoutMs);

  parent?.addEventListener("abort", onParentAbort, { once: true });
  if (parent?.aborted) {
    onParentAbort();
  }

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Settles `worker` for every item with at most `limit` in flight, preserving
 * input order in the results.
 */
export async function settleWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const lane = async () => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: "fulfilled", value: await worker(items[index]) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
