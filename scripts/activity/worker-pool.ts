import { RateLimitExceededError } from "./errors";

/** Concurrency per tier; the members bound stays below where secondary throttling starts failing silently. */
export const POOL_SIZES = {
  probe: 20,
  stats: 10,
  batch: 3,
  members: 4,
} as const;

export type PoolCompletion<TItem, TResult> =
  | { index: number; item: TItem; status: "fulfilled"; value: TResult }
  | { index: number; item: TItem; status: "rejected"; error: unknown };

/**
 * Runs `task` over `items` with at most `concurrency` in flight and yields
 * each completion as it happens. A rate-limit failure stops new tasks from
 * starting; the ones already running drain and are yielded before the
 * rate-limit error is rethrown.
 */
export async function* runPool<TItem, TResult>(
  items: readonly TItem[],
  concurrency: number,
  task: (item: TItem, index: number) => Promise<TResult>
): AsyncGenerator<PoolCompletion<TItem, TResult>> {
  const limit = Math.max(1, Math.floor(concurrency));
  const inFlight = new Map<number, Promise<PoolCompletion<TItem, TResult>>>();
  let nextIndex = 0;
  let fatal: RateLimitExceededError | null = null;

  const start = (index: number) => {
    const item = items[index];
    const settled = task(item, index).then(
      (value): PoolCompletion<TItem, TResult> => ({ index, item, status: "fulfilled", value }),
      (error: unknown): PoolCompletion<TItem, TResult> => ({ index, item, status: "rejected", error })
    );
    inFlight.set(index, settled);
  };

  while (nextIndex < items.length && inFlight.size < limit) {
    start(nextIndex++);
  }

  while (inFlight.size > 0) {
    const completion = await Promise.race(inFlight.values());
    inFlight.delete(completion.index);

    if (completion.status === "rejected" && completion.error instanceof RateLimitExceededError) {
      fatal ??= completion.error;
    } else {
      yield completion;
    }

    if (!fatal && nextIndex < items.length) {
      start(nextIndex++);
    }
  }

  if (fatal) {
    throw fatal;
  }
}

export interface CollectOptions<TItem, TResult> {
  onSettled?: (completion: PoolCompletion<TItem, TResult>, done: number, total: number) => void;
}

/** Drains `runPool` and returns completions in submission order. */
export async function collectPool<TItem, TResult>(
  items: readonly TItem[],
  concurrency: number,
  task: (item: TItem, index: number) => Promise<TResult>,
  options: CollectOptions<TItem, TResult> = {}
): Promise<Array<PoolCompletion<TItem, TResult>>> {
  const completions: Array<PoolCompletion<TItem, TResult>> = new Array(items.length);
  let done = 0;
  for await (const completion of runPool(items, concurrency, task)) {
    completions[completion.index] = completion;
    done += 1;
    options.onSettled?.(completion, done, items.length);
  }
  return completions;
}

/**
 * Counting semaphore shared by every pool of one tier, so the tier's bound
 * holds across concurrent members rather than per member.
 */
export class ConcurrencyLimiter {
  readonly limit: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(limit: number) {
    this.limit = Math.max(1, Math.floor(limit));
  }

  get inFlight(): number {
    return this.active;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active < this.limit) {
      this.active += 1;
    } else {
      // The releasing task hands its slot over, so `active` is unchanged.
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }
    try {
      return await task();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.active -= 1;
      }
    }
  }
}
