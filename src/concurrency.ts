/** Upper bound on parallel work, whatever the caller asks for. */
export const MAX_CONCURRENCY_LIMIT = 10;

const MIN_CONCURRENCY = 1;

type ConcurrencyLimitedExecutor = <T>(task: () => Promise<T>) => Promise<T>;

type ProgressCallback = (completed: number, total: number) => void;

interface ConcurrencyExecutionOptions {
  readonly onProgress?: ProgressCallback;
}

export function clampConcurrency(limit: number): number {
  if (!Number.isFinite(limit)) return MIN_CONCURRENCY;
  return Math.min(
    Math.max(MIN_CONCURRENCY, Math.floor(limit)),
    MAX_CONCURRENCY_LIMIT
  );
}

/** Semaphore: at most `limit` tasks run at once, the rest wait in FIFO order. */
function createConcurrencyLimiter(limit: number): ConcurrencyLimitedExecutor {
  const maxConcurrency = clampConcurrency(limit);

  let activeCount = 0;
  const waitingQueue: (() => void)[] = [];

  return async <T>(task: () => Promise<T>): Promise<T> => {
    while (activeCount >= maxConcurrency) {
      await new Promise<void>((resolve) => waitingQueue.push(resolve));
    }

    activeCount++;
    try {
      return await task();
    } finally {
      activeCount--;
      const nextWaiting = waitingQueue.shift();
      if (nextWaiting) nextWaiting();
    }
  };
}

/**
 * Runs every task with bounded parallelism. A rejected task never cancels
 * the others; results come back settled, in task order.
 */
export async function runWithConcurrency<T>(
  limit: number,
  tasks: readonly (() => Promise<T>)[],
  options?: ConcurrencyExecutionOptions
): Promise<PromiseSettledResult<T>[]> {
  const limiter = createConcurrencyLimiter(limit);
  const totalTasks = tasks.length;
  let completedCount = 0;

  const wrappedTasks = tasks.map((task) => async (): Promise<T> => {
    try {
      return await limiter(task);
    } finally {
      completedCount++;
      options?.onProgress?.(completedCount, totalTasks);
    }
  });

  return Promise.allSettled(wrappedTasks.map((task) => task()));
}
