export type LimitedRunner = <T>(task: () => Promise<T>) => Promise<T>;

export function createConcurrencyLimiter(limit: number): LimitedRunner {
  const maxActive = Math.max(1, Math.floor(limit));
  let active = 0;
  const queue: Array<() => void> = [];

  // A released slot passes straight to the next waiter so late callers cannot overtake it.
  const release = (): void => {
    const next = queue.shift();
    if (next) {
      next();
      return;
    }
    active = Math.max(0, active - 1);
  };

  return async function runLimited<T>(task: () => Promise<T>): Promise<T> {
    if (active >= maxActive) {
      await new Promise<void>((resolve) => queue.push(resolve));
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}
