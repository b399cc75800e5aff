export type Limiter = {
  run<T>(task: () => Promise<T>): Promise<T>;
  activeCount(): number;
  pendingCount(): number;
};

/**
 * Bounded task runner.
 *   const limiter = createLimiter(4);
 *   await Promise.allSettled(files.map((f) => limiter.run(() => put(f))));
 * `Infinity` disables the bound.
 */
export const createLimiter = (concurrency: number): Limiter => {
  const unbounded = concurrency === Number.POSITIVE_INFINITY;
  if (!unbounded && (!Number.isInteger(concurrency) || concurrency < 1)) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const drain = () => {
    while (active < concurrency && queue.length > 0) {
      const start = queue.shift();
      if (!start) return;
      active += 1;
      start();
    }
  };

  const run = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            drain();
          });
      });
      drain();
    });

  return {
    run,
    activeCount: () => active,
    pendingCount: () => queue.length
  };
};
