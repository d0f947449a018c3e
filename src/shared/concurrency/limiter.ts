/**
 * A tiny concurrency limiter (no external deps).
 * Usage:
 *   const limit = createLimiter(2);
 *   await Promise.all(items.map(i => limit(() => doWork(i))));
 *
 * With concurrency 1 it doubles as an async critical section: tasks run one at a time,
 * in submission order, and a task that sleeps holds every later caller back.
 */
export type Limiter = <T>(task: () => Promise<T> | T) => Promise<T>;

export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  const limit = <T>(task: () => Promise<T> | T): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });

  return limit;
};

export const createExclusiveSection = (): Limiter => createLimiter(1);
