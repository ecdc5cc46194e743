/**
 * Limit how many tasks run at once. Tasks beyond the limit wait in FIFO order.
 *
 * @param concurrency - Maximum number of in-flight tasks.
 * @returns Function that runs a task under the limit and settles with its result.
 */
export function limitConcurrency(concurrency: number) {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError('concurrency must be a positive integer');
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const start = queue.shift();
    if (!start) return;
    active += 1;
    start();
  };

  return <T>(fn: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        void (async () => {
          try {
            resolve(await fn());
          } catch (error) {
            reject(error);
          } finally {
            active -= 1;
            next();
          }
        })();
      });
      next();
    });
}
