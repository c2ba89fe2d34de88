// Scheduling helpers for the dual runner

export type WorkerPool = {
  readonly size: number;
  submit<T>(task: () => Promise<T>): Promise<T>;
  // Tasks currently executing
  running(): number;
  // Tasks waiting for a free worker
  queued(): number;
};

/**
 * A fixed-size pool of workers. Tasks start in submission order as soon as a
 * worker is free; the returned promise settles with the task's outcome.
 */
export function createWorkerPool(size: number): WorkerPool {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`createWorkerPool: size must be a positive integer, got ${size}`);
  }
  let active = 0;
  const waiting: Array<() => void> = [];

  const dispatch = () => {
    while (active < size && waiting.length > 0) {
      const start = waiting.shift();
      start?.();
    }
  };

  return {
    size,
    submit<T>(task: () => Promise<T>): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        waiting.push(() => {
          active++;
          void Promise.resolve()
            .then(task)
            .then(resolve, reject)
            .finally(() => {
              active--;
              dispatch();
            });
        });
        dispatch();
      });
    },
    running: () => active,
    queued: () => waiting.length,
  };
}
