export type Limiter = {
  /** The number of held slots. */
  readonly active: number;
  readonly limit: number;
  /** Resolves once a slot is free, in request order. */
  acquire(): Promise<void>;
  release(): void;
};

/**
 * Counting semaphore bounding the number of concurrent tasks. An infinite
 * limit never makes `acquire` wait.
 */
export function createLimiter(limit = Number.POSITIVE_INFINITY): Limiter {
  if (!(limit >= 1)) throw new RangeError(`Invalid limit: ${limit}`);

  let active = 0;
  const waiters: (() => void)[] = [];

  return {
    get active() {
      return active;
    },
    limit,
    acquire() {
      if (active < limit) {
        active++;
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => waiters.push(resolve));
    },
    release() {
      const next = waiters.shift();
      // The slot passes straight to the next waiter.
      if (next) next();
      else active = Math.max(0, active - 1);
    },
  };
}
