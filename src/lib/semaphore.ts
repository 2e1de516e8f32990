/**
 * Single-slot limiter. Callers queue in FIFO order and each run gets the
 * slot to itself; used to serialise a capability that cannot take
 * concurrent calls.
 */
export function createSlotLimiter() {
  const queue: (() => void)[] = [];
  let running = false;

  function acquire(): Promise<void> {
    if (!running) {
      running = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => queue.push(resolve));
  }

  function release(): void {
    const next = queue.shift();
    if (next) {
      next(); // hand the slot to the next waiter
    } else {
      running = false;
    }
  }

  return {
    async run<T>(fn: () => Promise<T>): Promise<T> {
      await acquire();
      try {
        return await fn();
      } finally {
        release();
      }
    },

    /** Callers waiting for the slot (excludes the one holding it) */
    pending(): number {
      return queue.length;
    },
  };
}
