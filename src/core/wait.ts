/** Source of the current time in ms. */
export interface Clock {
  now(): number;
}

/** Suspends the caller for `ms` milliseconds. */
export interface AsyncWaiter {
  wait(ms: number): Promise<void>;
}

/** Blocks the calling thread for `ms` milliseconds. */
export interface SyncWaiter {
  waitSync(ms: number): void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Timer-backed waiter; honours fake timers in tests. */
export const timerWaiter: AsyncWaiter = {
  wait: (ms) =>
    new Promise<void>((resolve) => {
      setTimeout(resolve, ms);
    }),
};

// Atomics.wait on a private cell nobody notifies: a plain thread sleep.
const sleepCell = new Int32Array(new SharedArrayBuffer(4));

export const threadWaiter: SyncWaiter = {
  waitSync: (ms) => {
    if (ms <= 0) return;
    Atomics.wait(sleepCell, 0, 0, ms);
  },
};
