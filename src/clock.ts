/**
 * Time sources for the monitor loop.
 *
 * `now()` is monotonic and drives every elapsed-time decision, so NTP
 * corrections and manual clock changes never shift escalation.
 * `wallTime()` is epoch milliseconds and only labels what leaves the process
 * (alerts, live events, API responses).
 */
export type Clock = Readonly<{
  /** Monotonic milliseconds; only differences are meaningful */
  now: () => number;
  /** Epoch milliseconds */
  wallTime: () => number;
}>;

export const systemClock: Clock = {
  now: () => performance.now(),
  wallTime: () => Date.now(),
};

/**
 * Map a monotonic reading taken from `clock` to epoch milliseconds.
 */
export function toWallTime(clock: Clock, monotonic: number): number {
  return Math.round(clock.wallTime() - (clock.now() - monotonic));
}

/**
 * Resolve after `ms` milliseconds, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
