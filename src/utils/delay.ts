/**
 * Sleep helpers for request pacing
 */

/**
 * Wait for `ms` milliseconds. An aborted signal ends the wait early without
 * rejecting; callers check the signal themselves afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Draw a duration uniformly from [minMs, maxMs]
 */
export function uniformDelay(minMs: number, maxMs: number, random: () => number = Math.random): number {
  const low = Math.min(minMs, maxMs);
  const high = Math.max(minMs, maxMs);
  return low + random() * (high - low);
}
