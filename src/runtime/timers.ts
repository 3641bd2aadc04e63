export const TIMED_OUT: unique symbol = Symbol("timed-out");
export const ABORTED: unique symbol = Symbol("aborted");

/**
 * Races `promise` against a timer and an optional abort signal. The timer and
 * the abort listener are always released; a rejection of `promise` propagates.
 */
export function raceTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T | typeof TIMED_OUT | typeof ABORTED> {
  if (signal?.aborted) return Promise.resolve(ABORTED);
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });
  const aborted = new Promise<typeof ABORTED>((resolve) => {
    if (!signal) return;
    onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([promise, timeout, aborted]).finally(() => {
    clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener("abort", onAbort);
  });
}
