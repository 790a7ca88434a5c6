/**
 * Creates a promise that resolves after the specified timeout.
 * Resolves early, without rejecting, when `signal` aborts.
 * @param timeout - The number of milliseconds to wait
 * @returns A promise that resolves after the timeout
 */
export const sleep = (timeout: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, timeout));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export type Sleep = (timeout: number, signal?: AbortSignal) => Promise<void>;
