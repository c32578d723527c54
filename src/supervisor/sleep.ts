/**
 * Sleep for `ms`, waking early when `signal` aborts.
 *
 * Resolves true when the full delay elapsed, false when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface SettleOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Wait for `work` to settle, giving up when `signal` aborts or `timeoutMs`
 * passes. Resolves true when `work` settled first. `work` is not cancelled.
 */
export function settleWithin(
  work: Promise<unknown>,
  { signal, timeoutMs }: SettleOptions
): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    let timer: NodeJS.Timeout | undefined;
    const finish = (settled: boolean) => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(settled);
    };
    const onAbort = () => finish(false);

    work.then(
      () => finish(true),
      () => finish(true)
    );
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => finish(false), timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
