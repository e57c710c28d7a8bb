/**
 * Time helper functions
 */

/**
 * Wait for the given number of milliseconds
 *
 * The wait is a real timer, not a hint: relay settle delays depend on it.
 * Rejects with the signal's reason if the signal aborts first.
 *
 * @param ms - Delay in milliseconds
 * @param signal - Optional abort signal
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>(function(resolve, reject) {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    function onAbort(): void {
      clearTimeout(timer);
      reject(signal?.reason);
    }

    const timer = setTimeout(function() {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
