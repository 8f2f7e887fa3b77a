/**
 * Settles with `promise` unless `signal` aborts first, in which case it
 * rejects with `onAbort()`. The listener is removed either way.
 */
export async function raceWithSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort: () => Error
): Promise<T> {
  if (!signal) return promise;

  let abortListener: () => void = () => undefined;
  const abortPromise = new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(onAbort());
      return;
    }
    abortListener = () => {
      reject(onAbort());
    };
    signal.addEventListener('abort', abortListener, { once: true });
  });

  try {
    return await Promise.race([promise, abortPromise]);
  } finally {
    signal.removeEventListener('abort', abortListener);
  }
}
