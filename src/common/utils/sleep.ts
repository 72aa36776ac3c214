/** Raised when a pending sleep is aborted through its AbortSignal. */
export class InterruptedError extends Error {
  constructor(message = 'Sleep interrupted') {
    super(message);
    this.name = 'InterruptedError';
  }
}

/**
 * Resolves after `ms` milliseconds, or rejects with InterruptedError as soon
 * as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InterruptedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new InterruptedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
