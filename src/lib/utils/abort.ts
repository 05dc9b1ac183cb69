/**
 * Cancellation helpers built on AbortController
 */

export function createAbortError(message: string = 'The operation was aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

/**
 * A signal that aborts as soon as any of the given signals aborts.
 */
export function anySignal(...sources: Array<AbortSignal | undefined>): AbortSignal {
  return AbortSignal.any(sources.filter((source): source is AbortSignal => source !== undefined));
}

/**
 * Resolve after `ms`, or reject with an AbortError once `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
