import { log } from './log';

/** Raised at a suspension point when its AbortSignal fires. */
export class AbortedError extends Error {
  constructor(message = 'operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function isAbortedError(err: unknown): err is AbortedError {
  return err instanceof AbortedError;
}

/**
 * Waits `ms`, or less if `signal` fires. Resolves `false` when cut short so callers
 * can tell a completed backoff from a cancelled one.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
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

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Settles with `promise`, or rejects with AbortedError as soon as `signal` fires. The abandoned
 * operation keeps running; a late failure from it is only logged.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AbortedError(`${label} abandoned`));
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) {
          log.debug({ err: error, event: 'abandoned_operation_failed', operation: label }, `${label} failed after abort`);
        }
        reject(error);
      },
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
