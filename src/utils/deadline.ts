import { DeadlineExceededError } from '../errors';

/**
 * Settle with `operation`, or reject with DeadlineExceededError as soon as
 * `signal` fires, whichever comes first.
 */
export async function withDeadline<T>(
  name: string,
  operation: () => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (!signal) {
    return operation();
  }
  if (signal.aborted) {
    throw new DeadlineExceededError(name, { cause: signal.reason });
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new DeadlineExceededError(name, { cause: signal.reason }));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    operation().then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
