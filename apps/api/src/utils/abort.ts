// =====================================================
// Cancellation Helpers
// =====================================================

import { OperationCancelledError } from './errors';

/**
 * Options accepted by every store call and orchestrator operation.
 */
export interface CallOptions {
  signal?: AbortSignal;
}

export function throwIfAborted(operation: string, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation);
  }
}

/**
 * Race a pending call against the caller's signal. The underlying driver
 * call is abandoned, not rolled back: whatever it already committed stays.
 */
export function withAbort<T>(
  operation: string,
  signal: AbortSignal | undefined,
  work: () => Promise<T>
): Promise<T> {
  if (!signal) {
    return work();
  }
  throwIfAborted(operation, signal);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new OperationCancelledError(operation));
    signal.addEventListener('abort', onAbort, { once: true });

    work().then(
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
