// =====================================================
// Store Call Wrapper
// =====================================================
// Shared by every adapter: honors the caller's signal and maps driver
// failures to StoreUnavailableError.

import { AppError, StoreName, StoreUnavailableError } from '../utils/errors';
import { CallOptions, withAbort } from '../utils/abort';

export async function callStore<T>(
  store: StoreName,
  operation: string,
  options: CallOptions | undefined,
  work: () => Promise<T>
): Promise<T> {
  try {
    return await withAbort(`${store}.${operation}`, options?.signal, work);
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new StoreUnavailableError(store, operation, error);
  }
}
