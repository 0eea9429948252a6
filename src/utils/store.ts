import { StoreOperationError, isSchemawrightError } from './errors.js'

/**
 * Runs a persistence call, wrapping foreign failures in
 * {@link StoreOperationError}. Library errors pass through unchanged.
 */
export async function callStore<R>(
  operation: string,
  fn: () => Promise<R>
): Promise<R> {
  try {
    return await fn()
  } catch (error) {
    if (isSchemawrightError(error)) throw error
    throw new StoreOperationError(
      operation,
      error instanceof Error ? error.message : String(error)
    )
  }
}
