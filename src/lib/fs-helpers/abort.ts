/**
 * Create an AbortError with the specified message.
 */
export function createAbortError(message = 'Operation aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Assert that the signal is not aborted, throwing if it is.
 *
 * @throws The signal's reason if it is an Error, otherwise an AbortError
 */
export function assertNotAborted(signal?: AbortSignal, message?: string): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    throw reason;
  }
  throw createAbortError(message);
}
