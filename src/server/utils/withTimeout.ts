/**
 * Timeout utility for wrapping async operations
 *
 * Keeps remote calls (embedding, vector search, model completion) from hanging a check.
 */

/**
 * Thrown when a wrapped operation does not settle in time. Carries the
 * ETIMEDOUT code so the retry helper treats it as transient.
 */
export class OperationTimeoutError extends Error {
  public readonly code = 'ETIMEDOUT';

  constructor(operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Wrap a promise with a timeout
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Optional name for error messages
 * @returns The promise result or throws OperationTimeoutError
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  const operation = operationName || 'Operation';
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new OperationTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Default timeout values for remote calls (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Embedding generation - 15 seconds */
  EMBEDDING: 15000,
  /** Vector similarity search - 10 seconds */
  VECTOR_SEARCH: 10000,
  /** Model completion - 60 seconds */
  MODEL_COMPLETION: 60000,
} as const;
