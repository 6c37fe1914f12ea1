/**
 * Retry Utility with Exponential Backoff
 *
 * Centralized retry mechanism for the remote calls on the AI reasoning path.
 * Transient failures (timeouts, rate limits, 5xx, dropped connections) are retried;
 * malformed requests, auth failures and unconfigured services are not.
 */

import { logger } from './logger.js';
import { ServiceUnavailableError } from '../types/errors.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first call (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Custom delay function (overrides exponential backoff if provided) */
  getDelay?: (attempt: number, error: unknown) => number;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'isRetryable' | 'getDelay'>> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE']);

function readNumericField(error: object, field: string): number | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'number' ? value : undefined;
}

function classifyStatus(status: number | undefined): boolean | undefined {
  if (status === undefined) {
    return undefined;
  }
  // Rate limit (429) and server errors (5xx) are transient
  if (status === 429 || (status >= 500 && status < 600)) {
    return true;
  }
  // Other 4xx: malformed request, auth, not found
  if (status >= 400 && status < 500) {
    return false;
  }
  return undefined;
}

/**
 * Default retryable error detection
 * Retries on transient errors: 429, 5xx, ECONNRESET, ETIMEDOUT, timeouts
 */
function defaultIsRetryable(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }

  // Raised for missing configuration; no retry can succeed
  if (error instanceof ServiceUnavailableError) {
    return false;
  }

  // HTTP-style status from SDK errors (`status`), wrapped service errors (`statusCode`)
  // or raw responses (`response.status`)
  const response: unknown = Reflect.get(error, 'response');
  const responseStatus =
    response && typeof response === 'object' ? readNumericField(response, 'status') : undefined;
  for (const status of [readNumericField(error, 'status'), readNumericField(error, 'statusCode'), responseStatus]) {
    const verdict = classifyStatus(status);
    if (verdict !== undefined) {
      return verdict;
    }
  }

  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) {
    return true;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('connection') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('etimedout')
    ) {
      return true;
    }
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Extract Retry-After header value from an error, in milliseconds
 */
function getRetryAfterDelay(error: unknown): number | null {
  if (!error || typeof error !== 'object') {
    return null;
  }

  const response: unknown = Reflect.get(error, 'response');
  const candidates: unknown[] = [
    Reflect.get(error, 'headers'),
    response && typeof response === 'object' ? Reflect.get(response, 'headers') : undefined,
  ];

  for (const headers of candidates) {
    if (!headers || typeof headers !== 'object') {
      continue;
    }
    const retryAfter: unknown = Reflect.get(headers, 'retry-after') ?? Reflect.get(headers, 'Retry-After');
    const value = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
    if (typeof value === 'string' || typeof value === 'number') {
      const seconds = parseInt(String(value), 10);
      if (!isNaN(seconds) && seconds > 0) {
        return seconds * 1000;
      }
    }
  }

  return null;
}

/**
 * Retry an operation with exponential backoff
 *
 * @param operation - The operation to retry (async function)
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name)
 * @returns Result of the operation
 * @throws The last error if all retries are exhausted, or the first non-retryable error
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = defaultIsRetryable,
    getDelay,
  } = config;

  let lastError: unknown;
  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; attempt <= maxAttempts; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: maxAttempts + 1, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        logger.debug(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxAttempts) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: maxAttempts + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxAttempts + 1} attempts${contextStr}`
        );
        throw error;
      }

      let delay: number;
      if (getDelay) {
        delay = getDelay(attempt, error);
      } else {
        const retryAfterDelay = getRetryAfterDelay(error);
        if (retryAfterDelay !== null) {
          delay = Math.min(retryAfterDelay, maxDelay);
          logger.warn(
            { attempt: attempt + 1, maxAttempts: maxAttempts + 1, delay, retryAfter: retryAfterDelay, context },
            `Rate limit detected, using Retry-After header delay${contextStr}`
          );
        } else {
          delay = calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);
        }
      }

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: maxAttempts + 1,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxAttempts + 1})`
      );

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError || new Error('Operation failed after retries');
}

/**
 * Check if an error is retryable using default logic
 */
export function isRetryableError(error: unknown): boolean {
  return defaultIsRetryable(error);
}
