/**
 * Error transformation utilities
 * Converts thrown values to the standardized error response
 */
import { isAppError, ErrorCode, type ErrorResponse } from '../types/errors.js';

const STATUS_LABELS: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

function statusLabel(statusCode: number): string {
  return STATUS_LABELS[statusCode] ?? (statusCode >= 500 ? 'Internal Server Error' : 'Error');
}

/**
 * Body-parser failures carry an HTTP status and a `type` such as 'entity.parse.failed'
 */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    typeof Reflect.get(error, 'status') === 'number' &&
    typeof Reflect.get(error, 'type') === 'string'
  );
}

/**
 * Transform error to standardized error response
 *
 * Messages of operational errors are passed through; anything else is reported
 * without its message so internals do not leak.
 */
export function transformErrorToResponse(
  error: unknown,
  path: string,
  includeStack = false
): ErrorResponse & { stack?: string } {
  const timestamp = new Date().toISOString();

  if (isAppError(error)) {
    const exposeMessage = error.isOperational || error.statusCode < 500;
    return {
      error: statusLabel(error.statusCode),
      code: error.code,
      message: exposeMessage ? error.message : 'An unexpected error occurred',
      statusCode: error.statusCode,
      timestamp,
      path,
      ...(error.isOperational && error.context ? { context: error.context } : {}),
      ...(includeStack && error.stack ? { stack: error.stack } : {}),
    };
  }

  if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    return {
      error: statusLabel(400),
      code: ErrorCode.BAD_REQUEST,
      message: 'Malformed request body',
      statusCode: 400,
      timestamp,
      path,
    };
  }

  return {
    error: statusLabel(500),
    code: ErrorCode.INTERNAL_SERVER_ERROR,
    message: 'An unexpected error occurred',
    statusCode: 500,
    timestamp,
    path,
    ...(includeStack && error instanceof Error && error.stack ? { stack: error.stack } : {}),
  };
}
