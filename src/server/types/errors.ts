/**
 * Centralized error type definitions for the eligibility engine
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;

    super(message, 'NOT_FOUND', 404, true, { resource, identifier, ...additionalContext });
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'BAD_REQUEST', 400, true, context);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable', context?: Record<string, unknown>) {
    super(message, 'SERVICE_UNAVAILABLE', 503, true, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      'EXTERNAL_SERVICE_ERROR',
      502,
      true,
      { service, ...context }
    );
  }
}

/**
 * No published rule version is active for the visa type on the evaluation date.
 * There is no baseline to decide against, so the whole check aborts.
 */
export class RuleVersionNotFoundError extends NotFoundError {
  constructor(visaTypeId: string, asOf: Date) {
    super('Active rule version', visaTypeId, {
      asOf: asOf.toISOString(),
      retryable: false,
    });
  }
}

/**
 * Raised while evaluating a single requirement's expression. Scoped to that
 * requirement: the rule engine records it and carries on with the others.
 */
export class EvaluationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EVALUATION_ERROR', 422, true, context);
  }
}

export type AIFailureKind = 'embedding' | 'retrieval' | 'model';

/**
 * Base class for failures on the AI reasoning path. These never abort a check;
 * the coordinator falls back to the rule verdict.
 */
export class AIReasoningFailure extends AppError {
  public readonly kind: AIFailureKind;

  constructor(kind: AIFailureKind, code: string, message: string, cause?: unknown) {
    super(message, code, 502, true, {
      kind,
      cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    });
    this.kind = kind;
  }
}

export class EmbeddingFailure extends AIReasoningFailure {
  constructor(message: string, cause?: unknown) {
    super('embedding', 'EMBEDDING_FAILURE', message, cause);
  }
}

export class RetrievalFailure extends AIReasoningFailure {
  constructor(message: string, cause?: unknown) {
    super('retrieval', 'RETRIEVAL_FAILURE', message, cause);
  }
}

export class ModelFailure extends AIReasoningFailure {
  constructor(message: string, cause?: unknown) {
    super('model', 'MODEL_FAILURE', message, cause);
  }
}

export type ParsedField = 'outcome' | 'confidence';

/**
 * A field of the model response could not be parsed. Reported as a warning;
 * the field resolves to `unknown`.
 */
export class ParseFailure extends AppError {
  public readonly field: ParsedField;

  constructor(field: ParsedField, message: string) {
    super(message, 'PARSE_FAILURE', 422, true, { field });
    this.field = field;
  }
}

/**
 * Writing a result, reasoning log or citation failed. An unpersisted result is
 * unobservable, so the check fails.
 */
export class PersistenceFailure extends AppError {
  constructor(entity: string, cause: unknown) {
    super(
      `Failed to persist ${entity}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'PERSISTENCE_FAILURE',
      500,
      false,
      { entity }
    );
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
