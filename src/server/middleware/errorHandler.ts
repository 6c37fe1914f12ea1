import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { transformErrorToResponse } from '../utils/errorTransformation.js';
import { NotFoundError, BadRequestError } from '../types/errors.js';

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * Transforms all errors to the standardized ErrorResponse format, logs them
 * with request context and returns a consistent JSON body.
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const message = err instanceof Error ? err.message : String(err);

    // Unknown cases and visa types are expected client errors
    if (err instanceof NotFoundError || err instanceof BadRequestError) {
        logger.info({ message, path: req.path, method: req.method }, 'Request rejected');
    } else {
        logger.error({
            error: err,
            message,
            stack: err instanceof Error ? err.stack : undefined,
            path: req.path,
            method: req.method,
        }, 'Unhandled error');
    }

    const errorResponse = transformErrorToResponse(err, req.path, process.env.NODE_ENV === 'development');

    // Client has already disconnected or a partial response went out
    if (res.headersSent || res.socket?.destroyed) {
        logger.debug({ path: req.path }, 'Response already sent, skipping error body');
        return;
    }

    res.status(errorResponse.statusCode).json(errorResponse);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
