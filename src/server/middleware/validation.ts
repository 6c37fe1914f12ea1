import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Validation middleware factory
 * Validates request body and params against Zod schemas. The parsed values
 * replace the raw ones, so handlers see trimmed and transformed input.
 * Passes BadRequestError on failure, so errors go through centralized error handling
 */
type ValidationSchema =
    | { body: ZodSchema; params?: ZodSchema }
    | { body?: ZodSchema; params: ZodSchema };

export function validate(schema: ValidationSchema) {
    return (req: Request, _res: Response, next: NextFunction): void => {
        try {
            if (schema.params) {
                req.params = schema.params.parse(req.params);
            }
            if (schema.body) {
                req.body = schema.body.parse(req.body);
            }
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const details = error.issues.map((e) => ({
                    path: e.path.join('.'),
                    message: e.message,
                }));
                logger.warn({ path: req.path, method: req.method, issues: details }, 'Request validation failed');
                next(new BadRequestError('Validation failed', { details }));
            } else {
                next(error);
            }
        }
    };
}
