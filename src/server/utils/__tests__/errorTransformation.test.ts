import { describe, it, expect } from 'vitest';
import { transformErrorToResponse } from '../errorTransformation.js';
import { BadRequestError, PersistenceFailure, RuleVersionNotFoundError } from '../../types/errors.js';

describe('transformErrorToResponse', () => {
  it('maps a missing rule version to 404', () => {
    const response = transformErrorToResponse(
      new RuleVersionNotFoundError('visa-unknown', new Date('2024-06-01T00:00:00Z')),
      '/api/cases/case-1/eligibility'
    );

    expect(response).toMatchObject({
      error: 'Not Found',
      code: 'NOT_FOUND',
      message: "Active rule version with identifier 'visa-unknown' not found",
      statusCode: 404,
      path: '/api/cases/case-1/eligibility',
      context: {
        resource: 'Active rule version',
        identifier: 'visa-unknown',
        asOf: '2024-06-01T00:00:00.000Z',
        retryable: false,
      },
    });
  });

  it('passes validation details through', () => {
    const response = transformErrorToResponse(
      new BadRequestError('Validation failed', { details: [{ path: 'visaTypeIds', message: 'Required' }] }),
      '/api/cases/case-1/eligibility'
    );

    expect(response.statusCode).toBe(400);
    expect(response.message).toBe('Validation failed');
    expect(response.context).toEqual({ details: [{ path: 'visaTypeIds', message: 'Required' }] });
  });

  it('hides the message of non-operational failures', () => {
    const response = transformErrorToResponse(new PersistenceFailure('eligibility result', new Error('E11000 duplicate key')), '/api/x');

    expect(response).toMatchObject({
      error: 'Internal Server Error',
      code: 'PERSISTENCE_FAILURE',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
    expect(response.context).toBeUndefined();
  });

  it('reports malformed JSON bodies as bad requests', () => {
    const parseError = Object.assign(new SyntaxError('Unexpected token } in JSON'), {
      status: 400,
      type: 'entity.parse.failed',
    });

    expect(transformErrorToResponse(parseError, '/api/x')).toMatchObject({
      code: 'BAD_REQUEST',
      message: 'Malformed request body',
      statusCode: 400,
    });
  });

  it('treats unknown errors as internal errors', () => {
    const response = transformErrorToResponse(new TypeError('Cannot read properties of undefined'), '/api/x');

    expect(response.code).toBe('INTERNAL_SERVER_ERROR');
    expect(response.message).toBe('An unexpected error occurred');
    expect(response.stack).toBeUndefined();
  });
});
