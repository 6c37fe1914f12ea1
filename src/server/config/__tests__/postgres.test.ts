import { describe, it, expect } from 'vitest';
import { isRetryablePostgresError } from '../postgres.js';

const pgError = (message: string, code: string): Error => Object.assign(new Error(message), { code });

describe('isRetryablePostgresError', () => {
  it.each([
    [pgError('terminating connection due to administrator command', '57P01'), true],
    [pgError('the database system is starting up', '57P03'), true],
    [pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED'), true],
    [new Error('Connection terminated unexpectedly'), true],
    [pgError('password authentication failed for user "postgres"', '28P01'), false],
    [pgError('relation "vector.document_chunks" does not exist', '42P01'), false],
    [{ code: '57P01' }, false],
  ])('%s -> %s', (error, expected) => {
    expect(isRetryablePostgresError(error)).toBe(expected);
  });
});
