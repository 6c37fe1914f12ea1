import { describe, it, expect, vi } from 'vitest';
import express, { type Request, type Response } from 'express';
import { validate } from '../validation.js';
import { eligibilitySchemas } from '../../validation/eligibilitySchemas.js';
import { BadRequestError } from '../../types/errors.js';

function buildRequest(parts: { params: Record<string, string>; body?: unknown }): Request {
  return Object.assign(Object.create(express.request), {
    method: 'POST',
    url: '/api/cases/case-1/eligibility',
    ...parts,
  });
}

const response: Response = Object.create(express.response);

describe('validate', () => {
  it('hands the parsed params and body to the handler', () => {
    const req = buildRequest({
      params: { caseId: '  case-1 ' },
      body: { visaTypeIds: ['visa-a', 'visa-a'], evaluationDate: '2024-03-15' },
    });
    const next = vi.fn();

    validate(eligibilitySchemas.checkEligibility)(req, response, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.params.caseId).toBe('case-1');
    expect(req.body).toEqual({ visaTypeIds: ['visa-a'], evaluationDate: new Date('2024-03-15T00:00:00.000Z') });
  });

  it('validates params on their own', () => {
    const req = buildRequest({ params: { caseId: 'case-7 ' } });
    const next = vi.fn();

    validate(eligibilitySchemas.listResults)(req, response, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.params).toEqual({ caseId: 'case-7' });
  });

  it('passes a BadRequestError with the issues', () => {
    const req = buildRequest({ params: { caseId: 'case 1' }, body: { visaTypeIds: ['visa-a'] } });
    const next = vi.fn();

    validate(eligibilitySchemas.checkEligibility)(req, response, next);

    const [error] = next.mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(BadRequestError);
    expect(error).toMatchObject({
      message: 'Validation failed',
      statusCode: 400,
      context: { details: [{ path: 'caseId', message: 'Identifier contains invalid characters' }] },
    });
  });
});
