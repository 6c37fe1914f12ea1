/**
 * Builders for rule versions, requirements and chunks used by the tests
 */

import type { ContextChunk, Requirement, RuleVersion } from '../../domain/eligibility/types.js';

export const salaryRequirement: Requirement = {
  code: 'salary_threshold',
  mandatory: true,
  description: 'Salary meets the general threshold',
  expression: {
    op: 'compare',
    operator: '>=',
    left: { op: 'var', name: 'salary', type: 'number' },
    right: { op: 'literal', value: 38700 },
  },
};

export const sponsorRequirement: Requirement = {
  code: 'licensed_sponsor',
  mandatory: true,
  expression: { op: 'var', name: 'sponsor' },
};

export const degreeRequirement: Requirement = {
  code: 'has_degree',
  mandatory: false,
  expression: { op: 'var', name: 'has_degree' },
};

export function booleanRequirement(code: string, mandatory: boolean = false): Requirement {
  return { code, mandatory, expression: { op: 'var', name: code } };
}

export function buildRuleVersion(overrides: Partial<RuleVersion> = {}): RuleVersion {
  return {
    id: 'rv-skilled-2024',
    visaTypeId: 'visa-skilled-worker',
    visaCode: 'SKW',
    effectiveFrom: new Date('2024-01-01T00:00:00Z'),
    effectiveTo: null,
    published: true,
    createdAt: new Date('2023-12-01T00:00:00Z'),
    requirements: [salaryRequirement, degreeRequirement],
    ...overrides,
  };
}

export function buildChunk(overrides: Partial<ContextChunk> = {}): ContextChunk {
  return {
    chunkId: 'chunk-1',
    documentVersionId: 'docv-1',
    documentVersionCreatedAt: new Date('2024-02-01T00:00:00Z'),
    text: 'Applicants must be paid at least the general salary threshold of 38,700 per year.',
    similarity: 0.9,
    metadata: { visaCode: 'SKW', jurisdiction: 'UK' },
    ...overrides,
  };
}
