import { describe, it, expect, beforeEach } from 'vitest';
import {
  RuleEvaluationEngine,
  createRuleVersionCache,
  isActiveOn,
  selectActiveRuleVersion,
} from '../RuleEvaluationEngine.js';
import { InMemoryRuleVersionSource } from '../../mocks/InMemoryEligibilityStores.js';
import {
  booleanRequirement,
  buildRuleVersion,
  salaryRequirement,
  sponsorRequirement,
} from '../../mocks/fixtures.js';
import { factsFrom } from '../../../domain/eligibility/types.js';
import { RuleVersionNotFoundError } from '../../../types/errors.js';

describe('RuleEvaluationEngine', () => {
  let source: InMemoryRuleVersionSource;
  let engine: RuleEvaluationEngine;

  beforeEach(() => {
    source = new InMemoryRuleVersionSource();
    engine = new RuleEvaluationEngine(source);
  });

  describe('evaluate', () => {
    it('excludes requirements with missing facts from the denominator', () => {
      const result = engine.evaluate(buildRuleVersion(), factsFrom({ salary: 45000, sponsor: true }));

      expect(result.passed).toBe(1);
      expect(result.total).toBe(1);
      expect(result.confidence).toBe(1);
      expect(result.outcome).toBe('eligible');
      expect(result.missingFacts).toEqual(['has_degree']);
      expect(result.requirementsWithMissingFacts).toEqual(['has_degree']);
      expect(result.mandatoryMissing).toEqual([]);
    });

    it('forces not_eligible when a mandatory requirement fails', () => {
      const ruleVersion = buildRuleVersion({
        requirements: [salaryRequirement, ...['a', 'b', 'c', 'd'].map(code => booleanRequirement(code))],
      });
      const result = engine.evaluate(ruleVersion, factsFrom({ salary: 30000, a: true, b: true, c: true, d: true }));

      expect(result.confidence).toBe(0.8);
      expect(result.outcome).toBe('not_eligible');
    });

    it('routes to review when a mandatory requirement cannot be evaluated', () => {
      const ruleVersion = buildRuleVersion({ requirements: [salaryRequirement, sponsorRequirement] });
      const result = engine.evaluate(ruleVersion, factsFrom({ salary: 50000 }));

      expect(result.confidence).toBe(1);
      expect(result.outcome).toBe('requires_review');
      expect(result.mandatoryMissing).toEqual(['licensed_sponsor']);
      expect(result.missingFacts).toEqual(['sponsor']);
    });

    it('maps confidence bands to outcomes', () => {
      const ruleVersion = buildRuleVersion({
        requirements: ['a', 'b', 'c', 'd', 'e'].map(code => booleanRequirement(code)),
      });

      const low = engine.evaluate(ruleVersion, factsFrom({ a: true, b: true, c: false, d: false, e: false }));
      expect(low.confidence).toBe(0.4);
      expect(low.outcome).toBe('not_eligible');

      const middle = engine.evaluate(ruleVersion, factsFrom({ a: true, b: true, c: true, d: false, e: false }));
      expect(middle.confidence).toBe(0.6);
      expect(middle.outcome).toBe('requires_review');
    });

    it('reports zero confidence when nothing is evaluable', () => {
      const result = engine.evaluate(buildRuleVersion(), factsFrom({}));

      expect(result.total).toBe(0);
      expect(result.confidence).toBe(0);
      expect(result.outcome).toBe('not_eligible');
      expect(result.missingFacts).toEqual(['salary', 'has_degree']);
    });

    it('warns about a rule version without requirements', () => {
      const result = engine.evaluate(buildRuleVersion({ requirements: [] }), factsFrom({ salary: 1 }));

      expect(result.confidence).toBe(0);
      expect(result.warnings).toEqual(['Rule version rv-skilled-2024 has no requirements']);
    });

    it('records evaluation errors as failed requirements without aborting', () => {
      const ruleVersion = buildRuleVersion({
        requirements: [salaryRequirement, { code: 'broken', mandatory: false, expression: { op: 'bogus' } }],
      });
      const result = engine.evaluate(ruleVersion, factsFrom({ salary: 45000 }));

      expect(result.evaluations.map(evaluation => evaluation.status)).toEqual(['passed', 'error']);
      expect(result.passed).toBe(1);
      expect(result.total).toBe(2);
      expect(result.outcome).toBe('requires_review');
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toMatch(/^Requirement broken could not be evaluated: Invalid expression/);
    });

    it('treats an errored mandatory requirement as a mandatory failure', () => {
      const ruleVersion = buildRuleVersion({ requirements: [salaryRequirement] });
      const result = engine.evaluate(ruleVersion, factsFrom({ salary: 'not disclosed' }));

      expect(result.evaluations[0]?.status).toBe('error');
      expect(result.evaluations[0]?.error).toBe('Cannot coerce "not disclosed" to number');
      expect(result.outcome).toBe('not_eligible');
    });
  });

  describe('loadActiveRuleVersion', () => {
    const asOf = new Date('2024-06-30T12:00:00Z');

    it('selects the most recently created active version', async () => {
      source.add(
        buildRuleVersion({ id: 'rv-old', createdAt: new Date('2023-01-01T00:00:00Z') }),
        buildRuleVersion({ id: 'rv-new', createdAt: new Date('2024-03-01T00:00:00Z') })
      );

      const version = await engine.loadActiveRuleVersion('visa-skilled-worker', asOf);
      expect(version.id).toBe('rv-new');
    });

    it('breaks creation-time ties by id descending', () => {
      const createdAt = new Date('2024-03-01T00:00:00Z');
      const selected = selectActiveRuleVersion(
        [buildRuleVersion({ id: 'rv-a', createdAt }), buildRuleVersion({ id: 'rv-b', createdAt })],
        asOf
      );
      expect(selected?.id).toBe('rv-b');
    });

    it('throws RuleVersionNotFoundError when no version is in force', async () => {
      source.add(
        buildRuleVersion({ id: 'rv-draft', published: false }),
        buildRuleVersion({ id: 'rv-expired', effectiveTo: new Date('2024-01-31T00:00:00Z') })
      );

      await expect(engine.loadActiveRuleVersion('visa-skilled-worker', asOf)).rejects.toBeInstanceOf(
        RuleVersionNotFoundError
      );
    });

    it('caches lookups per visa type and day', async () => {
      source.add(buildRuleVersion());
      const cache = createRuleVersionCache();

      await engine.loadActiveRuleVersion('visa-skilled-worker', asOf, cache);
      await engine.loadActiveRuleVersion('visa-skilled-worker', new Date('2024-06-30T18:00:00Z'), cache);
      expect(source.callCount('findActiveRuleVersions')).toBe(1);

      await engine.loadActiveRuleVersion('visa-skilled-worker', new Date('2024-07-01T08:00:00Z'), cache);
      expect(source.callCount('findActiveRuleVersions')).toBe(2);
    });

    it('queries the source every time without a cache', async () => {
      source.add(buildRuleVersion());

      await engine.loadActiveRuleVersion('visa-skilled-worker', asOf);
      await engine.loadActiveRuleVersion('visa-skilled-worker', asOf);
      expect(source.callCount('findActiveRuleVersions')).toBe(2);
    });
  });

  describe('isActiveOn', () => {
    it('includes both ends of the effective window', () => {
      const version = buildRuleVersion({
        effectiveFrom: new Date('2024-01-01T00:00:00Z'),
        effectiveTo: new Date('2024-06-30T00:00:00Z'),
      });
      expect(isActiveOn(version, new Date('2024-01-01T00:00:00Z'))).toBe(true);
      expect(isActiveOn(version, new Date('2024-06-30T00:00:00Z'))).toBe(true);
      expect(isActiveOn(version, new Date('2024-06-30T00:00:01Z'))).toBe(false);
    });
  });
});
