import { describe, it, expect } from 'vitest';
import { compareValues, evaluateExpression } from '../ExpressionEvaluator.js';
import { factsFrom } from '../../../domain/eligibility/types.js';
import type { Expression } from '../../../domain/eligibility/expression.js';
import { EvaluationError } from '../../../types/errors.js';

const salaryAtLeast = (threshold: number): Expression => ({
  op: 'compare',
  operator: '>=',
  left: { op: 'var', name: 'salary' },
  right: { op: 'literal', value: threshold },
});

describe('evaluateExpression', () => {
  describe('comparisons', () => {
    it('passes a numeric threshold', () => {
      const result = evaluateExpression(salaryAtLeast(38700), factsFrom({ salary: 45000 }));
      expect(result).toEqual({ value: true, missingVariables: [] });
    });

    it('fails a numeric threshold', () => {
      const result = evaluateExpression(salaryAtLeast(38700), factsFrom({ salary: 30000 }));
      expect(result.value).toBe(false);
    });

    it('treats the threshold itself as passing for >=', () => {
      expect(evaluateExpression(salaryAtLeast(38700), factsFrom({ salary: 38700 })).value).toBe(true);
    });

    it('coerces numeric strings when kinds differ', () => {
      expect(evaluateExpression(salaryAtLeast(38700), factsFrom({ salary: '45000' })).value).toBe(true);
    });

    it('uses the declared type of a variable', () => {
      const expression: Expression = {
        op: 'compare',
        operator: '<',
        left: { op: 'var', name: 'age', type: 'number' },
        right: { op: 'literal', value: '9' },
      };
      // Compared as strings "10" < "9" would be true; as numbers it is false
      expect(evaluateExpression(expression, factsFrom({ age: '10' })).value).toBe(false);
    });

    it('raises EvaluationError when a declared type cannot be coerced', () => {
      const expression: Expression = {
        op: 'compare',
        operator: '>',
        left: { op: 'var', name: 'age', type: 'number' },
        right: { op: 'literal', value: 18 },
      };
      expect(() => evaluateExpression(expression, factsFrom({ age: 'unknown' }))).toThrow(EvaluationError);
    });

    it('compares dates against ISO date strings', () => {
      const expression: Expression = {
        op: 'compare',
        operator: '<',
        left: { op: 'var', name: 'passport_expiry' },
        right: { op: 'literal', value: '2030-01-01' },
      };
      const facts = factsFrom({ passport_expiry: new Date('2027-06-30T00:00:00Z') });
      expect(evaluateExpression(expression, facts).value).toBe(true);
    });

    it('falls back to string equality for unrelated kinds', () => {
      const expression: Expression = {
        op: 'compare',
        operator: '==',
        left: { op: 'var', name: 'sponsor' },
        right: { op: 'literal', value: 'true' },
      };
      expect(evaluateExpression(expression, factsFrom({ sponsor: true })).value).toBe(true);
    });

    it('rejects ordering of incompatible operands', () => {
      const expression: Expression = {
        op: 'compare',
        operator: '>',
        left: { op: 'var', name: 'nationality' },
        right: { op: 'literal', value: 10 },
      };
      expect(() => evaluateExpression(expression, factsFrom({ nationality: 'FR' }))).toThrow(
        "Operator '>' cannot order string \"FR\" and number 10"
      );
    });

    it('rejects ordering of booleans', () => {
      expect(() => compareValues('>', true, false)).toThrow(EvaluationError);
    });

    it('rejects non-finite numbers instead of ordering them', () => {
      expect(() => compareValues('>', Number.NaN, 1)).toThrow(EvaluationError);
      expect(() => compareValues('>', Number.NaN, 1)).toThrow('Cannot compare non-finite number NaN');
      expect(() => compareValues('==', Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY)).toThrow(
        'Cannot compare non-finite number Infinity'
      );
    });

    it('rejects invalid dates', () => {
      expect(() => compareValues('<', new Date('not a date'), new Date('2024-01-01T00:00:00Z'))).toThrow(
        'Cannot compare non-finite number NaN'
      );
    });
  });

  describe('logical operators', () => {
    const facts = factsFrom({ salary: 45000, sponsor: true, has_degree: false });

    it('requires every operand of and', () => {
      const expression: Expression = {
        op: 'and',
        operands: [salaryAtLeast(38700), { op: 'var', name: 'has_degree' }],
      };
      expect(evaluateExpression(expression, facts).value).toBe(false);
    });

    it('accepts any operand of or', () => {
      const expression: Expression = {
        op: 'or',
        operands: [{ op: 'var', name: 'has_degree' }, { op: 'var', name: 'sponsor' }],
      };
      expect(evaluateExpression(expression, facts).value).toBe(true);
    });

    it('negates with not', () => {
      const expression: Expression = { op: 'not', operand: { op: 'var', name: 'has_degree' } };
      expect(evaluateExpression(expression, facts).value).toBe(true);
    });

    it('requires boolean facts where a condition is expected', () => {
      const expression: Expression = { op: 'not', operand: { op: 'var', name: 'salary' } };
      expect(() => evaluateExpression(expression, facts)).toThrow("Fact 'salary' must be a boolean, got 45000");
    });
  });

  describe('membership', () => {
    const expression: Expression = {
      op: 'in',
      value: { op: 'var', name: 'english_level' },
      options: ['B1', 'B2', 'C1', 'C2'],
    };

    it('matches a listed option', () => {
      expect(evaluateExpression(expression, factsFrom({ english_level: 'B2' })).value).toBe(true);
    });

    it('rejects an unlisted option', () => {
      expect(evaluateExpression(expression, factsFrom({ english_level: 'A2' })).value).toBe(false);
    });
  });

  describe('missing facts', () => {
    it('returns null and lists the missing variables', () => {
      const expression: Expression = {
        op: 'and',
        operands: [
          { op: 'var', name: 'has_degree' },
          salaryAtLeast(38700),
          { op: 'not', operand: { op: 'var', name: 'has_degree' } },
          { op: 'var', name: 'sponsor' },
        ],
      };
      const result = evaluateExpression(expression, factsFrom({ salary: 45000 }));
      expect(result).toEqual({ value: null, missingVariables: ['has_degree', 'sponsor'] });
    });

    it('stays indeterminate even when an or branch would already be true', () => {
      const expression: Expression = {
        op: 'or',
        operands: [{ op: 'var', name: 'sponsor' }, { op: 'var', name: 'has_degree' }],
      };
      const result = evaluateExpression(expression, factsFrom({ sponsor: true }));
      expect(result).toEqual({ value: null, missingVariables: ['has_degree'] });
    });
  });
});
