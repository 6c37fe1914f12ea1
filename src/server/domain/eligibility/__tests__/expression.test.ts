import { describe, it, expect } from 'vitest';
import {
  extractVariables,
  parseExpression,
  validateExpressionStructure,
  MAX_EXPRESSION_DEPTH,
  type Expression,
} from '../expression.js';

function nestedNot(depth: number): unknown {
  let node: unknown = { op: 'var', name: 'sponsor' };
  for (let i = 1; i < depth; i++) {
    node = { op: 'not', operand: node };
  }
  return node;
}

describe('parseExpression', () => {
  it('accepts a well-formed tree', () => {
    const raw = {
      op: 'compare',
      operator: '>=',
      left: { op: 'var', name: 'salary', type: 'number' },
      right: { op: 'literal', value: 38700 },
    };
    const result = parseExpression(raw);
    expect(result).toEqual({ success: true, expression: raw });
  });

  it('rejects unknown operators', () => {
    const result = parseExpression({ op: 'eval', code: 'process.exit(1)' });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown comparison operator', () => {
    const result = parseExpression({
      op: 'compare',
      operator: '=~',
      left: { op: 'var', name: 'salary' },
      right: { op: 'literal', value: 1 },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toContain('at operator');
    }
  });

  it('rejects empty operand lists', () => {
    expect(parseExpression({ op: 'and', operands: [] }).success).toBe(false);
  });

  it('rejects trees deeper than the limit', () => {
    const result = parseExpression(nestedNot(MAX_EXPRESSION_DEPTH + 1));
    expect(result).toEqual({
      success: false,
      error: `Expression exceeds maximum depth of ${MAX_EXPRESSION_DEPTH}`,
    });
  });

  it('accepts trees at the depth limit', () => {
    expect(parseExpression(nestedNot(MAX_EXPRESSION_DEPTH)).success).toBe(true);
  });
});

describe('validateExpressionStructure', () => {
  it('counts nodes and depth', () => {
    const check = validateExpressionStructure({
      op: 'and',
      operands: [
        { op: 'var', name: 'a' },
        { op: 'var', name: 'b' },
      ],
    });
    // and-object, operands array, two var objects
    expect(check).toEqual({ valid: true, depth: 2, nodes: 4 });
  });

  it('rejects trees with too many nodes', () => {
    const operands = Array.from({ length: 20 }, (_, i) => ({ op: 'var', name: `f${i}` }));
    const check = validateExpressionStructure({ op: 'or', operands }, 20, 10);
    expect(check.valid).toBe(false);
    expect(check.error).toBe('Expression exceeds maximum of 10 nodes');
  });
});

describe('extractVariables', () => {
  it('lists each referenced fact once in order of appearance', () => {
    const expression: Expression = {
      op: 'or',
      operands: [
        { op: 'in', value: { op: 'var', name: 'english_level' }, options: ['B2'] },
        {
          op: 'compare',
          operator: '>',
          left: { op: 'var', name: 'salary' },
          right: { op: 'var', name: 'english_level' },
        },
      ],
    };
    expect(extractVariables(expression)).toEqual(['english_level', 'salary']);
  });
});
