/**
 * Expression Evaluator
 *
 * Evaluates a requirement expression tree against the facts of a case.
 * Supports:
 * - Fact references (`var`), optionally with a declared type
 * - Scalar literals
 * - Comparisons: `==`, `!=`, `>`, `>=`, `<`, `<=`
 * - Logical operators: `and`, `or`, `not`
 * - Membership in a literal option list (`in`)
 *
 * A tree that references any fact the case lacks is indeterminate: the value is
 * null and the missing keys are reported, so callers can tell "false" apart from
 * "cannot be evaluated".
 */

import { EvaluationError } from '../../types/errors.js';
import type { FactMap, FactValue } from '../../domain/eligibility/types.js';
import {
  extractVariables,
  type ComparisonOperator,
  type DeclaredType,
  type Expression,
} from '../../domain/eligibility/expression.js';

export interface ExpressionEvaluation {
  value: boolean | null;
  missingVariables: string[];
}

type ValueKind = 'number' | 'string' | 'boolean' | 'date';

function kindOf(value: FactValue): ValueKind {
  if (value instanceof Date) return 'date';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  return 'string';
}

function describe(value: FactValue): string {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  return typeof value === 'number' ? String(value) : JSON.stringify(value);
}

function toNumber(value: FactValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value.trim());
    return Number.isFinite(num) ? num : undefined;
  }
  return undefined;
}

function toDate(value: FactValue): Date | undefined {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const time = Date.parse(value.trim());
    return isNaN(time) ? undefined : new Date(time);
  }
  return undefined;
}

function toBoolean(value: FactValue): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return undefined;
}

/**
 * Coerce a value to the declared type of the variable it is compared with
 * @throws {EvaluationError} When the value cannot be represented in that type
 */
function coerce(value: FactValue, type: DeclaredType): FactValue {
  let coerced: FactValue | undefined;
  switch (type) {
    case 'number':
      coerced = toNumber(value);
      break;
    case 'date':
      coerced = toDate(value);
      break;
    case 'boolean':
      coerced = toBoolean(value);
      break;
    case 'string':
      coerced = value instanceof Date ? value.toISOString() : String(value);
      break;
  }
  if (coerced === undefined) {
    throw new EvaluationError(`Cannot coerce ${describe(value)} to ${type}`, { declaredType: type });
  }
  return coerced;
}

function applyOrdering(operator: ComparisonOperator, order: number): boolean {
  switch (operator) {
    case '==':
      return order === 0;
    case '!=':
      return order !== 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
  }
}

/**
 * @throws {EvaluationError} For NaN or infinite operands, including invalid dates
 */
function orderOf(left: number | string, right: number | string): number {
  for (const operand of [left, right]) {
    if (typeof operand === 'number' && !Number.isFinite(operand)) {
      throw new EvaluationError(`Cannot compare non-finite number ${operand}`, { value: String(operand) });
    }
  }
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Compare two values that share a kind
 */
function compareSameKind(operator: ComparisonOperator, left: FactValue, right: FactValue): boolean {
  if (left instanceof Date && right instanceof Date) {
    return applyOrdering(operator, orderOf(left.getTime(), right.getTime()));
  }
  if (typeof left === 'boolean' && typeof right === 'boolean') {
    if (operator !== '==' && operator !== '!=') {
      throw new EvaluationError(`Operator '${operator}' cannot order boolean values`, { operator });
    }
    return operator === '==' ? left === right : left !== right;
  }
  if (typeof left === 'number' && typeof right === 'number') {
    return applyOrdering(operator, orderOf(left, right));
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return applyOrdering(operator, orderOf(left, right));
  }
  throw new EvaluationError(`Cannot compare ${describe(left)} with ${describe(right)}`, { operator });
}

/**
 * Compare two resolved values
 *
 * Declared type first, then native comparison for matching kinds, then numeric
 * coercion, then string equality. Ordering incompatible operands is an error.
 */
export function compareValues(
  operator: ComparisonOperator,
  left: FactValue,
  right: FactValue,
  declaredType?: DeclaredType
): boolean {
  if (declaredType) {
    return compareSameKind(operator, coerce(left, declaredType), coerce(right, declaredType));
  }

  const leftKind = kindOf(left);
  const rightKind = kindOf(right);
  if (leftKind === rightKind) {
    return compareSameKind(operator, left, right);
  }

  // A date compared with an ISO date string
  if (leftKind === 'date' || rightKind === 'date') {
    const leftDate = toDate(left);
    const rightDate = toDate(right);
    if (leftDate && rightDate) {
      return compareSameKind(operator, leftDate, rightDate);
    }
  }

  const leftNumber = toNumber(left);
  const rightNumber = toNumber(right);
  if (leftNumber !== undefined && rightNumber !== undefined) {
    return applyOrdering(operator, orderOf(leftNumber, rightNumber));
  }

  if (operator === '==' || operator === '!=') {
    const equal = String(left) === String(right);
    return operator === '==' ? equal : !equal;
  }

  throw new EvaluationError(
    `Operator '${operator}' cannot order ${leftKind} ${describe(left)} and ${rightKind} ${describe(right)}`,
    { operator, leftKind, rightKind }
  );
}

function declaredTypeOf(node: Expression): DeclaredType | undefined {
  return node.op === 'var' ? node.type : undefined;
}

/**
 * Resolve a node to a scalar. Callers guarantee every referenced fact is present.
 */
function resolve(node: Expression, facts: FactMap): FactValue {
  switch (node.op) {
    case 'var': {
      const value = facts.get(node.name);
      if (value === undefined) {
        throw new EvaluationError(`Fact '${node.name}' is not available`, { variable: node.name });
      }
      return node.type ? coerce(value, node.type) : value;
    }
    case 'literal':
      return node.value;
    default:
      return evaluateBoolean(node, facts);
  }
}

function evaluateBoolean(node: Expression, facts: FactMap): boolean {
  switch (node.op) {
    case 'var':
    case 'literal': {
      const value = resolve(node, facts);
      if (typeof value !== 'boolean') {
        const label = node.op === 'var' ? `Fact '${node.name}'` : 'Literal';
        throw new EvaluationError(`${label} must be a boolean, got ${describe(value)}`, { op: node.op });
      }
      return value;
    }
    case 'compare': {
      const declaredType = declaredTypeOf(node.left) ?? declaredTypeOf(node.right);
      return compareValues(node.operator, resolve(node.left, facts), resolve(node.right, facts), declaredType);
    }
    case 'and':
      return node.operands.every(operand => evaluateBoolean(operand, facts));
    case 'or':
      return node.operands.some(operand => evaluateBoolean(operand, facts));
    case 'not':
      return !evaluateBoolean(node.operand, facts);
    case 'in': {
      const value = resolve(node.value, facts);
      const declaredType = declaredTypeOf(node.value);
      return node.options.some(option => compareValues('==', value, option, declaredType));
    }
  }
}

/**
 * Evaluate an expression against a fact mapping
 *
 * @returns value null with the missing fact keys when any referenced fact is absent
 * @throws {EvaluationError} On type errors within the expression
 */
export function evaluateExpression(expression: Expression, facts: FactMap): ExpressionEvaluation {
  const missingVariables = extractVariables(expression).filter(name => !facts.has(name));
  if (missingVariables.length > 0) {
    return { value: null, missingVariables };
  }
  return { value: evaluateBoolean(expression, facts), missingVariables: [] };
}
