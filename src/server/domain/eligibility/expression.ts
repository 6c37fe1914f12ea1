/**
 * Requirement expression trees
 *
 * Requirements carry a closed, tagged operator tree. Trees arrive as untrusted
 * JSON from the rule-publishing pipeline, so they are size-checked and then
 * shape-checked with zod before evaluation.
 */

import { z } from 'zod';
import type { FactValue } from './types.js';

export type DeclaredType = 'number' | 'string' | 'boolean' | 'date';

export type ComparisonOperator = '==' | '!=' | '>' | '>=' | '<' | '<=';

export interface VarExpression {
  op: 'var';
  name: string;
  type?: DeclaredType;
}

export interface LiteralExpression {
  op: 'literal';
  value: FactValue;
}

export interface CompareExpression {
  op: 'compare';
  operator: ComparisonOperator;
  left: Expression;
  right: Expression;
}

export interface AndExpression {
  op: 'and';
  operands: Expression[];
}

export interface OrExpression {
  op: 'or';
  operands: Expression[];
}

export interface NotExpression {
  op: 'not';
  operand: Expression;
}

export interface InExpression {
  op: 'in';
  value: Expression;
  options: FactValue[];
}

export type Expression =
  | VarExpression
  | LiteralExpression
  | CompareExpression
  | AndExpression
  | OrExpression
  | NotExpression
  | InExpression;

export const MAX_EXPRESSION_DEPTH = 20;
export const MAX_EXPRESSION_NODES = 1000;

const scalarSchema = z.union([z.number().finite(), z.string(), z.boolean(), z.date()]);

export const expressionSchema: z.ZodType<Expression> = z.lazy(() =>
  z.discriminatedUnion('op', [
    z.object({
      op: z.literal('var'),
      name: z.string().min(1),
      type: z.enum(['number', 'string', 'boolean', 'date']).optional(),
    }),
    z.object({ op: z.literal('literal'), value: scalarSchema }),
    z.object({
      op: z.literal('compare'),
      operator: z.enum(['==', '!=', '>', '>=', '<', '<=']),
      left: expressionSchema,
      right: expressionSchema,
    }),
    z.object({ op: z.literal('and'), operands: z.array(expressionSchema).min(1) }),
    z.object({ op: z.literal('or'), operands: z.array(expressionSchema).min(1) }),
    z.object({ op: z.literal('not'), operand: expressionSchema }),
    z.object({ op: z.literal('in'), value: expressionSchema, options: z.array(scalarSchema) }),
  ])
);

export interface StructureCheck {
  valid: boolean;
  depth: number;
  nodes: number;
  error?: string;
}

/**
 * Measure a raw tree before it is parsed. Arrays and objects both count as nodes;
 * measuring stops as soon as a limit is exceeded.
 */
export function validateExpressionStructure(
  raw: unknown,
  maxDepth: number = MAX_EXPRESSION_DEPTH,
  maxNodes: number = MAX_EXPRESSION_NODES
): StructureCheck {
  let nodes = 0;
  let deepest = 0;

  const visit = (value: unknown, depth: number): string | undefined => {
    if (value === null || typeof value !== 'object' || value instanceof Date) {
      return undefined;
    }
    nodes++;
    deepest = Math.max(deepest, depth);
    if (depth > maxDepth) {
      return `Expression exceeds maximum depth of ${maxDepth}`;
    }
    if (nodes > maxNodes) {
      return `Expression exceeds maximum of ${maxNodes} nodes`;
    }
    const children = Array.isArray(value) ? value : Object.values(value);
    for (const child of children) {
      const error = visit(child, Array.isArray(value) ? depth : depth + 1);
      if (error) {
        return error;
      }
    }
    return undefined;
  };

  const error = visit(raw, 1);
  return error
    ? { valid: false, depth: deepest, nodes, error }
    : { valid: true, depth: deepest, nodes };
}

export type ParseExpressionResult =
  | { success: true; expression: Expression }
  | { success: false; error: string };

/**
 * Validate structure limits and shape of a raw expression tree
 */
export function parseExpression(raw: unknown): ParseExpressionResult {
  const structure = validateExpressionStructure(raw);
  if (!structure.valid) {
    return { success: false, error: structure.error ?? 'Invalid expression structure' };
  }

  const parsed = expressionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { success: false, error: `Invalid expression${path}: ${issue?.message ?? 'unknown issue'}` };
  }
  return { success: true, expression: parsed.data };
}

/**
 * List the fact keys an expression references, unique, in order of first appearance
 */
export function extractVariables(expression: Expression): string[] {
  const seen = new Set<string>();

  const walk = (node: Expression): void => {
    switch (node.op) {
      case 'var':
        seen.add(node.name);
        return;
      case 'literal':
        return;
      case 'compare':
        walk(node.left);
        walk(node.right);
        return;
      case 'and':
      case 'or':
        node.operands.forEach(walk);
        return;
      case 'not':
        walk(node.operand);
        return;
      case 'in':
        walk(node.value);
        return;
    }
  };

  walk(expression);
  return [...seen];
}
