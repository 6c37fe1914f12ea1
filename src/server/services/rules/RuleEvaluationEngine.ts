/**
 * Rule Evaluation Engine
 *
 * Resolves the rule version active for a visa type on a date, evaluates every
 * requirement against the case facts and aggregates the results into an outcome
 * and a confidence score.
 */

import type { RuleVersionSource } from '../../contracts/eligibility.js';
import { DEFAULT_THRESHOLDS, type DecisionThresholds } from '../../config/eligibility.js';
import type {
  EligibilityOutcome,
  FactMap,
  RequirementEvaluation,
  RuleEvaluationResult,
  RuleVersion,
} from '../../domain/eligibility/types.js';
import { parseExpression } from '../../domain/eligibility/expression.js';
import { evaluateExpression } from './ExpressionEvaluator.js';
import { RuleVersionNotFoundError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Rule-version lookups of one coordinator run, keyed by visa type and calendar day.
 * Holding promises lets concurrent checks in the run share a pending lookup.
 */
export type RuleVersionCache = Map<string, Promise<RuleVersion>>;

export function createRuleVersionCache(): RuleVersionCache {
  return new Map();
}

function cacheKey(visaTypeId: string, asOf: Date): string {
  return `${visaTypeId}|${asOf.toISOString().slice(0, 10)}`;
}

/**
 * Whether a rule version is published and in force on `asOf` (bounds inclusive)
 */
export function isActiveOn(version: RuleVersion, asOf: Date): boolean {
  const time = asOf.getTime();
  if (!version.published || version.effectiveFrom.getTime() > time) {
    return false;
  }
  return !version.effectiveTo || version.effectiveTo.getTime() >= time;
}

/**
 * Order candidates newest first, ties broken by id descending
 */
function compareByRecency(a: RuleVersion, b: RuleVersion): number {
  const byCreated = b.createdAt.getTime() - a.createdAt.getTime();
  if (byCreated !== 0) {
    return byCreated;
  }
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/**
 * Pick the active version among candidates
 */
export function selectActiveRuleVersion(candidates: RuleVersion[], asOf: Date): RuleVersion | undefined {
  return candidates.filter(version => isActiveOn(version, asOf)).sort(compareByRecency)[0];
}

export interface RuleEvaluationEngineOptions {
  thresholds?: DecisionThresholds;
}

export class RuleEvaluationEngine {
  private readonly thresholds: DecisionThresholds;

  constructor(
    private readonly ruleSource: RuleVersionSource,
    options: RuleEvaluationEngineOptions = {}
  ) {
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  }

  /**
   * Load the rule version active for a visa type on a date
   *
   * @param cache - Per-run lookup cache; omit to always query the source
   * @throws {RuleVersionNotFoundError} When no published version is in force
   */
  async loadActiveRuleVersion(visaTypeId: string, asOf: Date, cache?: RuleVersionCache): Promise<RuleVersion> {
    if (!cache) {
      return this.lookup(visaTypeId, asOf);
    }

    const key = cacheKey(visaTypeId, asOf);
    let pending = cache.get(key);
    if (!pending) {
      pending = this.lookup(visaTypeId, asOf);
      cache.set(key, pending);
    }
    return pending;
  }

  private async lookup(visaTypeId: string, asOf: Date): Promise<RuleVersion> {
    const candidates = (await this.ruleSource.findActiveRuleVersions(visaTypeId, asOf)).filter(version =>
      isActiveOn(version, asOf)
    );
    const selected = selectActiveRuleVersion(candidates, asOf);
    if (!selected) {
      throw new RuleVersionNotFoundError(visaTypeId, asOf);
    }

    if (candidates.length > 1) {
      logger.warn(
        {
          visaTypeId,
          asOf: asOf.toISOString(),
          candidates: candidates.map(version => version.id),
          selected: selected.id,
        },
        'Multiple active rule versions found, using the most recently created'
      );
    }
    return selected;
  }

  /**
   * Evaluate every requirement of a rule version. Invalid expressions and type
   * errors are recorded on the requirement and never abort the others.
   */
  evaluateAll(ruleVersion: RuleVersion, facts: FactMap): RequirementEvaluation[] {
    return ruleVersion.requirements.map((requirement): RequirementEvaluation => {
      const base = { code: requirement.code, mandatory: requirement.mandatory };

      const parsed = parseExpression(requirement.expression);
      if (!parsed.success) {
        return { ...base, status: 'error', missingVariables: [], error: parsed.error };
      }

      try {
        const { value, missingVariables } = evaluateExpression(parsed.expression, facts);
        if (value === null) {
          return { ...base, status: 'indeterminate', missingVariables };
        }
        return { ...base, status: value ? 'passed' : 'failed', missingVariables: [] };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(
          { ruleVersionId: ruleVersion.id, requirement: requirement.code, error: message },
          'Requirement evaluation failed'
        );
        return { ...base, status: 'error', missingVariables: [], error: message };
      }
    });
  }

  /**
   * Aggregate requirement evaluations into an outcome and confidence
   *
   * Indeterminate requirements leave the denominator; errored requirements count
   * as evaluated and failed. A failed mandatory requirement forces not_eligible.
   */
  aggregate(ruleVersion: RuleVersion, evaluations: RequirementEvaluation[]): RuleEvaluationResult {
    const evaluable = evaluations.filter(evaluation => evaluation.status !== 'indeterminate');
    const indeterminate = evaluations.filter(evaluation => evaluation.status === 'indeterminate');
    const passed = evaluable.filter(evaluation => evaluation.status === 'passed').length;
    const total = evaluable.length;
    const confidence = total === 0 ? 0 : passed / total;

    const mandatoryFailed = evaluable.some(
      evaluation => evaluation.mandatory && evaluation.status !== 'passed'
    );
    const mandatoryMissing = indeterminate.filter(evaluation => evaluation.mandatory).map(evaluation => evaluation.code);
    const missingFacts = [...new Set(indeterminate.flatMap(evaluation => evaluation.missingVariables))];

    let outcome: EligibilityOutcome;
    if (mandatoryFailed) {
      outcome = 'not_eligible';
    } else if (confidence >= this.thresholds.eligible && mandatoryMissing.length === 0) {
      outcome = 'eligible';
    } else if (confidence >= this.thresholds.review) {
      outcome = 'requires_review';
    } else {
      outcome = 'not_eligible';
    }

    const warnings: string[] = [];
    if (evaluations.length === 0) {
      warnings.push(`Rule version ${ruleVersion.id} has no requirements`);
    }
    for (const evaluation of evaluations) {
      if (evaluation.status === 'error') {
        warnings.push(`Requirement ${evaluation.code} could not be evaluated: ${evaluation.error ?? 'unknown error'}`);
      }
    }

    return {
      ruleVersionId: ruleVersion.id,
      visaTypeId: ruleVersion.visaTypeId,
      visaCode: ruleVersion.visaCode,
      outcome,
      confidence,
      passed,
      total,
      missingFacts,
      requirementsWithMissingFacts: indeterminate.map(evaluation => evaluation.code),
      mandatoryMissing,
      evaluations,
      warnings,
    };
  }

  /**
   * Evaluate and aggregate in one step
   */
  evaluate(ruleVersion: RuleVersion, facts: FactMap): RuleEvaluationResult {
    return this.aggregate(ruleVersion, this.evaluateAll(ruleVersion, facts));
  }
}
