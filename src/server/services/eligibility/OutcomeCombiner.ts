/**
 * Outcome Combiner
 *
 * Merges the rule verdict with the AI verdict, detects conflicts between them
 * and decides whether the case goes to a human reviewer. Pure functions only.
 */

import { DEFAULT_THRESHOLDS, type DecisionThresholds } from '../../config/eligibility.js';
import type { EligibilityOutcome, RuleEvaluationResult } from '../../domain/eligibility/types.js';
import type { ParsedConfidence, ParsedOutcome } from '../reasoning/responseParser.js';
import type { AIFailureKind } from '../../types/errors.js';

export type RuleVerdict = Pick<RuleEvaluationResult, 'outcome' | 'confidence' | 'mandatoryMissing'>;

export interface AIVerdict {
  outcome: ParsedOutcome;
  confidence: ParsedConfidence;
}

export type EscalationReason = 'low_confidence' | 'rule_ai_conflict' | 'missing_critical_facts' | 'review_recommended';

export interface CombinedVerdict {
  outcome: EligibilityOutcome;
  confidence: number;
  conflict: boolean;
  /** Whether the AI verdict contributed to the outcome */
  aiUsed: boolean;
  escalate: boolean;
  escalationReasons: EscalationReason[];
}

/**
 * True when one verdict is eligible and the other not_eligible.
 * requires_review on either side never conflicts.
 */
export function isConflict(ruleOutcome: EligibilityOutcome, aiOutcome: EligibilityOutcome): boolean {
  return (
    (ruleOutcome === 'eligible' && aiOutcome === 'not_eligible') ||
    (ruleOutcome === 'not_eligible' && aiOutcome === 'eligible')
  );
}

/**
 * Combine the rule verdict with an optional AI verdict
 *
 * @param ai - null when AI reasoning was disabled or unavailable
 */
export function combineOutcomes(
  rule: RuleVerdict,
  ai: AIVerdict | null,
  thresholds: DecisionThresholds = DEFAULT_THRESHOLDS
): CombinedVerdict {
  let outcome: EligibilityOutcome = rule.outcome;
  let confidence = rule.confidence;
  let conflict = false;
  let aiUsed = false;

  if (ai && ai.outcome !== 'unknown') {
    aiUsed = true;
    const aiConfidence = ai.confidence === 'unknown' ? rule.confidence : ai.confidence;
    if (isConflict(rule.outcome, ai.outcome)) {
      conflict = true;
      outcome = 'requires_review';
      confidence = Math.min(rule.confidence, aiConfidence);
    } else {
      outcome = ai.outcome;
      confidence = aiConfidence;
    }
  }

  const escalationReasons: EscalationReason[] = [];
  if (confidence < thresholds.escalation) {
    escalationReasons.push('low_confidence');
  }
  if (conflict) {
    escalationReasons.push('rule_ai_conflict');
  }
  if (rule.mandatoryMissing.length > 0) {
    escalationReasons.push('missing_critical_facts');
  }
  if (outcome === 'requires_review' && !conflict) {
    escalationReasons.push('review_recommended');
  }

  return {
    outcome,
    confidence,
    conflict,
    aiUsed,
    escalate: escalationReasons.length > 0,
    escalationReasons,
  };
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/**
 * Strip the OUTCOME and CONFIDENCE marker lines and truncate
 */
function summarizeResponse(responseText: string, maxLength: number): string {
  const body = responseText
    .split('\n')
    .filter(line => !/^\s*\**\s*(OUTCOME|CONFIDENCE)\s*\**\s*:/i.test(line))
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();
  return body.length > maxLength ? `${body.slice(0, maxLength - 3)}...` : body;
}

export interface SummaryInput {
  rule: Pick<RuleEvaluationResult, 'outcome' | 'confidence' | 'passed' | 'total' | 'missingFacts'>;
  combined: CombinedVerdict;
  ai?: { outcome: ParsedOutcome; responseText: string } | null;
  aiFailure?: AIFailureKind;
  thresholds?: DecisionThresholds;
}

export const SUMMARY_RESPONSE_LENGTH = 500;

/**
 * Human-readable explanation stored on the eligibility result
 */
export function buildReasoningSummary({
  rule,
  combined,
  ai,
  aiFailure,
  thresholds = DEFAULT_THRESHOLDS,
}: SummaryInput): string {
  const parts: string[] = [];

  if (combined.conflict && ai) {
    parts.push(
      `Rule engine evaluation indicates ${rule.outcome} eligibility, while AI reasoning suggests ${ai.outcome}. ` +
        'Human review recommended for accurate assessment.'
    );
  } else if (combined.aiUsed && ai) {
    const response = summarizeResponse(ai.responseText, SUMMARY_RESPONSE_LENGTH);
    parts.push(response.length > 0 ? response : `AI reasoning indicates ${ai.outcome}.`);
  } else {
    parts.push(
      `Rule engine evaluation: ${rule.passed} of ${rule.total} requirements passed. Confidence: ${percent(rule.confidence)}.`
    );
  }

  if (aiFailure) {
    parts.push(`AI reasoning unavailable (${aiFailure} failure); verdict based on rule evaluation only.`);
  } else if (ai && !combined.aiUsed) {
    parts.push('AI reasoning gave no usable verdict; verdict based on rule evaluation only.');
  }

  if (rule.missingFacts.length > 0) {
    parts.push(`Missing facts: ${rule.missingFacts.join(', ')}.`);
  }

  if (combined.confidence < thresholds.escalation) {
    parts.push(
      `Confidence is below threshold (${percent(combined.confidence)} < ${percent(thresholds.escalation)}). Human review recommended.`
    );
  }

  return parts.join(' ');
}

const ESCALATION_DESCRIPTIONS: Record<EscalationReason, string> = {
  low_confidence: 'confidence below threshold',
  rule_ai_conflict: 'rule engine and AI outcomes conflict',
  missing_critical_facts: 'mandatory requirements lack facts',
  review_recommended: 'verdict requires review',
};

/**
 * Reason text sent with a human review request
 */
export function describeEscalation(reasons: EscalationReason[]): string {
  return reasons.map(reason => `${reason}: ${ESCALATION_DESCRIPTIONS[reason]}`).join('; ');
}
