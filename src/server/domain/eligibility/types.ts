/**
 * Eligibility domain types
 *
 * Shared shapes for facts, rule versions, requirement evaluations, retrieved
 * context and the persisted artifacts of an eligibility check.
 */

/**
 * Scalar fact value. Dates travel as Date objects; ISO strings stay strings.
 */
export type FactValue = number | string | boolean | Date;

/**
 * Facts of one case, keyed by fact name
 */
export type FactMap = ReadonlyMap<string, FactValue>;

/**
 * Build a FactMap from a plain object
 */
export function factsFrom(record: Record<string, FactValue>): FactMap {
  return new Map(Object.entries(record));
}

/**
 * Verdict of a check
 * - 'eligible': the case qualifies
 * - 'not_eligible': the case does not qualify
 * - 'requires_review': a caseworker must decide
 */
export type EligibilityOutcome = 'eligible' | 'not_eligible' | 'requires_review';

/**
 * One condition inside a rule version. The expression is validated when the
 * requirement is evaluated, since rule versions are published externally.
 */
export interface Requirement {
  code: string;
  expression: unknown;
  mandatory: boolean;
  description?: string;
}

export interface RuleVersion {
  id: string;
  visaTypeId: string;
  visaCode: string;
  effectiveFrom: Date;
  effectiveTo?: Date | null;
  published: boolean;
  createdAt: Date;
  requirements: Requirement[];
}

export type RequirementStatus = 'passed' | 'failed' | 'indeterminate' | 'error';

export interface RequirementEvaluation {
  code: string;
  mandatory: boolean;
  status: RequirementStatus;
  /** Fact keys the expression referenced but the case lacks */
  missingVariables: string[];
  error?: string;
}

export interface RuleEvaluationResult {
  ruleVersionId: string;
  visaTypeId: string;
  visaCode: string;
  outcome: EligibilityOutcome;
  confidence: number;
  passed: number;
  /** Requirements that could be evaluated (indeterminate ones excluded) */
  total: number;
  /** Fact keys missing across all requirements, in order of first appearance */
  missingFacts: string[];
  requirementsWithMissingFacts: string[];
  /** Mandatory requirement codes that could not be evaluated */
  mandatoryMissing: string[];
  evaluations: RequirementEvaluation[];
  warnings: string[];
}

export interface ChunkMetadata {
  visaCode?: string;
  jurisdiction?: string;
  [key: string]: unknown;
}

export interface ContextChunk {
  chunkId: string;
  documentVersionId: string;
  documentVersionCreatedAt: Date;
  text: string;
  similarity: number;
  metadata: ChunkMetadata;
}

export interface ChunkSearchFilters {
  visaCode?: string;
  jurisdiction?: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface EligibilityResult {
  id: string;
  caseId: string;
  visaTypeId: string;
  ruleVersionId: string;
  outcome: EligibilityOutcome;
  confidence: number;
  reasoningSummary: string;
  missingFacts: string[];
  reasoningLogId?: string;
  aiUnavailable: boolean;
  conflictDetected: boolean;
  escalated: boolean;
  createdAt: Date;
}

export interface ReasoningLog {
  id: string;
  caseId: string;
  prompt: string;
  responseText: string;
  modelName: string;
  tokenUsage?: TokenUsage;
  createdAt: Date;
}

export interface Citation {
  reasoningLogId: string;
  documentVersionId: string;
  excerpt: string;
  relevanceScore: number;
}

export interface HumanReviewRequest {
  caseId: string;
  reason: string;
  createdAt: Date;
}
