/**
 * Eligibility Contracts
 *
 * Ports the decision engine consumes and produces. Facts, rule versions and
 * document chunks are read-only; results, reasoning logs and citations are
 * written once per check. Adapters live in models/ (MongoDB) and vector/
 * (pgvector); in-process implementations live in services/mocks/.
 */

import type {
  ChunkSearchFilters,
  Citation,
  ContextChunk,
  EligibilityResult,
  FactMap,
  ReasoningLog,
  RuleVersion,
} from '../domain/eligibility/types.js';

export interface FactSource {
  getFacts(caseId: string): Promise<FactMap>;
}

export interface RuleVersionSource {
  /**
   * Published rule versions of a visa type whose effective window contains `asOf`.
   * More than one may be returned; the engine picks deterministically.
   */
  findActiveRuleVersions(visaTypeId: string, asOf: Date): Promise<RuleVersion[]>;
}

export interface ChunkSearchProvider {
  /**
   * Similarity search over document chunks. Results may arrive in any order;
   * the retriever ranks and truncates them.
   */
  search(vector: number[], filters: ChunkSearchFilters, topK: number, minSimilarity: number): Promise<ContextChunk[]>;
}

export interface EligibilityResultStore {
  saveEligibilityResult(result: EligibilityResult): Promise<void>;
  /** Results of a case, newest first */
  findByCaseId(caseId: string): Promise<EligibilityResult[]>;
}

export interface ReasoningLogStore {
  saveReasoningLog(log: ReasoningLog): Promise<void>;
}

export interface CitationStore {
  saveCitations(citations: Citation[]): Promise<void>;
}

export interface HumanReviewGateway {
  requestHumanReview(caseId: string, reason: string): Promise<void>;
}

export interface CaseStatusGateway {
  markCaseEvaluated(caseId: string): Promise<void>;
}
