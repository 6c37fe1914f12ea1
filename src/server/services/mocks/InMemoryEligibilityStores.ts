/**
 * In-memory implementations of the eligibility ports
 *
 * Stand in for the MongoDB and pgvector adapters in tests. Each keeps its data
 * in plain collections and can be told to fail through MockServiceBase.
 */

import { MockServiceBase } from './MockServiceBase.js';
import type {
  CaseStatusGateway,
  ChunkSearchProvider,
  CitationStore,
  EligibilityResultStore,
  FactSource,
  HumanReviewGateway,
  ReasoningLogStore,
  RuleVersionSource,
} from '../../contracts/eligibility.js';
import type {
  ChunkSearchFilters,
  Citation,
  ContextChunk,
  EligibilityResult,
  FactMap,
  FactValue,
  HumanReviewRequest,
  ReasoningLog,
  RuleVersion,
} from '../../domain/eligibility/types.js';
import { isActiveOn } from '../rules/RuleEvaluationEngine.js';

export class InMemoryFactSource extends MockServiceBase implements FactSource {
  private readonly facts = new Map<string, Map<string, FactValue>>();

  getServiceName(): string {
    return 'InMemoryFactSource';
  }

  setFacts(caseId: string, facts: Record<string, FactValue>): void {
    this.facts.set(caseId, new Map(Object.entries(facts)));
  }

  async getFacts(caseId: string): Promise<FactMap> {
    this.record('getFacts', caseId);
    return new Map(this.facts.get(caseId) ?? []);
  }
}

export class InMemoryRuleVersionSource extends MockServiceBase implements RuleVersionSource {
  private readonly versions: RuleVersion[] = [];

  getServiceName(): string {
    return 'InMemoryRuleVersionSource';
  }

  add(...versions: RuleVersion[]): void {
    this.versions.push(...versions);
  }

  async findActiveRuleVersions(visaTypeId: string, asOf: Date): Promise<RuleVersion[]> {
    this.record('findActiveRuleVersions', visaTypeId, asOf);
    return this.versions.filter(version => version.visaTypeId === visaTypeId && isActiveOn(version, asOf));
  }
}

/**
 * Chunk search over a fixed chunk list. Similarity is taken from the stored chunk,
 * so tests control ranking directly.
 */
export class InMemoryChunkSearchProvider extends MockServiceBase implements ChunkSearchProvider {
  private readonly chunks: ContextChunk[] = [];

  getServiceName(): string {
    return 'InMemoryChunkSearchProvider';
  }

  add(...chunks: ContextChunk[]): void {
    this.chunks.push(...chunks);
  }

  async search(vector: number[], filters: ChunkSearchFilters, topK: number, minSimilarity: number): Promise<ContextChunk[]> {
    this.record('search', vector, filters, topK, minSimilarity);
    return this.chunks.filter(
      chunk =>
        chunk.similarity >= minSimilarity &&
        (!filters.visaCode || chunk.metadata.visaCode === filters.visaCode) &&
        (!filters.jurisdiction || chunk.metadata.jurisdiction === filters.jurisdiction)
    );
  }
}

export class InMemoryEligibilityResultStore extends MockServiceBase implements EligibilityResultStore {
  readonly results: EligibilityResult[] = [];

  getServiceName(): string {
    return 'InMemoryEligibilityResultStore';
  }

  async saveEligibilityResult(result: EligibilityResult): Promise<void> {
    this.record('saveEligibilityResult', result);
    this.results.push({ ...result, missingFacts: [...result.missingFacts] });
  }

  async findByCaseId(caseId: string): Promise<EligibilityResult[]> {
    this.record('findByCaseId', caseId);
    return this.results
      .filter(result => result.caseId === caseId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(result => ({ ...result, missingFacts: [...result.missingFacts] }));
  }
}

export class InMemoryReasoningLogStore extends MockServiceBase implements ReasoningLogStore {
  readonly logs: ReasoningLog[] = [];

  getServiceName(): string {
    return 'InMemoryReasoningLogStore';
  }

  async saveReasoningLog(log: ReasoningLog): Promise<void> {
    this.record('saveReasoningLog', log);
    this.logs.push(log);
  }
}

export class InMemoryCitationStore extends MockServiceBase implements CitationStore {
  readonly citations: Citation[] = [];

  getServiceName(): string {
    return 'InMemoryCitationStore';
  }

  async saveCitations(citations: Citation[]): Promise<void> {
    this.record('saveCitations', citations);
    this.citations.push(...citations);
  }
}

export class InMemoryHumanReviewGateway extends MockServiceBase implements HumanReviewGateway {
  readonly requests: HumanReviewRequest[] = [];

  getServiceName(): string {
    return 'InMemoryHumanReviewGateway';
  }

  async requestHumanReview(caseId: string, reason: string): Promise<void> {
    this.record('requestHumanReview', caseId, reason);
    this.requests.push({ caseId, reason, createdAt: new Date() });
  }
}

export class InMemoryCaseStatusGateway extends MockServiceBase implements CaseStatusGateway {
  readonly evaluatedCases: string[] = [];

  getServiceName(): string {
    return 'InMemoryCaseStatusGateway';
  }

  async markCaseEvaluated(caseId: string): Promise<void> {
    this.record('markCaseEvaluated', caseId);
    this.evaluatedCases.push(caseId);
  }
}
