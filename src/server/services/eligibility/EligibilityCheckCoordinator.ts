/**
 * Eligibility Check Coordinator
 *
 * Drives one eligibility check through its states:
 *
 *   PENDING -> RULE_EVALUATED -> AI_EVALUATED | AI_SKIPPED -> COMBINED -> PERSISTED -> ESCALATED | DONE
 *
 * A check either returns a complete, persisted result (possibly flagged as
 * decided without AI) or throws one check-level error. A missing rule version
 * and a failed write are the only errors that end a check.
 */

import { randomUUID } from 'crypto';
import type {
  CaseStatusGateway,
  CitationStore,
  EligibilityResultStore,
  FactSource,
  HumanReviewGateway,
  ReasoningLogStore,
} from '../../contracts/eligibility.js';
import { DEFAULT_THRESHOLDS, type DecisionThresholds } from '../../config/eligibility.js';
import type {
  Citation,
  EligibilityOutcome,
  EligibilityResult,
  FactMap,
  ReasoningLog,
  RuleEvaluationResult,
} from '../../domain/eligibility/types.js';
import {
  RuleEvaluationEngine,
  createRuleVersionCache,
  type RuleVersionCache,
} from '../rules/RuleEvaluationEngine.js';
import type { ReasoningOrchestrator, ReasoningResult } from '../reasoning/ReasoningOrchestrator.js';
import {
  buildReasoningSummary,
  combineOutcomes,
  describeEscalation,
  type CombinedVerdict,
} from './OutcomeCombiner.js';
import { PersistenceFailure, toAppError, type AIFailureKind } from '../../types/errors.js';
import { eligibilityCheckDuration, eligibilityChecksTotal, escalationsTotal } from '../../utils/metrics.js';
import { createChildLogger } from '../../utils/logger.js';

const log = createChildLogger({ component: 'EligibilityCheckCoordinator' });

export type CheckState =
  | 'PENDING'
  | 'RULE_EVALUATED'
  | 'AI_EVALUATED'
  | 'AI_SKIPPED'
  | 'COMBINED'
  | 'PERSISTED'
  | 'ESCALATED'
  | 'DONE';

const TRANSITIONS: Record<CheckState, readonly CheckState[]> = {
  PENDING: ['RULE_EVALUATED'],
  RULE_EVALUATED: ['AI_EVALUATED', 'AI_SKIPPED'],
  AI_EVALUATED: ['COMBINED'],
  AI_SKIPPED: ['COMBINED'],
  COMBINED: ['PERSISTED'],
  PERSISTED: ['ESCALATED', 'DONE'],
  ESCALATED: [],
  DONE: [],
};

/**
 * Tracks the state of one check and rejects transitions the lifecycle does not allow
 */
class CheckLifecycle {
  readonly history: CheckState[] = ['PENDING'];

  constructor(private readonly context: Record<string, unknown>) {}

  get current(): CheckState {
    return this.history[this.history.length - 1] ?? 'PENDING';
  }

  advance(next: CheckState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal eligibility check transition ${this.current} -> ${next}`);
    }
    this.history.push(next);
    log.debug({ ...this.context, state: next }, 'Eligibility check state changed');
  }
}

/**
 * - 'disabled': AI reasoning was not requested or is not configured
 * - 'unavailable': AI reasoning was attempted and failed
 * - 'completed': the model answered
 */
export type AIStatus = 'disabled' | 'unavailable' | 'completed';

export interface EligibilityCheckRequest {
  caseId: string;
  visaTypeId: string;
  /** Date the rules are evaluated for (default: now) */
  evaluationDate?: Date;
  /** Set to false to skip AI reasoning for this check */
  enableAiReasoning?: boolean;
  jurisdiction?: string;
}

export interface EligibilityCheckReport {
  result: EligibilityResult;
  ruleEvaluation: RuleEvaluationResult;
  combined: CombinedVerdict;
  aiStatus: AIStatus;
  aiFailure?: AIFailureKind;
  reasoningLog?: ReasoningLog;
  citations: Citation[];
  warnings: string[];
  states: CheckState[];
}

export interface BatchCheckFailure {
  visaTypeId: string;
  code: string;
  message: string;
}

export interface BatchCheckSummary {
  total: number;
  succeeded: number;
  failed: number;
  escalated: number;
  requiresReview: boolean;
  outcomes: Record<EligibilityOutcome, number>;
}

export interface BatchCheckReport {
  caseId: string;
  results: EligibilityCheckReport[];
  failures: BatchCheckFailure[];
  summary: BatchCheckSummary;
}

export interface EligibilityCheckDependencies {
  facts: FactSource;
  ruleEngine: RuleEvaluationEngine;
  /** Omit to run without AI reasoning */
  reasoning?: ReasoningOrchestrator | null;
  results: EligibilityResultStore;
  reasoningLogs: ReasoningLogStore;
  citations: CitationStore;
  humanReview: HumanReviewGateway;
  caseStatus: CaseStatusGateway;
}

export interface EligibilityCheckOptions {
  thresholds?: DecisionThresholds;
  aiReasoningEnabled?: boolean;
  generateId?: () => string;
  now?: () => Date;
}

export class EligibilityCheckCoordinator {
  private readonly thresholds: DecisionThresholds;
  private readonly aiReasoningEnabled: boolean;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly deps: EligibilityCheckDependencies,
    options: EligibilityCheckOptions = {}
  ) {
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.aiReasoningEnabled = options.aiReasoningEnabled ?? true;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one eligibility check
   *
   * @throws {RuleVersionNotFoundError} When no rule version is in force for the visa type
   * @throws {PersistenceFailure} When the result, reasoning log or citations cannot be stored
   */
  async check(request: EligibilityCheckRequest): Promise<EligibilityCheckReport> {
    const facts = await this.deps.facts.getFacts(request.caseId);
    return this.runCheck(request, facts, createRuleVersionCache());
  }

  /**
   * Run independent checks of one case against several visa types concurrently.
   * A failed check is reported and does not affect the others.
   */
  async checkMany(
    caseId: string,
    visaTypeIds: string[],
    options: Omit<EligibilityCheckRequest, 'caseId' | 'visaTypeId'> = {}
  ): Promise<BatchCheckReport> {
    const facts = await this.deps.facts.getFacts(caseId);
    const cache = createRuleVersionCache();
    const evaluationDate = options.evaluationDate ?? this.now();

    const settled = await Promise.allSettled(
      visaTypeIds.map(visaTypeId => this.runCheck({ ...options, caseId, visaTypeId, evaluationDate }, facts, cache))
    );

    const results: EligibilityCheckReport[] = [];
    const failures: BatchCheckFailure[] = [];
    settled.forEach((outcome, index) => {
      const visaTypeId = visaTypeIds[index] ?? '';
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else {
        const error = toAppError(outcome.reason);
        failures.push({ visaTypeId, code: error.code, message: error.message });
      }
    });

    const outcomes: Record<EligibilityOutcome, number> = { eligible: 0, not_eligible: 0, requires_review: 0 };
    for (const report of results) {
      outcomes[report.result.outcome]++;
    }
    const escalated = results.filter(report => report.result.escalated).length;

    return {
      caseId,
      results,
      failures,
      summary: {
        total: visaTypeIds.length,
        succeeded: results.length,
        failed: failures.length,
        escalated,
        requiresReview: escalated > 0,
        outcomes,
      },
    };
  }

  private async runCheck(
    request: EligibilityCheckRequest,
    facts: FactMap,
    cache: RuleVersionCache
  ): Promise<EligibilityCheckReport> {
    const { caseId, visaTypeId } = request;
    const startTime = Date.now();
    const lifecycle = new CheckLifecycle({ caseId, visaTypeId });
    const asOf = request.evaluationDate ?? this.now();

    try {
      // Rule evaluation always completes before anything is combined
      const ruleVersion = await this.deps.ruleEngine.loadActiveRuleVersion(visaTypeId, asOf, cache);
      const ruleEvaluation = this.deps.ruleEngine.evaluate(ruleVersion, facts);
      lifecycle.advance('RULE_EVALUATED');

      const warnings = [...ruleEvaluation.warnings];
      const reasoning = await this.runReasoning(request, facts, ruleEvaluation);
      let aiStatus: AIStatus;
      let aiFailure: AIFailureKind | undefined;
      if (reasoning === null) {
        aiStatus = 'disabled';
        lifecycle.advance('AI_SKIPPED');
      } else if (reasoning.status === 'unavailable') {
        aiStatus = 'unavailable';
        aiFailure = reasoning.failure;
        warnings.push(`AI reasoning unavailable: ${reasoning.error}`);
        lifecycle.advance('AI_SKIPPED');
      } else {
        aiStatus = 'completed';
        warnings.push(...reasoning.warnings);
        lifecycle.advance('AI_EVALUATED');
      }

      const completed = reasoning?.status === 'completed' ? reasoning : null;
      const combined = combineOutcomes(ruleEvaluation, completed, this.thresholds);
      const reasoningSummary = buildReasoningSummary({
        rule: ruleEvaluation,
        combined,
        ai: completed ? { outcome: completed.outcome, responseText: completed.response.responseText } : null,
        aiFailure,
        thresholds: this.thresholds,
      });
      lifecycle.advance('COMBINED');

      // Reasoning log and citations first, so the result can link to the log. A failed
      // result write leaves the log and citations stored with no result; they are never
      // read without a result that references them.
      let reasoningLog: ReasoningLog | undefined;
      let citations: Citation[] = [];
      if (completed) {
        const newLog: ReasoningLog = {
          id: this.generateId(),
          caseId,
          prompt: completed.prompt.text,
          responseText: completed.response.responseText,
          modelName: completed.response.modelName,
          tokenUsage: completed.response.tokenUsage,
          createdAt: this.now(),
        };
        await this.persist('reasoning log', () => this.deps.reasoningLogs.saveReasoningLog(newLog));
        const linked = completed.citations.map(citation => ({ ...citation, reasoningLogId: newLog.id }));
        if (linked.length > 0) {
          await this.persist('citations', () => this.deps.citations.saveCitations(linked));
        }
        reasoningLog = newLog;
        citations = linked;
      }

      const result: EligibilityResult = {
        id: this.generateId(),
        caseId,
        visaTypeId,
        ruleVersionId: ruleEvaluation.ruleVersionId,
        outcome: combined.outcome,
        confidence: combined.confidence,
        reasoningSummary,
        missingFacts: ruleEvaluation.missingFacts,
        reasoningLogId: reasoningLog?.id,
        aiUnavailable: aiStatus === 'unavailable',
        conflictDetected: combined.conflict,
        escalated: combined.escalate,
        createdAt: this.now(),
      };
      await this.persist('eligibility result', () => this.deps.results.saveEligibilityResult(result));
      lifecycle.advance('PERSISTED');

      if (combined.escalate) {
        await this.notify(warnings, 'human review request', () =>
          this.deps.humanReview.requestHumanReview(caseId, describeEscalation(combined.escalationReasons))
        );
        combined.escalationReasons.forEach(reason => escalationsTotal.inc({ reason }));
        lifecycle.advance('ESCALATED');
      } else {
        await this.notify(warnings, 'case status update', () => this.deps.caseStatus.markCaseEvaluated(caseId));
        lifecycle.advance('DONE');
      }

      eligibilityChecksTotal.inc({ outcome: result.outcome, status: 'success' });
      eligibilityCheckDuration.observe({ ai_status: aiStatus }, (Date.now() - startTime) / 1000);
      log.info(
        {
          caseId,
          visaTypeId,
          outcome: result.outcome,
          confidence: result.confidence,
          aiStatus,
          escalated: result.escalated,
        },
        'Eligibility check completed'
      );

      return {
        result,
        ruleEvaluation,
        combined,
        aiStatus,
        aiFailure,
        reasoningLog,
        citations,
        warnings,
        states: [...lifecycle.history],
      };
    } catch (error) {
      eligibilityChecksTotal.inc({ outcome: 'none', status: 'failed' });
      log.error(
        { caseId, visaTypeId, state: lifecycle.current, error: error instanceof Error ? error.message : String(error) },
        'Eligibility check failed'
      );
      throw error;
    }
  }

  private async runReasoning(
    request: EligibilityCheckRequest,
    facts: FactMap,
    ruleEvaluation: RuleEvaluationResult
  ): Promise<ReasoningResult | null> {
    const reasoning = this.deps.reasoning;
    if (!reasoning || !this.aiReasoningEnabled || request.enableAiReasoning === false) {
      return null;
    }
    return reasoning.reason({
      caseId: request.caseId,
      facts,
      ruleResult: ruleEvaluation,
      visaCode: ruleEvaluation.visaCode,
      jurisdiction: request.jurisdiction,
    });
  }

  private async persist(entity: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      throw new PersistenceFailure(entity, error);
    }
  }

  /**
   * Downstream notifications run after the result is stored. A failure is logged
   * and reported as a warning; the stored result stands.
   */
  private async notify(warnings: string[], action: string, send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ action, error: message }, 'Post-check notification failed');
      warnings.push(`${action} failed: ${message}`);
    }
  }
}
