/**
 * MongoDB adapters for the eligibility ports
 */

import type {
  CaseStatusGateway,
  CitationStore,
  EligibilityResultStore,
  FactSource,
  HumanReviewGateway,
  ReasoningLogStore,
  RuleVersionSource,
} from '../../contracts/eligibility.js';
import type { Citation, EligibilityResult, FactMap, ReasoningLog, RuleVersion } from '../../domain/eligibility/types.js';
import { CaseFactModel } from '../../models/CaseFact.js';
import { VisaRuleVersionModel } from '../../models/VisaRuleVersion.js';
import { EligibilityResultModel } from '../../models/EligibilityResult.js';
import { ReasoningLogModel } from '../../models/ReasoningLog.js';
import { AICitationModel } from '../../models/AICitation.js';
import { HumanReviewModel } from '../../models/HumanReview.js';
import { ImmigrationCaseModel } from '../../models/ImmigrationCase.js';

export class MongoFactSource implements FactSource {
  getFacts(caseId: string): Promise<FactMap> {
    return CaseFactModel.findByCaseId(caseId);
  }
}

export class MongoRuleVersionSource implements RuleVersionSource {
  findActiveRuleVersions(visaTypeId: string, asOf: Date): Promise<RuleVersion[]> {
    return VisaRuleVersionModel.findActive(visaTypeId, asOf);
  }
}

export class MongoEligibilityResultStore implements EligibilityResultStore {
  saveEligibilityResult(result: EligibilityResult): Promise<void> {
    return EligibilityResultModel.create(result);
  }

  findByCaseId(caseId: string): Promise<EligibilityResult[]> {
    return EligibilityResultModel.findByCaseId(caseId);
  }
}

export class MongoReasoningLogStore implements ReasoningLogStore {
  saveReasoningLog(log: ReasoningLog): Promise<void> {
    return ReasoningLogModel.create(log);
  }
}

export class MongoCitationStore implements CitationStore {
  saveCitations(citations: Citation[]): Promise<void> {
    return AICitationModel.createMany(citations);
  }
}

/**
 * Opens a review request and moves the case into review
 */
export class MongoHumanReviewGateway implements HumanReviewGateway {
  async requestHumanReview(caseId: string, reason: string): Promise<void> {
    const now = new Date();
    await HumanReviewModel.create({ caseId, reason, createdAt: now });
    await ImmigrationCaseModel.markInReview(caseId, now);
  }
}

export class MongoCaseStatusGateway implements CaseStatusGateway {
  markCaseEvaluated(caseId: string): Promise<void> {
    return ImmigrationCaseModel.markEvaluated(caseId);
  }
}

/**
 * Create indexes for every eligibility collection
 */
export async function ensureEligibilityIndexes(): Promise<void> {
  await Promise.all([
    CaseFactModel.ensureIndexes(),
    VisaRuleVersionModel.ensureIndexes(),
    EligibilityResultModel.ensureIndexes(),
    ReasoningLogModel.ensureIndexes(),
    AICitationModel.ensureIndexes(),
    HumanReviewModel.ensureIndexes(),
  ]);
}
