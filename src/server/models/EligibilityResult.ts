import { getDB } from '../config/database.js';
import type { ObjectId } from 'mongodb';
import type { EligibilityOutcome, EligibilityResult } from '../domain/eligibility/types.js';

export interface EligibilityResultDocument {
    _id?: ObjectId;
    result_id: string;
    case_id: string;
    visa_type_id: string;
    rule_version_id: string;
    outcome: EligibilityOutcome;
    confidence: number;
    reasoning_summary: string;
    missing_facts: string[];
    reasoning_log_id: string | null;
    ai_unavailable: boolean;
    conflict_detected: boolean;
    escalated: boolean;
    created_at: Date;
}

const COLLECTION_NAME = 'eligibility_results';

export function toEligibilityResultDocument(result: EligibilityResult): EligibilityResultDocument {
    return {
        result_id: result.id,
        case_id: result.caseId,
        visa_type_id: result.visaTypeId,
        rule_version_id: result.ruleVersionId,
        outcome: result.outcome,
        confidence: result.confidence,
        reasoning_summary: result.reasoningSummary,
        missing_facts: [...result.missingFacts],
        reasoning_log_id: result.reasoningLogId ?? null,
        ai_unavailable: result.aiUnavailable,
        conflict_detected: result.conflictDetected,
        escalated: result.escalated,
        created_at: result.createdAt,
    };
}

export function fromEligibilityResultDocument(doc: EligibilityResultDocument): EligibilityResult {
    const result: EligibilityResult = {
        id: doc.result_id,
        caseId: doc.case_id,
        visaTypeId: doc.visa_type_id,
        ruleVersionId: doc.rule_version_id,
        outcome: doc.outcome,
        confidence: doc.confidence,
        reasoningSummary: doc.reasoning_summary,
        missingFacts: [...doc.missing_facts],
        aiUnavailable: doc.ai_unavailable,
        conflictDetected: doc.conflict_detected,
        escalated: doc.escalated,
        createdAt: doc.created_at,
    };
    if (doc.reasoning_log_id) {
        result.reasoningLogId = doc.reasoning_log_id;
    }
    return result;
}

export class EligibilityResultModel {
    /**
     * Insert a result. Results are written once and never updated.
     */
    static async create(result: EligibilityResult): Promise<void> {
        const db = getDB();
        await db.collection<EligibilityResultDocument>(COLLECTION_NAME).insertOne(toEligibilityResultDocument(result));
    }

    /**
     * Results of a case, newest first
     */
    static async findByCaseId(caseId: string, limit: number = 100): Promise<EligibilityResult[]> {
        const db = getDB();
        const docs = await db.collection<EligibilityResultDocument>(COLLECTION_NAME)
            .find({ case_id: caseId })
            .sort({ created_at: -1, _id: -1 })
            .limit(limit)
            .toArray();
        return docs.map(fromEligibilityResultDocument);
    }

    static async ensureIndexes(): Promise<void> {
        const db = getDB();
        const collection = db.collection<EligibilityResultDocument>(COLLECTION_NAME);
        await collection.createIndex({ result_id: 1 }, { unique: true });
        await collection.createIndex({ case_id: 1, created_at: -1 });
    }
}
