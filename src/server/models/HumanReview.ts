import { getDB } from '../config/database.js';
import type { ObjectId } from 'mongodb';
import type { HumanReviewRequest } from '../domain/eligibility/types.js';

export type HumanReviewStatus = 'pending' | 'in_progress' | 'completed';

export interface HumanReviewDocument {
    _id?: ObjectId;
    case_id: string;
    reason: string;
    status: HumanReviewStatus;
    created_at: Date;
}

const COLLECTION_NAME = 'human_reviews';

export class HumanReviewModel {
    /**
     * Open a pending review for a case
     */
    static async create(request: HumanReviewRequest): Promise<void> {
        const db = getDB();
        await db.collection<HumanReviewDocument>(COLLECTION_NAME).insertOne({
            case_id: request.caseId,
            reason: request.reason,
            status: 'pending',
            created_at: request.createdAt,
        });
    }

    static async ensureIndexes(): Promise<void> {
        const db = getDB();
        await db.collection<HumanReviewDocument>(COLLECTION_NAME).createIndex({ case_id: 1, status: 1 });
    }
}
