import { getDB } from '../config/database.js';
import type { ObjectId } from 'mongodb';
import { NotFoundError } from '../types/errors.js';

export type CaseStatus = 'draft' | 'submitted' | 'evaluated' | 'in_review' | 'closed';

export interface ImmigrationCaseDocument {
    _id?: ObjectId;
    case_id: string;
    status: CaseStatus;
    evaluated_at?: Date;
    updated_at: Date;
}

const COLLECTION_NAME = 'cases';

export class ImmigrationCaseModel {
    /**
     * Mark a case evaluated after a check that needs no review
     *
     * @throws {NotFoundError} When the case does not exist
     */
    static async markEvaluated(caseId: string, at: Date = new Date()): Promise<void> {
        const db = getDB();
        const result = await db.collection<ImmigrationCaseDocument>(COLLECTION_NAME).updateOne(
            { case_id: caseId },
            { $set: { status: 'evaluated', evaluated_at: at, updated_at: at } }
        );
        if (result.matchedCount === 0) {
            throw new NotFoundError('Case', caseId);
        }
    }

    /**
     * Move a case into review when a check was escalated
     */
    static async markInReview(caseId: string, at: Date = new Date()): Promise<void> {
        const db = getDB();
        await db.collection<ImmigrationCaseDocument>(COLLECTION_NAME).updateOne(
            { case_id: caseId },
            { $set: { status: 'in_review', updated_at: at } }
        );
    }
}
