import { getDB } from '../config/database.js';
import type { ObjectId } from 'mongodb';
import type { Citation } from '../domain/eligibility/types.js';

export interface AICitationDocument {
    _id?: ObjectId;
    reasoning_log_id: string;
    document_version_id: string;
    excerpt: string;
    relevance_score: number;
    created_at: Date;
}

const COLLECTION_NAME = 'ai_citations';

export class AICitationModel {
    /**
     * Insert the citations of one reasoning log in a single batch
     */
    static async createMany(citations: Citation[], createdAt: Date = new Date()): Promise<void> {
        if (citations.length === 0) {
            return;
        }
        const db = getDB();
        await db.collection<AICitationDocument>(COLLECTION_NAME).insertMany(
            citations.map(citation => ({
                reasoning_log_id: citation.reasoningLogId,
                document_version_id: citation.documentVersionId,
                excerpt: citation.excerpt,
                relevance_score: citation.relevanceScore,
                created_at: createdAt,
            })),
            { ordered: true }
        );
    }

    static async ensureIndexes(): Promise<void> {
        const db = getDB();
        await db.collection<AICitationDocument>(COLLECTION_NAME).createIndex({ reasoning_log_id: 1 });
    }
}
