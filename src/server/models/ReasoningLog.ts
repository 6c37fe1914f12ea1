import { getDB } from '../config/database.js';
import type { ObjectId } from 'mongodb';
import type { ReasoningLog } from '../domain/eligibility/types.js';

export interface ReasoningLogDocument {
    _id?: ObjectId;
    log_id: string;
    case_id: string;
    prompt: string;
    response_text: string;
    model_name: string;
    token_usage: {
        prompt_tokens: number;
        completion_tokens: number;
        total_tokens: number;
    } | null;
    created_at: Date;
}

const COLLECTION_NAME = 'ai_reasoning_logs';

export function toReasoningLogDocument(log: ReasoningLog): ReasoningLogDocument {
    return {
        log_id: log.id,
        case_id: log.caseId,
        prompt: log.prompt,
        response_text: log.responseText,
        model_name: log.modelName,
        token_usage: log.tokenUsage
            ? {
                prompt_tokens: log.tokenUsage.promptTokens,
                completion_tokens: log.tokenUsage.completionTokens,
                total_tokens: log.tokenUsage.totalTokens,
            }
            : null,
        created_at: log.createdAt,
    };
}

export class ReasoningLogModel {
    static async create(log: ReasoningLog): Promise<void> {
        const db = getDB();
        await db.collection<ReasoningLogDocument>(COLLECTION_NAME).insertOne(toReasoningLogDocument(log));
    }

    static async ensureIndexes(): Promise<void> {
        const db = getDB();
        const collection = db.collection<ReasoningLogDocument>(COLLECTION_NAME);
        await collection.createIndex({ log_id: 1 }, { unique: true });
        await collection.createIndex({ case_id: 1, created_at: -1 });
    }
}
