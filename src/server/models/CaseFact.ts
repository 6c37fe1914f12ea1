import { getDB } from '../config/database.js';
import type { ObjectId } from 'mongodb';
import { z } from 'zod';
import type { FactMap, FactValue } from '../domain/eligibility/types.js';
import { logger } from '../utils/logger.js';

export interface CaseFactDocument {
    _id?: ObjectId;
    case_id: string;
    fact_key: string;
    fact_value: unknown;
    source?: string;
    created_at: Date;
}

const COLLECTION_NAME = 'case_facts';

const factValueSchema = z.union([z.number().finite(), z.string(), z.boolean(), z.date()]);

/**
 * Fold fact documents into a fact map. Later documents for the same key replace
 * earlier ones; values that are not scalars are skipped.
 */
export function factsFromDocuments(docs: CaseFactDocument[]): FactMap {
    const facts = new Map<string, FactValue>();
    for (const doc of docs) {
        const parsed = factValueSchema.safeParse(doc.fact_value);
        if (!parsed.success) {
            logger.warn(
                { caseId: doc.case_id, factKey: doc.fact_key },
                'Skipping case fact with a non-scalar value'
            );
            continue;
        }
        facts.set(doc.fact_key, parsed.data);
    }
    return facts;
}

export class CaseFactModel {
    /**
     * Current facts of a case
     */
    static async findByCaseId(caseId: string): Promise<FactMap> {
        const db = getDB();
        const docs = await db.collection<CaseFactDocument>(COLLECTION_NAME)
            .find({ case_id: caseId })
            .sort({ created_at: 1, _id: 1 })
            .toArray();
        return factsFromDocuments(docs);
    }

    static async ensureIndexes(): Promise<void> {
        const db = getDB();
        await db.collection<CaseFactDocument>(COLLECTION_NAME).createIndex({ case_id: 1, fact_key: 1 });
    }
}
