import { getDB } from '../config/database.js';
import type { ObjectId } from 'mongodb';
import { z } from 'zod';
import type { RuleVersion } from '../domain/eligibility/types.js';
import { logger } from '../utils/logger.js';

export interface VisaRuleVersionDocument {
    _id?: ObjectId;
    rule_version_id: string;
    visa_type_id: string;
    visa_code: string;
    effective_from: Date;
    effective_to?: Date | null;
    published: boolean;
    created_at: Date;
    requirements: Array<{
        code: string;
        expression: unknown;
        mandatory: boolean;
        description?: string | null;
    }>;
}

const COLLECTION_NAME = 'visa_rule_versions';

/**
 * Stored shape of a rule version. Expressions are kept opaque here and
 * validated when each requirement is evaluated.
 */
const ruleVersionDocumentSchema = z.object({
    rule_version_id: z.string().min(1),
    visa_type_id: z.string().min(1),
    visa_code: z.string().min(1),
    effective_from: z.date(),
    effective_to: z.date().nullish(),
    published: z.boolean(),
    created_at: z.date(),
    requirements: z.array(
        z.object({
            code: z.string().min(1),
            expression: z.unknown(),
            mandatory: z.boolean().default(false),
            description: z.string().nullish(),
        })
    ),
});

/**
 * Map a stored document to a rule version, or null when the document is malformed
 */
export function ruleVersionFromDocument(raw: unknown): RuleVersion | null {
    const parsed = ruleVersionDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        logger.warn(
            { issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) },
            'Skipping malformed rule version document'
        );
        return null;
    }
    const doc = parsed.data;
    return {
        id: doc.rule_version_id,
        visaTypeId: doc.visa_type_id,
        visaCode: doc.visa_code,
        effectiveFrom: doc.effective_from,
        effectiveTo: doc.effective_to ?? null,
        published: doc.published,
        createdAt: doc.created_at,
        requirements: doc.requirements.map(requirement => ({
            code: requirement.code,
            expression: requirement.expression,
            mandatory: requirement.mandatory,
            ...(requirement.description ? { description: requirement.description } : {}),
        })),
    };
}

export class VisaRuleVersionModel {
    /**
     * Published versions of a visa type in force on `asOf`
     */
    static async findActive(visaTypeId: string, asOf: Date): Promise<RuleVersion[]> {
        const db = getDB();
        const docs = await db.collection<VisaRuleVersionDocument>(COLLECTION_NAME)
            .find({
                visa_type_id: visaTypeId,
                published: true,
                effective_from: { $lte: asOf },
                $or: [{ effective_to: null }, { effective_to: { $gte: asOf } }],
            })
            .sort({ created_at: -1 })
            .toArray();

        const versions: RuleVersion[] = [];
        for (const doc of docs) {
            const version = ruleVersionFromDocument(doc);
            if (version) {
                versions.push(version);
            }
        }
        return versions;
    }

    static async ensureIndexes(): Promise<void> {
        const db = getDB();
        await db.collection<VisaRuleVersionDocument>(COLLECTION_NAME).createIndex({
            visa_type_id: 1,
            published: 1,
            effective_from: -1,
        });
    }
}
