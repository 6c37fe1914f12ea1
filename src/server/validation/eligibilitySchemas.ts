import { z } from 'zod';

/**
 * Most visa types one request may check a case against
 */
export const MAX_VISA_TYPES = 10;

const identifier = z
    .string()
    .trim()
    .min(1, 'Identifier cannot be empty')
    .max(128, 'Identifier is too long')
    .regex(/^[A-Za-z0-9_.:-]+$/, 'Identifier contains invalid characters');

// Accepts a calendar date (YYYY-MM-DD) or a full ISO timestamp
const evaluationDate = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}(T[\d:.]+(Z|[+-]\d{2}:\d{2})?)?$/, 'evaluationDate must be an ISO date')
    .transform((value, ctx) => {
        const date = new Date(value);
        if (Number.isNaN(date.getTime())) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'evaluationDate is not a valid date' });
            return z.NEVER;
        }
        return date;
    });

const caseParams = z.object({
    caseId: identifier,
});

export const eligibilitySchemas = {
    checkEligibility: {
        params: caseParams,
        body: z.object({
            visaTypeIds: z
                .array(identifier)
                .min(1, 'At least one visa type is required')
                .max(MAX_VISA_TYPES, `At most ${MAX_VISA_TYPES} visa types can be checked at once`)
                // Duplicates would produce duplicate results
                .transform(ids => [...new Set(ids)]),
            evaluationDate: evaluationDate.optional(),
            enableAiReasoning: z.boolean().optional(),
            jurisdiction: z.string().trim().min(1).max(64).optional(),
        }).strict(),
    },

    listResults: {
        params: caseParams,
    },
};

export type CheckEligibilityBody = z.output<typeof eligibilitySchemas.checkEligibility.body>;
