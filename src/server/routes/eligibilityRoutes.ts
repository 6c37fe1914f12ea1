import { Router, Request, Response } from 'express';
import { asyncHandler } from '../utils/errorHandling.js';
import { validate } from '../middleware/validation.js';
import { eligibilitySchemas, type CheckEligibilityBody } from '../validation/eligibilitySchemas.js';
import type {
    BatchCheckReport,
    EligibilityCheckCoordinator,
    EligibilityCheckReport,
} from '../services/eligibility/EligibilityCheckCoordinator.js';
import type { EligibilityResultStore } from '../contracts/eligibility.js';

export interface EligibilityRouteDependencies {
    coordinator: EligibilityCheckCoordinator;
    results: EligibilityResultStore;
}

/**
 * Response view of one check. Prompts and raw model output stay in the reasoning log.
 */
export function toCheckResponse(report: EligibilityCheckReport) {
    return {
        ...report.result,
        aiStatus: report.aiStatus,
        ...(report.aiFailure ? { aiFailure: report.aiFailure } : {}),
        escalationReasons: report.combined.escalationReasons,
        ruleEvaluation: {
            ruleVersionId: report.ruleEvaluation.ruleVersionId,
            outcome: report.ruleEvaluation.outcome,
            confidence: report.ruleEvaluation.confidence,
            passed: report.ruleEvaluation.passed,
            total: report.ruleEvaluation.total,
            requirements: report.ruleEvaluation.evaluations,
        },
        citations: report.citations.map(citation => ({
            documentVersionId: citation.documentVersionId,
            excerpt: citation.excerpt,
            relevanceScore: citation.relevanceScore,
        })),
        warnings: report.warnings,
    };
}

export function toBatchResponse(report: BatchCheckReport) {
    return {
        caseId: report.caseId,
        results: report.results.map(toCheckResponse),
        failures: report.failures,
        summary: report.summary,
    };
}

export function createEligibilityRoutes({ coordinator, results }: EligibilityRouteDependencies): Router {
    const router = Router();

    /**
     * POST /api/cases/:caseId/eligibility
     * Check a case against one or more visa types
     */
    router.post(
        '/cases/:caseId/eligibility',
        validate(eligibilitySchemas.checkEligibility),
        asyncHandler(async (req: Request, res: Response) => {
            const { caseId } = req.params;
            const body: CheckEligibilityBody = req.body;

            const report = await coordinator.checkMany(caseId, body.visaTypeIds, {
                evaluationDate: body.evaluationDate,
                enableAiReasoning: body.enableAiReasoning,
                jurisdiction: body.jurisdiction,
            });

            res.json(toBatchResponse(report));
        })
    );

    /**
     * GET /api/cases/:caseId/eligibility-results
     * Stored results of a case, newest first
     */
    router.get(
        '/cases/:caseId/eligibility-results',
        validate(eligibilitySchemas.listResults),
        asyncHandler(async (req: Request, res: Response) => {
            const { caseId } = req.params;
            const stored = await results.findByCaseId(caseId);
            res.json({ caseId, results: stored });
        })
    );

    return router;
}
