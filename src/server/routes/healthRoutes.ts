import { Router, type Request, type Response } from 'express';
import type { AnalysisPipeline } from '../services/analysis/AnalysisPipeline.js';

/**
 * GET /health
 * Liveness plus the configured score providers
 */
export function createHealthRouter(pipeline: AnalysisPipeline): Router {
    const router = Router();

    router.get('/health', (_req: Request, res: Response) => {
        const scorers = pipeline.describeScorers();
        res.status(200).json({
            status: 'ok',
            aiScorer: scorers.aiOrigin,
            originalityScorer: scorers.originality,
        });
    });

    return router;
}
