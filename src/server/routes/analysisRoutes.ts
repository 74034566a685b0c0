import express, { Router, type Request, type Response } from 'express';
import { detectDocumentFormat } from '../extraction/formatDetection.js';
import { validate } from '../middleware/validation.js';
import type { AnalysisPipeline } from '../services/analysis/AnalysisPipeline.js';
import { toAnalysisResponse } from '../services/analysis/reportSerializer.js';
import { BadRequestError, UnsupportedFormatError } from '../types/errors.js';
import { asyncHandler } from '../utils/errorHandling.js';
import {
    analysisSchemas,
    DOCUMENT_CONTENT_TYPES,
    type AnalyzeDocumentQuery,
    type AnalyzeTextBody,
} from '../validation/analysisSchemas.js';

export interface AnalysisRouterOptions {
    maxUploadBytes: number;
}

export function createAnalysisRouter(pipeline: AnalysisPipeline, options: AnalysisRouterOptions): Router {
    const router = Router();

    /**
     * POST /api/analysis/text
     * Analyze pasted text
     */
    router.post('/text', validate(analysisSchemas.analyzeText), asyncHandler(async (req: Request, res: Response) => {
        const body: AnalyzeTextBody = req.body;
        const report = await pipeline.analyze({ kind: 'text', text: body.text });
        res.status(200).json(toAnalysisResponse(report));
    }));

    /**
     * POST /api/analysis/document?filename=<name>[&format=<tag>]
     * Analyze an uploaded document sent as the raw request body
     */
    router.post(
        '/document',
        express.raw({ type: [...DOCUMENT_CONTENT_TYPES], limit: options.maxUploadBytes }),
        validate(analysisSchemas.analyzeDocument),
        asyncHandler(async (req: Request, res: Response) => {
            const contentType = req.get('content-type');
            if (req.is([...DOCUMENT_CONTENT_TYPES]) === false) {
                throw new UnsupportedFormatError(contentType ?? 'unknown', { contentType });
            }
            if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
                throw new BadRequestError('Document body is empty');
            }

            const query: AnalyzeDocumentQuery = analysisSchemas.analyzeDocument.query.parse(req.query);
            const format = query.format ?? detectDocumentFormat(query.filename, contentType);

            const report = await pipeline.analyze({
                kind: 'document',
                document: { content: req.body, format, filename: query.filename },
            });
            res.status(200).json(toAnalysisResponse(report));
        })
    );

    return router;
}
