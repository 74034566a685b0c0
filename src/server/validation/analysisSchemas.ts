import { z } from 'zod';

export const analysisSchemas = {
    analyzeText: {
        body: z.object({
            text: z.string({
                required_error: 'text is required',
                invalid_type_error: 'text must be a string',
            }),
        }),
    },

    analyzeDocument: {
        query: z.object({
            filename: z.string().min(1).max(255).optional(),
            // Any tag is accepted here; unknown ones are rejected by the extractor with 415
            format: z.string().min(1).max(32).optional(),
        }),
    },
};

export type AnalyzeTextBody = z.infer<typeof analysisSchemas.analyzeText.body>;
export type AnalyzeDocumentQuery = z.infer<typeof analysisSchemas.analyzeDocument.query>;

export const DOCUMENT_CONTENT_TYPES = [
    'application/pdf',
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    'text/plain',
    'application/octet-stream',
] as const;
