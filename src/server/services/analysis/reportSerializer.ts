import type { AnalysisReport, AnalysisResponse } from './types.js';

/**
 * AI scores strictly above this are shown as flagged
 */
export const AI_FLAG_THRESHOLD = 50;

/**
 * Convert a report to its snake_case wire shape.
 *
 * Degraded scores keep their error label and are listed under `errors`.
 */
export function toAnalysisResponse(report: AnalysisReport): AnalysisResponse {
  const { aiOrigin, originality } = report;
  const errors: NonNullable<AnalysisResponse['errors']> = [];

  if (aiOrigin.label === 'error') {
    errors.push({ scorer: 'ai_origin', message: aiOrigin.error ?? 'AI-origin scoring failed' });
  }
  if (originality.label === 'error') {
    errors.push({ scorer: 'plagiarism', message: originality.error ?? 'Plagiarism scoring failed' });
  }

  return {
    ai_score: aiOrigin.score,
    ai_label: aiOrigin.label,
    ai_flagged: aiOrigin.label !== 'error' && aiOrigin.score > AI_FLAG_THRESHOLD,
    plagiarism_score: originality.score,
    plagiarism_label: originality.label,
    sources: [...originality.sources],
    extracted_text: report.extractedText,
    ...(errors.length > 0 && { errors }),
  };
}
