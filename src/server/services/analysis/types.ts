import type { SourceDocument } from '../../extraction/types.js';
import type { ScoreResult } from '../scoring/types/ScoreResult.js';

/**
 * Pipeline input: pasted text skips extraction
 */
export type AnalysisInput =
  | { kind: 'text'; text: string }
  | { kind: 'document'; document: SourceDocument };

export interface AnalysisReport {
  aiOrigin: ScoreResult;
  originality: ScoreResult;
  extractedText: string;
}

/**
 * Wire shape of a report, as returned by the HTTP API and the CLI
 */
export interface AnalysisResponse {
  ai_score: number;
  ai_label: ScoreResult['label'];
  ai_flagged: boolean;
  plagiarism_score: number;
  plagiarism_label: ScoreResult['label'];
  sources: string[];
  extracted_text: string;
  errors?: Array<{ scorer: 'ai_origin' | 'plagiarism'; message: string }>;
}
