/**
 * AnalysisPipeline - extraction, input validation, scoring, report assembly
 *
 * Stateless: every call is independent. Extraction and input-length errors
 * abort before any scoring; scorer failures only degrade their own score.
 */

import type { TextExtractor } from '../../extraction/TextExtractor.js';
import { InsufficientInputError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { IScoreProvider } from '../scoring/interfaces/IScoreProvider.js';
import { scoreSafely } from '../scoring/scoreSafely.js';
import type { AnalysisInput, AnalysisReport } from './types.js';

export interface AnalysisPipelineOptions {
  extractor: TextExtractor;
  aiOriginScorer: IScoreProvider;
  originalityScorer: IScoreProvider;
  minInputLength: number;
}

export class AnalysisPipeline {
  private readonly extractor: TextExtractor;
  private readonly aiOriginScorer: IScoreProvider;
  private readonly originalityScorer: IScoreProvider;
  private readonly minInputLength: number;

  constructor(options: AnalysisPipelineOptions) {
    this.extractor = options.extractor;
    this.aiOriginScorer = options.aiOriginScorer;
    this.originalityScorer = options.originalityScorer;
    this.minInputLength = options.minInputLength;
  }

  /**
   * Analyze pasted text or a document
   *
   * @throws UnsupportedFormatError, ExtractionFailedError, InsufficientInputError
   */
  async analyze(input: AnalysisInput): Promise<AnalysisReport> {
    const startTime = Date.now();

    const text = input.kind === 'text' ? input.text : await this.extractor.extractText(input.document);

    if (text.length < this.minInputLength) {
      throw new InsufficientInputError(text.length, this.minInputLength);
    }

    const [aiOrigin, originality] = await Promise.all([
      scoreSafely(this.aiOriginScorer, text),
      scoreSafely(this.originalityScorer, text),
    ]);

    logger.info(
      {
        inputKind: input.kind,
        ...(input.kind === 'document' && { format: input.document.format }),
        textLength: text.length,
        aiLabel: aiOrigin.label,
        originalityLabel: originality.label,
        durationMs: Date.now() - startTime,
      },
      'Analysis completed'
    );

    return { aiOrigin, originality, extractedText: text };
  }

  describeScorers(): { aiOrigin: string; originality: string } {
    return { aiOrigin: this.aiOriginScorer.name, originality: this.originalityScorer.name };
  }
}
