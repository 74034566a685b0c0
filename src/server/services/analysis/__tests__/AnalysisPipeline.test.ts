import { describe, it, expect, vi } from 'vitest';
import { AnalysisPipeline, type AnalysisPipelineOptions } from '../AnalysisPipeline.js';
import { TextExtractor } from '../../../extraction/TextExtractor.js';
import type { FormatExtractor } from '../../../extraction/types.js';
import type { IScoreProvider } from '../../scoring/interfaces/IScoreProvider.js';
import { RandomOriginalityScorer } from '../../scoring/providers/RandomOriginalityScorer.js';
import { RuleBasedScorer } from '../../scoring/providers/RuleBasedScorer.js';
import type { ScoreResult } from '../../scoring/types/ScoreResult.js';
import {
  ErrorCode,
  ExtractionFailedError,
  InsufficientInputError,
  UnsupportedFormatError,
} from '../../../types/errors.js';

const SCENARIO_TEXT =
  'As an AI language model, I cannot provide opinions. In conclusion, this demonstrates the pattern.';
const HUMAN_TEXT = 'We walked along the river at dusk and counted eleven herons before the rain came.';

const originalityPolicy = {
  threshold: 10,
  maxScore: 20,
  referenceSources: ['Wikipedia - General Knowledge', 'Academic Source A'],
};

function stubScorer(kind: IScoreProvider['kind'], result: ScoreResult) {
  const score = vi.fn(async (_text: string) => result);
  const provider: IScoreProvider = { name: `stub-${kind}`, kind, score };
  return { provider, score };
}

function createPipeline(overrides: Partial<AnalysisPipelineOptions> = {}) {
  return new AnalysisPipeline({
    extractor: new TextExtractor(),
    aiOriginScorer: new RuleBasedScorer({
      telltalePhrases: ['As an AI language model', 'In conclusion,'],
      highScore: 85.5,
      lowScore: 12,
    }),
    originalityScorer: new RandomOriginalityScorer(originalityPolicy),
    minInputLength: 50,
    ...overrides,
  });
}

describe('AnalysisPipeline', () => {
  it('scores the telltale scenario text as likely generated', async () => {
    const report = await createPipeline().analyze({ kind: 'text', text: SCENARIO_TEXT });

    expect(report.extractedText).toBe(SCENARIO_TEXT);
    expect(report.aiOrigin).toEqual({ score: 85.5, label: 'high', sources: [] });
    expect(report.originality.score).toBeGreaterThanOrEqual(0);
    expect(report.originality.score).toBeLessThanOrEqual(20);
    if (report.originality.score > 10) {
      expect(report.originality.sources).toEqual(originalityPolicy.referenceSources);
    } else {
      expect(report.originality.sources).toEqual([]);
    }
  });

  it('scores text without telltale phrases as low', async () => {
    const report = await createPipeline().analyze({ kind: 'text', text: HUMAN_TEXT });

    expect(report.aiOrigin).toEqual({ score: 12, label: 'low', sources: [] });
  });

  it('extracts documents before scoring', async () => {
    const docx: FormatExtractor = { extract: async () => `${HUMAN_TEXT}\n` };
    const pipeline = createPipeline({ extractor: new TextExtractor({ docx }) });

    const report = await pipeline.analyze({
      kind: 'document',
      document: { content: Buffer.from('zip bytes'), format: 'docx', filename: 'essay.docx' },
    });

    expect(report.extractedText).toBe(`${HUMAN_TEXT}\n`);
    expect(report.aiOrigin.label).toBe('low');
  });

  it('rejects text shorter than the minimum without scoring', async () => {
    const aiOrigin = stubScorer('ai-origin', { score: 12, label: 'low', sources: [] });
    const pipeline = createPipeline({ aiOriginScorer: aiOrigin.provider });

    const result = pipeline.analyze({ kind: 'text', text: 'Too short to judge.' });

    await expect(result).rejects.toBeInstanceOf(InsufficientInputError);
    await expect(result).rejects.toMatchObject({
      code: ErrorCode.INSUFFICIENT_INPUT,
      context: { actualLength: 19, minLength: 50 },
    });
    expect(aiOrigin.score).not.toHaveBeenCalled();
  });

  it('accepts text of exactly the minimum length, whitespace included', async () => {
    const text = `${' '.repeat(10)}${'x'.repeat(40)}`;

    const report = await createPipeline().analyze({ kind: 'text', text });

    expect(report.extractedText).toHaveLength(50);
  });

  it('states the inclusive minimum when one character short', async () => {
    const result = createPipeline().analyze({ kind: 'text', text: 'x'.repeat(49) });

    await expect(result).rejects.toThrow('Please provide text of at least 50 characters (received 49)');
  });

  it('applies the minimum length to extracted text', async () => {
    const pipeline = createPipeline();

    await expect(
      pipeline.analyze({ kind: 'document', document: { content: Buffer.from('tiny'), format: 'plain' } })
    ).rejects.toBeInstanceOf(InsufficientInputError);
  });

  it('aborts on an unsupported format', async () => {
    await expect(
      createPipeline().analyze({
        kind: 'document',
        document: { content: Buffer.from(HUMAN_TEXT), format: 'txt' },
      })
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it('aborts on an extraction failure', async () => {
    const pdf: FormatExtractor = {
      extract: async () => {
        throw new ExtractionFailedError('pdf', 'Invalid PDF structure.');
      },
    };

    await expect(
      createPipeline({ extractor: new TextExtractor({ pdf }) }).analyze({
        kind: 'document',
        document: { content: Buffer.from('broken'), format: 'pdf' },
      })
    ).rejects.toBeInstanceOf(ExtractionFailedError);
  });

  it('isolates a failing scorer from the other', async () => {
    const originalityScorer: IScoreProvider = {
      name: 'broken-originality',
      kind: 'originality',
      score: async () => {
        throw new Error('service unavailable');
      },
    };

    const report = await createPipeline({ originalityScorer }).analyze({ kind: 'text', text: SCENARIO_TEXT });

    expect(report.originality).toEqual({
      score: 0,
      label: 'error',
      sources: [],
      error: "Scorer 'broken-originality' failed: service unavailable",
    });
    expect(report.aiOrigin).toEqual({ score: 85.5, label: 'high', sources: [] });
  });

  it('passes the full text to both scorers', async () => {
    const aiOrigin = stubScorer('ai-origin', { score: 12, label: 'low', sources: [] });
    const originality = stubScorer('originality', { score: 3, label: 'low', sources: [] });

    await createPipeline({ aiOriginScorer: aiOrigin.provider, originalityScorer: originality.provider }).analyze({
      kind: 'text',
      text: HUMAN_TEXT,
    });

    expect(aiOrigin.score).toHaveBeenCalledWith(HUMAN_TEXT);
    expect(originality.score).toHaveBeenCalledWith(HUMAN_TEXT);
  });

  it('describes the configured scorers', () => {
    expect(createPipeline().describeScorers()).toEqual({ aiOrigin: 'rule-based', originality: 'random-originality' });
  });
});
