import { describe, it, expect, vi } from 'vitest';
import { ModelHandle } from '../ModelHandle.js';
import {
  ModelBackedScorer,
  getClassifierHandle,
  machineProbability,
  type ClassificationLabel,
  type TextClassifier,
} from '../providers/ModelBackedScorer.js';
import { TimeoutError } from '../../../utils/withTimeout.js';

function handleFor(classifier: TextClassifier): ModelHandle<TextClassifier> {
  return new ModelHandle('test/detector', async () => classifier);
}

describe('machineProbability', () => {
  it('uses the machine-generated label', () => {
    expect(
      machineProbability([
        { label: 'Real', score: 0.1 },
        { label: 'Fake', score: 0.9 },
      ])
    ).toBe(0.9);
    expect(machineProbability([{ label: 'LABEL_1', score: 0.75 }])).toBe(0.75);
  });

  it('complements a human label reported alone', () => {
    expect(machineProbability([{ label: 'Real', score: 0.75 }])).toBe(0.25);
  });

  it('rejects unknown labels', () => {
    expect(() => machineProbability([{ label: 'POSITIVE', score: 0.99 }])).toThrow(
      'Classifier returned no recognised label (got: POSITIVE)'
    );
  });
});

describe('ModelBackedScorer', () => {
  it('reports the machine probability as a percentage', async () => {
    const classifier = vi.fn(async (): Promise<ClassificationLabel[]> => [
      { label: 'Fake', score: 0.9731 },
      { label: 'Real', score: 0.0269 },
    ]);
    const scorer = new ModelBackedScorer({ handle: handleFor(classifier), prefixLength: 1500, timeoutMs: 1000 });

    await expect(scorer.score('Some text to classify.')).resolves.toEqual({ score: 97.3, label: 'high', sources: [] });
  });

  it('labels scores below 50 as low', async () => {
    const scorer = new ModelBackedScorer({
      handle: handleFor(async () => [{ label: 'Real', score: 0.8 }]),
      prefixLength: 1500,
      timeoutMs: 1000,
    });

    await expect(scorer.score('Some text to classify.')).resolves.toEqual({ score: 20, label: 'low', sources: [] });
  });

  it('labels a score of exactly 50 as high', async () => {
    const scorer = new ModelBackedScorer({
      handle: handleFor(async () => [{ label: 'LABEL_1', score: 0.5 }]),
      prefixLength: 1500,
      timeoutMs: 1000,
    });

    await expect(scorer.score('Some text to classify.')).resolves.toMatchObject({ score: 50, label: 'high' });
  });

  it('classifies only the configured prefix', async () => {
    const classifier = vi.fn(async (_text: string): Promise<ClassificationLabel[]> => [{ label: 'Fake', score: 0.2 }]);
    const scorer = new ModelBackedScorer({ handle: handleFor(classifier), prefixLength: 10, timeoutMs: 1000 });

    await scorer.score('0123456789abcdefghij');

    expect(classifier).toHaveBeenCalledWith('0123456789');
  });

  it('times out a classifier that never answers', async () => {
    const scorer = new ModelBackedScorer({
      handle: handleFor(() => new Promise<ClassificationLabel[]>(() => {})),
      prefixLength: 1500,
      timeoutMs: 20,
    });

    const result = scorer.score('Some text to classify.');
    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('AI detector inference (test/detector) timed out after 20ms');
  });

  it('propagates a failed model load', async () => {
    const handle = new ModelHandle<TextClassifier>('test/missing', async () => {
      throw new Error('model not found');
    });
    const scorer = new ModelBackedScorer({ handle, prefixLength: 1500, timeoutMs: 1000 });

    await expect(scorer.score('Some text to classify.')).rejects.toThrow('model not found');
  });
});

describe('getClassifierHandle', () => {
  it('returns one handle per model id', () => {
    const loader = vi.fn(async (): Promise<TextClassifier> => async () => []);

    const first = getClassifierHandle('test/shared-detector', loader);
    const second = getClassifierHandle('test/shared-detector', loader);
    const other = getClassifierHandle('test/other-detector', loader);

    expect(second).toBe(first);
    expect(other).not.toBe(first);
    expect(first.modelId).toBe('test/shared-detector');
    expect(loader).not.toHaveBeenCalled();
  });
});
