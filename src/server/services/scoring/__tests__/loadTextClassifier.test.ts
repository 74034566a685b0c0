import { beforeEach, describe, it, expect, vi } from 'vitest';
import { loadTextClassifier } from '../providers/ModelBackedScorer.js';

const { pipelineMock } = vi.hoisted(() => ({ pipelineMock: vi.fn() }));

vi.mock('@huggingface/transformers', () => ({ pipeline: pipelineMock }));

describe('loadTextClassifier', () => {
  beforeEach(() => {
    pipelineMock.mockReset();
  });

  it('loads a text-classification pipeline for the model id', async () => {
    const classify = vi.fn(async (_text: string) => [
      { label: 'Real', score: 0.2 },
      { label: 'Fake', score: 0.8 },
    ]);
    pipelineMock.mockResolvedValue(classify);

    const classifier = await loadTextClassifier('test/detector');

    expect(pipelineMock).toHaveBeenCalledWith('text-classification', 'test/detector');
    await expect(classifier('sample text')).resolves.toEqual([
      { label: 'Real', score: 0.2 },
      { label: 'Fake', score: 0.8 },
    ]);
    expect(classify).toHaveBeenCalledWith('sample text');
  });

  it('wraps a single label in a list', async () => {
    pipelineMock.mockResolvedValue(async () => ({ label: 'LABEL_1', score: 0.6 }));

    const classifier = await loadTextClassifier('test/detector');

    await expect(classifier('sample text')).resolves.toEqual([{ label: 'LABEL_1', score: 0.6 }]);
  });

  it('rejects output that is not a list of labels', async () => {
    pipelineMock.mockResolvedValue(async () => [{ label: 'Fake', score: 3 }]);

    const classifier = await loadTextClassifier('test/detector');

    await expect(classifier('sample text')).rejects.toThrow();
  });

  it('propagates a failed model download', async () => {
    pipelineMock.mockRejectedValue(new Error('model not found'));

    await expect(loadTextClassifier('test/missing')).rejects.toThrow('model not found');
  });
});
