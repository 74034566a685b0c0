/**
 * ModelBackedScorer - AI-origin scoring with a local text-classification model
 *
 * Runs a detector such as Xenova/roberta-base-openai-detector through
 * @huggingface/transformers. The model is loaded once per process through a
 * shared ModelHandle; only a bounded prefix of the text is classified.
 */

import { z } from 'zod';
import { logger } from '../../../utils/logger.js';
import { withTimeout } from '../../../utils/withTimeout.js';
import { ModelHandle } from '../ModelHandle.js';
import type { IScoreProvider } from '../interfaces/IScoreProvider.js';
import type { ScoreResult } from '../types/ScoreResult.js';

export interface ClassificationLabel {
  label: string;
  score: number;
}

export type TextClassifier = (text: string) => Promise<ClassificationLabel[]>;

const classificationSchema = z.object({
  label: z.string(),
  score: z.number().min(0).max(1),
});

const classifierOutputSchema = z.preprocess(
  (value) => (Array.isArray(value) ? value : [value]),
  z.array(classificationSchema).min(1)
);

const MACHINE_LABELS = new Set(['fake', 'label_1', 'ai', 'machine', 'generated']);
const HUMAN_LABELS = new Set(['real', 'label_0', 'human']);

/**
 * Load a text-classification pipeline and wrap it as a TextClassifier
 */
export async function loadTextClassifier(modelId: string): Promise<TextClassifier> {
  const { pipeline } = await import('@huggingface/transformers');
  const classifier = await pipeline('text-classification', modelId);

  return async (text: string) => {
    const output: unknown = await classifier(text);
    return classifierOutputSchema.parse(output);
  };
}

const classifierHandles = new Map<string, ModelHandle<TextClassifier>>();

/**
 * Process-wide handle for a detector model; one per model id.
 */
export function getClassifierHandle(
  modelId: string,
  loader: (modelId: string) => Promise<TextClassifier> = loadTextClassifier
): ModelHandle<TextClassifier> {
  const existing = classifierHandles.get(modelId);
  if (existing) {
    return existing;
  }

  const handle = new ModelHandle(modelId, loader);
  classifierHandles.set(modelId, handle);
  return handle;
}

/**
 * Probability in [0, 1] that the text is machine generated.
 *
 * Binary detectors may report only their top label, so a human label is
 * converted to its complement.
 */
export function machineProbability(labels: ClassificationLabel[]): number {
  const machine = labels.find((entry) => MACHINE_LABELS.has(entry.label.toLowerCase()));
  if (machine) {
    return machine.score;
  }

  const human = labels.find((entry) => HUMAN_LABELS.has(entry.label.toLowerCase()));
  if (human) {
    return 1 - human.score;
  }

  const seen = labels.map((entry) => entry.label).join(', ');
  throw new Error(`Classifier returned no recognised label (got: ${seen})`);
}

export interface ModelBackedScorerOptions {
  handle: ModelHandle<TextClassifier>;
  prefixLength: number;
  timeoutMs: number;
}

export class ModelBackedScorer implements IScoreProvider {
  readonly name = 'model-backed';
  readonly kind = 'ai-origin';

  private readonly handle: ModelHandle<TextClassifier>;
  private readonly prefixLength: number;
  private readonly timeoutMs: number;

  constructor(options: ModelBackedScorerOptions) {
    this.handle = options.handle;
    this.prefixLength = options.prefixLength;
    this.timeoutMs = options.timeoutMs;
  }

  async score(text: string): Promise<ScoreResult> {
    const prefix = text.slice(0, this.prefixLength);

    const labels = await withTimeout(
      this.classify(prefix),
      this.timeoutMs,
      `AI detector inference (${this.handle.modelId})`
    );

    const score = Math.round(machineProbability(labels) * 1000) / 10;

    logger.debug(
      { modelId: this.handle.modelId, classifiedLength: prefix.length, score },
      'AI detector inference completed'
    );

    return { score, label: score >= 50 ? 'high' : 'low', sources: [] };
  }

  private async classify(text: string): Promise<ClassificationLabel[]> {
    const classifier = await this.handle.get();
    return classifier(text);
  }
}
