/**
 * RandomOriginalityScorer - Simulated plagiarism check
 *
 * Placeholder for a similarity-search call: the score is drawn uniformly
 * from [0, maxScore] and the reference sources are cited only when it
 * exceeds the threshold.
 */

import { randomInt } from 'crypto';
import type { OriginalityPolicy } from '../../../config/analysisPolicy.js';
import type { IScoreProvider } from '../interfaces/IScoreProvider.js';
import type { ScoreResult } from '../types/ScoreResult.js';

/**
 * Integer in [min, max], both inclusive
 */
export type RandomIntSource = (min: number, max: number) => number;

export const cryptoRandomInt: RandomIntSource = (min, max) => randomInt(min, max + 1);

export class RandomOriginalityScorer implements IScoreProvider {
  readonly name = 'random-originality';
  readonly kind = 'originality';

  constructor(
    private readonly policy: OriginalityPolicy,
    private readonly random: RandomIntSource = cryptoRandomInt
  ) {}

  async score(_text: string): Promise<ScoreResult> {
    const score = this.random(0, this.policy.maxScore);
    if (!Number.isInteger(score) || score < 0 || score > this.policy.maxScore) {
      throw new Error(`Random source returned ${score}, outside [0, ${this.policy.maxScore}]`);
    }

    if (score > this.policy.threshold) {
      return { score, label: 'high', sources: [...this.policy.referenceSources] };
    }
    return { score, label: 'low', sources: [] };
  }
}
