/**
 * RuleBasedScorer - Telltale-phrase AI-origin policy
 *
 * Placeholder standing in for a real classifier: text containing any
 * configured telltale phrase is reported as likely generated.
 */

import type { AiOriginPolicy } from '../../../config/analysisPolicy.js';
import type { IScoreProvider } from '../interfaces/IScoreProvider.js';
import type { ScoreResult } from '../types/ScoreResult.js';

export class RuleBasedScorer implements IScoreProvider {
  readonly name = 'rule-based';
  readonly kind = 'ai-origin';

  private readonly phrases: readonly string[];
  private readonly highScore: number;
  private readonly lowScore: number;

  constructor(policy: Pick<AiOriginPolicy, 'telltalePhrases' | 'highScore' | 'lowScore'>) {
    this.phrases = [...policy.telltalePhrases];
    this.highScore = policy.highScore;
    this.lowScore = policy.lowScore;
  }

  /**
   * Phrases found in the text, in policy order
   */
  findTelltalePhrases(text: string): string[] {
    return this.phrases.filter((phrase) => text.includes(phrase));
  }

  async score(text: string): Promise<ScoreResult> {
    // The whole text is scanned: a phrase past any prefix still counts
    if (this.findTelltalePhrases(text).length > 0) {
      return { score: this.highScore, label: 'high', sources: [] };
    }
    return { score: this.lowScore, label: 'low', sources: [] };
  }
}
