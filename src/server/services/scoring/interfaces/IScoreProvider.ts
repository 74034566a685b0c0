import type { ScoreKind, ScoreResult } from '../types/ScoreResult.js';

/**
 * Score provider interface
 *
 * Capability shared by the AI-origin and originality scorers. The analysis
 * pipeline only sees this interface, so a rule-based placeholder, a local
 * model or a remote API can be swapped in by configuration.
 */
export interface IScoreProvider {
  /**
   * Provider name, used in logs and error reports
   */
  readonly name: string;

  /**
   * What the score measures
   */
  readonly kind: ScoreKind;

  /**
   * Score a text
   *
   * May reject; callers isolate failures with scoreSafely().
   */
  score(text: string): Promise<ScoreResult>;
}
