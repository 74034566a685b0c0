/**
 * Score result types shared by every score provider
 */

export type ScoreLabel = 'low' | 'high' | 'error';

/**
 * What a provider measures
 */
export type ScoreKind = 'ai-origin' | 'originality';

/**
 * Outcome of one scorer on one text.
 *
 * `score` is a percentage in [0, 100]; it is 0 when `label` is `error`.
 * `sources` is ordered and empty unless the label reports a match.
 */
export interface ScoreResult {
  score: number;
  label: ScoreLabel;
  sources: string[];
  error?: string;
}
