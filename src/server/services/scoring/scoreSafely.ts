import { ScoringError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { IScoreProvider } from './interfaces/IScoreProvider.js';
import type { ScoreResult } from './types/ScoreResult.js';

/**
 * Reject results that break the ScoreResult invariants
 */
function checkResult(result: ScoreResult): string | null {
  if (!Number.isFinite(result.score) || result.score < 0 || result.score > 100) {
    return `score ${result.score} is outside [0, 100]`;
  }
  if (result.label === 'error') {
    return 'provider returned an error label instead of throwing';
  }
  if (result.sources.length > 0 && result.label !== 'high') {
    return `sources cited with label '${result.label}'`;
  }
  return null;
}

/**
 * Run a provider without letting its failure escape.
 *
 * Any rejection or invalid result becomes a ScoringError, which is logged
 * and reported as `{ score: 0, label: 'error' }`.
 */
export async function scoreSafely(provider: IScoreProvider, text: string): Promise<ScoreResult> {
  let scoringError: ScoringError;
  try {
    const result = await provider.score(text);
    const problem = checkResult(result);
    if (!problem) {
      return result;
    }
    scoringError = new ScoringError(provider.name, problem);
  } catch (error) {
    scoringError = error instanceof ScoringError ? error : new ScoringError(provider.name, getErrorMessage(error), error);
  }

  logger.warn(
    { provider: provider.name, kind: provider.kind, error: scoringError.message },
    'Score provider failed; reporting error-labelled score'
  );

  return { score: 0, label: 'error', sources: [], error: scoringError.message };
}
