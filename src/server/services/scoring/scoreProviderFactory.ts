/**
 * Score provider selection from configuration
 */

import type { AnalysisPolicy } from '../../config/analysisPolicy.js';
import type { Env } from '../../config/env.js';
import { ConfigurationError } from '../../types/errors.js';
import type { IScoreProvider } from './interfaces/IScoreProvider.js';
import { ExternalApiScorer } from './providers/ExternalApiScorer.js';
import { ModelBackedScorer, getClassifierHandle } from './providers/ModelBackedScorer.js';
import { RandomOriginalityScorer } from './providers/RandomOriginalityScorer.js';
import { RuleBasedScorer } from './providers/RuleBasedScorer.js';

export interface ScoreProviders {
  aiOrigin: IScoreProvider;
  originality: IScoreProvider;
}

type ProviderSettings = Pick<
  Env,
  | 'AI_SCORER'
  | 'ORIGINALITY_SCORER'
  | 'AI_DETECTOR_MODEL'
  | 'MODEL_SCORER_TIMEOUT_MS'
  | 'SIMILARITY_API_URL'
  | 'SIMILARITY_API_KEY'
  | 'SIMILARITY_API_TIMEOUT_MS'
>;

export function createAiOriginScorer(settings: ProviderSettings, policy: AnalysisPolicy): IScoreProvider {
  switch (settings.AI_SCORER) {
    case 'rule':
      return new RuleBasedScorer(policy.aiOrigin);
    case 'model':
      return new ModelBackedScorer({
        handle: getClassifierHandle(settings.AI_DETECTOR_MODEL),
        prefixLength: policy.aiOrigin.prefixLength,
        timeoutMs: settings.MODEL_SCORER_TIMEOUT_MS,
      });
  }
}

export function createOriginalityScorer(settings: ProviderSettings, policy: AnalysisPolicy): IScoreProvider {
  switch (settings.ORIGINALITY_SCORER) {
    case 'random':
      return new RandomOriginalityScorer(policy.originality);
    case 'external': {
      if (!settings.SIMILARITY_API_URL) {
        throw new ConfigurationError('SIMILARITY_API_URL is required for the external originality scorer');
      }
      return new ExternalApiScorer({
        url: settings.SIMILARITY_API_URL,
        apiKey: settings.SIMILARITY_API_KEY,
        timeoutMs: settings.SIMILARITY_API_TIMEOUT_MS,
        policy: policy.originality,
      });
    }
  }
}

export function createScoreProviders(settings: ProviderSettings, policy: AnalysisPolicy): ScoreProviders {
  return {
    aiOrigin: createAiOriginScorer(settings, policy),
    originality: createOriginalityScorer(settings, policy),
  };
}
