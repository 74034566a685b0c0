import { loadAnalysisPolicy } from '../../config/analysisPolicy.js';
import type { Env } from '../../config/env.js';
import { TextExtractor } from '../../extraction/TextExtractor.js';
import { createScoreProviders } from '../scoring/scoreProviderFactory.js';
import { AnalysisPipeline } from './AnalysisPipeline.js';

/**
 * Wire the pipeline from validated environment settings and the policy file
 *
 * @throws ConfigurationError when the policy file is missing or invalid
 */
export function createAnalysisPipeline(env: Env): AnalysisPipeline {
  const policy = loadAnalysisPolicy(env.ANALYSIS_POLICY_PATH);
  const providers = createScoreProviders(env, policy);

  return new AnalysisPipeline({
    extractor: new TextExtractor(),
    aiOriginScorer: providers.aiOrigin,
    originalityScorer: providers.originality,
    minInputLength: policy.minInputLength,
  });
}
