/**
 * Scoring Layer - Main exports
 *
 * Central export point for the scoring layer.
 */

// Interfaces
export type { IScoreProvider } from './interfaces/IScoreProvider.js';

// Types
export type { ScoreResult, ScoreLabel, ScoreKind } from './types/ScoreResult.js';

// Providers
export { RuleBasedScorer } from './providers/RuleBasedScorer.js';
export { RandomOriginalityScorer, cryptoRandomInt, type RandomIntSource } from './providers/RandomOriginalityScorer.js';
export {
  ModelBackedScorer,
  getClassifierHandle,
  loadTextClassifier,
  machineProbability,
  type TextClassifier,
  type ClassificationLabel,
} from './providers/ModelBackedScorer.js';
export { ExternalApiScorer, similarityResponseSchema } from './providers/ExternalApiScorer.js';

// Model lifecycle
export { ModelHandle } from './ModelHandle.js';

// Failure isolation and selection
export { scoreSafely } from './scoreSafely.js';
export { createScoreProviders, createAiOriginScorer, createOriginalityScorer, type ScoreProviders } from './scoreProviderFactory.js';
