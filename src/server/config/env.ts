/**
 * Environment Variable Validation
 *
 * Centralized validation of all environment variables.
 * Values are parsed once, checked together, and cached.
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseOneOf<T extends string>(value: string | undefined, allowed: readonly T[], defaultValue: T): T | null {
  if (!value) return defaultValue;
  return allowed.find((candidate) => candidate === value) ?? null;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
const AI_SCORERS = ['rule', 'model'] as const;
const ORIGINALITY_SCORERS = ['random', 'external'] as const;

export type AiScorerKind = (typeof AI_SCORERS)[number];
export type OriginalityScorerKind = (typeof ORIGINALITY_SCORERS)[number];

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: (typeof NODE_ENVS)[number];
  PORT: number;

  // CORS Configuration
  ALLOWED_ORIGINS?: string;

  // Logging Configuration
  LOG_LEVEL?: string;

  // Request limits
  MAX_UPLOAD_BYTES: number;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;

  // Analysis policy file (telltale phrases, thresholds, reference sources)
  ANALYSIS_POLICY_PATH?: string;

  // Score provider selection
  AI_SCORER: AiScorerKind;
  ORIGINALITY_SCORER: OriginalityScorerKind;

  // Model-backed AI-origin scorer
  AI_DETECTOR_MODEL: string;
  MODEL_SCORER_TIMEOUT_MS: number;

  // External similarity-search API
  SIMILARITY_API_URL?: string;
  SIMILARITY_API_KEY?: string;
  SIMILARITY_API_TIMEOUT_MS: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = parseOneOf(process.env.NODE_ENV, NODE_ENVS, 'development');
  if (!nodeEnv) {
    errors.push(`NODE_ENV: Invalid value "${process.env.NODE_ENV}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const maxUploadBytes = parseNumericEnv(process.env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024);
  if (maxUploadBytes < 1) {
    errors.push(`MAX_UPLOAD_BYTES: Invalid value "${process.env.MAX_UPLOAD_BYTES}". Must be greater than 0.`);
  }
  if (maxUploadBytes > 100 * 1024 * 1024) {
    logger.warn(`MAX_UPLOAD_BYTES (${maxUploadBytes}) is greater than 100 MB. Documents are held in memory during extraction.`);
  }

  const rateLimitWindowMs = parseNumericEnv(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
  if (rateLimitWindowMs < 1) {
    errors.push(`RATE_LIMIT_WINDOW_MS: Invalid value "${process.env.RATE_LIMIT_WINDOW_MS}". Must be greater than 0.`);
  }

  const rateLimitMax = parseNumericEnv(process.env.RATE_LIMIT_MAX, 100);
  if (rateLimitMax < 1) {
    errors.push(`RATE_LIMIT_MAX: Invalid value "${process.env.RATE_LIMIT_MAX}". Must be at least 1.`);
  }

  const aiScorer = parseOneOf(process.env.AI_SCORER, AI_SCORERS, 'rule');
  if (!aiScorer) {
    errors.push(`AI_SCORER: Invalid value "${process.env.AI_SCORER}". Must be rule or model.`);
  }

  const originalityScorer = parseOneOf(process.env.ORIGINALITY_SCORER, ORIGINALITY_SCORERS, 'random');
  if (!originalityScorer) {
    errors.push(`ORIGINALITY_SCORER: Invalid value "${process.env.ORIGINALITY_SCORER}". Must be random or external.`);
  }

  const modelScorerTimeout = parseNumericEnv(process.env.MODEL_SCORER_TIMEOUT_MS, 30000);
  if (modelScorerTimeout < 1) {
    errors.push(`MODEL_SCORER_TIMEOUT_MS: Invalid value "${process.env.MODEL_SCORER_TIMEOUT_MS}". Must be greater than 0.`);
  }

  const similarityApiTimeout = parseNumericEnv(process.env.SIMILARITY_API_TIMEOUT_MS, 10000);
  if (similarityApiTimeout < 1) {
    errors.push(`SIMILARITY_API_TIMEOUT_MS: Invalid value "${process.env.SIMILARITY_API_TIMEOUT_MS}". Must be greater than 0.`);
  }

  const similarityApiUrl = process.env.SIMILARITY_API_URL;
  if (originalityScorer === 'external' && !similarityApiUrl) {
    errors.push('SIMILARITY_API_URL: Environment variable is required when ORIGINALITY_SCORER=external.');
  }
  if (similarityApiUrl && !URL.canParse(similarityApiUrl)) {
    errors.push(`SIMILARITY_API_URL: Invalid value "${similarityApiUrl}". Must be an absolute URL.`);
  }

  if (errors.length > 0 || !nodeEnv || !aiScorer || !originalityScorer) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,

    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,
    LOG_LEVEL: process.env.LOG_LEVEL,

    MAX_UPLOAD_BYTES: maxUploadBytes,
    RATE_LIMIT_WINDOW_MS: rateLimitWindowMs,
    RATE_LIMIT_MAX: rateLimitMax,

    ANALYSIS_POLICY_PATH: process.env.ANALYSIS_POLICY_PATH,

    AI_SCORER: aiScorer,
    ORIGINALITY_SCORER: originalityScorer,

    AI_DETECTOR_MODEL: process.env.AI_DETECTOR_MODEL || 'Xenova/roberta-base-openai-detector',
    MODEL_SCORER_TIMEOUT_MS: modelScorerTimeout,

    SIMILARITY_API_URL: similarityApiUrl,
    SIMILARITY_API_KEY: process.env.SIMILARITY_API_KEY,
    SIMILARITY_API_TIMEOUT_MS: similarityApiTimeout,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

/**
 * Check if running in development
 */
export function isDevelopment(): boolean {
  return getEnv().NODE_ENV === 'development';
}
