/**
 * Analysis Policy Configuration
 *
 * Scoring policy values live in a JSON file so real policies can be
 * substituted without a code change. The file is validated with Zod and
 * cached per path.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_POLICY_PATH = fileURLToPath(new URL('../../../config/analysis-policy.json', import.meta.url));

const percentage = z.number().min(0).max(100);

export const analysisPolicySchema = z
  .object({
    minInputLength: z.number().int().min(1),
    aiOrigin: z.object({
      telltalePhrases: z.array(z.string().min(1)).min(1, 'At least one telltale phrase is required'),
      prefixLength: z.number().int().min(1),
      highScore: percentage.refine((value) => value >= 50, 'highScore must be at least 50'),
      lowScore: percentage.refine((value) => value < 50, 'lowScore must be below 50'),
    }),
    originality: z.object({
      threshold: percentage,
      maxScore: z.number().int().min(0).max(100),
      referenceSources: z.array(z.string().min(1)).min(1, 'At least one reference source is required'),
    }),
  })
  .refine((policy) => policy.originality.threshold < policy.originality.maxScore, {
    message: 'originality.threshold must be below originality.maxScore',
    path: ['originality', 'threshold'],
  });

export type AnalysisPolicy = z.infer<typeof analysisPolicySchema>;
export type AiOriginPolicy = AnalysisPolicy['aiOrigin'];
export type OriginalityPolicy = AnalysisPolicy['originality'];

const policyCache = new Map<string, AnalysisPolicy>();

/**
 * Validate a raw policy object
 * @throws {ConfigurationError} listing every invalid field
 */
export function parseAnalysisPolicy(raw: unknown, source: string = 'inline'): AnalysisPolicy {
  const result = analysisPolicySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid analysis policy (${source}):\n${issues.map((i) => `  - ${i}`).join('\n')}`, {
      source,
      issues,
    });
  }
  return result.data;
}

/**
 * Load the analysis policy from disk
 *
 * @param policyPath - JSON file path; defaults to config/analysis-policy.json
 */
export function loadAnalysisPolicy(policyPath?: string): AnalysisPolicy {
  const path = policyPath ? resolve(policyPath) : DEFAULT_POLICY_PATH;
  const cached = policyCache.get(path);
  if (cached) {
    return cached;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read analysis policy from ${path}: ${getErrorMessage(error)}`, { path });
  }

  const policy = parseAnalysisPolicy(raw, path);
  policyCache.set(path, policy);

  logger.debug(
    {
      path,
      minInputLength: policy.minInputLength,
      telltalePhrases: policy.aiOrigin.telltalePhrases.length,
      referenceSources: policy.originality.referenceSources.length,
    },
    'Analysis policy loaded'
  );

  return policy;
}

/**
 * Clear cached policies
 * Used for testing to reload after the file changes
 */
export function resetAnalysisPolicyCache(): void {
  policyCache.clear();
}
