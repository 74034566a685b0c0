/**
 * ExternalApiScorer - Originality scoring through a similarity-search API
 *
 * Contract with the remote service:
 *   POST <url>  { "text": string }
 *   200         { "score": number (0-100), "sources": string[] }
 */

import axios, { type AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import type { OriginalityPolicy } from '../../../config/analysisPolicy.js';
import { ScoringError } from '../../../types/errors.js';
import { logger } from '../../../utils/logger.js';
import type { IScoreProvider } from '../interfaces/IScoreProvider.js';
import type { ScoreResult } from '../types/ScoreResult.js';

export const similarityResponseSchema = z.object({
  score: z.number().min(0).max(100),
  sources: z.array(z.string()).default([]),
});

export type SimilarityResponse = z.infer<typeof similarityResponseSchema>;

export interface ExternalApiScorerOptions {
  url: string;
  apiKey?: string;
  timeoutMs: number;
  policy: Pick<OriginalityPolicy, 'threshold'>;
  /** Preconfigured client; a new axios instance is created when omitted */
  client?: AxiosInstance;
}

export class ExternalApiScorer implements IScoreProvider {
  readonly name = 'external-similarity-api';
  readonly kind = 'originality';

  private readonly client: AxiosInstance;
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly threshold: number;

  constructor(options: ExternalApiScorerOptions) {
    this.url = options.url;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.threshold = options.policy.threshold;
    this.client = options.client ?? axios.create();
  }

  async score(text: string): Promise<ScoreResult> {
    const response = await this.search(text);

    if (response.score <= this.threshold) {
      return { score: response.score, label: 'low', sources: [] };
    }

    if (response.sources.length === 0) {
      throw new ScoringError(this.name, `API reported a ${response.score}% match without citing any source`);
    }
    return { score: response.score, label: 'high', sources: response.sources };
  }

  private async search(text: string): Promise<SimilarityResponse> {
    const startTime = Date.now();
    let data: unknown;
    try {
      const response = await this.client.post<unknown>(
        this.url,
        { text },
        {
          timeout: this.timeoutMs,
          headers: {
            'Content-Type': 'application/json',
            ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
          },
        }
      );
      data = response.data;
    } catch (error) {
      if (isAxiosError(error)) {
        const status = error.response?.status;
        throw new ScoringError(
          this.name,
          status ? `similarity API returned HTTP ${status}` : `similarity API request failed: ${error.message}`,
          error
        );
      }
      throw error;
    }

    const parsed = similarityResponseSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ScoringError(this.name, `unexpected similarity API response (${issues.join('; ')})`);
    }

    logger.debug(
      { url: this.url, durationMs: Date.now() - startTime, score: parsed.data.score, sources: parsed.data.sources.length },
      'Similarity search completed'
    );

    return parsed.data;
  }
}
