/**
 * ModelHandle - Lazily loaded, process-wide model instance
 *
 * The first get() starts loading; concurrent callers share the in-flight
 * load. A failed load is not kept, so the next get() retries. Once loaded,
 * the instance lives as long as the process.
 */

import { logger } from '../../utils/logger.js';

export class ModelHandle<T> {
  private instance: T | null = null;
  private loading: Promise<T> | null = null;

  constructor(
    readonly modelId: string,
    private readonly loader: (modelId: string) => Promise<T>
  ) {}

  isLoaded(): boolean {
    return this.instance !== null;
  }

  async get(): Promise<T> {
    if (this.instance !== null) {
      return this.instance;
    }

    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<T> {
    const startTime = Date.now();
    logger.info({ modelId: this.modelId }, 'Loading model');

    try {
      const instance = await this.loader(this.modelId);
      this.instance = instance;
      logger.info({ modelId: this.modelId, durationMs: Date.now() - startTime }, 'Model loaded');
      return instance;
    } catch (error) {
      logger.error({ error, modelId: this.modelId }, 'Model load failed');
      throw error;
    } finally {
      this.loading = null;
    }
  }
}
