import crypto from 'crypto';
import type { EmbeddingProvider, RequestOptions } from '@ragkit/core';
import { EmbeddingCache } from './embedding-cache';

/**
 * Embedding provider decorator that skips the API for text it has seen
 * Re-indexing an edited document only pays for the chunks that changed
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  private provider: EmbeddingProvider;
  private cache: EmbeddingCache;

  constructor(provider: EmbeddingProvider, cache: EmbeddingCache = new EmbeddingCache()) {
    this.provider = provider;
    this.cache = cache;
  }

  async createEmbedding(text: string, model: string, options?: RequestOptions): Promise<number[]> {
    const key = CachedEmbeddingProvider.hashContent(model, text);
    const cached = this.cache.get(key);

    if (cached) {
      return cached;
    }

    const embedding = await this.provider.createEmbedding(text, model, options);
    this.cache.set(key, embedding);

    return embedding;
  }

  getCacheStats() {
    return this.cache.getStats();
  }

  /**
   * SHA-256 of model and text; the same text embeds differently per model
   */
  static hashContent(model: string, text: string): string {
    return crypto
      .createHash('sha256')
      .update(model)
      .update('\0')
      .update(text)
      .digest('hex');
  }
}
