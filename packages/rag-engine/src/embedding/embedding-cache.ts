import { createLogger } from '@ragkit/core';

const logger = createLogger('embedding-cache');

/**
 * In-memory embedding cache keyed by content hash
 * Evicts the least recently used entry once full
 */
export class EmbeddingCache {
  private cache: Map<string, number[]>;
  private maxSize: number;
  private hits = 0;
  private misses = 0;

  constructor(maxSize: number = 10000) {
    this.cache = new Map();
    this.maxSize = maxSize;
  }

  /**
   * Get cached embedding by content hash
   */
  get(contentHash: string): number[] | null {
    const embedding = this.cache.get(contentHash);

    if (!embedding) {
      this.misses++;
      return null;
    }

    // Re-insert so iteration order tracks recency
    this.cache.delete(contentHash);
    this.cache.set(contentHash, embedding);
    this.hits++;

    logger.debug({ contentHash }, 'Cache hit');
    return embedding;
  }

  /**
   * Store embedding in cache
   */
  set(contentHash: string, embedding: number[]): void {
    if (this.maxSize <= 0) {
      return;
    }

    if (this.cache.has(contentHash)) {
      this.cache.delete(contentHash);
    } else if (this.cache.size >= this.maxSize) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) {
        this.cache.delete(oldestKey);
        logger.debug({ removedHash: oldestKey }, 'Cache eviction');
      }
    }

    this.cache.set(contentHash, embedding);
  }

  /**
   * Clear all cached embeddings
   */
  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
    logger.info('Cache cleared');
  }

  getStats() {
    return {
      size: this.cache.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      utilizationPercent: this.maxSize > 0 ? (this.cache.size / this.maxSize) * 100 : 0
    };
  }
}
