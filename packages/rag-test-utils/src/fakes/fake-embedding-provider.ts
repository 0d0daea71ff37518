import type { EmbeddingProvider, RequestOptions } from '@ragkit/core';

export type FakeEmbeddingOptions = {
  /** Vector returned for an exact text */
  vectors?: Record<string, number[]>;
  /** Vector for texts without an entry */
  fallback?: number[];
  /** Texts for which the call rejects */
  failWhen?: (text: string) => boolean;
};

/**
 * Deterministic in-process embedding provider
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: Array<{ text: string; model: string }> = [];
  private options: FakeEmbeddingOptions;

  constructor(options: FakeEmbeddingOptions = {}) {
    this.options = options;
  }

  async createEmbedding(text: string, model: string, options: RequestOptions = {}): Promise<number[]> {
    options.signal?.throwIfAborted();
    this.calls.push({ text, model });

    if (this.options.failWhen?.(text)) {
      throw new Error(`embedding failed for "${text}"`);
    }

    const vector = this.options.vectors?.[text] ?? this.options.fallback;
    if (!vector) {
      throw new Error(`no embedding configured for "${text}"`);
    }

    return vector;
  }
}
