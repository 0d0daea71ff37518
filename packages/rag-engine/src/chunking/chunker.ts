import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  type ChunkerConfig,
  type TextChunk
} from '@ragkit/core';
import { Tokenizer } from './tokenizer';

/**
 * Text chunking service
 * Splits documents into overlapping word windows for embedding
 */
export class Chunker {
  private tokenizer: Tokenizer;
  private config: ChunkerConfig;

  constructor(config?: Partial<ChunkerConfig>) {
    this.tokenizer = new Tokenizer();
    this.config = Chunker.normalizeConfig(config);
  }

  /**
   * Clamp a raw configuration into a usable one
   */
  static normalizeConfig(config?: Partial<ChunkerConfig>): ChunkerConfig {
    let chunkSize = config?.chunkSize ?? DEFAULT_CHUNK_SIZE;
    let chunkOverlap = config?.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;

    if (chunkSize <= 0) {
      chunkSize = DEFAULT_CHUNK_SIZE;
    }
    if (chunkOverlap < 0) {
      chunkOverlap = 0;
    }
    if (chunkOverlap >= chunkSize) {
      chunkOverlap = Math.floor(chunkSize / 4);
    }

    return { chunkSize, chunkOverlap };
  }

  get chunkSize(): number {
    return this.config.chunkSize;
  }

  get chunkOverlap(): number {
    return this.config.chunkOverlap;
  }

  /**
   * Chunk a document into overlapping pieces
   */
  chunk(text: string): string[] {
    const words = this.tokenizer.words(text);

    if (words.length === 0) {
      return [];
    }

    const step = Math.max(1, this.config.chunkSize - this.config.chunkOverlap);
    const chunks: string[] = [];

    for (let i = 0; i < words.length; i += step) {
      const end = Math.min(i + this.config.chunkSize, words.length);
      chunks.push(words.slice(i, end).join(' '));

      if (end === words.length) {
        break;
      }
    }

    return chunks;
  }

  /**
   * Chunk a document, tagging each piece with its position
   */
  chunkWithPositions(text: string): TextChunk[] {
    return this.chunk(text).map((content, index) => ({ content, index }));
  }
}
