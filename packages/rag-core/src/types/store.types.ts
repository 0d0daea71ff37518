import type { Chunk, NewChunk } from '../schemas/chunk.schema';
import type { RequestOptions } from './provider.types';

/**
 * Chunk persistence and similarity search
 *
 * `search` is a full scan in the bundled stores; an implementation backed by an
 * approximate index can satisfy the same contract.
 */
export interface ChunkStore {
  /**
   * Insert all chunks, assigning id and created_at where missing.
   * Either the whole batch is stored or a single StoreError is thrown.
   */
  createBatch(chunks: NewChunk[], options?: RequestOptions): Promise<void>;

  /** All chunks of a document ordered by chunk_index, [] when none */
  getByDocumentId(documentId: string, options?: RequestOptions): Promise<Chunk[]>;

  /** Idempotent */
  deleteByDocumentId(documentId: string, options?: RequestOptions): Promise<void>;

  /** Chunks scoring >= threshold, best first, at most topK */
  search(
    embedding: number[],
    topK: number,
    threshold: number,
    options?: RequestOptions
  ): Promise<Chunk[]>;
}
