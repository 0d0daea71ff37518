import crypto from 'crypto';
import {
  createLogger,
  StoreError,
  topKBySimilarity,
  type Chunk,
  type ChunkStore,
  type NewChunk,
  type RequestOptions
} from '@ragkit/core';

const logger = createLogger('memory-chunk-store');

/**
 * Process-local chunk store
 * Keeps chunks in insertion order and ranks them with a full scan.
 * Chunks are copied on the way in and out, so stored rows stay immutable.
 */
export class InMemoryChunkStore implements ChunkStore {
  private chunks: Chunk[] = [];

  async createBatch(chunks: NewChunk[], options: RequestOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();

    if (chunks.length === 0) {
      return;
    }

    const now = new Date().toISOString();
    const rows: Chunk[] = chunks.map(chunk => ({
      ...chunk,
      embedding: [...chunk.embedding],
      id: chunk.id || crypto.randomUUID(),
      created_at: chunk.created_at ?? now
    }));

    this.validateBatch(rows);

    // Validation passed, so the whole batch lands at once
    this.chunks.push(...rows);

    logger.debug({ count: rows.length, total: this.chunks.length }, 'Chunks inserted');
  }

  async getByDocumentId(documentId: string, options: RequestOptions = {}): Promise<Chunk[]> {
    options.signal?.throwIfAborted();

    return this.chunks
      .filter(chunk => chunk.document_id === documentId)
      .sort((a, b) => a.chunk_index - b.chunk_index)
      .map(copyChunk);
  }

  async deleteByDocumentId(documentId: string, options: RequestOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();

    const before = this.chunks.length;
    this.chunks = this.chunks.filter(chunk => chunk.document_id !== documentId);

    logger.debug({ documentId, deleted: before - this.chunks.length }, 'Chunks deleted');
  }

  async search(
    embedding: number[],
    topK: number,
    threshold: number,
    options: RequestOptions = {}
  ): Promise<Chunk[]> {
    options.signal?.throwIfAborted();

    const corpus = this.chunks;
    const ranked = topKBySimilarity(
      embedding,
      corpus.map(chunk => chunk.embedding),
      topK,
      threshold
    );

    return ranked.map(({ index }) => copyChunk(corpus[index]));
  }

  /**
   * Number of stored chunks
   */
  size(): number {
    return this.chunks.length;
  }

  /**
   * Reject the whole batch on id, position or dimension conflicts
   */
  private validateBatch(rows: Chunk[]): void {
    const ids = new Set(this.chunks.map(chunk => chunk.id));
    const positions = new Set(this.chunks.map(chunk => positionKey(chunk)));
    let dimensions = this.chunks[0]?.embedding.length;

    for (const row of rows) {
      if (ids.has(row.id)) {
        throw new StoreError('Duplicate chunk id', { id: row.id });
      }

      const position = positionKey(row);
      if (positions.has(position)) {
        throw new StoreError('Duplicate chunk index for document', {
          documentId: row.document_id,
          chunkIndex: row.chunk_index
        });
      }

      if (dimensions === undefined) {
        dimensions = row.embedding.length;
      }
      if (row.embedding.length !== dimensions) {
        throw new StoreError('Embedding dimension mismatch', {
          expected: dimensions,
          received: row.embedding.length,
          documentId: row.document_id
        });
      }

      ids.add(row.id);
      positions.add(position);
    }
  }
}

function copyChunk(chunk: Chunk): Chunk {
  return { ...chunk, embedding: [...chunk.embedding] };
}

function positionKey(chunk: Chunk): string {
  return `${chunk.document_id}\u0000${chunk.chunk_index}`;
}
