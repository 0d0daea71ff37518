import { faker } from '@faker-js/faker';
import type { Chunk, NewChunk } from '@ragkit/core';

export interface ChunkFactoryOptions {
  id?: string;
  document_id?: string;
  chunk_index?: number;
  content?: string;
  embedding?: number[];
  created_at?: string;
}

export function createChunk(options: ChunkFactoryOptions = {}): Chunk {
  return {
    id: options.id ?? faker.string.uuid(),
    document_id: options.document_id ?? faker.string.uuid(),
    chunk_index: options.chunk_index ?? 0,
    content: options.content ?? faker.lorem.sentences(3),
    embedding: options.embedding ?? createEmbedding(8),
    created_at: options.created_at ?? faker.date.past().toISOString()
  };
}

/**
 * Sequentially indexed chunks of one document, without id or created_at
 */
export function createNewChunks(
  documentId: string,
  embeddings: number[][],
  contents: string[] = []
): NewChunk[] {
  return embeddings.map((embedding, i) => ({
    document_id: documentId,
    chunk_index: i,
    content: contents[i] ?? faker.lorem.sentence(),
    embedding
  }));
}

export function createEmbedding(dimensions: number): number[] {
  return Array.from({ length: dimensions }, () => faker.number.float({ min: -1, max: 1 }));
}

/**
 * Unit vector along one axis
 */
export function basisVector(dimensions: number, axis: number): number[] {
  return Array.from({ length: dimensions }, (_, i) => (i === axis ? 1 : 0));
}

/**
 * `count` space-separated words w0 w1 ... w{count-1}
 */
export function numberedWords(count: number, prefix: string = 'w'): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');
}
