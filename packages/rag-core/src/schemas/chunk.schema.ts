import { z } from 'zod';

/**
 * Stored chunk schema - a slice of a document with its embedding
 */
export const chunkSchema = z.object({
  // Identity
  id: z.string().min(1).describe('Unique chunk identifier'),

  // Source
  document_id: z.string().min(1).describe('Owning document identifier'),
  chunk_index: z.number().int().nonnegative().describe('Position in document, 0-based'),

  // Content
  content: z.string().describe('Chunk text content'),
  embedding: z.array(z.number()).describe('Embedding vector'),

  // Timestamps
  created_at: z.string().datetime({ offset: true }).describe('Creation timestamp')
});

export type Chunk = z.infer<typeof chunkSchema>;

/**
 * Chunk before insertion - the store assigns id and created_at when absent
 */
export const newChunkSchema = chunkSchema.extend({
  id: chunkSchema.shape.id.optional(),
  created_at: chunkSchema.shape.created_at.optional()
});

export type NewChunk = z.infer<typeof newChunkSchema>;
