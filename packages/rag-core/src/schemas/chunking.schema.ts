import { z } from 'zod';

/**
 * Chunker configuration schema
 */
export const chunkerConfigSchema = z.object({
  chunkSize: z.number().int().describe('Words per chunk'),
  chunkOverlap: z.number().int().describe('Words shared between consecutive chunks')
});

export type ChunkerConfig = z.infer<typeof chunkerConfigSchema>;

/**
 * Text chunk with its position in the document
 */
export const textChunkSchema = z.object({
  content: z.string().describe('Chunk text content'),
  index: z.number().int().nonnegative().describe('Chunk index in document')
});

export type TextChunk = z.infer<typeof textChunkSchema>;
