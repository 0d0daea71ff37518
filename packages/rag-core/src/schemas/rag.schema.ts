import { z } from 'zod';
import { chunkSchema } from './chunk.schema';

/**
 * RAG query request schema - wire input
 */
export const ragQueryRequestSchema = z.object({
  query: z.string().describe('Question text'),
  top_k: z.number().int().optional().describe('Number of chunks to retrieve'),
  threshold: z.number().optional().describe('Minimum cosine similarity')
});

export type RAGQueryRequest = z.infer<typeof ragQueryRequestSchema>;

/**
 * RAG query - input for the orchestrator
 */
export type RAGQuery = {
  text: string;
  topK?: number;
  threshold?: number;
};

/**
 * RAG response schema - answer with the chunks it was grounded on
 */
export const ragResponseSchema = z.object({
  answer: z.string().describe('Generated answer'),
  relevant_chunks: z.array(chunkSchema).describe('Retrieved chunks in ranked order'),
  confidence_score: z.number().min(0).max(1).describe('Heuristic support indicator'),
  processing_time_ms: z.number().int().nonnegative().describe('Wall-clock processing time')
});

export type RAGResponse = z.infer<typeof ragResponseSchema>;

/**
 * Index summary schema - outcome of indexing one document
 */
export const indexSummarySchema = z.object({
  document_id: z.string(),
  status: z.enum(['indexed', 'skipped']),
  chunks_total: z.number().int().nonnegative(),
  chunks_indexed: z.number().int().nonnegative(),
  chunks_failed: z.number().int().nonnegative()
});

export type IndexSummary = z.infer<typeof indexSummarySchema>;

/**
 * RAG status schema - which operations have their collaborators configured
 */
export const ragStatusSchema = z.object({
  query: z.boolean(),
  index: z.boolean(),
  delete: z.boolean()
});

export type RagStatus = z.infer<typeof ragStatusSchema>;

/**
 * Document lifecycle request schema - content pushed by the document service
 */
export const documentContentRequestSchema = z.object({
  content: z.string(),
  previous_content: z.string().optional()
});

export type DocumentContentRequest = z.infer<typeof documentContentRequestSchema>;
