import { z } from 'zod';
import {
  DEFAULT_CHAT_MODEL,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_EMBEDDING_MODEL,
  EMBEDDING_CACHE_SIZE,
  EMBEDDING_DEFAULT_CONCURRENCY,
  RAG_DEFAULT_THRESHOLD,
  RAG_DEFAULT_TOP_K
} from '../constants/limits';

/**
 * RAG orchestrator configuration schema
 */
export const ragConfigSchema = z.object({
  // Chunking
  chunkSize: z.number().int().default(DEFAULT_CHUNK_SIZE).describe('Words per chunk'),
  chunkOverlap: z.number().int().default(DEFAULT_CHUNK_OVERLAP).describe('Word overlap between chunks'),

  // Models
  embeddingModel: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL).describe('Embedding model name'),
  chatModel: z.string().min(1).default(DEFAULT_CHAT_MODEL).describe('Chat completion model name'),
  temperature: z.number().min(0).max(2).optional().describe('Sampling temperature'),
  maxTokens: z.number().int().positive().optional().describe('Completion token limit'),

  // Query defaults
  defaultTopK: z.number().int().positive().default(RAG_DEFAULT_TOP_K).describe('top_k when unset'),
  defaultThreshold: z.number().positive().default(RAG_DEFAULT_THRESHOLD).describe('threshold when unset'),

  // Indexing
  embeddingConcurrency: z.number().int().positive().default(EMBEDDING_DEFAULT_CONCURRENCY)
    .describe('Parallel embedding calls while indexing'),
  embeddingCacheSize: z.number().int().nonnegative().default(EMBEDDING_CACHE_SIZE)
    .describe('Cached embeddings, 0 disables the cache')
});

export type RagConfig = z.infer<typeof ragConfigSchema>;
export type RagConfigInput = z.input<typeof ragConfigSchema>;

export const chatProviderEnum = z.enum(['openai', 'anthropic']);
export type ChatProviderKind = z.infer<typeof chatProviderEnum>;

export const chunkStoreEnum = z.enum(['memory', 'supabase']);
export type ChunkStoreKind = z.infer<typeof chunkStoreEnum>;
