import { createClient } from '@supabase/supabase-js';
import {
  createLogger,
  type AppConfig,
  type ChatCompletionProvider,
  type ChunkStore,
  type EmbeddingProvider
} from '@ragkit/core';
import { OpenAIEmbeddingClient } from '../embedding/embedding-client';
import { CachedEmbeddingProvider } from '../embedding/cached-embedding-provider';
import { EmbeddingCache } from '../embedding/embedding-cache';
import { OpenAIChatClient } from '../llm/openai-chat-client';
import { ClaudeClient } from '../llm/claude-client';
import { InMemoryChunkStore } from '../store/memory-chunk-store';
import { SupabaseChunkStore } from '../store/supabase-chunk-store';
import { RagService } from './rag-service';
import { DocumentIndexer } from './document-indexer';

const logger = createLogger('rag-factory');

/**
 * Build providers and store from configuration
 * Missing credentials leave the matching collaborator out instead of failing
 */
export function createRagService(config: AppConfig): { rag: RagService; indexer: DocumentIndexer } {
  const rag = new RagService(config.rag, {
    embeddings: createEmbeddingProvider(config),
    chat: createChatProvider(config),
    store: createChunkStore(config)
  });

  return { rag, indexer: new DocumentIndexer(rag) };
}

export function createEmbeddingProvider(config: AppConfig): EmbeddingProvider | null {
  const { apiKey, baseURL, timeoutMs } = config.openai;

  if (!apiKey) {
    logger.warn('OPENAI_API_KEY not set, embeddings disabled');
    return null;
  }

  const client = new OpenAIEmbeddingClient({ apiKey, baseURL, timeoutMs });

  if (config.rag.embeddingCacheSize === 0) {
    return client;
  }

  return new CachedEmbeddingProvider(client, new EmbeddingCache(config.rag.embeddingCacheSize));
}

export function createChatProvider(config: AppConfig): ChatCompletionProvider | null {
  if (config.chatProvider === 'anthropic') {
    if (!config.anthropic.apiKey) {
      logger.warn('ANTHROPIC_API_KEY not set, answer generation disabled');
      return null;
    }
    return new ClaudeClient({ apiKey: config.anthropic.apiKey, timeoutMs: config.openai.timeoutMs });
  }

  const { apiKey, baseURL, timeoutMs } = config.openai;
  if (!apiKey) {
    logger.warn('OPENAI_API_KEY not set, answer generation disabled');
    return null;
  }

  return new OpenAIChatClient({ apiKey, baseURL, timeoutMs });
}

export function createChunkStore(config: AppConfig): ChunkStore | null {
  if (config.store.kind === 'memory') {
    return new InMemoryChunkStore();
  }

  const { supabaseUrl, supabaseKey } = config.store;
  if (!supabaseUrl || !supabaseKey) {
    logger.warn('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY required for the supabase chunk store');
    return null;
  }

  const db = createClient(supabaseUrl, supabaseKey, {
    auth: { persistSession: false, autoRefreshToken: false }
  });

  return new SupabaseChunkStore(db);
}
