// Chunking
export { Chunker } from './chunking/chunker';
export { Tokenizer } from './chunking/tokenizer';

// Embeddings
export { OpenAIEmbeddingClient } from './embedding/embedding-client';
export { EmbeddingCache } from './embedding/embedding-cache';
export { CachedEmbeddingProvider } from './embedding/cached-embedding-provider';
export type { OpenAIClientOptions } from './openai/openai-http';

// Chat
export { OpenAIChatClient } from './llm/openai-chat-client';
export { ClaudeClient, type ClaudeClientOptions } from './llm/claude-client';

// Stores
export { InMemoryChunkStore } from './store/memory-chunk-store';
export { SupabaseChunkStore, type SupabaseChunkStoreOptions } from './store/supabase-chunk-store';

// Orchestration
export {
  RagService,
  resolveCapabilities,
  NOT_CONFIGURED_ANSWER,
  NO_RESULTS_ANSWER,
  type RagCapabilities,
  type RagDependencies
} from './rag/rag-service';
export { DocumentIndexer } from './rag/document-indexer';
export {
  createRagService,
  createEmbeddingProvider,
  createChatProvider,
  createChunkStore
} from './rag/create-rag-service';

// Prompts
export { RAG_SYSTEM_PROMPT, buildAnswerMessages, buildContextBlock, buildUserPrompt } from './prompts/rag-answer';
