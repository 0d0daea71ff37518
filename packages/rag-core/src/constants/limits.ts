/**
 * RAG defaults and limits
 */

// Chunking
export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_CHUNK_OVERLAP = 50;

// Query
export const RAG_DEFAULT_TOP_K = 5;
export const RAG_DEFAULT_THRESHOLD = 0.7;
export const RAG_CONFIDENCE_HIGH = 0.85;
export const RAG_CONFIDENCE_LOW = 0.6;

// Models
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-ada-002';
export const DEFAULT_CHAT_MODEL = 'gpt-3.5-turbo';
export const DEFAULT_CLAUDE_MODEL = 'claude-3-5-haiku-20241022';

// Providers
export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const PROVIDER_TIMEOUT_MS = 30000; // 30 seconds

// Indexing
export const EMBEDDING_DEFAULT_CONCURRENCY = 1;
export const EMBEDDING_CACHE_SIZE = 10000;

// Storage
export const CHUNK_TABLE = 'kb_chunks';
export const STORE_PAGE_SIZE = 1000;
