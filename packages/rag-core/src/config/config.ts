import { z } from 'zod';
import { ValidationError } from '../errors/validation.error';
import {
  chatProviderEnum,
  chunkStoreEnum,
  ragConfigSchema,
  type ChatProviderKind,
  type ChunkStoreKind,
  type RagConfig
} from '../schemas/config.schema';
import {
  DEFAULT_CHAT_MODEL,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CLAUDE_MODEL,
  DEFAULT_EMBEDDING_MODEL,
  EMBEDDING_CACHE_SIZE,
  EMBEDDING_DEFAULT_CONCURRENCY,
  OPENAI_DEFAULT_BASE_URL,
  PROVIDER_TIMEOUT_MS,
  RAG_DEFAULT_THRESHOLD,
  RAG_DEFAULT_TOP_K
} from '../constants/limits';

/**
 * Application configuration resolved from the environment
 */
export type AppConfig = {
  rag: RagConfig;
  chatProvider: ChatProviderKind;
  openai: {
    apiKey?: string;
    baseURL: string;
    timeoutMs: number;
  };
  anthropic: {
    apiKey?: string;
  };
  store: {
    kind: ChunkStoreKind;
    supabaseUrl?: string;
    supabaseKey?: string;
  };
  server: {
    port: number;
    corsOrigins: string[];
  };
};

// Unset and blank variables both fall back to the default
const blank = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(blank, z.string().optional());
const intVar = (fallback: number) => z.preprocess(blank, z.coerce.number().int().default(fallback));
const numberVar = (fallback: number) => z.preprocess(blank, z.coerce.number().default(fallback));
const optionalNumberVar = z.preprocess(blank, z.coerce.number().optional());

const envSchema = z.object({
  RAG_CHUNK_SIZE: intVar(DEFAULT_CHUNK_SIZE),
  RAG_CHUNK_OVERLAP: intVar(DEFAULT_CHUNK_OVERLAP),
  RAG_EMBEDDING_MODEL: z.preprocess(blank, z.string().default(DEFAULT_EMBEDDING_MODEL)),
  RAG_MODEL_NAME: optionalString,
  RAG_TOP_K: intVar(RAG_DEFAULT_TOP_K),
  RAG_THRESHOLD: numberVar(RAG_DEFAULT_THRESHOLD),
  RAG_TEMPERATURE: optionalNumberVar,
  RAG_MAX_TOKENS: optionalNumberVar,
  RAG_EMBEDDING_CONCURRENCY: intVar(EMBEDDING_DEFAULT_CONCURRENCY),
  RAG_EMBEDDING_CACHE_SIZE: intVar(EMBEDDING_CACHE_SIZE),
  RAG_CHAT_PROVIDER: z.preprocess(blank, chatProviderEnum.default('openai')),
  RAG_CHUNK_STORE: z.preprocess(blank, chunkStoreEnum.default('memory')),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.preprocess(blank, z.string().url().default(OPENAI_DEFAULT_BASE_URL)),
  OPENAI_TIMEOUT_MS: intVar(PROVIDER_TIMEOUT_MS),
  ANTHROPIC_API_KEY: optionalString,
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  PORT: intVar(8000),
  CORS_ORIGINS: z.preprocess(blank, z.string().default('http://localhost:3000'))
});

/**
 * Load configuration from environment variables
 * Throws ValidationError naming every malformed variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${formatIssues(parsed.error)}`, {
      variables: parsed.error.issues.map(issue => issue.path.join('.'))
    });
  }

  const vars = parsed.data;
  const defaultChatModel = vars.RAG_CHAT_PROVIDER === 'anthropic'
    ? DEFAULT_CLAUDE_MODEL
    : DEFAULT_CHAT_MODEL;

  const rag = ragConfigSchema.safeParse({
    chunkSize: vars.RAG_CHUNK_SIZE,
    chunkOverlap: vars.RAG_CHUNK_OVERLAP,
    embeddingModel: vars.RAG_EMBEDDING_MODEL,
    chatModel: vars.RAG_MODEL_NAME ?? defaultChatModel,
    temperature: vars.RAG_TEMPERATURE,
    maxTokens: vars.RAG_MAX_TOKENS,
    defaultTopK: vars.RAG_TOP_K,
    defaultThreshold: vars.RAG_THRESHOLD,
    embeddingConcurrency: vars.RAG_EMBEDDING_CONCURRENCY,
    embeddingCacheSize: vars.RAG_EMBEDDING_CACHE_SIZE
  });

  if (!rag.success) {
    throw new ValidationError(`Invalid RAG configuration: ${formatIssues(rag.error)}`, {
      variables: rag.error.issues.map(issue => issue.path.join('.'))
    });
  }

  return {
    rag: rag.data,
    chatProvider: vars.RAG_CHAT_PROVIDER,
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      baseURL: vars.OPENAI_BASE_URL,
      timeoutMs: vars.OPENAI_TIMEOUT_MS
    },
    anthropic: {
      apiKey: vars.ANTHROPIC_API_KEY
    },
    store: {
      kind: vars.RAG_CHUNK_STORE,
      supabaseUrl: vars.SUPABASE_URL,
      supabaseKey: vars.SUPABASE_SERVICE_ROLE_KEY
    },
    server: {
      port: vars.PORT,
      corsOrigins: vars.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean)
    }
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}
