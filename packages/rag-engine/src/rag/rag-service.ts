import {
  createLogger,
  errorMessage,
  ragConfigSchema,
  RAG_CONFIDENCE_HIGH,
  RAG_CONFIDENCE_LOW,
  ProviderError,
  StoreError,
  ValidationError,
  type ChatCompletionProvider,
  type Chunk,
  type ChunkStore,
  type EmbeddingProvider,
  type IndexSummary,
  type Logger,
  type NewChunk,
  type RagConfig,
  type RagConfigInput,
  type RagStatus,
  type RAGQuery,
  type RAGResponse,
  type RequestOptions
} from '@ragkit/core';
import { Chunker } from '../chunking/chunker';
import { buildAnswerMessages } from '../prompts/rag-answer';

const defaultLogger = createLogger('rag-service');

export const NOT_CONFIGURED_ANSWER = 'RAG service is not configured. Please set OPENAI_API_KEY.';
export const NO_RESULTS_ANSWER =
  "I couldn't find any relevant information in the knowledge base to answer your question.";

/**
 * Collaborators handed to the service; absent ones disable the operations that need them
 */
export type RagDependencies = {
  embeddings?: EmbeddingProvider | null;
  chat?: ChatCompletionProvider | null;
  store?: ChunkStore | null;
  chunker?: Chunker;
  logger?: Logger;
};

type QueryCapability = {
  embeddings: EmbeddingProvider;
  chat: ChatCompletionProvider;
  store: ChunkStore;
};

type IndexCapability = {
  embeddings: EmbeddingProvider;
  chunker: Chunker;
  store: ChunkStore;
};

/**
 * What the service can do, decided once at construction
 */
export type RagCapabilities = {
  query: QueryCapability | null;
  index: IndexCapability | null;
  store: ChunkStore | null;
};

export function resolveCapabilities(deps: RagDependencies, chunker: Chunker): RagCapabilities {
  const embeddings = deps.embeddings ?? null;
  const chat = deps.chat ?? null;
  const store = deps.store ?? null;

  return {
    query: embeddings && chat && store ? { embeddings, chat, store } : null,
    index: embeddings && store ? { embeddings, chunker, store } : null,
    store
  };
}

/**
 * Retrieval-augmented generation service
 * Indexes documents into chunks, removes them, and answers questions from them
 */
export class RagService {
  private readonly config: RagConfig;
  private readonly capabilities: RagCapabilities;
  private readonly logger: Logger;

  constructor(config: RagConfigInput = {}, deps: RagDependencies = {}) {
    const parsed = ragConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ValidationError('Invalid RAG configuration', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }

    this.config = parsed.data;
    this.logger = deps.logger ?? defaultLogger;

    const chunker = deps.chunker ?? new Chunker({
      chunkSize: this.config.chunkSize,
      chunkOverlap: this.config.chunkOverlap
    });
    this.capabilities = resolveCapabilities(deps, chunker);

    this.logger.info({
      query: this.capabilities.query !== null,
      index: this.capabilities.index !== null,
      store: this.capabilities.store !== null,
      embeddingModel: this.config.embeddingModel,
      chatModel: this.config.chatModel
    }, 'RAG service initialized');
  }

  /**
   * Which operations are backed by real collaborators
   */
  status(): RagStatus {
    return {
      query: this.capabilities.query !== null,
      index: this.capabilities.index !== null,
      delete: this.capabilities.store !== null
    };
  }

  /**
   * Answer a question from the indexed corpus
   */
  async query(query: RAGQuery, options: RequestOptions = {}): Promise<RAGResponse> {
    const startTime = Date.now();

    if (query.text.trim().length === 0) {
      throw new ValidationError('Query text is required');
    }

    const topK = query.topK !== undefined && query.topK > 0 ? query.topK : this.config.defaultTopK;
    const threshold = query.threshold !== undefined && query.threshold > 0
      ? query.threshold
      : this.config.defaultThreshold;

    const capability = this.capabilities.query;
    if (!capability) {
      return {
        answer: NOT_CONFIGURED_ANSWER,
        relevant_chunks: [],
        confidence_score: 0,
        processing_time_ms: Date.now() - startTime
      };
    }

    let queryEmbedding: number[];
    try {
      queryEmbedding = await capability.embeddings.createEmbedding(
        query.text,
        this.config.embeddingModel,
        options
      );
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Query embedding failed');
      throw new ProviderError('Failed to generate query embedding', {
        model: this.config.embeddingModel
      }, { cause: error });
    }

    let relevantChunks: Chunk[];
    try {
      relevantChunks = await capability.store.search(queryEmbedding, topK, threshold, options);
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Chunk search failed');
      throw new StoreError('Failed to search chunks', { topK, threshold }, { cause: error });
    }

    if (relevantChunks.length === 0) {
      this.logger.info({ topK, threshold, duration: Date.now() - startTime }, 'No relevant chunks');

      return {
        answer: NO_RESULTS_ANSWER,
        relevant_chunks: [],
        confidence_score: 0,
        processing_time_ms: Date.now() - startTime
      };
    }

    let answer: string;
    try {
      answer = await capability.chat.createChatCompletion(
        buildAnswerMessages(relevantChunks, query.text),
        this.config.chatModel,
        {
          temperature: this.config.temperature,
          maxTokens: this.config.maxTokens,
          signal: options.signal
        }
      );
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Answer generation failed');
      throw new ProviderError('Failed to generate answer', {
        model: this.config.chatModel
      }, { cause: error });
    }

    const confidenceScore = relevantChunks.length < Math.floor(topK / 2)
      ? RAG_CONFIDENCE_LOW
      : RAG_CONFIDENCE_HIGH;

    const processingTime = Date.now() - startTime;

    this.logger.info({
      queryLength: query.text.length,
      chunks: relevantChunks.length,
      topK,
      confidenceScore,
      processingTime
    }, 'Query answered');

    return {
      answer,
      relevant_chunks: relevantChunks,
      confidence_score: confidenceScore,
      processing_time_ms: processingTime
    };
  }

  /**
   * Chunk, embed and store a document's content
   * Chunks whose embedding fails are skipped; the insert itself must succeed
   */
  async indexDocument(
    documentId: string,
    content: string,
    options: RequestOptions = {}
  ): Promise<IndexSummary> {
    const capability = this.capabilities.index;

    if (!capability || content.trim().length === 0) {
      return skipped(documentId);
    }

    const texts = capability.chunker.chunk(content);
    if (texts.length === 0) {
      return skipped(documentId);
    }

    const embeddings = await this.embedChunks(documentId, texts, capability.embeddings, options);

    const chunks: NewChunk[] = [];
    texts.forEach((text, i) => {
      const embedding = embeddings[i];
      if (embedding) {
        chunks.push({
          document_id: documentId,
          chunk_index: chunks.length,
          content: text,
          embedding
        });
      }
    });

    const summary: IndexSummary = {
      document_id: documentId,
      status: 'indexed',
      chunks_total: texts.length,
      chunks_indexed: chunks.length,
      chunks_failed: texts.length - chunks.length
    };

    if (chunks.length === 0) {
      this.logger.warn({ documentId, chunksTotal: texts.length }, 'No chunk embeddings survived');
      return summary;
    }

    try {
      await capability.store.createBatch(chunks, options);
    } catch (error) {
      this.logger.error({ documentId, error: errorMessage(error) }, 'Chunk batch insert failed');
      throw new StoreError('Failed to create chunk batch', {
        documentId,
        count: chunks.length
      }, { cause: error });
    }

    this.logger.info(summary, 'Document indexed');

    return summary;
  }

  /**
   * Remove every chunk of a document
   */
  async deleteDocumentChunks(documentId: string, options: RequestOptions = {}): Promise<void> {
    const store = this.capabilities.store;
    if (!store) {
      return;
    }

    try {
      await store.deleteByDocumentId(documentId, options);
    } catch (error) {
      this.logger.error({ documentId, error: errorMessage(error) }, 'Chunk delete failed');
      throw new StoreError('Failed to delete document chunks', { documentId }, { cause: error });
    }

    this.logger.info({ documentId }, 'Document chunks deleted');
  }

  /**
   * Embed chunk texts with up to `embeddingConcurrency` calls in flight
   * Results keep chunk order; failed slots stay null
   */
  private async embedChunks(
    documentId: string,
    texts: string[],
    provider: EmbeddingProvider,
    options: RequestOptions
  ): Promise<Array<number[] | null>> {
    const results: Array<number[] | null> = texts.map(() => null);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < texts.length) {
        const i = next++;
        options.signal?.throwIfAborted();

        try {
          results[i] = await provider.createEmbedding(texts[i], this.config.embeddingModel, options);
        } catch (error) {
          // An abort rejects with the signal's reason, not the provider's error
          options.signal?.throwIfAborted();

          this.logger.warn({
            documentId,
            chunkIndex: i,
            error: errorMessage(error)
          }, 'Failed to create embedding for chunk');
        }
      }
    };

    const workerCount = Math.min(this.config.embeddingConcurrency, texts.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
  }
}

function skipped(documentId: string): IndexSummary {
  return {
    document_id: documentId,
    status: 'skipped',
    chunks_total: 0,
    chunks_indexed: 0,
    chunks_failed: 0
  };
}
