import type { AxiosInstance } from 'axios';
import {
  createLogger,
  DEFAULT_EMBEDDING_MODEL,
  ProviderError,
  type EmbeddingProvider,
  type RequestOptions
} from '@ragkit/core';
import { createOpenAIHttpClient, toProviderError, type OpenAIClientOptions } from '../openai/openai-http';
import { openAIEmbeddingResponseSchema } from '../openai/openai.schema';

const logger = createLogger('embedding-client');

/**
 * Client for the OpenAI embeddings API
 */
export class OpenAIEmbeddingClient implements EmbeddingProvider {
  private client: AxiosInstance;

  constructor(options: OpenAIClientOptions) {
    this.client = createOpenAIHttpClient(options);
  }

  /**
   * Generate the embedding for one text
   */
  async createEmbedding(
    text: string,
    model: string = DEFAULT_EMBEDDING_MODEL,
    options: RequestOptions = {}
  ): Promise<number[]> {
    const startTime = Date.now();

    try {
      const response = await this.client.post(
        '/embeddings',
        { model, input: text },
        { signal: options.signal }
      );

      const parsed = openAIEmbeddingResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError('Malformed embedding response', { model });
      }

      const [first] = parsed.data.data;
      if (!first) {
        throw new ProviderError('No embedding returned', { model });
      }

      logger.debug({
        model,
        textLength: text.length,
        dimensions: first.embedding.length,
        duration: Date.now() - startTime
      }, 'Embedding generated');

      return first.embedding;

    } catch (error) {
      const providerError = toProviderError(error, 'embedding');

      logger.error({
        model,
        error: providerError.message,
        duration: Date.now() - startTime
      }, 'Embedding request failed');

      throw providerError;
    }
  }

  /**
   * Generate embeddings for several texts, one request each
   * Fails on the first error
   */
  async createEmbeddings(
    texts: string[],
    model: string = DEFAULT_EMBEDDING_MODEL,
    options: RequestOptions = {}
  ): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (let i = 0; i < texts.length; i++) {
      try {
        embeddings.push(await this.createEmbedding(texts[i], model, options));
      } catch (error) {
        const cause = toProviderError(error, 'embedding');
        throw new ProviderError(
          `Failed to create embedding for text ${i}: ${cause.message}`,
          { model, textIndex: i },
          { cause }
        );
      }
    }

    return embeddings;
  }
}
