/**
 * External provider contracts consumed by the RAG orchestrator
 */

/**
 * Per-call options - every external call honours the caller's signal
 */
export type RequestOptions = {
  signal?: AbortSignal;
};

/**
 * Turns text into an embedding vector
 */
export interface EmbeddingProvider {
  createEmbedding(text: string, model: string, options?: RequestOptions): Promise<number[]>;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type CompletionOptions = RequestOptions & {
  temperature?: number;
  maxTokens?: number;
};

/**
 * Generates a reply for an ordered message list
 */
export interface ChatCompletionProvider {
  createChatCompletion(
    messages: ChatMessage[],
    model: string,
    options?: CompletionOptions
  ): Promise<string>;
}
