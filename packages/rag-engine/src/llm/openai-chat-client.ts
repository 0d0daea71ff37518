import type { AxiosInstance } from 'axios';
import {
  createLogger,
  DEFAULT_CHAT_MODEL,
  ProviderError,
  type ChatCompletionProvider,
  type ChatMessage,
  type CompletionOptions
} from '@ragkit/core';
import { createOpenAIHttpClient, toProviderError, type OpenAIClientOptions } from '../openai/openai-http';
import { openAIChatResponseSchema } from '../openai/openai.schema';

const logger = createLogger('openai-chat-client');

/**
 * Client for the OpenAI chat completions API
 */
export class OpenAIChatClient implements ChatCompletionProvider {
  private client: AxiosInstance;

  constructor(options: OpenAIClientOptions) {
    this.client = createOpenAIHttpClient(options);
  }

  /**
   * Generate a completion and return the first choice's content
   */
  async createChatCompletion(
    messages: ChatMessage[],
    model: string = DEFAULT_CHAT_MODEL,
    options: CompletionOptions = {}
  ): Promise<string> {
    const { temperature, maxTokens, signal } = options;

    logger.info({
      model,
      messageCount: messages.length,
      temperature,
      maxTokens
    }, 'Generating completion');

    const startTime = Date.now();

    try {
      const response = await this.client.post(
        '/chat/completions',
        {
          model,
          messages,
          ...(temperature !== undefined ? { temperature } : {}),
          ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {})
        },
        { signal }
      );

      const parsed = openAIChatResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ProviderError('Malformed completion response', { model });
      }

      const [choice] = parsed.data.choices;
      if (!choice) {
        throw new ProviderError('No completion returned', { model });
      }

      logger.info({
        duration: Date.now() - startTime,
        finishReason: choice.finish_reason,
        totalTokens: parsed.data.usage?.total_tokens
      }, 'Generation complete');

      return choice.message.content ?? '';

    } catch (error) {
      const providerError = toProviderError(error, 'chat completion');

      logger.error({
        model,
        error: providerError.message,
        duration: Date.now() - startTime
      }, 'Generation failed');

      throw providerError;
    }
  }
}
