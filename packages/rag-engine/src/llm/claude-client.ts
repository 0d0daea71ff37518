import Anthropic from '@anthropic-ai/sdk';
import {
  createLogger,
  DEFAULT_CLAUDE_MODEL,
  PROVIDER_TIMEOUT_MS,
  ProviderError,
  type ChatCompletionProvider,
  type ChatMessage,
  type CompletionOptions
} from '@ragkit/core';

const logger = createLogger('claude-client');

export type ClaudeClientOptions = {
  apiKey?: string;
  baseURL?: string;
  timeoutMs?: number;
  maxRetries?: number;
};

/**
 * Client for Anthropic Claude API
 */
export class ClaudeClient implements ChatCompletionProvider {
  private client: Anthropic;
  private readonly defaultMaxTokens = 1024;

  constructor(options: ClaudeClientOptions = {}) {
    const key = options.apiKey || process.env.ANTHROPIC_API_KEY;

    if (!key) {
      throw new Error('ANTHROPIC_API_KEY is required');
    }

    this.client = new Anthropic({
      apiKey: key,
      baseURL: options.baseURL,
      timeout: options.timeoutMs ?? PROVIDER_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? 0
    });

    logger.info('Claude client initialized');
  }

  /**
   * Generate text completion
   * System messages are folded into the top-level system prompt
   */
  async createChatCompletion(
    messages: ChatMessage[],
    model: string = DEFAULT_CLAUDE_MODEL,
    options: CompletionOptions = {}
  ): Promise<string> {
    const { temperature, maxTokens = this.defaultMaxTokens, signal } = options;

    const system = messages
      .filter(message => message.role === 'system')
      .map(message => message.content)
      .join('\n\n');

    const turns: Anthropic.MessageParam[] = [];
    for (const message of messages) {
      if (message.role !== 'system') {
        turns.push({ role: message.role, content: message.content });
      }
    }

    logger.info({
      model,
      systemPromptLength: system.length,
      turnCount: turns.length,
      maxTokens,
      temperature
    }, 'Generating completion');

    const startTime = Date.now();

    try {
      const response = await this.client.messages.create(
        {
          model,
          max_tokens: maxTokens,
          ...(temperature !== undefined ? { temperature } : {}),
          ...(system ? { system } : {}),
          messages: turns
        },
        { signal }
      );

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');

      logger.info({
        duration: Date.now() - startTime,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        stopReason: response.stop_reason
      }, 'Generation complete');

      return text;

    } catch (error) {
      const duration = Date.now() - startTime;
      const message = error instanceof Error ? error.message : 'Unknown error';

      logger.error({ error: message, duration }, 'Generation failed');

      if (error instanceof Anthropic.APIError) {
        if (error.status === 429) {
          throw new ProviderError('Rate limit exceeded', { status: 429 }, { cause: error });
        }
        if (error.status === 529) {
          throw new ProviderError('API overloaded, retry later', { status: 529 }, { cause: error });
        }
        throw new ProviderError(`Anthropic API error: ${message}`, { status: error.status }, { cause: error });
      }

      throw new ProviderError(`Anthropic request failed: ${message}`, {}, { cause: error });
    }
  }
}
