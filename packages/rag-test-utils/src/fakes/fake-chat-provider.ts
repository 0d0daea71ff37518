import type { ChatCompletionProvider, ChatMessage, CompletionOptions } from '@ragkit/core';

/**
 * In-process chat provider returning a canned answer and recording calls
 */
export class FakeChatProvider implements ChatCompletionProvider {
  readonly calls: Array<{ messages: ChatMessage[]; model: string; options?: CompletionOptions }> = [];
  private answer: string;
  private error: Error | null;

  constructor(answer: string = 'fake answer', error: Error | null = null) {
    this.answer = answer;
    this.error = error;
  }

  async createChatCompletion(
    messages: ChatMessage[],
    model: string,
    options?: CompletionOptions
  ): Promise<string> {
    this.calls.push({ messages, model, options });

    if (this.error) {
      throw this.error;
    }

    return this.answer;
  }
}
