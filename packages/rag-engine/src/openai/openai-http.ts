import axios, { type AxiosInstance } from 'axios';
import { OPENAI_DEFAULT_BASE_URL, PROVIDER_TIMEOUT_MS, ProviderError } from '@ragkit/core';
import { openAIErrorSchema } from './openai.schema';

export type OpenAIClientOptions = {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
};

/**
 * Create an axios instance for an OpenAI-compatible API
 */
export function createOpenAIHttpClient(options: OpenAIClientOptions): AxiosInstance {
  if (!options.apiKey) {
    throw new Error('OPENAI_API_KEY is required');
  }

  return axios.create({
    baseURL: options.baseURL ?? OPENAI_DEFAULT_BASE_URL,
    headers: {
      'Authorization': `Bearer ${options.apiKey}`,
      'Content-Type': 'application/json'
    },
    timeout: options.timeoutMs ?? PROVIDER_TIMEOUT_MS
  });
}

/**
 * Map an axios failure onto ProviderError, keeping the API's own message
 */
export function toProviderError(error: unknown, operation: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (axios.isCancel(error)) {
    return new ProviderError(`OpenAI ${operation} aborted`, { operation }, { cause: error });
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === undefined) {
      return new ProviderError(
        `OpenAI ${operation} failed: ${error.message}`,
        { operation, code: error.code },
        { cause: error }
      );
    }

    const body = openAIErrorSchema.safeParse(error.response?.data);
    if (body.success) {
      const type = body.data.error.type ?? 'unknown';
      return new ProviderError(
        `OpenAI API error: ${body.data.error.message} (type: ${type})`,
        { operation, status, type },
        { cause: error }
      );
    }

    return new ProviderError(`OpenAI API error: status ${status}`, { operation, status }, { cause: error });
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return new ProviderError(`OpenAI ${operation} failed: ${message}`, { operation }, { cause: error });
}
