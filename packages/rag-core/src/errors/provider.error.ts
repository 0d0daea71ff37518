import { BaseError } from './base.error';

/**
 * Provider error - embedding or generation API failures
 */
export class ProviderError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'PROVIDER_ERROR', 502, context, options);
  }
}
