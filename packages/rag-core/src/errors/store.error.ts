import { BaseError } from './base.error';

/**
 * Store error - chunk insert, search or delete failures
 */
export class StoreError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'STORE_ERROR', 500, context, options);
  }
}
