import { describe, it, expect } from 'vitest';
import { BaseError, ProviderError, StoreError, ValidationError, errorMessage } from '../src/errors';

describe('errors', () => {
  it('should carry code and status', () => {
    const validation = new ValidationError('Query text is required');
    const provider = new ProviderError('upstream down');
    const store = new StoreError('insert failed');

    expect(validation).toBeInstanceOf(BaseError);
    expect([validation.code, validation.statusCode]).toEqual(['VALIDATION_ERROR', 400]);
    expect([provider.code, provider.statusCode]).toEqual(['PROVIDER_ERROR', 502]);
    expect([store.code, store.statusCode]).toEqual(['STORE_ERROR', 500]);
    expect(store.name).toBe('StoreError');
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    const error = new ProviderError('Failed to generate answer', { model: 'm' }, { cause });

    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: 'ProviderError',
      code: 'PROVIDER_ERROR',
      message: 'Failed to generate answer',
      statusCode: 502,
      context: { model: 'm' }
    });
  });

  it('should extract messages from unknown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('boom')).toBe('Unknown error');
  });
});
