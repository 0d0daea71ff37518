export * from './base.error';
export * from './validation.error';
export * from './provider.error';
export * from './store.error';

/**
 * Extract a log-friendly message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
