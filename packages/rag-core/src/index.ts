// Schemas and types
export * from './schemas';
export * from './types';

// Errors
export * from './errors';

// Logger
export * from './logger';

// Configuration
export * from './config';

// Constants
export * from './constants';

// Vector math
export * from './vector';
