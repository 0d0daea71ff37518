// Re-export all schemas and types
export * from './chunk.schema';
export * from './chunking.schema';
export * from './rag.schema';
export * from './config.schema';
