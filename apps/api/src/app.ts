import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { createLogger, errorMessage } from '@ragkit/core';
import type { DocumentIndexer, RagService } from '@ragkit/engine';
import { createRagRouter } from './rag/rag-routes';
import { createDocumentRouter } from './rag/document-routes';

const logger = createLogger('api');

export type AppDependencies = {
  rag: RagService;
  indexer: DocumentIndexer;
  corsOrigins?: string[];
};

/**
 * Build the express application around the RAG services
 */
export function createApp({ rag, indexer, corsOrigins }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: corsOrigins ?? ['http://localhost:3000'],
    credentials: true
  }));
  app.use(express.json({ limit: '5mb' }));

  // Routes
  app.use('/rag/documents', createDocumentRouter(indexer));
  app.use('/rag', createRagRouter(rag));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Errors raised before a route answers, such as unparseable JSON
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      res.status(400).json({ error: 'invalid request body' });
      return;
    }

    logger.error({ error: errorMessage(error) }, 'Unhandled request error');
    res.status(500).json({ error: 'internal server error' });
  });

  return app;
}

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}
