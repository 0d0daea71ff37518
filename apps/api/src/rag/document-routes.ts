import { Router, type Request, type Response, type Router as ExpressRouter } from 'express';
import { createLogger, documentContentRequestSchema } from '@ragkit/core';
import type { DocumentIndexer } from '@ragkit/engine';

const logger = createLogger('document-routes');

/**
 * Lifecycle hooks for the document service
 * Indexing failures are logged by the indexer and never change the response
 */
export function createDocumentRouter(indexer: DocumentIndexer): ExpressRouter {
  const router: ExpressRouter = Router();

  /**
   * PUT /rag/documents/:id
   * Document created or its content changed
   */
  router.put('/:id', async (req: Request, res: Response) => {
    const parsed = documentContentRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid request body' });
    }

    const documentId = req.params.id;
    const { content, previous_content } = parsed.data;

    await indexer.onDocumentUpdated(documentId, previous_content, content);

    logger.info({ documentId, contentLength: content.length }, 'Document content synced');
    return res.status(202).json({ status: 'accepted' });
  });

  /**
   * DELETE /rag/documents/:id
   */
  router.delete('/:id', async (req: Request, res: Response) => {
    const documentId = req.params.id;

    await indexer.onDocumentDeleted(documentId);

    logger.info({ documentId }, 'Document chunks removed');
    return res.status(204).end();
  });

  return router;
}
