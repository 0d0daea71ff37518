import { Router, type Request, type Response, type Router as ExpressRouter } from 'express';
import { createLogger, ragQueryRequestSchema, ValidationError } from '@ragkit/core';
import type { RagService } from '@ragkit/engine';

const logger = createLogger('rag-routes');

/**
 * Abort signal that fires when the client goes away before the response is sent
 */
export function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();

  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  return controller.signal;
}

export function createRagRouter(rag: RagService): ExpressRouter {
  const router: ExpressRouter = Router();

  /**
   * POST /rag/query
   * Answer a question from the indexed documents
   */
  router.post('/query', async (req: Request, res: Response) => {
    const parsed = ragQueryRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid request body' });
    }

    const { query, top_k, threshold } = parsed.data;

    try {
      const response = await rag.query(
        { text: query, topK: top_k, threshold },
        { signal: requestSignal(res) }
      );

      logger.info({
        queryLength: query.length,
        chunks: response.relevant_chunks.length,
        processingTime: response.processing_time_ms
      }, 'RAG query processed');

      return res.json(response);

    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ error: 'invalid query' });
      }

      logger.error({ error }, 'Failed to process RAG query');
      return res.status(500).json({ error: 'failed to process query' });
    }
  });

  /**
   * GET /rag/status
   * Which operations have their collaborators configured
   */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(rag.status());
  });

  return router;
}
