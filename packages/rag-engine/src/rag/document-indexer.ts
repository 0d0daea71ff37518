import { createLogger, errorMessage, type Logger, type RequestOptions } from '@ragkit/core';
import type { RagService } from './rag-service';

const defaultLogger = createLogger('document-indexer');

/**
 * Keeps a document's chunks in step with its content
 *
 * Called by the document service after each mutation. RAG bookkeeping failures
 * are logged and never reach the caller, so document CRUD does not fail on them.
 * Delete and re-index are not one transaction: a crash in between leaves the
 * document without chunks until it is indexed again.
 */
export class DocumentIndexer {
  private rag: RagService;
  private logger: Logger;

  constructor(rag: RagService, logger: Logger = defaultLogger) {
    this.rag = rag;
    this.logger = logger;
  }

  async onDocumentCreated(documentId: string, content: string, options: RequestOptions = {}): Promise<void> {
    await this.index(documentId, content, options);
  }

  /**
   * Replace a document's chunks after its content changed
   * Old chunks go first; new ones are only generated once they are gone
   */
  async onDocumentUpdated(
    documentId: string,
    previousContent: string | undefined,
    content: string,
    options: RequestOptions = {}
  ): Promise<void> {
    if (previousContent !== undefined && previousContent === content) {
      this.logger.debug({ documentId }, 'Content unchanged, keeping chunks');
      return;
    }

    const deleted = await this.remove(documentId, options);
    if (!deleted) {
      // Indexing now would mix stale and fresh chunks
      return;
    }

    if (content.trim().length > 0) {
      await this.index(documentId, content, options);
    }
  }

  async onDocumentDeleted(documentId: string, options: RequestOptions = {}): Promise<void> {
    await this.remove(documentId, options);
  }

  private async index(documentId: string, content: string, options: RequestOptions): Promise<void> {
    try {
      await this.rag.indexDocument(documentId, content, options);
    } catch (error) {
      this.logger.error({ documentId, error: errorMessage(error) }, 'Failed to index document');
    }
  }

  private async remove(documentId: string, options: RequestOptions): Promise<boolean> {
    try {
      await this.rag.deleteDocumentChunks(documentId, options);
      return true;
    } catch (error) {
      this.logger.error({ documentId, error: errorMessage(error) }, 'Failed to delete document chunks');
      return false;
    }
  }
}
