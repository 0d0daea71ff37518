import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createLogger } from '@ragkit/core';
import { FakeEmbeddingProvider } from '@ragkit/test-utils';
import { InMemoryChunkStore } from '../src/store/memory-chunk-store';
import { RagService } from '../src/rag/rag-service';
import { DocumentIndexer } from '../src/rag/document-indexer';

describe('DocumentIndexer', () => {
  let store: InMemoryChunkStore;
  let embeddings: FakeEmbeddingProvider;
  let rag: RagService;
  let indexer: DocumentIndexer;

  const contents = async (documentId: string) =>
    (await store.getByDocumentId(documentId)).map(chunk => chunk.content);

  beforeEach(() => {
    store = new InMemoryChunkStore();
    embeddings = new FakeEmbeddingProvider({ fallback: [1, 0] });
    rag = new RagService({ chunkSize: 2, chunkOverlap: 0 }, { embeddings, store });
    indexer = new DocumentIndexer(rag, createLogger('document-indexer-test'));
  });

  it('should index a created document', async () => {
    await indexer.onDocumentCreated('doc-1', 'alpha beta gamma');

    expect(await contents('doc-1')).toEqual(['alpha beta', 'gamma']);
  });

  it('should replace chunks when content changes', async () => {
    await indexer.onDocumentCreated('doc-1', 'alpha beta gamma');

    await indexer.onDocumentUpdated('doc-1', 'alpha beta gamma', 'delta epsilon zeta');

    const chunks = await store.getByDocumentId('doc-1');
    expect(chunks.map(chunk => [chunk.chunk_index, chunk.content])).toEqual([
      [0, 'delta epsilon'],
      [1, 'zeta']
    ]);

    const found = await store.search([1, 0], 10, 0.5);
    expect(found.map(chunk => chunk.content)).toEqual(['delta epsilon', 'zeta']);
  });

  it('should keep chunks when content is unchanged', async () => {
    await indexer.onDocumentCreated('doc-1', 'alpha beta');
    const before = await store.getByDocumentId('doc-1');
    const deleteChunks = vi.spyOn(rag, 'deleteDocumentChunks');

    await indexer.onDocumentUpdated('doc-1', 'alpha beta', 'alpha beta');

    expect(deleteChunks).not.toHaveBeenCalled();
    expect(await store.getByDocumentId('doc-1')).toEqual(before);
  });

  it('should re-index when the previous content is unknown', async () => {
    await indexer.onDocumentCreated('doc-1', 'alpha beta');

    await indexer.onDocumentUpdated('doc-1', undefined, 'alpha beta');

    expect(await contents('doc-1')).toEqual(['alpha beta']);
    expect(embeddings.calls).toHaveLength(2);
  });

  it('should only delete when the new content is blank', async () => {
    await indexer.onDocumentCreated('doc-1', 'alpha beta');
    const indexDocument = vi.spyOn(rag, 'indexDocument');

    await indexer.onDocumentUpdated('doc-1', 'alpha beta', '   ');

    expect(await contents('doc-1')).toEqual([]);
    expect(indexDocument).not.toHaveBeenCalled();
  });

  it('should not re-index when deleting the old chunks fails', async () => {
    await indexer.onDocumentCreated('doc-1', 'alpha beta');
    vi.spyOn(store, 'deleteByDocumentId').mockRejectedValue(new Error('db down'));
    const indexDocument = vi.spyOn(rag, 'indexDocument');

    await expect(indexer.onDocumentUpdated('doc-1', 'alpha beta', 'gamma delta')).resolves.toBeUndefined();

    expect(indexDocument).not.toHaveBeenCalled();
    expect(await contents('doc-1')).toEqual(['alpha beta']);
  });

  it('should swallow indexing failures', async () => {
    vi.spyOn(store, 'createBatch').mockRejectedValue(new Error('constraint violated'));

    await expect(indexer.onDocumentCreated('doc-1', 'alpha beta')).resolves.toBeUndefined();
  });

  it('should remove chunks of a deleted document', async () => {
    await indexer.onDocumentCreated('doc-1', 'alpha beta');
    await indexer.onDocumentCreated('doc-2', 'gamma');

    await indexer.onDocumentDeleted('doc-1');

    expect(await contents('doc-1')).toEqual([]);
    expect(await contents('doc-2')).toEqual(['gamma']);

    const found = await store.search([1, 0], 10, 0.5);
    expect(found.map(chunk => chunk.document_id)).toEqual(['doc-2']);
  });
});
