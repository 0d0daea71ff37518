import { describe, it, expect, beforeEach } from 'vitest';
import { StoreError } from '@ragkit/core';
import { basisVector, createNewChunks } from '@ragkit/test-utils';
import { InMemoryChunkStore } from '../src/store/memory-chunk-store';

describe('InMemoryChunkStore', () => {
  let store: InMemoryChunkStore;

  beforeEach(() => {
    store = new InMemoryChunkStore();
  });

  it('should assign ids and timestamps on insert', async () => {
    await store.createBatch(createNewChunks('doc-1', [[1, 0], [0, 1]], ['first', 'second']));

    const chunks = await store.getByDocumentId('doc-1');

    expect(chunks.map(chunk => chunk.content)).toEqual(['first', 'second']);
    expect(chunks.map(chunk => chunk.chunk_index)).toEqual([0, 1]);
    expect(new Set(chunks.map(chunk => chunk.id)).size).toBe(2);
    for (const chunk of chunks) {
      expect(Number.isNaN(Date.parse(chunk.created_at))).toBe(false);
    }
  });

  it('should keep provided ids', async () => {
    await store.createBatch([{
      id: 'chunk-a',
      document_id: 'doc-1',
      chunk_index: 0,
      content: 'text',
      embedding: [1, 0]
    }]);

    const [chunk] = await store.getByDocumentId('doc-1');
    expect(chunk.id).toBe('chunk-a');
  });

  it('should return chunks ordered by index', async () => {
    await store.createBatch([
      { document_id: 'doc-1', chunk_index: 2, content: 'c', embedding: [1] },
      { document_id: 'doc-1', chunk_index: 0, content: 'a', embedding: [1] },
      { document_id: 'doc-2', chunk_index: 0, content: 'x', embedding: [1] },
      { document_id: 'doc-1', chunk_index: 1, content: 'b', embedding: [1] }
    ]);

    const chunks = await store.getByDocumentId('doc-1');

    expect(chunks.map(chunk => chunk.content)).toEqual(['a', 'b', 'c']);
    expect(await store.getByDocumentId('missing')).toEqual([]);
  });

  it('should delete only the given document', async () => {
    await store.createBatch(createNewChunks('doc-1', [[1], [1]]));
    await store.createBatch(createNewChunks('doc-2', [[1]]));

    await store.deleteByDocumentId('doc-1');

    expect(await store.getByDocumentId('doc-1')).toEqual([]);
    expect(await store.getByDocumentId('doc-2')).toHaveLength(1);
    expect(store.size()).toBe(1);
  });

  it('should never return chunks of a deleted document from search', async () => {
    await store.createBatch(createNewChunks('doc-1', [[1, 0], [0.9, 0.1]], ['gone', 'also gone']));
    await store.createBatch(createNewChunks('doc-2', [[1, 0]], ['kept']));

    await store.deleteByDocumentId('doc-1');

    const results = await store.search([1, 0], 10, -1);
    expect(results.map(chunk => [chunk.document_id, chunk.content])).toEqual([['doc-2', 'kept']]);
  });

  it('should keep stored chunks unchanged when returned ones are edited', async () => {
    const embedding = [1, 0];
    await store.createBatch([{ document_id: 'doc-1', chunk_index: 0, content: 'original', embedding }]);

    embedding[0] = 5;
    const [found] = await store.search([1, 0], 1, 0.5);
    found.content = 'edited';
    found.embedding[0] = -1;
    const [read] = await store.getByDocumentId('doc-1');
    read.embedding[1] = 7;

    const [stored] = await store.getByDocumentId('doc-1');
    expect(stored.content).toBe('original');
    expect(stored.embedding).toEqual([1, 0]);
  });

  it('should treat deleting an unknown document as a no-op', async () => {
    await store.createBatch(createNewChunks('doc-1', [[1]]));

    await expect(store.deleteByDocumentId('nope')).resolves.toBeUndefined();
    expect(store.size()).toBe(1);
  });

  it('should reject a duplicate position and store nothing from the batch', async () => {
    await store.createBatch(createNewChunks('doc-1', [[1, 0]]));

    const batch = [
      { document_id: 'doc-2', chunk_index: 0, content: 'new', embedding: [0, 1] },
      { document_id: 'doc-1', chunk_index: 0, content: 'clash', embedding: [0, 1] }
    ];

    await expect(store.createBatch(batch)).rejects.toThrow('Duplicate chunk index for document');
    expect(store.size()).toBe(1);
    expect(await store.getByDocumentId('doc-2')).toEqual([]);
  });

  it('should reject a duplicate id', async () => {
    const batch = [
      { id: 'same', document_id: 'doc-1', chunk_index: 0, content: 'a', embedding: [1] },
      { id: 'same', document_id: 'doc-1', chunk_index: 1, content: 'b', embedding: [1] }
    ];

    await expect(store.createBatch(batch)).rejects.toThrow('Duplicate chunk id');
    expect(store.size()).toBe(0);
  });

  it('should reject embeddings of another dimension', async () => {
    await store.createBatch(createNewChunks('doc-1', [[1, 0, 0]]));

    const result = store.createBatch(createNewChunks('doc-2', [[1, 0]]));

    await expect(result).rejects.toBeInstanceOf(StoreError);
    await expect(result).rejects.toThrow('Embedding dimension mismatch');
  });

  it('should search by cosine similarity above the threshold', async () => {
    await store.createBatch(createNewChunks('doc-1', [
      basisVector(3, 0),
      basisVector(3, 1),
      [1, 1, 0]
    ], ['x-axis', 'y-axis', 'diagonal']));

    const results = await store.search([1, 0, 0], 5, 0.5);

    // diagonal scores 1/sqrt(2), y-axis scores 0
    expect(results.map(chunk => chunk.content)).toEqual(['x-axis', 'diagonal']);
  });

  it('should cap results at topK', async () => {
    await store.createBatch(createNewChunks('doc-1', [[1, 0], [2, 0], [3, 0]], ['a', 'b', 'c']));

    const results = await store.search([1, 0], 2, 0.1);

    // equal scores fall back to insertion order
    expect(results.map(chunk => chunk.content)).toEqual(['a', 'b']);
  });

  it('should return nothing for topK of zero or an empty store', async () => {
    expect(await store.search([1, 0], 5, 0)).toEqual([]);

    await store.createBatch(createNewChunks('doc-1', [[1, 0]]));
    expect(await store.search([1, 0], 0, 0)).toEqual([]);
  });

  it('should honour an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(store.search([1], 1, 0, { signal: controller.signal })).rejects.toThrow();
    await expect(
      store.createBatch(createNewChunks('doc-1', [[1]]), { signal: controller.signal })
    ).rejects.toThrow();
    expect(store.size()).toBe(0);
  });
});
