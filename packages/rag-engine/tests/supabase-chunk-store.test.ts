import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { createClient } from '@supabase/supabase-js';
import { StoreError, type Chunk } from '@ragkit/core';
import { createChunk, HttpStub } from '@ragkit/test-utils';
import { SupabaseChunkStore } from '../src/store/supabase-chunk-store';

const CREATED_AT = '2025-01-01T00:00:00+00:00';

function row(id: string, embedding: number[], content: string = id): Chunk {
  return createChunk({
    id,
    document_id: 'doc-1',
    content,
    embedding,
    created_at: CREATED_AT
  });
}

describe('SupabaseChunkStore', () => {
  const stub = new HttpStub(() => ({ status: 200, body: [] }));
  let store: SupabaseChunkStore;

  beforeAll(async () => {
    await stub.start();
  });

  afterAll(async () => {
    await stub.stop();
  });

  beforeEach(() => {
    stub.requests.length = 0;
    stub.setHandler(() => ({ status: 200, body: [] }));

    const db = createClient(stub.baseUrl, 'test-secret', {
      auth: { persistSession: false, autoRefreshToken: false }
    });
    store = new SupabaseChunkStore(db, { pageSize: 2 });
  });

  it('should insert the whole batch in one request', async () => {
    stub.setHandler(() => ({ status: 201 }));

    await store.createBatch([
      { document_id: 'doc-1', chunk_index: 0, content: 'a', embedding: [1, 0] },
      { id: 'kept', document_id: 'doc-1', chunk_index: 1, content: 'b', embedding: [0, 1] }
    ]);

    expect(stub.requests).toHaveLength(1);

    const [request] = stub.requests;
    expect(request.method).toBe('POST');
    expect(request.url.pathname).toBe('/rest/v1/kb_chunks');
    expect(request.headers.apikey).toBe('test-secret');

    const sent: Chunk[] = JSON.parse(request.body);
    expect(sent.map(chunk => [chunk.document_id, chunk.chunk_index, chunk.content])).toEqual([
      ['doc-1', 0, 'a'],
      ['doc-1', 1, 'b']
    ]);
    expect(sent[1].id).toBe('kept');
    expect(sent[0].id).toMatch(/^[0-9a-f-]{36}$/);
    expect(sent[0].created_at).toBe(sent[1].created_at);
  });

  it('should skip the request for an empty batch', async () => {
    await store.createBatch([]);

    expect(stub.requests).toHaveLength(0);
  });

  it('should raise a StoreError when the insert fails', async () => {
    stub.setHandler(() => ({
      status: 409,
      body: { code: '23505', message: 'duplicate key value', details: null, hint: null }
    }));

    const result = store.createBatch([
      { document_id: 'doc-1', chunk_index: 0, content: 'a', embedding: [1] }
    ]);

    await expect(result).rejects.toBeInstanceOf(StoreError);
    await expect(result).rejects.toThrow('Failed to insert chunks');
  });

  it('should fetch a document ordered by chunk index', async () => {
    stub.setHandler(() => ({ status: 200, body: [row('c1', [1]), row('c2', [1])] }));

    const chunks = await store.getByDocumentId('doc-1');

    expect(chunks.map(chunk => chunk.id)).toEqual(['c1', 'c2']);

    const params = stub.requests[0].url.searchParams;
    expect(params.get('document_id')).toBe('eq.doc-1');
    expect(params.get('order')).toBe('chunk_index.asc');
    expect(params.get('select')).toBe('id,document_id,chunk_index,content,embedding,created_at');
  });

  it('should reject malformed rows', async () => {
    stub.setHandler(() => ({ status: 200, body: [{ id: 'c1', content: 'no embedding' }] }));

    await expect(store.getByDocumentId('doc-1')).rejects.toThrow('Malformed chunk row');
  });

  it('should delete by document id', async () => {
    stub.setHandler(() => ({ status: 204 }));

    await store.deleteByDocumentId('doc-1');

    const [request] = stub.requests;
    expect(request.method).toBe('DELETE');
    expect(request.url.searchParams.get('document_id')).toBe('eq.doc-1');
  });

  it('should raise a StoreError when the delete fails', async () => {
    stub.setHandler(() => ({
      status: 500,
      body: { code: 'XX000', message: 'internal', details: null, hint: null }
    }));

    await expect(store.deleteByDocumentId('doc-1')).rejects.toThrow('Failed to delete chunks');
  });

  it('should page through the table and rank in process', async () => {
    const pages: Record<string, Chunk[]> = {
      '0': [row('a', [0, 1], 'y-axis'), row('b', [1, 0], 'x-axis')],
      '2': [row('c', [1, 1], 'diagonal')]
    };
    stub.setHandler(request => ({
      status: 200,
      body: pages[request.url.searchParams.get('offset') ?? '0'] ?? []
    }));

    const results = await store.search([1, 0], 5, 0.5);

    expect(results.map(chunk => chunk.content)).toEqual(['x-axis', 'diagonal']);
    expect(stub.requests.map(request => [
      request.url.searchParams.get('offset'),
      request.url.searchParams.get('limit'),
      request.url.searchParams.get('order')
    ])).toEqual([
      ['0', '2', 'id.asc'],
      ['2', '2', 'id.asc']
    ]);
  });

  it('should not query for topK of zero', async () => {
    await expect(store.search([1, 0], 0, 0)).resolves.toEqual([]);
    expect(stub.requests).toHaveLength(0);
  });
});
