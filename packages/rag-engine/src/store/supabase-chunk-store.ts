import crypto from 'crypto';
import type { SupabaseClient } from '@supabase/supabase-js';
import {
  CHUNK_TABLE,
  chunkSchema,
  createLogger,
  STORE_PAGE_SIZE,
  StoreError,
  topKBySimilarity,
  type Chunk,
  type ChunkStore,
  type NewChunk,
  type RequestOptions
} from '@ragkit/core';

const logger = createLogger('supabase-chunk-store');

const COLUMNS = 'id, document_id, chunk_index, content, embedding, created_at';

export type SupabaseChunkStoreOptions = {
  table?: string;
  pageSize?: number;
};

/**
 * Chunk store backed by a Supabase (Postgres) table
 *
 * Expected columns: id text primary key, document_id text, chunk_index int,
 * content text, embedding float8[] (or jsonb), created_at timestamptz,
 * unique (document_id, chunk_index).
 */
export class SupabaseChunkStore implements ChunkStore {
  private db: SupabaseClient;
  private readonly table: string;
  private readonly pageSize: number;

  constructor(db: SupabaseClient, options: SupabaseChunkStoreOptions = {}) {
    this.db = db;
    this.table = options.table ?? CHUNK_TABLE;
    this.pageSize = options.pageSize ?? STORE_PAGE_SIZE;
  }

  /**
   * Insert chunks in a single statement so the batch succeeds or fails as one
   */
  async createBatch(chunks: NewChunk[], options: RequestOptions = {}): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    const now = new Date().toISOString();
    const rows: Chunk[] = chunks.map(chunk => ({
      ...chunk,
      id: chunk.id || crypto.randomUUID(),
      created_at: chunk.created_at ?? now
    }));

    let query = this.db.from(this.table).insert(rows);
    if (options.signal) {
      query = query.abortSignal(options.signal);
    }

    const { error } = await query;

    if (error) {
      logger.error({ error, count: rows.length }, 'Failed to insert chunks');
      throw new StoreError('Failed to insert chunks', { count: rows.length, code: error.code }, { cause: error });
    }

    logger.info({ count: rows.length }, 'Chunks inserted');
  }

  async getByDocumentId(documentId: string, options: RequestOptions = {}): Promise<Chunk[]> {
    let query = this.db
      .from(this.table)
      .select(COLUMNS)
      .eq('document_id', documentId)
      .order('chunk_index', { ascending: true });

    if (options.signal) {
      query = query.abortSignal(options.signal);
    }

    const { data, error } = await query;

    if (error) {
      logger.error({ error, documentId }, 'Failed to fetch chunks');
      throw new StoreError('Failed to fetch chunks', { documentId, code: error.code }, { cause: error });
    }

    return this.parseRows(data ?? []);
  }

  async deleteByDocumentId(documentId: string, options: RequestOptions = {}): Promise<void> {
    let query = this.db
      .from(this.table)
      .delete()
      .eq('document_id', documentId);

    if (options.signal) {
      query = query.abortSignal(options.signal);
    }

    const { error } = await query;

    if (error) {
      logger.error({ error, documentId }, 'Failed to delete chunks');
      throw new StoreError('Failed to delete chunks', { documentId, code: error.code }, { cause: error });
    }
  }

  /**
   * Brute-force search: load every chunk page by page, rank in process
   */
  async search(
    embedding: number[],
    topK: number,
    threshold: number,
    options: RequestOptions = {}
  ): Promise<Chunk[]> {
    if (topK <= 0) {
      return [];
    }

    const corpus = await this.loadAll(options);
    const ranked = topKBySimilarity(
      embedding,
      corpus.map(chunk => chunk.embedding),
      topK,
      threshold
    );

    logger.debug({ scanned: corpus.length, returned: ranked.length }, 'Search complete');

    return ranked.map(({ index }) => corpus[index]);
  }

  private async loadAll(options: RequestOptions): Promise<Chunk[]> {
    const corpus: Chunk[] = [];

    for (let from = 0; ; from += this.pageSize) {
      let query = this.db
        .from(this.table)
        .select(COLUMNS)
        .order('id', { ascending: true })
        .range(from, from + this.pageSize - 1);

      if (options.signal) {
        query = query.abortSignal(options.signal);
      }

      const { data, error } = await query;

      if (error) {
        logger.error({ error, from }, 'Failed to load chunks');
        throw new StoreError('Failed to load chunks', { from, code: error.code }, { cause: error });
      }

      const page = this.parseRows(data ?? []);
      corpus.push(...page);

      if (page.length < this.pageSize) {
        return corpus;
      }
    }
  }

  private parseRows(rows: unknown[]): Chunk[] {
    return rows.map(row => {
      const parsed = chunkSchema.safeParse(row);
      if (!parsed.success) {
        throw new StoreError('Malformed chunk row', { issues: parsed.error.issues.length });
      }
      return parsed.data;
    });
  }
}
