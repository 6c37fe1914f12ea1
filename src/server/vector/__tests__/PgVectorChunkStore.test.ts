import { describe, it, expect, vi } from 'vitest';
import type { QueryResultRow } from 'pg';
import { PgVectorChunkStore, chunkFromRow } from '../PgVectorChunkStore.js';
import { queryPostgres } from '../../config/postgres.js';

vi.mock('../../config/postgres.js', () => ({
  queryPostgres: vi.fn(),
}));

const row = (overrides: QueryResultRow = {}): QueryResultRow => ({
  chunk_id: 'chunk-1',
  document_version_id: 'docv-1',
  document_version_created_at: new Date('2024-02-01T00:00:00Z'),
  text: 'Sponsors must hold a valid licence.',
  visa_code: 'SKW',
  jurisdiction: 'UK',
  metadata: { section: '4.2' },
  similarity: '0.91',
  ...overrides,
});

describe('PgVectorChunkStore', () => {
  it('filters by similarity, visa code and jurisdiction', () => {
    const store = new PgVectorChunkStore({ schema: 'vector', query: async () => [] });

    const { text, params } = store.buildSearchQuery([0.1, 0.2], { visaCode: 'SKW', jurisdiction: 'UK' }, 5, 0.7);

    expect(params).toEqual(['[0.1,0.2]', 0.7, 'SKW', 'UK', 5]);
    expect(text).toContain('FROM "vector".document_chunks');
    expect(text).toContain('1 - (embedding <=> CAST($1::text AS vector)) >= $2');
    expect(text).toContain('(visa_code = $3 OR visa_code IS NULL)');
    expect(text).toContain('(jurisdiction = $4 OR jurisdiction IS NULL)');
    expect(text).toContain('LIMIT $5;');
  });

  it('numbers the limit after the parameters in use', () => {
    const store = new PgVectorChunkStore({ schema: 'vector', query: async () => [] });

    const { text, params } = store.buildSearchQuery([1], {}, 3, 0.5);

    expect(params).toEqual(['[1]', 0.5, 3]);
    expect(text).toContain('LIMIT $3;');
    expect(text).not.toContain('visa_code =');
  });

  it('rejects schema names that are not plain identifiers', () => {
    expect(() => new PgVectorChunkStore({ schema: 'vector; DROP TABLE x', query: async () => [] })).toThrow(
      'Invalid schema name: vector; DROP TABLE x. Only alphanumeric characters and underscores are allowed.'
    );
  });

  it('maps rows to chunks and skips malformed ones', async () => {
    const captured: unknown[][] = [];
    const store = new PgVectorChunkStore({
      schema: 'vector',
      query: async (_text, params) => {
        captured.push(params);
        return [row(), { chunk_id: 'chunk-broken' }];
      },
    });

    const chunks = await store.search([0.5, 0.5], { visaCode: 'SKW' }, 5, 0.7);

    expect(captured).toHaveLength(1);
    expect(chunks).toEqual([
      {
        chunkId: 'chunk-1',
        documentVersionId: 'docv-1',
        documentVersionCreatedAt: new Date('2024-02-01T00:00:00Z'),
        text: 'Sponsors must hold a valid licence.',
        similarity: 0.91,
        metadata: { section: '4.2', visaCode: 'SKW', jurisdiction: 'UK' },
      },
    ]);
  });

  it('runs through the shared PostgreSQL query helper by default', async () => {
    vi.mocked(queryPostgres).mockResolvedValueOnce([row()]);
    const store = new PgVectorChunkStore({ schema: 'vector' });

    const chunks = await store.search([0.5, 0.5], {}, 5, 0.7);

    expect(chunks.map(chunk => chunk.chunkId)).toEqual(['chunk-1']);
    expect(queryPostgres).toHaveBeenCalledWith(expect.stringContaining('FROM "vector".document_chunks'), [
      '[0.5,0.5]',
      0.7,
      5,
    ]);
  });

  it('propagates query failures', async () => {
    const store = new PgVectorChunkStore({
      schema: 'vector',
      query: async () => {
        throw new Error('connection terminated unexpectedly');
      },
    });

    await expect(store.search([1], {}, 5, 0.7)).rejects.toThrow('connection terminated unexpectedly');
  });
});

describe('chunkFromRow', () => {
  it('leaves metadata keys out when the columns are null', () => {
    const chunk = chunkFromRow(row({ visa_code: null, jurisdiction: null, metadata: null }));

    expect(chunk?.metadata).toEqual({});
  });
});
