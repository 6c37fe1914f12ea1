/**
 * PgVectorChunkStore - pgvector implementation of ChunkSearchProvider
 *
 * Similarity search over regulatory document chunks, filtered by visa code and
 * jurisdiction. Scores are cosine similarity (1 - cosine distance).
 */

import type { QueryResultRow } from 'pg';
import { z } from 'zod';
import { queryPostgres } from '../config/postgres.js';
import { validateEnv } from '../config/env.js';
import type { ChunkSearchProvider } from '../contracts/eligibility.js';
import type { ChunkSearchFilters, ContextChunk } from '../domain/eligibility/types.js';
import { logger } from '../utils/logger.js';

/**
 * Runs one parameterized statement and returns its rows
 */
export type SqlQuery = (text: string, params: unknown[]) => Promise<QueryResultRow[]>;

const chunkRowSchema = z.object({
  chunk_id: z.string(),
  document_version_id: z.string(),
  document_version_created_at: z.coerce.date(),
  text: z.string(),
  similarity: z.coerce.number(),
  visa_code: z.string().nullable().optional(),
  jurisdiction: z.string().nullable().optional(),
  metadata: z.record(z.unknown()).nullable().optional(),
});

/**
 * Map a search row to a chunk, or null when the row is malformed
 */
export function chunkFromRow(row: QueryResultRow): ContextChunk | null {
  const parsed = chunkRowSchema.safeParse(row);
  if (!parsed.success) {
    logger.warn({ chunkId: row.chunk_id }, 'Skipping malformed chunk row');
    return null;
  }
  const data = parsed.data;
  return {
    chunkId: data.chunk_id,
    documentVersionId: data.document_version_id,
    documentVersionCreatedAt: data.document_version_created_at,
    text: data.text,
    similarity: data.similarity,
    metadata: {
      ...(data.metadata ?? {}),
      ...(data.visa_code ? { visaCode: data.visa_code } : {}),
      ...(data.jurisdiction ? { jurisdiction: data.jurisdiction } : {}),
    },
  };
}

export class PgVectorChunkStore implements ChunkSearchProvider {
  private readonly schema: string;
  private readonly query: SqlQuery;

  constructor(config: { schema?: string; query?: SqlQuery } = {}) {
    this.schema = config.schema ?? validateEnv().PGVECTOR_SCHEMA;

    if (!/^[a-z0-9_]+$/i.test(this.schema)) {
      throw new Error(`Invalid schema name: ${this.schema}. Only alphanumeric characters and underscores are allowed.`);
    }

    this.query = config.query ?? queryPostgres;
  }

  /**
   * Escape identifier (schema/table name) to prevent SQL injection
   *
   * Doubles double quotes and wraps in double quotes.
   */
  private escapeIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  /**
   * Build the search statement and its parameters
   */
  buildSearchQuery(
    vector: number[],
    filters: ChunkSearchFilters,
    topK: number,
    minSimilarity: number
  ): { text: string; params: unknown[] } {
    // pgvector parses the JSON array text form '[1,2,3]'
    const params: unknown[] = [JSON.stringify(vector), minSimilarity];
    const conditions = ['1 - (embedding <=> CAST($1::text AS vector)) >= $2'];

    if (filters.visaCode) {
      params.push(filters.visaCode);
      conditions.push(`(visa_code = $${params.length} OR visa_code IS NULL)`);
    }
    if (filters.jurisdiction) {
      params.push(filters.jurisdiction);
      conditions.push(`(jurisdiction = $${params.length} OR jurisdiction IS NULL)`);
    }
    params.push(topK);

    const text = `
        SELECT
          chunk_id,
          document_version_id,
          document_version_created_at,
          text,
          visa_code,
          jurisdiction,
          metadata,
          1 - (embedding <=> CAST($1::text AS vector)) AS similarity
        FROM ${this.escapeIdentifier(this.schema)}.document_chunks
        WHERE ${conditions.join('\n          AND ')}
        ORDER BY embedding <=> CAST($1::text AS vector)
        LIMIT $${params.length};
      `;
    return { text, params };
  }

  async search(
    vector: number[],
    filters: ChunkSearchFilters,
    topK: number,
    minSimilarity: number
  ): Promise<ContextChunk[]> {
    const { text, params } = this.buildSearchQuery(vector, filters, topK, minSimilarity);

    try {
      const rows = await this.query(text, params);
      const chunks: ContextChunk[] = [];
      for (const row of rows) {
        const chunk = chunkFromRow(row);
        if (chunk) {
          chunks.push(chunk);
        }
      }
      logger.debug(
        { topK, resultCount: chunks.length, filters, scores: chunks.slice(0, 3).map(c => c.similarity) },
        'Vector search completed'
      );
      return chunks;
    } catch (error) {
      logger.error({ error, filters }, 'Failed to search in pgvector');
      throw error;
    }
  }
}
