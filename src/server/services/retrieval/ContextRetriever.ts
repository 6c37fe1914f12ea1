/**
 * Context Retriever
 *
 * Turns case facts into a retrieval query, embeds it and runs a similarity
 * search over regulatory document chunks. Embedding and search each run under
 * their own timeout with bounded retries.
 */

import type { EmbeddingProvider } from '../../embeddings/EmbeddingProvider.js';
import type { ChunkSearchProvider } from '../../contracts/eligibility.js';
import { DEFAULT_RETRIEVAL_SETTINGS, type RetrievalSettings } from '../../config/eligibility.js';
import type { ChunkSearchFilters, ContextChunk, FactMap, FactValue } from '../../domain/eligibility/types.js';
import { EmbeddingFailure, RetrievalFailure } from '../../types/errors.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_RETRIEVAL_QUERY = 'immigration eligibility requirements';

export interface RetrievedContext {
  query: string;
  chunks: ContextChunk[];
}

/**
 * Render a fact value for query and prompt text. Dates become calendar days.
 */
export function formatFactValue(value: FactValue): string {
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return String(value);
}

/**
 * Rank chunks by similarity, then by most recent document version, then by ids,
 * dropping those under the similarity floor
 */
export function rankChunks(chunks: ContextChunk[], topK: number, minSimilarity: number): ContextChunk[] {
  return chunks
    .filter(chunk => chunk.similarity >= minSimilarity)
    .sort((a, b) => {
      if (a.similarity !== b.similarity) {
        return b.similarity - a.similarity;
      }
      const byRecency = b.documentVersionCreatedAt.getTime() - a.documentVersionCreatedAt.getTime();
      if (byRecency !== 0) {
        return byRecency;
      }
      if (a.documentVersionId !== b.documentVersionId) {
        return a.documentVersionId < b.documentVersionId ? -1 : 1;
      }
      return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
    })
    .slice(0, topK);
}

export class ContextRetriever {
  private readonly settings: RetrievalSettings;

  constructor(
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly searchProvider: ChunkSearchProvider,
    settings: Partial<RetrievalSettings> = {}
  ) {
    this.settings = { ...DEFAULT_RETRIEVAL_SETTINGS, ...settings };
  }

  /**
   * Build a deterministic query: visa type first, then facts sorted by key
   */
  buildQuery(facts: FactMap, visaCode?: string): string {
    const parts: string[] = [];
    if (visaCode) {
      parts.push(`visa type: ${visaCode}`);
    }
    const keys = [...facts.keys()].sort();
    for (const key of keys) {
      const value = facts.get(key);
      if (value !== undefined) {
        parts.push(`${key.replace(/_/g, ' ')}: ${formatFactValue(value)}`);
      }
    }
    return parts.length > 0 ? parts.join(', ') : DEFAULT_RETRIEVAL_QUERY;
  }

  /**
   * Embed query text
   * @throws {EmbeddingFailure} When the provider fails after retries or returns an invalid vector
   */
  async embed(text: string): Promise<number[]> {
    const { timeoutMs, retry } = this.settings.embedding;
    let vector: number[];
    try {
      vector = await retryWithBackoff(
        () => withTimeout(this.embeddingProvider.generateEmbedding(text), timeoutMs, 'Embedding generation'),
        retry,
        'embedding'
      );
    } catch (error) {
      throw new EmbeddingFailure(
        `Embedding generation failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    if (vector.length === 0) {
      throw new EmbeddingFailure('Embedding provider returned an empty vector');
    }
    if (vector.length !== this.settings.embeddingDimensions) {
      throw new EmbeddingFailure(
        `Embedding has ${vector.length} dimensions, expected ${this.settings.embeddingDimensions}`
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new EmbeddingFailure('Embedding contains non-finite values');
    }
    return vector;
  }

  /**
   * Similarity search. An empty result is valid.
   * @throws {RetrievalFailure} When the search provider fails after retries
   */
  async search(
    vector: number[],
    filters: ChunkSearchFilters,
    topK: number = this.settings.topK,
    minSimilarity: number = this.settings.minSimilarity
  ): Promise<ContextChunk[]> {
    const { timeoutMs, retry } = this.settings.search;
    let chunks: ContextChunk[];
    try {
      chunks = await retryWithBackoff(
        () => withTimeout(this.searchProvider.search(vector, filters, topK, minSimilarity), timeoutMs, 'Vector search'),
        retry,
        'vector-search'
      );
    } catch (error) {
      throw new RetrievalFailure(
        `Vector search failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    return rankChunks(chunks, topK, minSimilarity);
  }

  /**
   * Build the query from the facts, embed it and search
   */
  async retrieve(facts: FactMap, filters: ChunkSearchFilters): Promise<RetrievedContext> {
    const query = this.buildQuery(facts, filters.visaCode);
    const vector = await this.embed(query);
    const chunks = await this.search(vector, filters);

    logger.debug(
      {
        provider: this.embeddingProvider.getName(),
        visaCode: filters.visaCode,
        jurisdiction: filters.jurisdiction,
        chunkCount: chunks.length,
      },
      'Retrieved regulatory context'
    );
    return { query, chunks };
  }
}
