/**
 * OpenAIEmbeddingProvider - EmbeddingProvider over the OpenAI embeddings API
 */

import type { EmbeddingProvider } from '../EmbeddingProvider.js';
import { getEnv } from '../../config/env.js';
import { getOpenAIClient } from '../../services/llm/openaiUtils.js';
import { ServiceUnavailableError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Subset of the OpenAI client this provider calls
 */
export interface EmbeddingsClient {
  embeddings: {
    create: (params: { model: string; input: string[] }) => Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface OpenAIEmbeddingProviderConfig {
  apiKey?: string;
  model?: string;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly model: string;
  private readonly apiKey?: string;
  private client: EmbeddingsClient | null = null;

  constructor(config?: OpenAIEmbeddingProviderConfig) {
    const env = getEnv();
    const settings = { apiKey: env.OPENAI_API_KEY, model: env.EMBEDDING_MODEL, ...config };
    this.apiKey = settings.apiKey;
    this.model = settings.model ?? env.EMBEDDING_MODEL;
  }

  private getClient(): EmbeddingsClient {
    if (!this.client) {
      if (!this.apiKey) {
        throw new ServiceUnavailableError('OpenAI embeddings are not configured', { missing: ['OPENAI_API_KEY'] });
      }
      this.client = getOpenAIClient(this.apiKey);
    }
    return this.client;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text]);
    if (!embedding) {
      throw new Error('OpenAI returned no embedding');
    }
    return embedding;
  }

  /**
   * Embed a batch, returned in input order
   */
  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.getClient().embeddings.create({ model: this.model, input: texts });
    const ordered = [...response.data].sort((a, b) => a.index - b.index);

    logger.debug({ model: this.model, count: ordered.length }, 'Generated embeddings');
    return ordered.map(item => item.embedding);
  }

  getName(): string {
    return 'openai';
  }

  /**
   * Set OpenAI client (for testing)
   */
  setClient(client: EmbeddingsClient): void {
    this.client = client;
  }
}
