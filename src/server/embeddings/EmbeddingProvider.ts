/**
 * EmbeddingProvider - Interface for embedding generation providers
 *
 * Abstraction over the embedding backend used for retrieval queries.
 */

export interface EmbeddingProvider {
  /**
   * Generate embedding for text
   */
  generateEmbedding(text: string): Promise<number[]>;

  /**
   * Provider name, used in logs
   */
  getName(): string;
}
