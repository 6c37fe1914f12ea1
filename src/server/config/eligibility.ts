/**
 * Eligibility engine configuration
 *
 * Groups the thresholds, retrieval settings and remote-call policies that the
 * decision services take as constructor options. Defaults live here so services
 * can be built without touching the environment; `getEligibilityConfig` maps the
 * validated environment onto the same shape.
 */

import { getEnv, type Env } from './env.js';
import type { RetryConfig } from '../utils/retry.js';
import { DEFAULT_TIMEOUTS } from '../utils/withTimeout.js';

export interface DecisionThresholds {
  /** Rule confidence at or above which a case is eligible */
  eligible: number;
  /** Rule confidence at or above which a case is routed to review */
  review: number;
  /** Combined confidence below which a case is escalated */
  escalation: number;
}

export interface RemoteCallPolicy {
  timeoutMs: number;
  retry: RetryConfig;
}

export interface RetrievalSettings {
  topK: number;
  minSimilarity: number;
  embeddingDimensions: number;
  embedding: RemoteCallPolicy;
  search: RemoteCallPolicy;
}

export interface ReasoningSettings {
  temperature: number;
  maxTokens: number;
  /** Upper bound on the AI confidence when no context chunk was retrieved */
  noContextConfidenceCap: number;
  model: RemoteCallPolicy;
}

export interface EligibilityEngineConfig {
  thresholds: DecisionThresholds;
  retrieval: RetrievalSettings;
  reasoning: ReasoningSettings;
  aiReasoningEnabled: boolean;
}

export const DEFAULT_THRESHOLDS: DecisionThresholds = {
  eligible: 0.8,
  review: 0.5,
  escalation: 0.6,
};

const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 2,
  initialDelay: 500,
  maxDelay: 8000,
  multiplier: 2,
};

export const DEFAULT_RETRIEVAL_SETTINGS: RetrievalSettings = {
  topK: 5,
  minSimilarity: 0.7,
  embeddingDimensions: 1536,
  embedding: { timeoutMs: DEFAULT_TIMEOUTS.EMBEDDING, retry: DEFAULT_RETRY },
  search: { timeoutMs: DEFAULT_TIMEOUTS.VECTOR_SEARCH, retry: DEFAULT_RETRY },
};

export const DEFAULT_REASONING_SETTINGS: ReasoningSettings = {
  temperature: 0,
  maxTokens: 1200,
  noContextConfidenceCap: 0.5,
  model: { timeoutMs: DEFAULT_TIMEOUTS.MODEL_COMPLETION, retry: DEFAULT_RETRY },
};

/**
 * Build the engine configuration from validated environment variables
 */
export function getEligibilityConfig(env: Env = getEnv()): EligibilityEngineConfig {
  const retry: RetryConfig = {
    maxAttempts: env.AI_MAX_RETRIES,
    initialDelay: env.AI_RETRY_INITIAL_DELAY_MS,
    maxDelay: env.AI_RETRY_MAX_DELAY_MS,
    multiplier: 2,
  };

  return {
    thresholds: {
      eligible: env.ELIGIBLE_CONFIDENCE_THRESHOLD,
      review: env.REVIEW_CONFIDENCE_THRESHOLD,
      escalation: env.ESCALATION_CONFIDENCE_THRESHOLD,
    },
    retrieval: {
      topK: env.RETRIEVAL_TOP_K,
      minSimilarity: env.RETRIEVAL_MIN_SIMILARITY,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
      embedding: { timeoutMs: env.EMBEDDING_TIMEOUT_MS, retry },
      search: { timeoutMs: env.VECTOR_SEARCH_TIMEOUT_MS, retry },
    },
    reasoning: {
      temperature: env.AI_TEMPERATURE,
      maxTokens: env.AI_MAX_TOKENS,
      noContextConfidenceCap: env.NO_CONTEXT_CONFIDENCE_CAP,
      model: { timeoutMs: env.MODEL_TIMEOUT_MS, retry },
    },
    aiReasoningEnabled: env.AI_REASONING_ENABLED && Boolean(env.OPENAI_API_KEY),
  };
}
