/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables. Values are parsed by hand
 * with defaults, then validated; invalid values fail fast at startup.
 */

// Load dotenv early so every module sees the same environment
import * as dotenv from 'dotenv';
dotenv.config();

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;

  // Database Configuration
  MONGODB_URI: string;
  DB_NAME: string;
  DB_MAX_POOL_SIZE: number;
  DB_CONNECT_TIMEOUT_MS: number;
  DB_SERVER_SELECTION_TIMEOUT_MS: number;

  // PostgreSQL / pgvector Configuration
  POSTGRES_HOST: string;
  POSTGRES_PORT: number;
  POSTGRES_DB: string;
  POSTGRES_USER: string;
  POSTGRES_PASSWORD: string;
  POSTGRES_POOL_MAX: number;
  PGVECTOR_SCHEMA: string;

  // OpenAI Configuration
  OPENAI_API_KEY?: string;
  AI_REASONING_ENABLED: boolean;
  AI_MODEL: string;
  AI_TEMPERATURE: number;
  AI_MAX_TOKENS: number;
  EMBEDDING_MODEL: string;
  EMBEDDING_DIMENSIONS: number;

  // Remote call resilience
  AI_MAX_RETRIES: number;
  AI_RETRY_INITIAL_DELAY_MS: number;
  AI_RETRY_MAX_DELAY_MS: number;
  EMBEDDING_TIMEOUT_MS: number;
  VECTOR_SEARCH_TIMEOUT_MS: number;
  MODEL_TIMEOUT_MS: number;

  // Retrieval
  RETRIEVAL_TOP_K: number;
  RETRIEVAL_MIN_SIMILARITY: number;
  NO_CONTEXT_CONFIDENCE_CAP: number;

  // Decision thresholds
  ELIGIBLE_CONFIDENCE_THRESHOLD: number;
  REVIEW_CONFIDENCE_THRESHOLD: number;
  ESCALATION_CONFIDENCE_THRESHOLD: number;

  // Logging Configuration
  LOG_LEVEL?: string;
}

let validatedEnv: Env | null = null;

function requireUnitInterval(name: string, value: number, errors: string[]): void {
  if (value < 0 || value > 1) {
    errors.push(`${name}: Invalid value "${value}". Must be between 0 and 1.`);
  }
}

/**
 * Validate and return environment variables
 * @throws {Error} If validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (nodeEnv !== 'development' && nodeEnv !== 'production' && nodeEnv !== 'test') {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const pgvectorSchema = process.env.PGVECTOR_SCHEMA || 'vector';
  if (!/^[a-z0-9_]+$/i.test(pgvectorSchema)) {
    errors.push(`PGVECTOR_SCHEMA: Invalid value "${pgvectorSchema}". Only alphanumeric characters and underscores are allowed.`);
  }

  const embeddingDimensions = parseNumericEnv(process.env.EMBEDDING_DIMENSIONS, 1536);
  if (embeddingDimensions < 1) {
    errors.push(`EMBEDDING_DIMENSIONS: Invalid value "${process.env.EMBEDDING_DIMENSIONS}". Must be positive.`);
  }

  const retrievalTopK = parseNumericEnv(process.env.RETRIEVAL_TOP_K, 5);
  if (retrievalTopK < 1) {
    errors.push(`RETRIEVAL_TOP_K: Invalid value "${process.env.RETRIEVAL_TOP_K}". Must be at least 1.`);
  }

  const aiMaxRetries = parseNumericEnv(process.env.AI_MAX_RETRIES, 2);
  if (aiMaxRetries < 0 || aiMaxRetries > 10) {
    errors.push(`AI_MAX_RETRIES: Invalid value "${process.env.AI_MAX_RETRIES}". Must be between 0 and 10.`);
  }

  const retrievalMinSimilarity = parseFloatEnv(process.env.RETRIEVAL_MIN_SIMILARITY, 0.7);
  const noContextCap = parseFloatEnv(process.env.NO_CONTEXT_CONFIDENCE_CAP, 0.5);
  const eligibleThreshold = parseFloatEnv(process.env.ELIGIBLE_CONFIDENCE_THRESHOLD, 0.8);
  const reviewThreshold = parseFloatEnv(process.env.REVIEW_CONFIDENCE_THRESHOLD, 0.5);
  const escalationThreshold = parseFloatEnv(process.env.ESCALATION_CONFIDENCE_THRESHOLD, 0.6);
  requireUnitInterval('RETRIEVAL_MIN_SIMILARITY', retrievalMinSimilarity, errors);
  requireUnitInterval('NO_CONTEXT_CONFIDENCE_CAP', noContextCap, errors);
  requireUnitInterval('ELIGIBLE_CONFIDENCE_THRESHOLD', eligibleThreshold, errors);
  requireUnitInterval('REVIEW_CONFIDENCE_THRESHOLD', reviewThreshold, errors);
  requireUnitInterval('ESCALATION_CONFIDENCE_THRESHOLD', escalationThreshold, errors);
  if (reviewThreshold > eligibleThreshold) {
    errors.push('REVIEW_CONFIDENCE_THRESHOLD: Must not exceed ELIGIBLE_CONFIDENCE_THRESHOLD.');
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development',
    PORT: port,

    MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017',
    DB_NAME: process.env.DB_NAME || 'visa_eligibility',
    DB_MAX_POOL_SIZE: parseNumericEnv(process.env.DB_MAX_POOL_SIZE, 10),
    DB_CONNECT_TIMEOUT_MS: parseNumericEnv(process.env.DB_CONNECT_TIMEOUT_MS, 10000),
    DB_SERVER_SELECTION_TIMEOUT_MS: parseNumericEnv(process.env.DB_SERVER_SELECTION_TIMEOUT_MS, 10000),

    POSTGRES_HOST: process.env.POSTGRES_HOST || 'localhost',
    POSTGRES_PORT: parseNumericEnv(process.env.POSTGRES_PORT, 5432),
    POSTGRES_DB: process.env.POSTGRES_DB || 'visa_eligibility',
    POSTGRES_USER: process.env.POSTGRES_USER || 'postgres',
    POSTGRES_PASSWORD: process.env.POSTGRES_PASSWORD || 'postgres',
    POSTGRES_POOL_MAX: parseNumericEnv(process.env.POSTGRES_POOL_MAX, 10),
    PGVECTOR_SCHEMA: pgvectorSchema,

    OPENAI_API_KEY: process.env.OPENAI_API_KEY || undefined,
    AI_REASONING_ENABLED: parseBooleanEnv(process.env.AI_REASONING_ENABLED, true),
    AI_MODEL: process.env.AI_MODEL || 'gpt-4o-mini',
    AI_TEMPERATURE: parseFloatEnv(process.env.AI_TEMPERATURE, 0),
    AI_MAX_TOKENS: parseNumericEnv(process.env.AI_MAX_TOKENS, 1200),
    EMBEDDING_MODEL: process.env.EMBEDDING_MODEL || 'text-embedding-ada-002',
    EMBEDDING_DIMENSIONS: embeddingDimensions,

    AI_MAX_RETRIES: aiMaxRetries,
    AI_RETRY_INITIAL_DELAY_MS: parseNumericEnv(process.env.AI_RETRY_INITIAL_DELAY_MS, 500),
    AI_RETRY_MAX_DELAY_MS: parseNumericEnv(process.env.AI_RETRY_MAX_DELAY_MS, 8000),
    EMBEDDING_TIMEOUT_MS: parseNumericEnv(process.env.EMBEDDING_TIMEOUT_MS, 15000),
    VECTOR_SEARCH_TIMEOUT_MS: parseNumericEnv(process.env.VECTOR_SEARCH_TIMEOUT_MS, 10000),
    MODEL_TIMEOUT_MS: parseNumericEnv(process.env.MODEL_TIMEOUT_MS, 60000),

    RETRIEVAL_TOP_K: retrievalTopK,
    RETRIEVAL_MIN_SIMILARITY: retrievalMinSimilarity,
    NO_CONTEXT_CONFIDENCE_CAP: noContextCap,

    ELIGIBLE_CONFIDENCE_THRESHOLD: eligibleThreshold,
    REVIEW_CONFIDENCE_THRESHOLD: reviewThreshold,
    ESCALATION_CONFIDENCE_THRESHOLD: escalationThreshold,

    LOG_LEVEL: process.env.LOG_LEVEL,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}
