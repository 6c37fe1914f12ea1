import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import { logger } from './logger.js';

/**
 * Prometheus metrics registry
 */
export const metricsRegistry = new Registry();

/**
 * HTTP Request Metrics
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [metricsRegistry],
});

export const httpRequestTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [metricsRegistry],
});

/**
 * Eligibility Metrics
 */
export const eligibilityChecksTotal = new Counter({
  name: 'eligibility_checks_total',
  help: 'Total number of eligibility checks by final outcome',
  labelNames: ['outcome', 'status'],
  registers: [metricsRegistry],
});

export const eligibilityCheckDuration = new Histogram({
  name: 'eligibility_check_duration_seconds',
  help: 'Duration of eligibility checks in seconds',
  labelNames: ['ai_status'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [metricsRegistry],
});

export const aiReasoningTotal = new Counter({
  name: 'ai_reasoning_total',
  help: 'AI reasoning runs by status and failure kind',
  labelNames: ['status', 'failure'],
  registers: [metricsRegistry],
});

export const escalationsTotal = new Counter({
  name: 'eligibility_escalations_total',
  help: 'Checks routed to human review, by reason',
  labelNames: ['reason'],
  registers: [metricsRegistry],
});

export const llmCalls = new Counter({
  name: 'llm_calls_total',
  help: 'Total number of LLM API calls',
  labelNames: ['provider', 'model', 'status'],
  registers: [metricsRegistry],
});

export const llmCallDuration = new Histogram({
  name: 'llm_call_duration_seconds',
  help: 'Duration of LLM API calls in seconds',
  labelNames: ['provider', 'model'],
  buckets: [0.5, 1, 2, 5, 10, 30, 60],
  registers: [metricsRegistry],
});

/**
 * System Metrics
 */
export const memoryUsage = new Gauge({
  name: 'memory_usage_bytes',
  help: 'Memory usage in bytes',
  labelNames: ['type'],
  registers: [metricsRegistry],
});

/**
 * Interval ID for memory metrics collection (stored for cleanup)
 */
let metricsIntervalId: NodeJS.Timeout | null = null;

const DEFAULT_COLLECTION_INTERVAL_MS = 10000;

function collectMemoryMetrics(): void {
  const memUsage = process.memoryUsage();
  memoryUsage.set({ type: 'heap_used' }, memUsage.heapUsed);
  memoryUsage.set({ type: 'heap_total' }, memUsage.heapTotal);
  memoryUsage.set({ type: 'rss' }, memUsage.rss);
}

/**
 * Start periodic system metric collection
 *
 * @remarks Idempotent; calling it again has no effect
 */
export function initializeMetrics(intervalMs: number = DEFAULT_COLLECTION_INTERVAL_MS): void {
  if (metricsIntervalId !== null) {
    logger.warn('Metrics already initialized, skipping');
    return;
  }

  collectMemoryMetrics();
  metricsIntervalId = setInterval(collectMemoryMetrics, intervalMs);
  metricsIntervalId.unref();
  logger.info({ intervalMs }, 'Metrics initialized');
}

/**
 * Stop metric collection. Called during graceful shutdown.
 */
export function cleanupMetrics(): void {
  if (metricsIntervalId !== null) {
    clearInterval(metricsIntervalId);
    metricsIntervalId = null;
    logger.info('Metrics collection stopped');
  }
}

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}
