import { createServer } from 'http';
import { validateEnv } from './config/env.js';
import { getEligibilityConfig } from './config/eligibility.js';
import { connectDB, closeDB, checkDatabaseHealth } from './config/database.js';
import { getPostgresPool, closePostgresPool, checkPostgresHealth } from './config/postgres.js';
import { logger } from './utils/logger.js';
import { initializeMetrics, cleanupMetrics } from './utils/metrics.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';
import { createApp } from './app.js';
import { RuleEvaluationEngine } from './services/rules/RuleEvaluationEngine.js';
import { ContextRetriever } from './services/retrieval/ContextRetriever.js';
import { ReasoningOrchestrator } from './services/reasoning/ReasoningOrchestrator.js';
import { EligibilityCheckCoordinator } from './services/eligibility/EligibilityCheckCoordinator.js';
import {
  MongoCaseStatusGateway,
  MongoCitationStore,
  MongoEligibilityResultStore,
  MongoFactSource,
  MongoHumanReviewGateway,
  MongoReasoningLogStore,
  MongoRuleVersionSource,
  ensureEligibilityIndexes,
} from './services/eligibility/MongoEligibilityStores.js';
import { PgVectorChunkStore } from './vector/PgVectorChunkStore.js';
import { OpenAIEmbeddingProvider } from './embeddings/providers/OpenAIEmbeddingProvider.js';
import { OpenAIProvider } from './services/llm/OpenAIProvider.js';

async function startServer(): Promise<void> {
  // Fail fast if config is invalid
  const env = validateEnv();
  const config = getEligibilityConfig(env);

  await connectDB();
  await ensureEligibilityIndexes();

  let reasoning: ReasoningOrchestrator | null = null;
  if (config.aiReasoningEnabled) {
    getPostgresPool();
    const retriever = new ContextRetriever(new OpenAIEmbeddingProvider(), new PgVectorChunkStore(), config.retrieval);
    reasoning = new ReasoningOrchestrator(retriever, new OpenAIProvider(), config.reasoning);
  } else {
    logger.warn('AI reasoning disabled (AI_REASONING_ENABLED=false or OPENAI_API_KEY missing); checks use rules only');
  }

  const results = new MongoEligibilityResultStore();
  const coordinator = new EligibilityCheckCoordinator(
    {
      facts: new MongoFactSource(),
      ruleEngine: new RuleEvaluationEngine(new MongoRuleVersionSource(), { thresholds: config.thresholds }),
      reasoning,
      results,
      reasoningLogs: new MongoReasoningLogStore(),
      citations: new MongoCitationStore(),
      humanReview: new MongoHumanReviewGateway(),
      caseStatus: new MongoCaseStatusGateway(),
    },
    { thresholds: config.thresholds, aiReasoningEnabled: config.aiReasoningEnabled }
  );

  const app = createApp({
    coordinator,
    results,
    healthChecks: {
      mongodb: () => checkDatabaseHealth(),
      ...(config.aiReasoningEnabled ? { postgres: () => checkPostgresHealth() } : {}),
    },
  });

  initializeMetrics();

  const httpServer = createServer(app);
  const shutdownCoordinator = new ShutdownCoordinator();

  // HTTP server first, so no new checks start while stores close
  shutdownCoordinator.register('HTTP Server', () => new Promise<void>((resolve, reject) => {
    httpServer.close(error => (error ? reject(error) : resolve()));
  }), 10000);
  shutdownCoordinator.register('MongoDB', () => closeDB(), 5000);
  shutdownCoordinator.register('PostgreSQL', () => closePostgresPool(), 5000);
  shutdownCoordinator.register('Metrics', () => cleanupMetrics());

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdownCoordinator
      .shutdown(signal)
      .then(failed => process.exit(failed.length > 0 ? 1 : 0))
      .catch(error => {
        logger.error({ error }, 'Graceful shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  httpServer.on('error', error => {
    logger.fatal({ error, port: env.PORT }, 'HTTP server error');
    process.exit(1);
  });

  httpServer.listen(env.PORT, () => {
    logger.info(
      { port: env.PORT, env: env.NODE_ENV, aiReasoningEnabled: config.aiReasoningEnabled },
      'Server started successfully and listening'
    );
  });
}

startServer().catch(error => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});
