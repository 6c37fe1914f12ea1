import express, { type Express, type Request, type Response } from 'express';
import { requestIdMiddleware } from './middleware/requestId.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { asyncHandler } from './utils/errorHandling.js';
import { getMetrics, metricsRegistry } from './utils/metrics.js';
import { createEligibilityRoutes, type EligibilityRouteDependencies } from './routes/eligibilityRoutes.js';

export interface HealthStatus {
  healthy: boolean;
  latency?: number;
  error?: string;
}

export type HealthCheck = () => Promise<HealthStatus>;

export interface AppDependencies extends EligibilityRouteDependencies {
  /** Named dependency checks reported on /health */
  healthChecks?: Record<string, HealthCheck>;
}

/**
 * Build the Express application. Listening is left to the caller.
 */
export function createApp({ healthChecks = {}, ...routeDeps }: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware); // Request ID and logging context - must be first
  app.use(metricsMiddleware);
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', asyncHandler(async (_req: Request, res: Response) => {
    const entries = await Promise.all(
      Object.entries(healthChecks).map(async ([name, check]): Promise<[string, HealthStatus]> => {
        try {
          return [name, await check()];
        } catch (error) {
          return [name, { healthy: false, error: error instanceof Error ? error.message : String(error) }];
        }
      })
    );
    const checks = Object.fromEntries(entries);
    const healthy = entries.every(([, status]) => status.healthy);

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    });
  }));

  app.get('/metrics', asyncHandler(async (_req: Request, res: Response) => {
    res.set('Content-Type', metricsRegistry.contentType);
    res.send(await getMetrics());
  }));

  app.use('/api', createEligibilityRoutes(routeDeps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
