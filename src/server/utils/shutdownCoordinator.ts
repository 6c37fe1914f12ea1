import { logger } from './logger.js';
import { withTimeout } from './withTimeout.js';

type ShutdownHandler = () => Promise<void> | void;

interface CleanupOperation {
  name: string;
  handler: ShutdownHandler;
  /** Optional timeout in milliseconds for this operation */
  timeout?: number;
}

/**
 * Runs registered cleanup operations in registration order on shutdown.
 * A failing or slow operation is logged and the rest still run.
 */
export class ShutdownCoordinator {
  private readonly cleanupOperations: CleanupOperation[] = [];
  private isShuttingDown = false;

  constructor(private readonly shutdownTimeoutMs: number = 30000) {}

  register(name: string, handler: ShutdownHandler, timeout?: number): void {
    this.cleanupOperations.push({ name, handler, timeout });
  }

  /**
   * Execute all registered cleanup operations in order
   *
   * @param signal - Signal that triggered shutdown (for logging)
   * @returns Names of operations that failed
   */
  async shutdown(signal?: string): Promise<string[]> {
    if (this.isShuttingDown) {
      logger.warn('Shutdown already in progress');
      return [];
    }

    this.isShuttingDown = true;
    logger.info({ signal, operationsCount: this.cleanupOperations.length }, 'Starting graceful shutdown');

    const failed: string[] = [];
    const run = async (): Promise<void> => {
      for (const operation of this.cleanupOperations) {
        if (!(await this.executeOperation(operation))) {
          failed.push(operation.name);
        }
      }
    };

    await withTimeout(run(), this.shutdownTimeoutMs, 'Graceful shutdown');
    logger.info({ failed }, 'Graceful shutdown completed');
    return failed;
  }

  private async executeOperation({ name, handler, timeout }: CleanupOperation): Promise<boolean> {
    try {
      const pending = Promise.resolve(handler());
      await (timeout ? withTimeout(pending, timeout, `Cleanup operation ${name}`) : pending);
      logger.debug({ operation: name }, 'Cleanup operation completed');
      return true;
    } catch (error) {
      logger.error({ error, operation: name }, 'Error during cleanup operation (continuing with shutdown)');
      return false;
    }
  }

  isShuttingDownStatus(): boolean {
    return this.isShuttingDown;
  }
}
