import { describe, it, expect } from 'vitest';
import { ShutdownCoordinator } from '../shutdownCoordinator.js';

describe('ShutdownCoordinator', () => {
  it('runs operations in registration order and reports failures', async () => {
    const order: string[] = [];
    const coordinator = new ShutdownCoordinator(1000);
    coordinator.register('HTTP Server', () => {
      order.push('http');
    });
    coordinator.register('MongoDB', async () => {
      order.push('mongo');
      throw new Error('already closed');
    });
    coordinator.register('Metrics', () => {
      order.push('metrics');
    });

    const failed = await coordinator.shutdown('SIGTERM');

    expect(order).toEqual(['http', 'mongo', 'metrics']);
    expect(failed).toEqual(['MongoDB']);
    expect(coordinator.isShuttingDownStatus()).toBe(true);
  });

  it('gives up on an operation that exceeds its timeout', async () => {
    const coordinator = new ShutdownCoordinator(1000);
    coordinator.register('Stuck', () => new Promise<void>(() => undefined), 10);
    coordinator.register('Next', () => undefined);

    await expect(coordinator.shutdown()).resolves.toEqual(['Stuck']);
  });

  it('ignores a second shutdown request', async () => {
    let calls = 0;
    const coordinator = new ShutdownCoordinator(1000);
    coordinator.register('Counter', () => {
      calls++;
    });

    await coordinator.shutdown();
    await expect(coordinator.shutdown()).resolves.toEqual([]);
    expect(calls).toBe(1);
  });
});
