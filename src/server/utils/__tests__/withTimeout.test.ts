import { describe, it, expect, vi, afterEach } from 'vitest';
import { OperationTimeoutError, withTimeout } from '../withTimeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'Quick op')).resolves.toBe('done');
  });

  it('passes through the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000)).rejects.toThrow('boom');
  });

  it('rejects with OperationTimeoutError when the deadline passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 50, 'Vector search');
    const assertion = expect(pending).rejects.toThrow('Vector search timed out after 50ms');

    await vi.advanceTimersByTimeAsync(50);

    await assertion;
    await expect(pending).rejects.toBeInstanceOf(OperationTimeoutError);
  });

  it('names the operation generically when no name is given', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 10);
    const assertion = expect(pending).rejects.toMatchObject({
      message: 'Operation timed out after 10ms',
      code: 'ETIMEDOUT',
      timeoutMs: 10,
    });

    await vi.advanceTimersByTimeAsync(10);

    await assertion;
  });
});
