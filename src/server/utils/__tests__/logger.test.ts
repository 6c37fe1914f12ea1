import { describe, it, expect } from 'vitest';
import { createLogger, requestContext } from '../logger.js';

function captureLines(): { lines: Array<Record<string, unknown>>; write: (line: string) => void } {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write: line => {
      lines.push(JSON.parse(line));
    },
  };
}

describe('createLogger', () => {
  it('adds the request context to lines from loggers created before the request', () => {
    const output = captureLines();
    const componentLog = createLogger(output, 'info').child({ component: 'EligibilityCheckCoordinator' });

    requestContext.run({ requestId: 'req-1', method: 'POST', path: '/api/cases/case-1/eligibility' }, () => {
      componentLog.info({ caseId: 'case-1' }, 'Eligibility check completed');
    });

    expect(output.lines).toHaveLength(1);
    expect(output.lines[0]).toMatchObject({
      level: 'info',
      msg: 'Eligibility check completed',
      component: 'EligibilityCheckCoordinator',
      caseId: 'case-1',
      requestId: 'req-1',
      method: 'POST',
      path: '/api/cases/case-1/eligibility',
    });
  });

  it('writes no request fields outside a request', () => {
    const output = captureLines();

    createLogger(output, 'info').warn('Startup warning');

    expect(output.lines[0]?.msg).toBe('Startup warning');
    expect(output.lines[0]).not.toHaveProperty('requestId');
  });

  it('keeps each request to its own context', async () => {
    const output = captureLines();
    const log = createLogger(output, 'info');

    await Promise.all(
      ['req-a', 'req-b'].map(requestId =>
        requestContext.run({ requestId }, async () => {
          await Promise.resolve();
          log.info(`handled ${requestId}`);
        })
      )
    );

    expect(output.lines.map(line => [line.msg, line.requestId])).toEqual([
      ['handled req-a', 'req-a'],
      ['handled req-b', 'req-b'],
    ]);
  });
});
