import { describe, expect, it } from '@jest/globals';
import { DispatchError, PipelineError } from '../../../src/core/errors.js';
import { createLogger } from '../../../src/util/logging.js';

const LINE_USER = 'U0123456789abcdef0123456789abcdef';

function capture() {
  const lines: string[] = [];
  return {
    lines,
    destination: {
      write(msg: string) {
        lines.push(msg);
      },
    },
    records: (): Record<string, unknown>[] => lines.map((line) => JSON.parse(line)),
  };
}

describe('Logging', () => {
  it('tags records with the service name', () => {
    const out = capture();
    const logger = createLogger({ level: 'info', destination: out.destination });

    logger.info({ stage: 'idea' }, 'stage:done');

    expect(out.records()).toEqual([expect.objectContaining({ service: 'dinner-planner', stage: 'idea', msg: 'stage:done' })]);
  });

  it('redacts identifiers and secrets at info level', () => {
    const out = capture();
    const logger = createLogger({ level: 'info', destination: out.destination });

    logger.warn({ userId: LINE_USER, error: 'HTTP 401 for Bearer test-secret' }, 'dispatch:failed');

    expect(out.records()[0]).toMatchObject({
      userId: '[REDACTED_LINE_ID]',
      error: 'HTTP 401 for Bearer [REDACTED]',
    });
  });

  it('redacts identifiers carried by a logged error', () => {
    const out = capture();
    const logger = createLogger({ level: 'info', destination: out.destination });
    const err = new DispatchError(
      { userId: LINE_USER, conversationId: 'users/42' },
      new PipelineError('idea', new Error('boom')),
    );

    logger.error({ err }, 'chat failed');

    expect(out.lines[0]).not.toContain(LINE_USER);
    expect(out.lines[0]).not.toContain('users/42');
    expect(out.records()[0]).toMatchObject({
      err: {
        type: 'DispatchError',
        identity: { userId: '[REDACTED_LINE_ID]', conversationId: 'users/[REDACTED]' },
      },
    });
  });

  it('keeps identifiers at debug level', () => {
    const out = capture();
    const logger = createLogger({ level: 'debug', destination: out.destination });

    logger.debug({ userId: LINE_USER }, 'dispatch:start');

    expect(out.records()[0]).toMatchObject({ userId: LINE_USER });
  });

  it('drops records below the configured level', () => {
    const out = capture();
    const logger = createLogger({ level: 'warn', destination: out.destination });

    logger.info('ignored');
    logger.error('kept');

    expect(out.records().map((r) => r.msg)).toEqual(['kept']);
  });

  it('reads the level from LOG_LEVEL', () => {
    const original = process.env.LOG_LEVEL;
    process.env.LOG_LEVEL = 'error';
    try {
      expect(createLogger().level).toBe('error');
    } finally {
      process.env.LOG_LEVEL = original;
    }
  });
});
