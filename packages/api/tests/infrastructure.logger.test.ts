import { describe, expect, it, vi } from 'vitest';

import { createPipelineLogger, type LogFields, type Logger } from '../src/infrastructure/logger.js';

function fakeLogger() {
  const calls: Array<{ level: string; msg: string | Error; fields?: LogFields; bindings: LogFields }> =
    [];
  const make = (bindings: LogFields): Logger => ({
    info: (msg, fields) => calls.push({ level: 'info', msg, fields, bindings }),
    warn: (msg, fields) => calls.push({ level: 'warn', msg, fields, bindings }),
    error: (msg, fields) => calls.push({ level: 'error', msg, fields, bindings }),
    debug: (msg, fields) => calls.push({ level: 'debug', msg, fields, bindings }),
    child: vi.fn((extra: LogFields) => make({ ...bindings, ...extra })),
  });
  return { logger: make({}), calls };
}

describe('createPipelineLogger', () => {
  it('forwards events at their level with the job id bound', () => {
    const { logger, calls } = fakeLogger();
    const pipelineLogger = createPipelineLogger(logger);

    pipelineLogger.log({
      level: 'warn',
      message: 'stage.spatialize.skipped',
      jobId: 'job-1',
      stage: 'spatialize',
      detail: { reason: 'spatialize disabled' },
    });
    pipelineLogger.log({ level: 'debug', message: 'cache.lookup' });

    expect(calls).toEqual([
      {
        level: 'warn',
        msg: 'stage.spatialize.skipped',
        fields: { stage: 'spatialize', reason: 'spatialize disabled' },
        bindings: { jobId: 'job-1' },
      },
      {
        level: 'debug',
        msg: 'cache.lookup',
        fields: { stage: undefined },
        bindings: {},
      },
    ]);
  });
});
