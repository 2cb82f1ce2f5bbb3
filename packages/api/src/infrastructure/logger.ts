// Pino-based JSON logger with a minimal typed wrapper.
// - Container-friendly (stdout JSON).
// - Pretty printing in development only.
// - Supports child loggers with jobId bindings.

import pino from 'pino';

import type { PipelineLogEvent, PipelineLogger } from '@spatial-audio/contracts';

export interface LogFields {
  jobId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export const logger: Logger = createRootLogger();

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function createRootLogger(): Logger {
  const base = pino({
    level: defaultLevel(),
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
  });

  return wrap(base);
}

function wrap(instance: pino.Logger): Logger {
  return {
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error(
          {
            ...(fields ?? {}),
            err: {
              message: msg.message,
              stack: msg.stack,
              name: msg.name,
            },
          },
          msg.message,
        );
      } else {
        instance.error(fields ?? {}, msg);
      }
    },
    debug(msg, fields) {
      instance.debug(fields ?? {}, msg);
    },
    child(bindings) {
      return wrap(instance.child(bindings));
    },
  };
}

/**
 * Forward orchestrator events to pino, binding the job id of each event.
 */
export function createPipelineLogger(target: Logger = logger): PipelineLogger {
  return {
    log(event: PipelineLogEvent) {
      const sink = event.jobId ? target.child({ jobId: event.jobId }) : target;
      const fields: LogFields = { stage: event.stage, ...(event.detail ?? {}) };
      sink[event.level](event.message, fields);
    },
  };
}
