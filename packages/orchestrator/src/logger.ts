import type { PipelineLogEvent, PipelineLogger } from '@spatial-audio/contracts';

type LogLevel = 'info' | 'warn' | 'error' | 'step' | 'success';

export type LogEvent = {
  level: LogLevel;
  message: string;
  details?: Record<string, unknown> | undefined;
  timestamp: string;
};

export type Logger = {
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
  step: (message: string, details?: Record<string, unknown>) => void;
  success: (message: string, details?: Record<string, unknown>) => void;
  events: () => LogEvent[];
  flush: (final?: Record<string, unknown>) => void;
};

type LoggerOptions = {
  json?: boolean;
  write?: (line: string, details?: Record<string, unknown>) => void;
};

const ICONS: Record<LogLevel, string> = {
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
  success: '✅',
  step: '•',
};

function formatMessage(level: LogLevel, message: string): string {
  return `${ICONS[level]} ${message}`;
}

const defaultWrite = (line: string, details?: Record<string, unknown>): void => {
  if (details) console.log(line, details);
  else console.log(line);
};

/**
 * Console logger for the CLI. In JSON mode nothing is printed until `flush`,
 * which emits the buffered events together with the command result.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { json = false, write = defaultWrite } = options;
  const events: LogEvent[] = [];

  const push = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    events.push({ level, message, details, timestamp: new Date().toISOString() });
    if (json) return;
    const hasDetails = details !== undefined && Object.keys(details).length > 0;
    write(formatMessage(level, message), hasDetails ? details : undefined);
  };

  return {
    info: (message, details) => push('info', message, details),
    warn: (message, details) => push('warn', message, details),
    error: (message, details) => push('error', message, details),
    step: (message, details) => push('step', message, details),
    success: (message, details) => push('success', message, details),
    events: () => events,
    flush: (final) => {
      if (json) {
        console.log(JSON.stringify({ events, result: final ?? null }, null, 2));
      }
    },
  };
}

/**
 * Route structured pipeline events into the console logger. Debug and info
 * events are dropped unless `verbose` is set.
 */
export function toPipelineLogger(logger: Logger, verbose = false): PipelineLogger {
  return {
    log: (event: PipelineLogEvent) => {
      const details: Record<string, unknown> = { ...(event.detail ?? {}) };
      if (event.jobId) details.jobId = event.jobId;
      switch (event.level) {
        case 'error':
          logger.error(event.message, details);
          return;
        case 'warn':
          logger.warn(event.message, details);
          return;
        default:
          if (verbose) logger.step(event.message, details);
      }
    },
  };
}
