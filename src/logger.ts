import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: 'info')
// - LOG_PRETTY: 'true' to enable the pino-pretty transport

export type { Logger };

function createLogger(): Logger {
  const options: LoggerOptions = { level: process.env.LOG_LEVEL || 'info' };

  if (process.env.LOG_PRETTY === 'true') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' },
    };
  }

  return pino(options);
}

export const logger: Logger = createLogger();

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return logger.child(bindings);
  }
  return logger;
}
