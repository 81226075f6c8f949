import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

// Thin wrapper around pino.
// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: 'info')
// - LOG_PRETTY: 'true' to enable the pino-pretty transport

export type { Logger };

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function createPinoLogger(): Logger {
  const level = resolveLevel();
  // Default to pretty logs outside production unless explicitly disabled
  const pretty = process.env.LOG_PRETTY
    ? process.env.LOG_PRETTY === 'true'
    : process.env.NODE_ENV !== 'production';

  const options: LoggerOptions = { level };
  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    };
  }
  return pino(options);
}

export const logger: Logger = createPinoLogger();

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return logger.child(bindings);
  }
  return logger;
}
