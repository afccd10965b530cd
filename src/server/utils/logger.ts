import pino from 'pino';
import type { Logger, LevelWithSilent, LoggerOptions } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(): LevelWithSilent {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  if (nodeEnv === 'test') {
    return 'silent';
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment.
 *
 * Stdout carries extraction results, so every log line goes to stderr
 * (fd 2), including the pino-pretty transport.
 */
function createLogger(): Logger {
  const options: LoggerOptions = {
    level: resolveLevel(),
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'price-index-extractor',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (process.env.LOG_PRETTY === 'true') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Main logger instance
 */
export const logger = createLogger();

