import pino from 'pino';
import type { Logger, LevelWithSilent, LoggerOptions } from 'pino';

export type { Logger };

export function loggerOptions(level: LevelWithSilent): LoggerOptions {
  return {
    level,
    base: { service: 'ytmb' },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };
}

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino(loggerOptions(level));
}
