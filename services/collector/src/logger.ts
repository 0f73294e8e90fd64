import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export const loggerOptions = (level: string, name = 'pbs-collector'): LoggerOptions => ({
  name,
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export const createLogger = (level: string, name?: string): Logger => pino(loggerOptions(level, name));
