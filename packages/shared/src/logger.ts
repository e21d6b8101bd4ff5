import pino from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Credential-bearing fields that must never reach the console. */
const REDACTED_PATHS = ['private_key', '*.private_key', 'apiKey', '*.apiKey', 'authorization', '*.authorization'];

export function createLogger(name: string, level: LogLevel = 'info') {
  const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

  return pino({
    name,
    level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } }
      : undefined,
  });
}

/** Logger scoped to a single queue row, so every line carries its row number. */
export function rowLogger(logger: Logger, rowNumber: number): Logger {
  return logger.child({ row: rowNumber });
}

export type Logger = pino.Logger;
