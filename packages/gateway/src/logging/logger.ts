import { pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'modelgate',
    level: process.env['LOG_LEVEL'] ?? 'info',
    ...options,
  });
}

/** Logger for tests and embedders that want no output. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
