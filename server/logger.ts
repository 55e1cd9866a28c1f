import pino from 'pino';

export type Logger = pino.Logger;

const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Logger that discards everything; the default for tests and library callers. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export default logger;
