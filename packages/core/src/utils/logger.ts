/**
 * Log verbosity, from most to least verbose
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

/**
 * Logger used by every engine component
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Timestamped line logger. Writes to stderr unless a sink is given.
 */
export function createConsoleLogger(
  level: LogLevel = 'info',
  sink: (line: string) => void = (line) => process.stderr.write(`${line}\n`)
): Logger {
  const enabled = (lineLevel: LogLevel): boolean =>
    LEVEL_RANK[lineLevel] >= LEVEL_RANK[level];

  const emit = (lineLevel: LogLevel, message: string): void => {
    if (!enabled(lineLevel)) return;
    const timestamp = new Date().toISOString();
    sink(`[${timestamp}] ${lineLevel.toUpperCase()}: ${message}`);
  };

  return {
    debug(message: string): void {
      emit('debug', message);
    },

    info(message: string): void {
      emit('info', message);
    },

    warn(message: string): void {
      emit('warn', message);
    },

    error(message: string, error?: unknown): void {
      emit('error', message);
      if (enabled('error') && error instanceof Error && error.stack) {
        sink(error.stack);
      }
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = createConsoleLogger('silent', () => undefined);
