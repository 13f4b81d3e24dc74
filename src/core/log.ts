/**
 * Leveled console logging for the tooling around the codec.
 *
 * The codec core never logs. The data cache, the format handler and the
 * CLI take a `Logger` so callers (and tests) choose where lines go.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/** Receives a line that passed the level filter. */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, message: string) => void;

const consoleSink: LogSink = (level, message) => {
  // stdout stays free for command output
  const line = `[rxdata] ${level}: ${message}`;
  if (level === 'error') console.error(line);
  else console.warn(line);
};

export function createLogger(level: LogLevel = 'info', sink: LogSink = consoleSink): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LOG_LEVELS.indexOf(at) <= threshold) sink(at, message);
  };
  return {
    level,
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message),
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export const silentLogger: Logger = createLogger('silent');
