/**
 * Console backed logging with level filtering
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  trace(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

type Sink = (line: string, ...args: unknown[]) => void;

const SINKS: Record<Exclude<LogLevel, 'silent'>, Sink> = {
  trace: (line, ...args) => console.debug(line, ...args),
  debug: (line, ...args) => console.debug(line, ...args),
  info: (line, ...args) => console.info(line, ...args),
  warn: (line, ...args) => console.warn(line, ...args),
  error: (line, ...args) => console.error(line, ...args),
};

/**
 * Create a logger writing `[name] message` lines for `level` and above
 */
export function createLogger(name: string, level: LogLevel = 'warn'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit = (at: Exclude<LogLevel, 'silent'>) => (message: string, ...args: unknown[]) => {
    if (LOG_LEVELS.indexOf(at) >= threshold) {
      SINKS[at](`[${name}] ${message}`, ...args);
    }
  };

  return {
    trace: emit('trace'),
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
