/**
 * Console-backed logging with a level filter
 */

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const noop = (): void => {};

export function createLogger(level: LogLevel = 'info', sink: Logger = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= threshold;

  return {
    debug: enabled('debug') ? sink.debug.bind(sink) : noop,
    info: enabled('info') ? sink.info.bind(sink) : noop,
    warn: enabled('warn') ? sink.warn.bind(sink) : noop,
    error: enabled('error') ? sink.error.bind(sink) : noop
  };
}

export const defaultLogger: Logger = createLogger('info');
