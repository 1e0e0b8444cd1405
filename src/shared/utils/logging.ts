export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogFn = (...args: Parameters<typeof console.debug>) => void;

export type Logger = Record<LogLevel, LogFn>;

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const noop: LogFn = () => {};

export const silentLogger: Logger = {
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
  trace: noop
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createConsoleLogger(level: LogLevel, sink: Pick<Console, LogLevel> = console): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel) => LOG_LEVELS.indexOf(candidate) <= threshold;

  return {
    error: enabled('error') ? (...args) => sink.error(...args) : noop,
    warn: enabled('warn') ? (...args) => sink.warn(...args) : noop,
    info: enabled('info') ? (...args) => sink.info(...args) : noop,
    debug: enabled('debug') ? (...args) => sink.debug(...args) : noop,
    trace: enabled('trace') ? (...args) => sink.trace(...args) : noop
  };
}

// -v count to level: none → warn, -v → info, -vv → debug, -vvv and beyond → trace.
export function logLevelFromVerbosity(verbosity: number, base: LogLevel = 'warn'): LogLevel {
  const baseIndex = LOG_LEVELS.indexOf(base);
  const index = Math.min(LOG_LEVELS.length - 1, baseIndex + Math.max(0, Math.floor(verbosity)));
  return LOG_LEVELS[index] ?? base;
}
