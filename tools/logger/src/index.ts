type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

/**
 * Create a console-backed logger that drops messages below `level`.
 */
function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (target: Exclude<LogLevel, 'silent'>): boolean =>
    LEVEL_ORDER[target] >= threshold;

  return new Logger({
    debug: enabled('debug') ? console.debug.bind(console) : noop,
    info: enabled('info') ? console.info.bind(console) : noop,
    warn: enabled('warn') ? console.warn.bind(console) : noop,
    error: enabled('error') ? console.error.bind(console) : noop,
  });
}

export { Logger, createConsoleLogger };
export type { LoggerMethods, LogFn, LogLevel };
