type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
};

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

const sinks: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/** Console logger that prefixes every line with `[SCOPE]`. */
export const createLogger = (scope: string): Logger => {
  const tag = `[${scope.toUpperCase()}]`;

  const write = (level: LogLevel) => (message: string, context?: LogContext): void => {
    if (severity[level] < severity[threshold]) {
      return;
    }

    if (context && Object.keys(context).length > 0) {
      sinks[level](`${tag} ${message}`, context);
      return;
    }

    sinks[level](`${tag} ${message}`);
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
};
