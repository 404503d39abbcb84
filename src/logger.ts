export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[at] < threshold) {
      return;
    }
    const line = `[gedcom] ${message}`;
    if (context) {
      console[at](line, context);
    } else {
      console[at](line);
    }
  };
  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
