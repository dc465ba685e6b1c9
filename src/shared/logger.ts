export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function createLogger(
  component: string,
  minLevel: LogLevel = 'debug',
  format: LogFormat = 'text'
): Logger {
  const minLevelValue = LOG_LEVELS[minLevel];

  function logText(level: LogLevel, message: string, context?: LogContext): void {
    const timestamp = new Date().toISOString();
    const formattedMessage = `${timestamp} [${level.toUpperCase()}] [${component}] ${message}`;
    if (context === undefined) {
      console[level](formattedMessage);
    } else {
      console[level](formattedMessage, context);
    }
  }

  function logJson(level: LogLevel, message: string, context?: LogContext): void {
    const logEntry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
    };
    if (context !== undefined) {
      logEntry.context = context;
    }
    process.stderr.write(JSON.stringify(logEntry) + '\n');
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[level] < minLevelValue) {
      return;
    }

    if (format === 'json') {
      logJson(level, message, context);
    } else {
      logText(level, message, context);
    }
  }

  return {
    debug: (message: string, context?: LogContext) => log('debug', message, context),
    info: (message: string, context?: LogContext) => log('info', message, context),
    warn: (message: string, context?: LogContext) => log('warn', message, context),
    error: (message: string, context?: LogContext) => log('error', message, context),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

