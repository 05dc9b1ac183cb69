/**
 * Structured Logger
 * Level-filtered logging with a JSON context suffix
 */

export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

export type LogLevelName = keyof typeof LogLevel;
export type LogLevelValue = typeof LogLevel[LogLevelName];

export interface LogContext {
  connectionId?: string;
  attempt?: number;
  state?: string;
  eventType?: string;
  [key: string]: unknown;
}

/**
 * Destination for formatted lines. Defaults to the console method of the
 * matching level.
 */
export type LogSink = (level: LogLevelName, line: string) => void;

export interface LoggerOptions {
  level?: LogLevelValue;
  enabled?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'DEBUG':
      console.debug(line);
      break;
    case 'INFO':
      console.info(line);
      break;
    case 'WARN':
      console.warn(line);
      break;
    case 'ERROR':
      console.error(line);
      break;
  }
};

function isLogLevelName(value: string): value is LogLevelName {
  return value in LogLevel;
}

/**
 * Resolve logger options from environment variables:
 * CHAT_LOG_LEVEL (DEBUG|INFO|WARN|ERROR) and CHAT_ENABLE_LOGGING.
 */
export function getLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const envLevel = env.CHAT_LOG_LEVEL?.toUpperCase();
  return {
    level: envLevel && isLogLevelName(envLevel) ? LogLevel[envLevel] : LogLevel.INFO,
    enabled: env.NODE_ENV === 'development' || env.CHAT_ENABLE_LOGGING === 'true',
  };
}

export class Logger {
  private level: LogLevelValue;
  private enabled: boolean;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.enabled = options.enabled ?? true;
    this.sink = options.sink ?? consoleSink;
  }

  setLevel(level: LogLevelValue): void {
    this.level = level;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  private shouldLog(level: LogLevelValue): boolean {
    return this.enabled && level >= this.level;
  }

  private formatMessage(level: LogLevelName, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level}] ${message}${contextStr}`;
  }

  private write(level: LogLevelName, message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel[level])) {
      this.sink(level, this.formatMessage(level, message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('WARN', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.ERROR)) {
      return;
    }
    const errorContext: LogContext = {
      ...context,
      error: error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      } : error,
    };
    this.write('ERROR', message, errorContext);
  }
}

export const logger = new Logger(getLoggerOptions());
