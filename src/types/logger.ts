export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export interface LogContext {
  component?: string;
  correlationId?: string;
  [key: string]: unknown;
}

/**
 * Standardized error information structure
 */
export interface LogErrorInfo {
  name?: string;
  message: string;
  stack?: string;
  code?: string | number;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  correlationId?: string;
  message: string;
  data?: Record<string, unknown>;
  error?: LogErrorInfo;
}

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, error?: Error, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  setLevel(level: LogLevel): void;

  withContext(context: LogContext): Logger;

  // Child logger support
  child(component: string): Logger;
}

export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}
