import { Logger, LogContext, LogLevel } from '../../src/types/logger.js';

export interface LoggedMessage {
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
  error?: Error;
  context?: LogContext;
}

// Collects messages instead of printing them
export class MockLogger implements Logger {
  logs: LoggedMessage[] = [];
  level = LogLevel.DEBUG;

  info(message: string, context?: LogContext): void {
    this.logs.push({ level: 'info', message, context });
  }
  warn(message: string, error?: Error, context?: LogContext): void {
    this.logs.push({ level: 'warn', message, error, context });
  }
  error(message: string, error?: Error, context?: LogContext): void {
    this.logs.push({ level: 'error', message, error, context });
  }
  debug(message: string, context?: LogContext): void {
    this.logs.push({ level: 'debug', message, context });
  }
  setLevel(level: LogLevel): void {
    this.level = level;
  }
  withContext(): Logger {
    return this;
  }
  child(): Logger {
    return this;
  }

  messages(level: LoggedMessage['level']): string[] {
    return this.logs.filter(log => log.level === level).map(log => log.message);
  }
}
