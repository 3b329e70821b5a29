import { LogTransport } from './transports/LogTransport.js';
import { CorrelationContext } from './CorrelationContext.js';
import { Logger, LogContext, LogEntry, LogErrorInfo, LogLevel } from '../types/logger.js';

/**
 * DefaultLogService - Implementation of the Logger interface
 *
 * Builds a LogEntry for every message at or below the configured level and
 * hands it to each transport. Child loggers share the transports.
 */
export class DefaultLogService implements Logger {
  /**
   * Create a new DefaultLogService
   *
   * @param component The component name
   * @param level The log level
   * @param transports The log transports
   * @param contextData Context merged into every entry
   */
  constructor(
    private component: string,
    private level: LogLevel,
    private readonly transports: readonly LogTransport[],
    private readonly contextData: Record<string, unknown> = {}
  ) {}

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, undefined, context);
  }

  warn(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.WARN, message, error, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, error, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, undefined, context);
  }

  /**
   * Create a new logger with additional context
   *
   * @param context The context to add
   * @returns A new Logger with the combined context
   */
  withContext(context: LogContext): Logger {
    const { component, ...rest } = context;
    return new DefaultLogService(
      component ?? this.component,
      this.level,
      this.transports,
      { ...this.contextData, ...rest }
    );
  }

  /**
   * Create a child logger for a different component
   */
  child(component: string): Logger {
    return new DefaultLogService(component, this.level, this.transports, this.contextData);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, error?: Error, context?: LogContext): void {
    if (level > this.level) return;

    const { component, correlationId, ...rest } = { ...this.contextData, ...(context ?? {}) };
    const data = Object.fromEntries(Object.entries(rest).filter(([, value]) => value !== undefined));

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: typeof component === 'string' ? component : this.component,
      correlationId: typeof correlationId === 'string' ? correlationId : CorrelationContext.getCorrelationId(),
      message,
      data: Object.keys(data).length > 0 ? data : undefined,
      error: error ? this.formatError(error) : undefined
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }

  private formatError(error: Error): LogErrorInfo {
    const code = 'code' in error && (typeof error.code === 'string' || typeof error.code === 'number')
      ? error.code
      : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code
    };
  }
}
