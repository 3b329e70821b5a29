import { injectable } from 'inversify';
import { DefaultLogService } from './DefaultLogService.js';
import { LogTransport, ConsoleTransport, FileTransport } from './transports/LogTransport.js';
import { LoggingSettings } from '../config/loggingConfig.js';
import { Logger, LogLevel } from '../types/logger.js';

/**
 * LoggerFactory - Singleton factory for creating and configuring loggers
 *
 * Components that are constructed without an injected logger ask the
 * singleton for one, so library users get console output without wiring
 * anything.
 */
@injectable()
export class LoggerFactory {
  private static instance: LoggerFactory | undefined;
  private config: LoggingSettings = {
    defaultLevel: LogLevel.INFO,
    componentLevels: {},
    format: 'text',
    fileLogging: {
      enabled: false,
      path: './logs/tweetkit.log',
      format: 'json'
    }
  };
  private transports: LogTransport[] = [];

  constructor() {
    this.setupTransports();
  }

  static getInstance(): LoggerFactory {
    if (!LoggerFactory.instance) {
      LoggerFactory.instance = new LoggerFactory();
    }
    return LoggerFactory.instance;
  }

  /**
   * Configure the LoggerFactory with the provided configuration
   *
   * @param config The logging configuration
   */
  configure(config: LoggingSettings): void {
    this.config = {
      ...config,
      componentLevels: { ...this.config.componentLevels, ...config.componentLevels }
    };
    this.setupTransports();
  }

  createLogger(component: string): Logger {
    return new DefaultLogService(component, this.getLogLevel(component), this.transports);
  }

  getTransports(): readonly LogTransport[] {
    return this.transports;
  }

  private getLogLevel(component: string): LogLevel {
    return this.config.componentLevels[component] ?? this.config.defaultLevel;
  }

  private setupTransports(): void {
    this.transports = [new ConsoleTransport({ format: this.config.format })];

    if (this.config.fileLogging.enabled) {
      this.transports.push(
        new FileTransport({
          path: this.config.fileLogging.path,
          format: this.config.fileLogging.format
        })
      );
    }
  }

  /**
   * Flush all transports
   *
   * @returns A promise that resolves when all transports have been flushed
   */
  async flushAll(): Promise<void> {
    await Promise.all(this.transports.map(transport => transport.flush()));
  }
}
