import { injectable } from 'inversify';
import { LogLevel, parseLogLevel } from '../types/logger.js';
import { ConfigurationError } from '../utils/errors.js';

export type LogFormat = 'json' | 'text';

export interface FileLoggingSettings {
  enabled: boolean;
  path: string;
  format: LogFormat;
}

export interface LoggingSettings {
  defaultLevel: LogLevel;
  componentLevels: Record<string, LogLevel>;
  format: LogFormat;
  fileLogging: FileLoggingSettings;
}

/**
 * Environment variable names
 */
const ENV = {
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_FORMAT: 'LOG_FORMAT',
  LOG_FILE: 'LOG_FILE'
} as const;

/**
 * LoggingConfig - Configuration for the logging system
 *
 * Holds the default log level, component-specific levels, the console
 * format and the optional log file.
 */
@injectable()
export class LoggingConfig {
  private defaultLevel = LogLevel.INFO;

  // Component-specific log levels
  private readonly componentLevels: Record<string, LogLevel> = {
    MessageReader: LogLevel.INFO,
    MessageWriter: LogLevel.INFO,
    CorpusProcessor: LogLevel.INFO
  };

  private format: LogFormat = 'text';

  private readonly fileLogging: FileLoggingSettings = {
    enabled: false,
    path: './logs/tweetkit.log',
    format: 'json'
  };

  getLogLevel(component: string): LogLevel {
    return this.componentLevels[component] ?? this.defaultLevel;
  }

  getDefaultLevel(): LogLevel {
    return this.defaultLevel;
  }

  getFormat(): LogFormat {
    return this.format;
  }

  getFileLogging(): Readonly<FileLoggingSettings> {
    return this.fileLogging;
  }

  /**
   * Set the default level; component levels at the old default follow it
   */
  setDefaultLevel(level: LogLevel): void {
    for (const [component, componentLevel] of Object.entries(this.componentLevels)) {
      if (componentLevel === this.defaultLevel) {
        this.componentLevels[component] = level;
      }
    }
    this.defaultLevel = level;
  }

  setComponentLogLevel(component: string, level: LogLevel): void {
    this.componentLevels[component] = level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  enableFileLogging(path?: string): void {
    this.fileLogging.enabled = true;
    if (path) {
      this.fileLogging.path = path;
    }
  }

  /**
   * Apply LOG_LEVEL, LOG_FORMAT and LOG_FILE from the environment
   *
   * @throws ConfigurationError when a value cannot be parsed
   */
  applyEnvironment(env: NodeJS.ProcessEnv): this {
    const level = env[ENV.LOG_LEVEL];
    if (level) {
      const parsed = parseLogLevel(level);
      if (parsed === undefined) {
        throw new ConfigurationError(`${ENV.LOG_LEVEL} must be one of ERROR, WARN, INFO, DEBUG`, { value: level });
      }
      this.setDefaultLevel(parsed);
    }

    const format = env[ENV.LOG_FORMAT];
    if (format) {
      if (format !== 'json' && format !== 'text') {
        throw new ConfigurationError(`${ENV.LOG_FORMAT} must be "json" or "text"`, { value: format });
      }
      this.setFormat(format);
    }

    const file = env[ENV.LOG_FILE];
    if (file) {
      this.enableFileLogging(file);
    }
    return this;
  }

  getFullConfig(): LoggingSettings {
    return {
      defaultLevel: this.defaultLevel,
      componentLevels: { ...this.componentLevels },
      format: this.format,
      fileLogging: { ...this.fileLogging }
    };
  }
}
