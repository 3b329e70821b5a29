import chalk from 'chalk';
import { appendFile, mkdir } from 'fs/promises';
import path from 'path';
import { LogEntry, LogLevel } from '../../types/logger.js';

/**
 * LogTransport interface - Defines the contract for log transports
 *
 * Log transports are responsible for delivering log entries to their
 * destination, such as the console or a file.
 */
export interface LogTransport {
  log(entry: LogEntry): void;

  /**
   * Flush any buffered log entries
   *
   * @returns A promise that resolves when the flush is complete
   */
  flush(): Promise<void>;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG'
};

export function formatEntryText(entry: LogEntry): string {
  const correlationId = entry.correlationId ? ` [${entry.correlationId}]` : '';
  let message = `[${entry.timestamp}] [${LEVEL_NAMES[entry.level]}] [${entry.component}]${correlationId} ${entry.message}`;
  if (entry.data) {
    message += ` ${JSON.stringify(entry.data)}`;
  }
  if (entry.error) {
    message += ` Error: ${entry.error.message}`;
    if (entry.error.code !== undefined) {
      message += ` (${entry.error.code})`;
    }
  }
  return message;
}

/**
 * Console Transport - Outputs logs to the console
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly format: 'json' | 'text';

  constructor(options: { useColors?: boolean; format?: 'json' | 'text' } = {}) {
    this.useColors = options.useColors ?? chalk.supportsColor !== false;
    this.format = options.format ?? 'text';
  }

  log(entry: LogEntry): void {
    const formatted = this.format === 'json' ? JSON.stringify(entry) : this.formatText(entry);

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.DEBUG:
        console.debug(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  flush(): Promise<void> {
    return Promise.resolve();
  }

  private formatText(entry: LogEntry): string {
    if (!this.useColors) {
      return formatEntryText(entry);
    }

    const parts = [
      chalk.dim(`[${entry.timestamp}]`),
      this.colorLevel(entry.level),
      chalk.cyan(`[${entry.component}]`)
    ];
    if (entry.correlationId) {
      parts.push(chalk.gray(`[${entry.correlationId}]`));
    }
    parts.push(entry.message);
    if (entry.data) {
      parts.push(chalk.gray(JSON.stringify(entry.data)));
    }
    if (entry.error) {
      const code = entry.error.code !== undefined ? ` (${entry.error.code})` : '';
      parts.push(chalk.red(`Error: ${entry.error.message}${code}`));
    }
    return parts.join(' ');
  }

  private colorLevel(level: LogLevel): string {
    const label = `[${LEVEL_NAMES[level]}]`;
    switch (level) {
      case LogLevel.ERROR:
        return chalk.red.bold(label);
      case LogLevel.WARN:
        return chalk.yellow(label);
      case LogLevel.DEBUG:
        return chalk.gray(label);
      default:
        return chalk.green(label);
    }
  }
}

/**
 * File Transport - Buffers entries and appends them to a log file
 */
export class FileTransport implements LogTransport {
  private buffer: string[] = [];
  private readonly maxBufferSize: number;
  private readonly path: string;
  private readonly format: 'json' | 'text';
  private pendingFlush: Promise<void> | null = null;

  constructor(options: {
    path: string;
    format?: 'json' | 'text';
    maxBufferSize?: number;
  }) {
    this.path = options.path;
    this.format = options.format ?? 'json';
    this.maxBufferSize = options.maxBufferSize ?? 100;
  }

  log(entry: LogEntry): void {
    const formatted = this.format === 'json' ? JSON.stringify(entry) : formatEntryText(entry);
    this.buffer.push(`${formatted}\n`);

    if (this.buffer.length >= this.maxBufferSize) {
      this.flush().catch(error => {
        console.error(`FileTransport: Failed to flush logs to ${this.path}`, error);
      });
    }
  }

  async flush(): Promise<void> {
    // Serialize flushes so lines keep their order in the file
    while (this.pendingFlush) {
      await this.pendingFlush;
    }
    if (this.buffer.length === 0) return;

    const bufferToFlush = this.buffer;
    this.buffer = [];
    this.pendingFlush = this.write(bufferToFlush.join(''));
    try {
      await this.pendingFlush;
    } catch (error) {
      // Put the entries back so the next flush retries them
      this.buffer = [...bufferToFlush, ...this.buffer];
      throw error;
    } finally {
      this.pendingFlush = null;
    }
  }

  private async write(content: string): Promise<void> {
    await mkdir(path.dirname(this.path), { recursive: true });
    await appendFile(this.path, content, 'utf8');
  }
}
