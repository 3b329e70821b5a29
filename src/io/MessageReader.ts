import { createReadStream, existsSync, statSync } from 'fs';
import { Readable } from 'stream';
import { CompressionCodec, resolveCodec } from './compression.js';
import { LoggerFactory } from '../logging/LoggerFactory.js';
import { Logger } from '../types/logger.js';
import { MessageRecord } from '../types/message.js';
import { MalformedRecordError, MessageFileError, ReaderStateError } from '../utils/errors.js';
import { isMessageRecord, isRepostOrQuote } from '../utils/typeGuards.js';

export interface ReadOptions {
  /** Drop records that are themselves retweets or quotes */
  skipRepostedAndQuoted?: boolean;
  /** Log and skip lines that are not JSON objects instead of throwing */
  skipInvalid?: boolean;
}

/**
 * Reads a JSON-lines message file, one record per line.
 *
 * Files ending in `.gz` are decompressed on the fly. A reader is single-pass:
 * the file is opened when iteration starts and closed when it ends, is
 * abandoned with `break`, or fails.
 */
export class MessageReader {
  private readonly codec: CompressionCodec;
  private readonly logger: Logger;
  private consumed = false;
  private readCount = 0;

  constructor(readonly source: string, logger?: Logger) {
    this.logger = logger ?? LoggerFactory.getInstance().createLogger('MessageReader');
    if (!existsSync(source) || !statSync(source).isFile()) {
      throw new MessageFileError(`Message file not found: ${source}`, { source });
    }
    this.codec = resolveCodec(source);
  }

  /** Records yielded so far */
  get recordsRead(): number {
    return this.readCount;
  }

  async *readMessages(options: ReadOptions = {}): AsyncGenerator<MessageRecord, void, undefined> {
    if (this.consumed) {
      throw new ReaderStateError(`Messages from ${this.source} have already been read; open a new reader`, {
        source: this.source
      });
    }
    this.consumed = true;

    const raw = createReadStream(this.source);
    const decoded: Readable = this.codec.decode(raw);
    decoded.setEncoding('utf8');
    this.logger.debug(`Opened ${this.source}`, { codec: this.codec.name });

    let lineNumber = 0;
    let skipped = 0;
    let pending = '';
    try {
      for await (const chunk of decoded) {
        const lines = `${pending}${String(chunk)}`.split('\n');
        pending = lines.pop() ?? '';
        for (const line of lines) {
          lineNumber++;
          const record = this.parseLine(line, lineNumber, options);
          if (record === undefined) {
            skipped++;
            continue;
          }
          this.readCount++;
          yield record;
        }
      }
      if (pending.length > 0) {
        lineNumber++;
        const record = this.parseLine(pending, lineNumber, options);
        if (record === undefined) {
          skipped++;
        } else {
          this.readCount++;
          yield record;
        }
      }
      this.logger.debug(`Finished ${this.source}`, { lines: lineNumber, records: this.readCount, skipped });
    } finally {
      decoded.destroy();
      raw.destroy();
    }
  }

  /**
   * @returns the record, or undefined when the line is blank or filtered out
   */
  private parseLine(line: string, lineNumber: number, options: ReadOptions): MessageRecord | undefined {
    const trimmed = line.trim();
    if (trimmed.length === 0) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.rejectLine(new MalformedRecordError(this.source, lineNumber, `invalid JSON (${reason})`), options);
    }

    if (!isMessageRecord(parsed)) {
      return this.rejectLine(new MalformedRecordError(this.source, lineNumber, 'line is not a JSON object'), options);
    }

    if (options.skipRepostedAndQuoted && isRepostOrQuote(parsed)) {
      return undefined;
    }
    return parsed;
  }

  private rejectLine(error: MalformedRecordError, options: ReadOptions): undefined {
    if (!options.skipInvalid) {
      throw error;
    }
    this.logger.warn(`Skipping malformed line ${error.lineNumber} of ${error.source}`, error);
    return undefined;
  }
}
