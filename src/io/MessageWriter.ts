import { inject, injectable, optional } from 'inversify';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { resolveCodec } from './compression.js';
import { LoggerFactory } from '../logging/LoggerFactory.js';
import { TYPES } from '../types/di.js';
import { Logger } from '../types/logger.js';
import { MessageRecord } from '../types/message.js';

export interface WriteOptions {
  /** Append to the destination instead of replacing it */
  append?: boolean;
}

function isBatch(records: MessageRecord | readonly MessageRecord[]): records is readonly MessageRecord[] {
  return Array.isArray(records);
}

/**
 * Writes message records as JSON lines.
 *
 * Destinations ending in `.gz` are gzip-compressed. Each call compresses its
 * records as one gzip member, so appending record by record to a compressed
 * file works but compresses far worse than writing the whole batch at once.
 */
@injectable()
export class MessageWriter {
  private readonly logger: Logger;

  constructor(@inject(TYPES.Logger) @optional() logger?: Logger) {
    this.logger = logger ?? LoggerFactory.getInstance().createLogger('MessageWriter');
  }

  /**
   * @returns the number of records written
   */
  async write(
    destination: string,
    records: MessageRecord | readonly MessageRecord[],
    options: WriteOptions = {}
  ): Promise<number> {
    const batch = isBatch(records) ? records : [records];
    const codec = resolveCodec(destination);

    const payload = batch.map(record => `${JSON.stringify(record)}\n`).join('');
    const encoded = await codec.compress(Buffer.from(payload, 'utf8'));

    await mkdir(path.dirname(destination), { recursive: true });
    await writeFile(destination, encoded, { flag: options.append ? 'a' : 'w' });

    this.logger.debug(`Wrote ${batch.length} records to ${destination}`, {
      codec: codec.name,
      append: options.append ?? false
    });
    return batch.length;
  }
}
