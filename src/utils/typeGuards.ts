import { MessageRecord } from '../types/message.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard for MessageRecord.
 *
 * Any JSON object qualifies; typed fields are still checked where they are
 * read, since exports from different collectors disagree on shapes.
 */
export const isMessageRecord = (value: unknown): value is MessageRecord => isPlainObject(value);

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * A record that is itself a retweet or a quote of another message.
 */
export const isRepostOrQuote = (record: MessageRecord): boolean =>
  isMessageRecord(record.retweeted_status) || isMessageRecord(record.quoted_status);
