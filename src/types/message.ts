/**
 * Hashtag entity as found under `entities.hashtags`. Some exports flatten
 * these to bare strings, so both shapes are accepted.
 */
export type HashtagEntity = { text: string; indices?: [number, number] } | string;

export interface MessageEntities {
  hashtags?: HashtagEntity[];
  [field: string]: unknown;
}

export interface ExtendedMessage {
  full_text?: string;
  entities?: MessageEntities;
  [field: string]: unknown;
}

/**
 * One platform message, parsed from a single JSON line.
 *
 * Only the fields the tokenizers read are typed; everything else is kept
 * as-is so records survive a read/write round trip unchanged.
 */
export interface MessageRecord {
  id?: number | string;
  id_str?: string;
  text?: string;
  full_text?: string;
  truncated?: boolean;
  extended_tweet?: ExtendedMessage;
  entities?: MessageEntities;
  retweeted_status?: MessageRecord;
  quoted_status?: MessageRecord;
  [field: string]: unknown;
}
