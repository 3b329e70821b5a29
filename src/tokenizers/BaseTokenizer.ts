import { MessageReader } from '../io/MessageReader.js';
import { MessageEntities, MessageRecord } from '../types/message.js';
import { NotImplementedError } from '../utils/errors.js';
import { asString, isMessageRecord, isPlainObject } from '../utils/typeGuards.js';

/**
 * Turns text into an ordered sequence of tokens.
 *
 * Contract notes:
 * - empty, null or undefined input yields `[]`
 * - must not mutate instance state, so one instance can serve many callers
 */
export interface Tokenizer {
  tokenize(text: string | null | undefined): string[];
}

export interface BaseTokenizerOptions {
  /** Fold the text and hashtags of retweeted/quoted messages into a record's content (default true) */
  includeRetweetedAndQuotedContent?: boolean;
}

export interface TokenizeFileOptions {
  /** Yield token arrays instead of space-joined strings */
  returnTokens?: boolean;
  /** Skip records that are retweets or quotes */
  skipRepostedAndQuoted?: boolean;
  /** Skip records that produce no tokens */
  skipEmpty?: boolean;
}

/**
 * Base of the tokenizer family.
 *
 * Subclasses supply `tokenize`; record traversal and the file driver are
 * shared and only depend on that one method.
 */
export class BaseTokenizer implements Tokenizer {
  readonly includeRetweetedAndQuotedContent: boolean;

  constructor(options: BaseTokenizerOptions = {}) {
    this.includeRetweetedAndQuotedContent = options.includeRetweetedAndQuotedContent ?? true;
  }

  tokenize(text: string | null | undefined): string[] {
    throw new NotImplementedError(`${this.constructor.name} does not implement tokenize()`, {
      tokenizer: this.constructor.name,
      inputLength: text?.length ?? 0
    });
  }

  /**
   * Main content of a single record. Truncated records keep their full text
   * under `extended_tweet.full_text`; records without any text field give ''.
   */
  getPrimaryText(record: MessageRecord): string {
    if (record.truncated === true && isPlainObject(record.extended_tweet)) {
      const extended = asString(record.extended_tweet.full_text);
      if (extended !== undefined) return extended;
    }
    return asString(record.text) ?? asString(record.full_text) ?? '';
  }

  /**
   * Primary text followed by the retweeted and quoted messages' text.
   */
  getFullText(record: MessageRecord): string {
    return this.collectRecords(record)
      .map(part => this.getPrimaryText(part))
      .filter(text => text.length > 0)
      .join(' ');
  }

  /**
   * Hashtag texts without the `#`, in encounter order, duplicates kept.
   */
  getHashtags(record: MessageRecord): string[] {
    return this.collectRecords(record).flatMap(part => this.ownHashtags(part));
  }

  getTokenizedMessageText(record: MessageRecord): string[] {
    return this.tokenize(this.getFullText(record));
  }

  /**
   * Tokenize every record of a message file, in file order.
   *
   * The file stays open while the generator is suspended and is closed when
   * it finishes, when the caller breaks out of the loop, or on error.
   *
   * @param source path to a JSON-lines file, or a reader that has not been read yet
   */
  tokenizeMessageFile(
    source: string | MessageReader,
    options: TokenizeFileOptions & { returnTokens: true }
  ): AsyncGenerator<string[], void, undefined>;
  tokenizeMessageFile(
    source: string | MessageReader,
    options?: TokenizeFileOptions & { returnTokens?: false }
  ): AsyncGenerator<string, void, undefined>;
  tokenizeMessageFile(
    source: string | MessageReader,
    options: TokenizeFileOptions = {}
  ): AsyncGenerator<string | string[], void, undefined> {
    const reader = typeof source === 'string' ? new MessageReader(source) : source;
    const tokens = this.tokenizeRecords(reader, options);
    return options.returnTokens ? tokens : joinTokens(tokens);
  }

  private async *tokenizeRecords(
    reader: MessageReader,
    options: TokenizeFileOptions
  ): AsyncGenerator<string[], void, undefined> {
    for await (const record of reader.readMessages({ skipRepostedAndQuoted: options.skipRepostedAndQuoted })) {
      const tokens = this.getTokenizedMessageText(record);
      if (options.skipEmpty && tokens.length === 0) continue;
      yield tokens;
    }
  }

  /**
   * The record itself, then its retweet and quote when inclusion is on.
   */
  private collectRecords(record: MessageRecord): MessageRecord[] {
    const parts = [record];
    if (this.includeRetweetedAndQuotedContent) {
      if (isMessageRecord(record.retweeted_status)) parts.push(record.retweeted_status);
      if (isMessageRecord(record.quoted_status)) parts.push(record.quoted_status);
    }
    return parts;
  }

  private ownHashtags(record: MessageRecord): string[] {
    const entities = this.resolveEntities(record);
    if (!entities || !Array.isArray(entities.hashtags)) return [];

    const tags: string[] = [];
    for (const hashtag of entities.hashtags) {
      const text = hashtagText(hashtag);
      if (text) tags.push(text);
    }
    return tags;
  }

  private resolveEntities(record: MessageRecord): MessageEntities | undefined {
    if (record.truncated === true && isPlainObject(record.extended_tweet) && isPlainObject(record.extended_tweet.entities)) {
      return record.extended_tweet.entities;
    }
    return isPlainObject(record.entities) ? record.entities : undefined;
  }
}

function hashtagText(hashtag: unknown): string | undefined {
  const raw = typeof hashtag === 'string' ? hashtag : isPlainObject(hashtag) ? asString(hashtag.text) : undefined;
  if (raw === undefined) return undefined;
  const text = raw.startsWith('#') ? raw.slice(1) : raw;
  return text.length > 0 ? text : undefined;
}

async function* joinTokens(
  tokens: AsyncGenerator<string[], void, undefined>
): AsyncGenerator<string, void, undefined> {
  for await (const sequence of tokens) {
    yield sequence.join(' ');
  }
}
