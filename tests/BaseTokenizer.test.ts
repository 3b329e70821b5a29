import fs from 'fs';
import path from 'path';
import { MessageReader } from '../src/io/MessageReader.js';
import { BaseTokenizer } from '../src/tokenizers/BaseTokenizer.js';
import { ConfigurableTokenizer } from '../src/tokenizers/ConfigurableTokenizer.js';
import { MessageRecord } from '../src/types/message.js';
import { MessageFileError, NotImplementedError } from '../src/utils/errors.js';
import { MockLogger } from './support/MockLogger.js';
import { collect, makeTempDir, removeTempDir, writeLines } from './support/files.js';

// Splits on whitespace and shouts every token
class ShoutingTokenizer extends BaseTokenizer {
  tokenize(text: string | null | undefined): string[] {
    if (!text) return [];
    return text
      .split(/\s+/)
      .filter(token => token.length > 0)
      .map(token => token.toUpperCase());
  }
}

const truncated: MessageRecord = {
  text: 'short',
  truncated: true,
  extended_tweet: {
    full_text: 'the full text #one',
    entities: { hashtags: [{ text: 'one', indices: [14, 18] }] }
  },
  entities: { hashtags: [] }
};

const repost: MessageRecord = {
  text: 'RT @a: original',
  entities: { hashtags: [{ text: 'outer' }] },
  retweeted_status: {
    text: 'original words',
    entities: { hashtags: ['#inner', { text: 'outer' }] }
  },
  quoted_status: {
    text: 'quoted words',
    entities: { hashtags: [{ text: 'q' }] }
  }
};

describe('BaseTokenizer', () => {
  const tokenizer = new ConfigurableTokenizer();

  describe('getPrimaryText', () => {
    it('should prefer the extended text of truncated records', () => {
      expect(tokenizer.getPrimaryText(truncated)).toBe('the full text #one');
    });

    it('should use text when the record is not truncated', () => {
      expect(tokenizer.getPrimaryText({ text: 'hi', truncated: false, extended_tweet: { full_text: 'ignored' } })).toBe(
        'hi'
      );
    });

    it('should fall back to a top-level full_text', () => {
      expect(tokenizer.getPrimaryText({ full_text: 'extended mode' })).toBe('extended mode');
    });

    it('should fall back to text when a truncated record has no extended text', () => {
      expect(tokenizer.getPrimaryText({ text: 'cut off…', truncated: true })).toBe('cut off…');
    });

    it('should return an empty string when there is no text', () => {
      expect(tokenizer.getPrimaryText({ id: 7 })).toBe('');
    });
  });

  describe('getFullText', () => {
    it('should append retweeted and quoted text', () => {
      expect(tokenizer.getFullText(repost)).toBe('RT @a: original original words quoted words');
    });

    it('should leave out nested messages when inclusion is off', () => {
      const ownOnly = new ConfigurableTokenizer({ includeRetweetedAndQuotedContent: false });
      expect(ownOnly.getFullText(repost)).toBe('RT @a: original');
    });

    it('should use the extended text of both a truncated record and its truncated retweet', () => {
      const record: MessageRecord = {
        text: 'outer short',
        truncated: true,
        extended_tweet: { full_text: 'outer long' },
        retweeted_status: {
          text: 'rt short',
          truncated: true,
          extended_tweet: { full_text: 'rt long' }
        }
      };
      expect(tokenizer.getFullText(record)).toBe('outer long rt long');
    });

    it('should skip empty parts', () => {
      expect(tokenizer.getFullText({ text: '', retweeted_status: { text: 'x' } })).toBe('x');
    });
  });

  describe('getHashtags', () => {
    it('should collect hashtags in order without deduplication', () => {
      expect(tokenizer.getHashtags(repost)).toEqual(['outer', 'inner', 'outer', 'q']);
    });

    it('should read extended entities of truncated records', () => {
      expect(tokenizer.getHashtags(truncated)).toEqual(['one']);
    });

    it('should only read the record itself when inclusion is off', () => {
      const ownOnly = new ConfigurableTokenizer({ includeRetweetedAndQuotedContent: false });
      expect(ownOnly.getHashtags(repost)).toEqual(['outer']);
    });

    it('should return an empty array when there are no entities', () => {
      expect(tokenizer.getHashtags({ text: '#notAnEntity' })).toEqual([]);
    });
  });

  describe('getTokenizedMessageText', () => {
    it('should tokenize the full text', () => {
      expect(tokenizer.getTokenizedMessageText(repost)).toEqual(['original', 'original', 'words', 'quoted', 'words']);
    });
  });

  describe('extensibility', () => {
    it('should throw NotImplementedError when tokenize is not overridden', () => {
      const base = new BaseTokenizer();
      expect(() => base.tokenize('text')).toThrow(NotImplementedError);
      expect(() => base.getTokenizedMessageText({ text: 'text' })).toThrow(NotImplementedError);
    });

    it('should give subclasses the record helpers', () => {
      const shouting = new ShoutingTokenizer();
      expect(shouting.getTokenizedMessageText(repost)).toEqual([
        'RT',
        '@A:',
        'ORIGINAL',
        'ORIGINAL',
        'WORDS',
        'QUOTED',
        'WORDS'
      ]);
    });
  });

  describe('tokenizeMessageFile', () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
      dir = await makeTempDir();
      file = path.join(dir, 'messages.jsonl');
      await writeLines(file, [
        { text: 'Hello World #Fun' },
        { text: 'RT @x: copied', retweeted_status: { text: 'copied' } },
        { text: 'http://only.link' },
        { text: 'Bye now' }
      ]);
    });

    afterEach(async () => {
      jest.restoreAllMocks();
      await removeTempDir(dir);
    });

    it('should yield one joined string per record', async () => {
      expect(await collect(tokenizer.tokenizeMessageFile(file))).toEqual([
        'hello world fun',
        'copied copied',
        '',
        'bye now'
      ]);
    });

    it('should skip reposts when asked to', async () => {
      expect(await collect(tokenizer.tokenizeMessageFile(file, { skipRepostedAndQuoted: true }))).toEqual([
        'hello world fun',
        '',
        'bye now'
      ]);
    });

    it('should yield token arrays and skip empty records', async () => {
      expect(await collect(tokenizer.tokenizeMessageFile(file, { returnTokens: true, skipEmpty: true }))).toEqual([
        ['hello', 'world', 'fun'],
        ['copied', 'copied'],
        ['bye', 'now']
      ]);
    });

    it('should accept an unopened reader', async () => {
      const reader = new MessageReader(file, new MockLogger());
      const sequences = await collect(tokenizer.tokenizeMessageFile(reader, { returnTokens: true }));
      expect(sequences).toHaveLength(4);
      expect(reader.recordsRead).toBe(4);
    });

    it('should stop cleanly when the caller stops early', async () => {
      const sequences = tokenizer.tokenizeMessageFile(file);
      expect(await sequences.next()).toEqual({ done: false, value: 'hello world fun' });
      await sequences.return();
      expect(await sequences.next()).toEqual({ done: true, value: undefined });
    });

    it('should release the file when the caller stops early', async () => {
      const open = jest.spyOn(fs, 'createReadStream');
      const sequences = tokenizer.tokenizeMessageFile(file);
      await sequences.next();

      expect(open).toHaveBeenCalledTimes(1);
      const stream = open.mock.results[0].value;

      await sequences.return();
      expect(stream.destroyed).toBe(true);
    });

    it('should throw at once for a missing file', () => {
      expect(() => tokenizer.tokenizeMessageFile(path.join(dir, 'missing.jsonl'))).toThrow(MessageFileError);
    });
  });
});
