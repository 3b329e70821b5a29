import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { isCompressed, resolveCodec } from '../src/io/compression.js';
import { MessageReader } from '../src/io/MessageReader.js';
import { MessageWriter } from '../src/io/MessageWriter.js';
import { MessageRecord } from '../src/types/message.js';
import { ErrorCodes, MalformedRecordError, MessageFileError, ReaderStateError } from '../src/utils/errors.js';
import { MockLogger } from './support/MockLogger.js';
import { collect, makeTempDir, removeTempDir, writeLines } from './support/files.js';

const records: MessageRecord[] = [
  { id: 1, text: 'first message', lang: 'en' },
  { id: 2, text: 'second message', entities: { hashtags: [{ text: 'two', indices: [0, 4] }] } }
];

describe('compression', () => {
  it('should pick gzip by suffix, ignoring case', () => {
    expect(resolveCodec('corpus.jsonl.gz').name).toBe('gzip');
    expect(isCompressed('CORPUS.JSONL.GZ')).toBe(true);
    expect(resolveCodec('corpus.jsonl').name).toBe('plain');
    expect(isCompressed('corpus.gzip')).toBe(false);
  });
});

describe('MessageReader and MessageWriter', () => {
  let dir: string;
  let logger: MockLogger;
  let writer: MessageWriter;

  beforeEach(async () => {
    dir = await makeTempDir();
    logger = new MockLogger();
    writer = new MessageWriter(logger);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const readAll = (file: string): Promise<MessageRecord[]> => collect(new MessageReader(file, logger).readMessages());

  describe('writing', () => {
    it('should write one JSON object per line', async () => {
      const file = path.join(dir, 'out.jsonl');
      await expect(writer.write(file, records)).resolves.toBe(2);

      const content = await readFile(file, 'utf8');
      expect(content).toBe(`${JSON.stringify(records[0])}\n${JSON.stringify(records[1])}\n`);
    });

    it('should accept a single record', async () => {
      const file = path.join(dir, 'single.jsonl');
      await expect(writer.write(file, { id: 3, text: 'alone' })).resolves.toBe(1);
      expect(await readFile(file, 'utf8')).toBe('{"id":3,"text":"alone"}\n');
    });

    it('should create missing parent directories', async () => {
      const file = path.join(dir, 'nested', 'deeper', 'out.jsonl');
      await writer.write(file, records);
      expect(await readAll(file)).toEqual(records);
    });

    it('should replace the file unless appending', async () => {
      const file = path.join(dir, 'out.jsonl');
      await writer.write(file, records[0]);
      await writer.write(file, records[1]);
      expect(await readAll(file)).toEqual([records[1]]);

      await writer.write(file, records[0], { append: true });
      expect(await readAll(file)).toEqual([records[1], records[0]]);
    });

    it('should gzip files ending in .gz', async () => {
      const file = path.join(dir, 'out.jsonl.gz');
      await writer.write(file, records);

      const bytes = await readFile(file);
      expect(bytes[0]).toBe(0x1f);
      expect(bytes[1]).toBe(0x8b);
      expect(await readAll(file)).toEqual(records);
    });

    it('should read appended gzip members as one stream', async () => {
      const file = path.join(dir, 'out.jsonl.gz');
      await writer.write(file, records[0]);
      await writer.write(file, records[1], { append: true });
      expect(await readAll(file)).toEqual(records);
    });
  });

  describe('reading', () => {
    it('should skip blank lines and tolerate CRLF endings', async () => {
      const file = path.join(dir, 'crlf.jsonl');
      await writeFile(file, '{"a":1}\r\n\r\n   \n{"a":2}', 'utf8');
      expect(await readAll(file)).toEqual([{ a: 1 }, { a: 2 }]);
    });

    it('should read records that span many chunks', async () => {
      const file = path.join(dir, 'large.jsonl.gz');
      const many = Array.from({ length: 5000 }, (_, index) => ({ id: index, text: `message number ${index}` }));
      await writer.write(file, many);

      const read = await readAll(file);
      expect(read).toHaveLength(5000);
      expect(read[4999]).toEqual({ id: 4999, text: 'message number 4999' });
    });

    it('should report the line number of invalid JSON', async () => {
      const file = path.join(dir, 'broken.jsonl');
      await writeLines(file, ['{"a":1}', 'not json', '{"a":3}']);

      await expect(readAll(file)).rejects.toBeInstanceOf(MalformedRecordError);
      await expect(readAll(file)).rejects.toMatchObject({
        code: ErrorCodes.IO.MALFORMED_RECORD,
        source: file,
        lineNumber: 2
      });
    });

    it('should reject lines that are not objects', async () => {
      const file = path.join(dir, 'array.jsonl');
      await writeLines(file, ['{"a":1}', '[1,2]']);
      await expect(readAll(file)).rejects.toThrow(`${file}:2: line is not a JSON object`);
    });

    it('should log and skip invalid lines when asked to', async () => {
      const file = path.join(dir, 'broken.jsonl');
      await writeLines(file, ['{"a":1}', 'not json', '"just a string"', '{"a":4}']);

      const reader = new MessageReader(file, logger);
      expect(await collect(reader.readMessages({ skipInvalid: true }))).toEqual([{ a: 1 }, { a: 4 }]);
      expect(logger.messages('warn')).toEqual([
        `Skipping malformed line 2 of ${file}`,
        `Skipping malformed line 3 of ${file}`
      ]);
    });

    it('should skip retweets and quotes when asked to', async () => {
      const file = path.join(dir, 'mixed.jsonl');
      await writeLines(file, [
        { id: 1, text: 'own' },
        { id: 2, text: 'RT', retweeted_status: { id: 9, text: 'theirs' } },
        { id: 3, text: 'quoting', quoted_status: { id: 8, text: 'quoted' } },
        { id: 4, text: 'also own', retweeted_status: null }
      ]);

      const reader = new MessageReader(file, logger);
      const ids = (await collect(reader.readMessages({ skipRepostedAndQuoted: true }))).map(record => record.id);
      expect(ids).toEqual([1, 4]);
      expect(reader.recordsRead).toBe(2);
    });

    it('should refuse to be read twice', async () => {
      const file = path.join(dir, 'out.jsonl');
      await writer.write(file, records);

      const reader = new MessageReader(file, logger);
      await collect(reader.readMessages());
      await expect(reader.readMessages().next()).rejects.toBeInstanceOf(ReaderStateError);
    });

    it('should fail on open for missing files and directories', async () => {
      expect(() => new MessageReader(path.join(dir, 'missing.jsonl'), logger)).toThrow(MessageFileError);

      const folder = path.join(dir, 'folder.jsonl');
      await mkdir(folder);
      expect(() => new MessageReader(folder, logger)).toThrow(MessageFileError);
    });
  });
});
