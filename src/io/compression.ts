import { promisify } from 'util';
import { Readable, Transform } from 'stream';
import { createGunzip, gzip } from 'zlib';

const gzipAsync = promisify(gzip);

/**
 * How a message file's bytes are encoded on disk.
 */
export interface CompressionCodec {
  readonly name: string;
  /** Encode a complete payload before it is written or appended */
  compress(payload: Buffer): Promise<Buffer>;
  /** Wrap a raw file stream so that it yields decoded bytes */
  decode(raw: Readable): Readable;
}

export const plainCodec: CompressionCodec = {
  name: 'plain',
  compress: payload => Promise.resolve(payload),
  decode: raw => raw
};

export const gzipCodec: CompressionCodec = {
  name: 'gzip',
  compress: payload => gzipAsync(payload),
  decode: raw => {
    const gunzip: Transform = createGunzip();
    // pipe() does not forward source errors
    raw.on('error', error => gunzip.destroy(error));
    return raw.pipe(gunzip);
  }
};

const CODECS_BY_SUFFIX: ReadonlyArray<[suffix: string, codec: CompressionCodec]> = [
  ['.gz', gzipCodec]
];

/**
 * Pick the codec for a file from its name. Unknown suffixes are plain text.
 */
export function resolveCodec(filename: string): CompressionCodec {
  const lower = filename.toLowerCase();
  const match = CODECS_BY_SUFFIX.find(([suffix]) => lower.endsWith(suffix));
  return match ? match[1] : plainCodec;
}

export function isCompressed(filename: string): boolean {
  return resolveCodec(filename) !== plainCodec;
}
