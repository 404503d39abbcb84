/**
 * Byte order mark detection and the decoders behind declared character sets.
 */

export interface CharsetDecoder {
  /** WHATWG label, or `utf-32le` / `utf-32be`. */
  readonly encoding: string;
  decode(bytes: Uint8Array): string;
}

/** Maps a declared `CHAR` value to a decoder; `undefined` means unsupported. */
export interface CharsetProvider {
  getDecoder(charset: string): CharsetDecoder | undefined;
}

export interface DetectedEncoding {
  encoding: string;
  bomLength: number;
}

export const FALLBACK_ENCODING = 'utf-8';

export function detectEncoding(bytes: Uint8Array): DetectedEncoding | undefined {
  const [b0, b1, b2, b3] = bytes;
  if (b0 === 0xef && b1 === 0xbb && b2 === 0xbf) {
    return { encoding: 'utf-8', bomLength: 3 };
  }
  if (b0 === 0xfe && b1 === 0xff) {
    return { encoding: 'utf-16be', bomLength: 2 };
  }
  if (b0 === 0xff && b1 === 0xfe) {
    if (b2 === 0 && b3 === 0) {
      return { encoding: 'utf-32le', bomLength: 4 };
    }
    return { encoding: 'utf-16le', bomLength: 2 };
  }
  if (b0 === 0 && b1 === 0 && b2 === 0xfe && b3 === 0xff) {
    return { encoding: 'utf-32be', bomLength: 4 };
  }
  // BOM-less 16 bit text: ASCII characters leave every other byte zero.
  if (b0 === 0 && b2 === 0) {
    return { encoding: 'utf-16be', bomLength: 0 };
  }
  if (b1 === 0 && b3 === 0) {
    return { encoding: 'utf-16le', bomLength: 0 };
  }
  return undefined;
}

export function createDecoder(encoding: string): CharsetDecoder {
  if (encoding === 'utf-32le' || encoding === 'utf-32be') {
    const littleEndian = encoding === 'utf-32le';
    return { encoding, decode: bytes => decodeUtf32(bytes, littleEndian) };
  }
  const decoder = new TextDecoder(encoding, { ignoreBOM: true });
  return { encoding: decoder.encoding, decode: bytes => decoder.decode(bytes) };
}

function decodeUtf32(bytes: Uint8Array, littleEndian: boolean): string {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chunks: string[] = [];
  let codePoints: number[] = [];
  for (let offset = 0; offset + 4 <= bytes.byteLength; offset += 4) {
    const codePoint = view.getUint32(offset, littleEndian);
    codePoints.push(codePoint > 0x10ffff ? 0xfffd : codePoint);
    if (codePoints.length === 4096) {
      chunks.push(String.fromCodePoint(...codePoints));
      codePoints = [];
    }
  }
  chunks.push(String.fromCodePoint(...codePoints));
  return chunks.join('');
}

const DECLARED_CHARSETS: Record<string, string> = {
  ANSI: 'windows-1252',
  'WINDOWS-1252': 'windows-1252',
  CP1252: 'windows-1252',
  ASCII: 'ascii',
  'US-ASCII': 'ascii',
  UTF8: 'utf-8',
  'UTF-8': 'utf-8',
  UNICODE: 'utf-16le',
  'UTF-16': 'utf-16le',
  'ISO-8859-1': 'iso-8859-1',
  LATIN1: 'iso-8859-1',
};

/** ANSEL and IBMPC have no decoder here; plug one in through a custom provider. */
export const defaultCharsetProvider: CharsetProvider = {
  getDecoder(charset: string): CharsetDecoder | undefined {
    const encoding = DECLARED_CHARSETS[charset.trim().toUpperCase()];
    return encoding ? createDecoder(encoding) : undefined;
  },
};
