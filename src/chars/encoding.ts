import { ErrorKind, ScanError } from '../parser/errors';

export type Encoding = 'utf-8' | 'utf-16le' | 'utf-16be' | 'utf-32le' | 'utf-32be';

/**
 * Detect the encoding of a byte stream from its byte order mark, or from
 * where the null bytes fall in the first four bytes (the first character
 * of a YAML stream is always ASCII).
 */
export function detectEncoding(bytes: Uint8Array): Encoding {
  const [b0, b1, b2, b3] = [bytes[0], bytes[1], bytes[2], bytes[3]];

  if (b0 === 0x00 && b1 === 0x00 && b2 === 0xfe && b3 === 0xff) return 'utf-32be';
  if (b0 === 0xff && b1 === 0xfe && b2 === 0x00 && b3 === 0x00) return 'utf-32le';
  if (b0 === 0xfe && b1 === 0xff) return 'utf-16be';
  if (b0 === 0xff && b1 === 0xfe) return 'utf-16le';
  if (b0 === 0xef && b1 === 0xbb && b2 === 0xbf) return 'utf-8';

  if (bytes.length >= 4) {
    if (b0 === 0x00 && b1 === 0x00 && b2 === 0x00 && b3 !== 0x00) return 'utf-32be';
    if (b0 !== 0x00 && b1 === 0x00 && b2 === 0x00 && b3 === 0x00) return 'utf-32le';
  }
  if (bytes.length >= 2) {
    if (b0 === 0x00 && b1 !== 0x00) return 'utf-16be';
    if (b0 !== 0x00 && b1 === 0x00) return 'utf-16le';
  }
  return 'utf-8';
}

/** Decode a byte stream to text. A leading byte order mark is kept. */
export function decodeBytes(bytes: Uint8Array, encoding: Encoding = detectEncoding(bytes)): string {
  if (encoding === 'utf-32le' || encoding === 'utf-32be') {
    return decodeUtf32(bytes, encoding === 'utf-32le');
  }
  const decoder = new TextDecoder(encoding, { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw invalidEncoding(`Input is not valid ${encoding.toUpperCase()} (${reason})`, 0);
  }
}

function decodeUtf32(bytes: Uint8Array, littleEndian: boolean): string {
  if (bytes.length % 4 !== 0) {
    throw invalidEncoding('UTF-32 input length is not a multiple of 4 bytes', bytes.length - (bytes.length % 4));
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let text = '';
  for (let offset = 0; offset < bytes.length; offset += 4) {
    const codePoint = view.getUint32(offset, littleEndian);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      throw invalidEncoding(`Invalid UTF-32 code point 0x${codePoint.toString(16)}`, offset);
    }
    text += String.fromCodePoint(codePoint);
  }
  return text;
}

function invalidEncoding(message: string, byteOffset: number): ScanError {
  return new ScanError(ErrorKind.InvalidEncoding, message, { line: 1, column: 1, offset: byteOffset });
}

/** Text of `input`, decoding bytes when needed. */
export function toText(input: string | Uint8Array): string {
  return typeof input === 'string' ? input : decodeBytes(input);
}
