import { decodeBytes, detectEncoding, toText } from '../src/chars/encoding';
import { ErrorKind } from '../src/parser/errors';
import { catchScanError } from './helpers';

function utf16le(text: string): Uint8Array {
  const bytes: number[] = [];
  for (const unit of text) {
    const code = unit.charCodeAt(0);
    bytes.push(code & 0xff, code >> 8);
  }
  return Uint8Array.from(bytes);
}

describe('Encoding detection', () => {
  it('should detect byte order marks', () => {
    expect(detectEncoding(Uint8Array.from([0xef, 0xbb, 0xbf, 0x61]))).toBe('utf-8');
    expect(detectEncoding(Uint8Array.from([0xff, 0xfe, 0x61, 0x00]))).toBe('utf-16le');
    expect(detectEncoding(Uint8Array.from([0xfe, 0xff, 0x00, 0x61]))).toBe('utf-16be');
    expect(detectEncoding(Uint8Array.from([0xff, 0xfe, 0x00, 0x00]))).toBe('utf-32le');
    expect(detectEncoding(Uint8Array.from([0x00, 0x00, 0xfe, 0xff]))).toBe('utf-32be');
  });

  it('should detect encodings from null byte patterns', () => {
    expect(detectEncoding(Uint8Array.from([0x00, 0x61, 0x00, 0x3a]))).toBe('utf-16be');
    expect(detectEncoding(Uint8Array.from([0x61, 0x00, 0x3a, 0x00]))).toBe('utf-16le');
    expect(detectEncoding(Uint8Array.from([0x61, 0x00, 0x00, 0x00]))).toBe('utf-32le');
    expect(detectEncoding(Uint8Array.from([0x00, 0x00, 0x00, 0x61]))).toBe('utf-32be');
  });

  it('should default to UTF-8', () => {
    expect(detectEncoding(Uint8Array.from([0x61, 0x3a, 0x20, 0x31]))).toBe('utf-8');
    expect(detectEncoding(new Uint8Array(0))).toBe('utf-8');
  });
});

describe('Decoding', () => {
  it('should decode UTF-16LE input', () => {
    expect(decodeBytes(utf16le('a: 1'))).toBe('a: 1');
  });

  it('should keep the byte order mark for the parser to skip', () => {
    expect(toText(Uint8Array.from([0xff, 0xfe, 0x61, 0x00]))).toBe('\uFEFFa');
  });

  it('should decode UTF-32LE input', () => {
    expect(decodeBytes(Uint8Array.from([0x61, 0, 0, 0, 0x3a, 0, 0, 0]))).toBe('a:');
  });

  it('should pass strings through unchanged', () => {
    expect(toText('plain')).toBe('plain');
  });

  it('should reject malformed UTF-8', () => {
    const error = catchScanError(() => decodeBytes(Uint8Array.from([0xff, 0xff, 0x61])));
    expect(error.kind).toBe(ErrorKind.InvalidEncoding);
    expect(error.reason).toMatch(/^Input is not valid UTF-8/);
  });

  it('should reject truncated UTF-32 input', () => {
    expect(() => decodeBytes(Uint8Array.from([0x61, 0, 0, 0, 0x62]))).toThrow(
      'UTF-32 input length is not a multiple of 4 bytes',
    );
  });
});
