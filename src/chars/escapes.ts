import { isHexDigit } from './classifier';

/** Single-character escapes of double-quoted scalars, keyed by the character after `\`. */
const SIMPLE_ESCAPES: Record<string, string> = {
  '0': '\0',
  a: '\x07',
  b: '\b',
  t: '\t',
  '\t': '\t',
  n: '\n',
  v: '\v',
  f: '\f',
  r: '\r',
  e: '\x1b',
  ' ': ' ',
  '"': '"',
  '/': '/',
  '\\': '\\',
  N: '\u0085',
  _: '\u00a0',
  L: '\u2028',
  P: '\u2029',
};

const HEX_ESCAPE_LENGTHS: Record<string, number> = {
  x: 2,
  u: 4,
  U: 8,
};

export type EscapeResult =
  | { ok: true; text: string; length: number }
  | { ok: false; sequence: string };

/**
 * Decode the escape sequence starting at `source[index]`, which must be the
 * backslash. `length` counts every character of the sequence including the
 * backslash. Escaped line breaks are not handled here; they belong to line
 * folding.
 */
export function decodeEscape(source: string, index: number): EscapeResult {
  const indicator = source.charAt(index + 1);

  if (Object.prototype.hasOwnProperty.call(SIMPLE_ESCAPES, indicator)) {
    return { ok: true, text: SIMPLE_ESCAPES[indicator], length: 2 };
  }

  const digits = HEX_ESCAPE_LENGTHS[indicator];
  if (digits === undefined) {
    return { ok: false, sequence: source.slice(index, index + 2) };
  }

  const hex = source.slice(index + 2, index + 2 + digits);
  if (hex.length !== digits || !Array.from(hex).every(isHexDigit)) {
    return { ok: false, sequence: source.slice(index, index + 2 + hex.length) };
  }

  const codePoint = parseInt(hex, 16);
  if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    return { ok: false, sequence: source.slice(index, index + 2 + digits) };
  }

  return { ok: true, text: String.fromCodePoint(codePoint), length: 2 + digits };
}
