/**
 * Character classes of the YAML grammar.
 *
 * Every predicate takes a single character (a one-code-unit or surrogate
 * pair string, or '' for end of input) and never throws.
 */

export const BOM = '\uFEFF';

/** Characters with a syntactic role somewhere in the grammar. */
export const INDICATORS = '-?:,[]{}#&*!|>\'"%@`';

/** Indicators that open or close a flow collection or separate its entries. */
export const FLOW_INDICATORS = ',[]{}';

export function isPrintable(ch: string): boolean {
  if (ch === '') return false;
  const code = ch.codePointAt(0) ?? 0;
  return (
    code === 0x09 ||
    code === 0x0a ||
    code === 0x0d ||
    (code >= 0x20 && code <= 0x7e) ||
    code === 0x85 ||
    (code >= 0xa0 && code <= 0xd7ff) ||
    // surrogate halves; the cursor walks UTF-16 code units
    (code >= 0xd800 && code <= 0xdfff) ||
    (code >= 0xe000 && code <= 0xfffd) ||
    (code >= 0x10000 && code <= 0x10ffff)
  );
}

export function isJsonCompatible(ch: string): boolean {
  if (ch === '') return false;
  const code = ch.codePointAt(0) ?? 0;
  return code === 0x09 || (code >= 0x20 && code <= 0x10ffff);
}

export function isIndicator(ch: string): boolean {
  return ch !== '' && INDICATORS.includes(ch);
}

export function isFlowIndicator(ch: string): boolean {
  return ch !== '' && FLOW_INDICATORS.includes(ch);
}

/** LF, CR and NEL. */
export function isBreak(ch: string): boolean {
  return ch === '\n' || ch === '\r' || ch === '\u0085';
}

export function isWhite(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

/** A printable character that is neither white space nor a line break. */
export function isNonSpace(ch: string): boolean {
  return isPrintable(ch) && !isWhite(ch) && !isBreak(ch) && ch !== BOM;
}

/** White space, a line break or the end of input. */
export function isBlankOrEnd(ch: string): boolean {
  return ch === '' || isWhite(ch) || isBreak(ch);
}

export function isDecimalDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isHexDigit(ch: string): boolean {
  return isDecimalDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

export function isWordChar(ch: string): boolean {
  return isDecimalDigit(ch) || (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '-';
}

/** URI characters allowed in tag prefixes and verbatim tags. */
export function isUriChar(ch: string): boolean {
  return isWordChar(ch) || (ch !== '' && "%#;/?:@&=+$,_.!~*'()[]".includes(ch));
}

/** URI characters allowed in a shorthand tag suffix. */
export function isTagChar(ch: string): boolean {
  return isUriChar(ch) && ch !== '!' && !isFlowIndicator(ch);
}

/** Characters allowed in anchor and alias names. */
export function isAnchorChar(ch: string): boolean {
  return isNonSpace(ch) && !isFlowIndicator(ch);
}

/**
 * Whether `ch` can be the first character of a plain scalar, given the
 * character that follows it. `-`, `?` and `:` start a plain scalar only
 * when followed by a "safe" character.
 */
export function isPlainFirst(ch: string, next: string, inFlow: boolean): boolean {
  if (!isNonSpace(ch)) return false;
  if (!isIndicator(ch)) return true;
  if (ch === '-' || ch === '?' || ch === ':') return isPlainSafe(next, inFlow);
  return false;
}

/** Characters a plain scalar may contain; flow indicators end it inside flow collections. */
export function isPlainSafe(ch: string, inFlow: boolean): boolean {
  if (!isNonSpace(ch)) return false;
  return inFlow ? !isFlowIndicator(ch) : true;
}
