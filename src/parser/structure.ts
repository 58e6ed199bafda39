/**
 * Indentation, separation, comments and line folding.
 *
 * Checks named `is*` / `validate*` only peek; the rest consume input and
 * throw when the grammar requires something that is absent.
 */

import { isBlankOrEnd, isBreak, isWhite } from '../chars/classifier';
import { isFlowContext, isKeyContext, YamlContext } from './context';
import { Cursor } from './cursor';
import { ErrorKind } from './errors';

export type Chomping = 'strip' | 'clip' | 'keep';

/** Number of spaces starting at `offset`. Tabs are never indentation. */
export function peekIndent(cursor: Cursor, offset = 0): number {
  let count = 0;
  while (cursor.peek(offset + count) === ' ') count++;
  return count;
}

export function validateIndentExact(cursor: Cursor, n: number): boolean {
  return peekIndent(cursor) === n;
}

export function validateIndentLessThan(cursor: Cursor, n: number): boolean {
  return peekIndent(cursor) < n;
}

export function validateIndentLessOrEqual(cursor: Cursor, n: number): boolean {
  return peekIndent(cursor) <= n;
}

/** Fail when a tab follows the leading spaces of the line at the cursor. */
export function rejectTabIndent(cursor: Cursor): void {
  const spaces = peekIndent(cursor);
  if (cursor.peek(spaces) !== '\t') return;
  const at = cursor.mark();
  throw cursor.error(ErrorKind.UnexpectedIndentation, 'Tabs cannot be used for indentation', {
    ...at,
    column: at.column + spaces,
    offset: at.offset + spaces,
  });
}

/**
 * `---` or `...` at column 0 followed by white space, a break or the end.
 * `offset` must point at the start of a line.
 */
export function isDocumentMarker(cursor: Cursor, offset = 0): boolean {
  return (cursor.startsWith('---', offset) || cursor.startsWith('...', offset)) && isBlankOrEnd(cursor.peek(offset + 3));
}

/** A line that ends the content of the current document. */
export function isContentBoundary(cursor: Cursor, offset = 0): boolean {
  return isDocumentMarker(cursor, offset) || cursor.peek(offset) === '%';
}

/** Whether only white space remains on the line at `offset`. */
export function isEmptyLine(cursor: Cursor, offset = 0): boolean {
  let i = offset;
  while (isWhite(cursor.peek(i))) i++;
  const ch = cursor.peek(i);
  return ch === '' || isBreak(ch);
}

/** Whether the rest of the current line is white space and an optional comment. */
export function atLineEnd(cursor: Cursor): boolean {
  let i = 0;
  while (isWhite(cursor.peek(i))) i++;
  const ch = cursor.peek(i);
  if (ch === '' || isBreak(ch)) return true;
  return ch === '#' && (i > 0 || cursor.atLineStart() || isWhite(cursor.peek(-1)));
}

/** Consume spaces and tabs; returns how many. */
export function skipInlineSpace(cursor: Cursor): number {
  let count = 0;
  while (isWhite(cursor.peek())) {
    cursor.advance();
    count++;
  }
  return count;
}

/**
 * Consume the leading white space of a line: exactly `n` spaces in block
 * context, any run of spaces and tabs in flow context. Returns the number
 * of indentation spaces consumed.
 */
export function linePrefix(cursor: Cursor, n: number, context: YamlContext): number {
  if (!isFlowContext(context)) {
    const count = Math.min(peekIndent(cursor), Math.max(n, 0));
    cursor.advance(count);
    return count;
  }
  const indent = peekIndent(cursor);
  cursor.advance(indent);
  skipInlineSpace(cursor);
  return indent;
}

/**
 * Consume one line holding nothing but white space, if the cursor (at a
 * line start) is on one. In block context a line with `n` or more spaces
 * is empty only when nothing follows the first `n`; the rest is content of
 * a block scalar. Returns whether a line break was consumed; trailing
 * white space at the end of input is consumed all the same.
 */
export function emptyLine(cursor: Cursor, n: number, context: YamlContext): boolean {
  const blank =
    isFlowContext(context) || peekIndent(cursor) < n ? isEmptyLine(cursor) : cursor.eof(n) || isBreak(cursor.peek(n));
  if (!blank) return false;
  skipInlineSpace(cursor);
  return cursor.consumeBreak() !== '';
}

/**
 * Text standing in for `breaks` consecutive line breaks. Literal text keeps
 * every break; folded text turns a lone break into a space and otherwise
 * keeps one break per blank line.
 */
export function lineFolding(breaks: number, isLiteral: boolean): string {
  if (breaks <= 0) return '';
  if (isLiteral) return '\n'.repeat(breaks);
  return breaks === 1 ? ' ' : '\n'.repeat(breaks - 1);
}

/** Apply a chomping indicator to block scalar content. */
export function chomp(body: string, trailingBreaks: number, chomping: Chomping, hasContent: boolean): string {
  switch (chomping) {
    case 'strip':
      return body;
    case 'clip':
      return hasContent ? body + '\n' : body;
    case 'keep':
      return body + '\n'.repeat(trailingBreaks);
  }
}

/**
 * Consume a `#` comment up to (not including) the line break. Only valid at
 * the start of a line or after white space; returns false otherwise.
 */
export function commentSkip(cursor: Cursor): boolean {
  if (cursor.peek() !== '#') return false;
  if (!cursor.atLineStart() && !isWhite(cursor.peek(-1))) return false;
  while (!cursor.eof() && !isBreak(cursor.peek())) cursor.advance();
  return true;
}

/**
 * Finish the current line: white space, an optional comment, then a line
 * break or the end of input.
 */
export function lineEnd(cursor: Cursor): void {
  skipInlineSpace(cursor);
  commentSkip(cursor);
  if (cursor.eof()) return;
  if (cursor.consumeBreak() === '') {
    const ch = cursor.peek();
    const kind = ch === '#' ? ErrorKind.ExpectedSeparation : ErrorKind.UnexpectedCharacter;
    throw cursor.error(kind, ch === '#' ? 'Comments must be separated from content by white space' : `Unexpected character '${ch}'`);
  }
}

/**
 * Skip blank and comment-only lines. The cursor must be at a line start
 * and is left at the start of the next line with content, or at the end.
 */
export function skipCommentLines(cursor: Cursor): void {
  for (;;) {
    if (cursor.eof()) return;
    let i = 0;
    while (isWhite(cursor.peek(i))) i++;
    const ch = cursor.peek(i);
    if (ch !== '' && !isBreak(ch) && ch !== '#') return;
    cursor.advance(i);
    commentSkip(cursor);
    cursor.consumeBreak();
  }
}

/** s-l-comments: finish the current line, then skip comment lines. */
export function lineComments(cursor: Cursor): void {
  if (!cursor.atLineStart()) lineEnd(cursor);
  skipCommentLines(cursor);
}

/**
 * Separation between two tokens inside flow content, possibly spanning
 * lines. Continuation lines must be indented at least `n`. Returns whether
 * anything was consumed.
 */
export function separateOptional(cursor: Cursor, n: number, context: YamlContext): boolean {
  const start = cursor.offset;
  skipInlineSpace(cursor);
  // implicit keys never span lines
  if (isKeyContext(context)) return cursor.offset > start;
  if (!atLineEnd(cursor)) return cursor.offset > start;
  separateLines(cursor, n);
  return true;
}

/**
 * Consume separation that the grammar requires, failing with
 * `ExpectedSeparation` when there is none.
 */
export function separate(cursor: Cursor, n: number, context: YamlContext): void {
  if (!separateOptional(cursor, n, context) && !cursor.eof()) {
    throw cursor.error(ErrorKind.ExpectedSeparation, `Expected white space before '${cursor.peek()}'`);
  }
}

/**
 * Line breaks, blank lines and comments between flow tokens. Stops at the
 * first content character; lines holding content must be indented at
 * least `n`, except for a closing bracket.
 */
export function separateLines(cursor: Cursor, n: number): void {
  for (;;) {
    skipInlineSpace(cursor);
    commentSkip(cursor);
    if (cursor.consumeBreak() === '') return;
    if (cursor.eof() || isDocumentMarker(cursor)) return;
    const indent = linePrefix(cursor, n, YamlContext.FlowIn);
    const ch = cursor.peek();
    if (ch === '' || isBreak(ch) || ch === '#') continue;
    if (indent < n && ch !== ']' && ch !== '}') {
      throw cursor.error(ErrorKind.UnexpectedIndentation, `Flow content must be indented at least ${n} spaces, found ${indent}`);
    }
    return;
  }
}
