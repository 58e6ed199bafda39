import { isAnchorChar, isBlankOrEnd, isTagChar, isUriChar, isWhite, isWordChar } from '../chars/classifier';
import { Node } from './ast';
import { Cursor } from './cursor';
import { resolveShorthand } from './directives';
import { ErrorKind, Mark } from './errors';
import { DocumentScope } from './scope';

/** Anchor and tag written in front of a node. */
export interface NodeProperties {
  anchor?: string;
  /** Fully resolved tag. */
  tag?: string;
  position: Mark;
}

export function isPropertyStart(ch: string): boolean {
  return ch === '!' || ch === '&';
}

/**
 * Length of an anchor or alias name starting at `offset`. A `:` followed by
 * white space ends the name so that `*a: b` reads as a key.
 */
export function anchorNameLength(cursor: Cursor, offset: number): number {
  let length = 0;
  for (;;) {
    const ch = cursor.peek(offset + length);
    if (!isAnchorChar(ch)) break;
    if (ch === ':' && isBlankOrEnd(cursor.peek(offset + length + 1))) break;
    length++;
  }
  return length;
}

/**
 * Offset just past the properties starting at `offset`, or -1 when there
 * are none. Does not consume anything.
 */
export function measureProperties(cursor: Cursor, offset: number): number {
  let i = offset;
  let sawTag = false;
  let sawAnchor = false;
  for (;;) {
    const ch = cursor.peek(i);
    if (ch === '!' && !sawTag) {
      sawTag = true;
      i = measureTag(cursor, i);
      if (i < 0) return -1;
    } else if (ch === '&' && !sawAnchor) {
      sawAnchor = true;
      const length = anchorNameLength(cursor, i + 1);
      if (length === 0) return -1;
      i += 1 + length;
    } else {
      break;
    }
    let spaces = 0;
    while (isWhite(cursor.peek(i + spaces))) spaces++;
    const next = cursor.peek(i + spaces);
    if (spaces === 0 || !((next === '!' && !sawTag) || (next === '&' && !sawAnchor))) break;
    i += spaces;
  }
  return i === offset ? -1 : i;
}

function measureTag(cursor: Cursor, offset: number): number {
  let i = offset + 1;
  if (cursor.peek(i) === '<') {
    i++;
    while (isUriChar(cursor.peek(i)) && cursor.peek(i) !== '>') i++;
    return cursor.peek(i) === '>' ? i + 1 : -1;
  }
  let word = 0;
  while (isWordChar(cursor.peek(i + word))) word++;
  if (cursor.peek(i + word) === '!') i += word + 1;
  while (isTagChar(cursor.peek(i))) i++;
  return i;
}

/**
 * Consume the properties at the cursor, if any. Tag shorthands are
 * resolved against the document's tag table.
 */
export function parseProperties(cursor: Cursor, scope: DocumentScope): NodeProperties | null {
  if (!isPropertyStart(cursor.peek())) return null;
  const props: NodeProperties = { position: cursor.mark() };

  for (;;) {
    const ch = cursor.peek();
    if (ch === '!' && props.tag === undefined) {
      props.tag = parseTag(cursor, scope);
    } else if (ch === '&' && props.anchor === undefined) {
      props.anchor = parseAnchorName(cursor, '&');
    } else {
      break;
    }
    let spaces = 0;
    while (isWhite(cursor.peek(spaces))) spaces++;
    const next = cursor.peek(spaces);
    const another = (next === '!' && props.tag === undefined) || (next === '&' && props.anchor === undefined);
    if (spaces === 0 || !another) break;
    cursor.advance(spaces);
  }

  return props;
}

/** Consume `&name` or `*name` and return the name. */
export function parseAnchorName(cursor: Cursor, indicator: '&' | '*'): string {
  const start = cursor.mark();
  cursor.advance();
  const length = anchorNameLength(cursor, 0);
  if (length === 0) {
    const what = indicator === '&' ? 'anchor' : 'alias';
    throw cursor.error(ErrorKind.InvalidNodeProperties, `Expected ${what} name after '${indicator}'`, start);
  }
  const name = cursor.slice(cursor.offset, cursor.offset + length);
  cursor.advance(length);
  return name;
}

function parseTag(cursor: Cursor, scope: DocumentScope): string {
  const start = cursor.mark();
  cursor.advance();

  if (cursor.peek() === '<') {
    cursor.advance();
    const from = cursor.offset;
    while (isUriChar(cursor.peek()) && cursor.peek() !== '>') cursor.advance();
    if (cursor.peek() !== '>') {
      throw cursor.error(ErrorKind.InvalidNodeProperties, "Verbatim tag is missing its closing '>'", start);
    }
    const uri = cursor.slice(from);
    cursor.advance();
    if (uri === '' || uri === '!') {
      throw cursor.error(ErrorKind.InvalidNodeProperties, 'Verbatim tag must not be empty', start);
    }
    return uri;
  }

  let handle = '!';
  let word = 0;
  while (isWordChar(cursor.peek(word))) word++;
  if (cursor.peek(word) === '!') {
    handle = '!' + cursor.slice(cursor.offset, cursor.offset + word) + '!';
    cursor.advance(word + 1);
  }

  const from = cursor.offset;
  while (isTagChar(cursor.peek())) cursor.advance();
  const suffix = decodeTagSuffix(cursor, cursor.slice(from), start);

  if (handle !== '!' && suffix === '') {
    throw cursor.error(ErrorKind.InvalidNodeProperties, `Tag ${handle} needs a suffix`, start);
  }

  const resolved = resolveShorthand(scope.tags, handle, suffix);
  if (resolved === undefined) {
    throw cursor.error(ErrorKind.UnknownTagHandle, `Tag handle ${handle} was not declared by a %TAG directive`, start);
  }
  return resolved;
}

function decodeTagSuffix(cursor: Cursor, suffix: string, start: Mark): string {
  if (!suffix.includes('%')) return suffix;
  try {
    return decodeURIComponent(suffix);
  } catch (error) {
    if (error instanceof URIError) {
      throw cursor.error(ErrorKind.InvalidNodeProperties, `Invalid escape in tag suffix '${suffix}'`, start);
    }
    throw error;
  }
}

/** Attach the properties to a finished node and register its anchor. */
export function applyProperties<T extends Exclude<Node, { type: 'Alias' }>>(
  node: T,
  props: NodeProperties | null,
  scope: DocumentScope,
): T {
  if (!props) return node;
  node.position = props.position;
  if (props.anchor !== undefined) {
    node.anchor = props.anchor;
    scope.anchors.define(props.anchor, node);
  }
  return node;
}
