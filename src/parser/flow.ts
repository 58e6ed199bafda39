import { isBreak, isJsonCompatible, isPlainFirst, isPlainSafe, isWhite } from '../chars/classifier';
import { decodeEscape } from '../chars/escapes';
import { AliasNode, MappingNode, Node, Pair, ScalarNode, SequenceNode } from './ast';
import { inFlow, YamlContext } from './context';
import { ErrorKind, Mark } from './errors';
import { applyProperties, isPropertyStart, NodeProperties, parseAnchorName, parseProperties } from './properties';
import { Tags } from './schema';
import { GrammarState } from './scope';
import {
  isContentBoundary,
  isDocumentMarker,
  lineFolding,
  linePrefix,
  peekIndent,
  separate,
  separateOptional,
} from './structure';

/** Longest escape sequence, `\UXXXXXXXX`. */
const MAX_ESCAPE_LENGTH = 10;

function isFlowEnd(ch: string): boolean {
  return ch === '' || ch === ',' || ch === ']' || ch === '}';
}

function isJsonLike(node: Node): boolean {
  if (node.type === 'Scalar') return node.style === 'single-quoted' || node.style === 'double-quoted';
  return node.type !== 'Alias' && node.style === 'flow';
}

/** Whether `c` is the inside of a flow collection, where flow indicators end plain scalars. */
function insideCollection(c: YamlContext): boolean {
  return c === YamlContext.FlowIn || c === YamlContext.FlowKey;
}

/**
 * Flow scalars, flow collections and aliases. Every production is given
 * the indentation `n` continuation lines must reach and the context `c`.
 */
export class FlowParser {
  constructor(private readonly state: GrammarState) {}

  /** A flow node, optionally preceded by properties the caller already consumed. */
  parseNode(n: number, c: YamlContext, inherited: NodeProperties | null = null): Node {
    const { cursor, scope } = this.state;

    if (cursor.peek() === '*') {
      if (inherited) {
        throw cursor.error(ErrorKind.InvalidNodeProperties, 'An alias cannot have properties', inherited.position);
      }
      return this.parseAlias();
    }

    let props = inherited;
    if (!props && isPropertyStart(cursor.peek())) {
      props = parseProperties(cursor, scope);
      if (props && this.endsAfterProperties(n, c, props)) return this.emptyScalar(props);
    }

    return this.parseContent(n, c, props);
  }

  /** A node with no content, e.g. a missing mapping value. */
  emptyScalar(props: NodeProperties | null = null, position: Mark = this.state.cursor.mark()): ScalarNode {
    const { scope } = this.state;
    const node: ScalarNode = {
      type: 'Scalar',
      value: '',
      style: 'plain',
      tag: props?.tag ?? scope.resolvePlainTag(''),
      position,
    };
    return applyProperties(node, props, scope);
  }

  private parseContent(n: number, c: YamlContext, props: NodeProperties | null): Node {
    const { cursor } = this.state;
    const ch = cursor.peek();

    switch (ch) {
      case '[':
        return this.parseFlowSequence(n, c, props);
      case '{':
        return this.parseFlowMapping(n, c, props);
      case '"':
        return this.parseDoubleQuoted(n, c, props);
      case "'":
        return this.parseSingleQuoted(n, c, props);
      case '|':
      case '>':
        throw cursor.error(ErrorKind.UnexpectedCharacter, 'Block scalars are not allowed inside flow content');
    }

    if (isPlainFirst(ch, cursor.peek(1), insideCollection(c))) {
      return this.parsePlain(n, c, props);
    }
    if (ch === '') {
      throw cursor.error(ErrorKind.UnexpectedCharacter, 'Unexpected end of input');
    }
    throw cursor.error(ErrorKind.UnexpectedCharacter, `Unexpected character '${ch}'`);
  }

  /**
   * After properties: true when the node has no content, false when content
   * follows (separation before it consumed).
   */
  private endsAfterProperties(n: number, c: YamlContext, props: NodeProperties): boolean {
    const { cursor } = this.state;
    let spaces = 0;
    while (isWhite(cursor.peek(spaces))) spaces++;
    const next = cursor.peek(spaces);

    if (next === '' || isBreak(next) || (next === '#' && spaces > 0)) {
      if (!insideCollection(c)) return true;
      separateOptional(cursor, n, c);
      return isFlowEnd(cursor.peek()) || this.atValueIndicator(false);
    }
    if ((insideCollection(c) && isFlowEnd(next)) || (next === ':' && !isPlainSafe(cursor.peek(spaces + 1), insideCollection(c)))) {
      cursor.advance(spaces);
      return true;
    }
    if (next === '*') {
      throw cursor.error(ErrorKind.InvalidNodeProperties, 'An alias cannot have properties', props.position);
    }
    separate(cursor, n, c);
    return false;
  }

  private parseAlias(): AliasNode {
    const { cursor, scope } = this.state;
    const position = cursor.mark();
    const name = parseAnchorName(cursor, '*');
    const target = scope.anchors.lookup(name);
    if (!target) {
      throw cursor.error(ErrorKind.UnknownAnchor, `Alias *${name} refers to an anchor that is not defined`, position);
    }
    return { type: 'Alias', name, target, position };
  }

  // ─── Plain scalars ─────────────────────────────────────

  private parsePlain(n: number, c: YamlContext, props: NodeProperties | null): ScalarNode {
    const { cursor, scope } = this.state;
    const position = cursor.mark();
    const inCollection = insideCollection(c);
    const multiLine = c === YamlContext.FlowIn || c === YamlContext.FlowOut;

    let value = '';
    for (;;) {
      value += this.readPlainLine(inCollection);
      if (!multiLine) break;
      const breaks = this.plainContinuation(n, inCollection);
      if (breaks === 0) break;
      value += lineFolding(breaks, false);
    }

    const node: ScalarNode = {
      type: 'Scalar',
      value,
      style: 'plain',
      tag: props?.tag ?? scope.resolvePlainTag(value),
      position,
    };
    return applyProperties(node, props, scope);
  }

  /** The plain characters of one line; trailing white space is left unread. */
  private readPlainLine(inCollection: boolean): string {
    const { cursor } = this.state;
    const start = cursor.offset;

    for (;;) {
      const ch = cursor.peek();
      if (ch === ':') {
        if (!isPlainSafe(cursor.peek(1), inCollection)) break;
        cursor.advance();
      } else if (isWhite(ch)) {
        let width = 1;
        while (isWhite(cursor.peek(width))) width++;
        const next = cursor.peek(width);
        if (!isPlainSafe(next, inCollection) || next === '#') break;
        if (next === ':' && !isPlainSafe(cursor.peek(width + 1), inCollection)) break;
        cursor.advance(width);
      } else if (isPlainSafe(ch, inCollection)) {
        cursor.advance();
      } else {
        break;
      }
    }

    return cursor.slice(start);
  }

  /**
   * Look past the end of the current line for a continuation of a
   * multi-line plain scalar. When there is one, consume up to its first
   * character and return the number of line breaks crossed; otherwise
   * consume nothing and return 0.
   */
  private plainContinuation(n: number, inCollection: boolean): number {
    const { cursor } = this.state;
    let i = 0;
    while (isWhite(cursor.peek(i))) i++;
    if (!isBreak(cursor.peek(i))) return 0;

    let breaks = 0;
    for (;;) {
      i += cursor.peek(i) === '\r' && cursor.peek(i + 1) === '\n' ? 2 : 1;
      breaks++;
      if (isContentBoundary(cursor, i)) return 0;

      const indent = peekIndent(cursor, i);
      let j = i + indent;
      while (isWhite(cursor.peek(j))) j++;
      const ch = cursor.peek(j);

      if (isBreak(ch)) {
        i = j;
        continue;
      }
      if (ch === '' || ch === '#' || indent < n) return 0;
      if (!isPlainSafe(ch, inCollection)) return 0;
      if (ch === ':' && !isPlainSafe(cursor.peek(j + 1), inCollection)) return 0;

      cursor.advance(j);
      return breaks;
    }
  }

  // ─── Quoted scalars ────────────────────────────────────

  private parseSingleQuoted(n: number, c: YamlContext, props: NodeProperties | null): ScalarNode {
    const { cursor, scope } = this.state;
    const position = cursor.mark();
    cursor.advance();

    let value = '';
    for (;;) {
      const ch = cursor.peek();
      if (ch === '') {
        throw cursor.error(ErrorKind.UnterminatedScalar, 'Single-quoted scalar is missing its closing quote', position);
      }
      if (ch === "'") {
        if (cursor.peek(1) === "'") {
          value += "'";
          cursor.advance(2);
          continue;
        }
        cursor.advance();
        break;
      }
      if (isWhite(ch) || isBreak(ch)) {
        value += this.quotedWhitespace(n, c, position);
        continue;
      }
      this.expectQuotedChar(ch);
      value += ch;
      cursor.advance();
    }

    const node: ScalarNode = {
      type: 'Scalar',
      value,
      style: 'single-quoted',
      tag: props?.tag ?? Tags.str,
      position,
    };
    return applyProperties(node, props, scope);
  }

  private parseDoubleQuoted(n: number, c: YamlContext, props: NodeProperties | null): ScalarNode {
    const { cursor, scope } = this.state;
    const position = cursor.mark();
    cursor.advance();

    let value = '';
    for (;;) {
      const ch = cursor.peek();
      if (ch === '') {
        throw cursor.error(ErrorKind.UnterminatedScalar, 'Double-quoted scalar is missing its closing quote', position);
      }
      if (ch === '"') {
        cursor.advance();
        break;
      }
      if (ch === '\\') {
        if (isBreak(cursor.peek(1))) {
          if (c === YamlContext.BlockKey) {
            throw cursor.error(ErrorKind.UnexpectedCharacter, 'Implicit keys must fit on a single line', position);
          }
          cursor.advance();
          value += this.escapedBreak(n, position);
          continue;
        }
        const escape = decodeEscape(cursor.slice(cursor.offset, cursor.offset + MAX_ESCAPE_LENGTH), 0);
        if (!escape.ok) {
          throw cursor.error(ErrorKind.InvalidEscape, `Invalid escape sequence '${escape.sequence}'`);
        }
        value += escape.text;
        cursor.advance(escape.length);
        continue;
      }
      if (isWhite(ch) || isBreak(ch)) {
        value += this.quotedWhitespace(n, c, position);
        continue;
      }
      this.expectQuotedChar(ch);
      value += ch;
      cursor.advance();
    }

    const node: ScalarNode = {
      type: 'Scalar',
      value,
      style: 'double-quoted',
      tag: props?.tag ?? Tags.str,
      position,
    };
    return applyProperties(node, props, scope);
  }

  /**
   * White space inside a quoted scalar. Kept as written unless it ends the
   * line, in which case it is trimmed and the line break folded.
   */
  private quotedWhitespace(n: number, c: YamlContext, start: Mark): string {
    const { cursor } = this.state;
    let width = 0;
    while (isWhite(cursor.peek(width))) width++;

    if (!isBreak(cursor.peek(width))) {
      const text = cursor.slice(cursor.offset, cursor.offset + width);
      cursor.advance(width);
      return text;
    }
    if (c === YamlContext.BlockKey) {
      throw cursor.error(ErrorKind.UnexpectedCharacter, 'Implicit keys must fit on a single line', start);
    }

    cursor.advance(width);
    let breaks = 0;
    for (;;) {
      cursor.consumeBreak();
      breaks++;
      const indent = this.quotedLinePrefix(n, start);
      if (indent < 0) continue;
      return lineFolding(breaks, false);
    }
  }

  /** After `\` + line break: blank lines stay as breaks, the break itself disappears. */
  private escapedBreak(n: number, start: Mark): string {
    const { cursor } = this.state;
    cursor.consumeBreak();
    let text = '';
    while (this.quotedLinePrefix(n, start) < 0) {
      cursor.consumeBreak();
      text += '\n';
    }
    return text;
  }

  /**
   * Consume the leading white space of a continuation line of a quoted
   * scalar. Returns -1 for a blank line (left on its break), else the
   * indentation found.
   */
  private quotedLinePrefix(n: number, start: Mark): number {
    const { cursor } = this.state;
    if (cursor.eof() || isDocumentMarker(cursor)) {
      throw cursor.error(ErrorKind.UnterminatedScalar, 'Quoted scalar is missing its closing quote', start);
    }
    const indent = linePrefix(cursor, n, YamlContext.FlowOut);
    if (isBreak(cursor.peek())) return -1;
    if (cursor.eof()) {
      throw cursor.error(ErrorKind.UnterminatedScalar, 'Quoted scalar is missing its closing quote', start);
    }
    if (indent < n) {
      throw cursor.error(ErrorKind.UnexpectedIndentation, `Continuation line must be indented at least ${n} spaces`);
    }
    return indent;
  }

  private expectQuotedChar(ch: string): void {
    if (isJsonCompatible(ch)) return;
    const code = (ch.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
    throw this.state.cursor.error(ErrorKind.UnexpectedCharacter, `Control character U+${code} is not allowed in a quoted scalar`);
  }

  // ─── Collections ───────────────────────────────────────

  private parseFlowSequence(n: number, c: YamlContext, props: NodeProperties | null): SequenceNode {
    const { cursor, contexts, scope } = this.state;
    const position = cursor.mark();
    cursor.advance();

    const items = contexts.within(inFlow(c), n, ctx => {
      const entries: Node[] = [];
      separateOptional(cursor, n, ctx.context);
      for (;;) {
        this.expectOpen(position, ']');
        if (cursor.peek() === ']') break;
        entries.push(this.parseSequenceEntry(n, ctx.context));
        separateOptional(cursor, n, ctx.context);
        this.expectOpen(position, ']');
        if (cursor.peek() === ',') {
          cursor.advance();
          separateOptional(cursor, n, ctx.context);
          continue;
        }
        if (cursor.peek() === ']') break;
        throw cursor.error(ErrorKind.ExpectedSeparation, `Expected ',' or ']' in flow sequence, found '${cursor.peek()}'`);
      }
      cursor.advance();
      return entries;
    });

    const node: SequenceNode = { type: 'Sequence', items, style: 'flow', tag: props?.tag ?? Tags.seq, position };
    return applyProperties(node, props, scope);
  }

  private parseSequenceEntry(n: number, c: YamlContext): Node {
    const { cursor } = this.state;
    const position = cursor.mark();

    if (cursor.peek() === '?' && this.isIndicatorEnd(cursor.peek(1))) {
      return this.singlePair(this.parseExplicitEntry(n, c), position);
    }
    if (this.atValueIndicator(false)) {
      const key = this.emptyScalar();
      cursor.advance();
      return this.singlePair({ key, value: this.parseValue(n, c) }, position);
    }

    const node = this.parseNode(n, c);
    separateOptional(cursor, n, c);
    if (this.atValueIndicator(isJsonLike(node))) {
      cursor.advance();
      return this.singlePair({ key: node, value: this.parseValue(n, c) }, position);
    }
    return node;
  }

  private parseFlowMapping(n: number, c: YamlContext, props: NodeProperties | null): MappingNode {
    const { cursor, contexts, scope } = this.state;
    const position = cursor.mark();
    cursor.advance();

    const entries = contexts.within(inFlow(c), n, ctx => {
      const pairs: Pair[] = [];
      separateOptional(cursor, n, ctx.context);
      for (;;) {
        this.expectOpen(position, '}');
        if (cursor.peek() === '}') break;
        pairs.push(this.parseMappingEntry(n, ctx.context));
        separateOptional(cursor, n, ctx.context);
        this.expectOpen(position, '}');
        if (cursor.peek() === ',') {
          cursor.advance();
          separateOptional(cursor, n, ctx.context);
          continue;
        }
        if (cursor.peek() === '}') break;
        throw cursor.error(ErrorKind.ExpectedSeparation, `Expected ',' or '}' in flow mapping, found '${cursor.peek()}'`);
      }
      cursor.advance();
      return pairs;
    });

    const node: MappingNode = { type: 'Mapping', entries, style: 'flow', tag: props?.tag ?? Tags.map, position };
    return applyProperties(node, props, scope);
  }

  private parseMappingEntry(n: number, c: YamlContext): Pair {
    const { cursor } = this.state;

    if (cursor.peek() === '?' && this.isIndicatorEnd(cursor.peek(1))) {
      return this.parseExplicitEntry(n, c);
    }
    if (this.atValueIndicator(false)) {
      const key = this.emptyScalar();
      cursor.advance();
      return { key, value: this.parseValue(n, c) };
    }

    const key = this.parseNode(n, c);
    separateOptional(cursor, n, c);
    if (this.atValueIndicator(isJsonLike(key))) {
      cursor.advance();
      return { key, value: this.parseValue(n, c) };
    }
    return { key, value: this.emptyScalar() };
  }

  /** `? key : value`, either part possibly empty. */
  private parseExplicitEntry(n: number, c: YamlContext): Pair {
    const { cursor } = this.state;
    cursor.advance();
    separateOptional(cursor, n, c);

    const key = isFlowEnd(cursor.peek()) || this.atValueIndicator(false) ? this.emptyScalar() : this.parseNode(n, c);
    separateOptional(cursor, n, c);
    if (this.atValueIndicator(isJsonLike(key))) {
      cursor.advance();
      return { key, value: this.parseValue(n, c) };
    }
    return { key, value: this.emptyScalar() };
  }

  /** The value after a `:` indicator, or an empty node when none is written. */
  private parseValue(n: number, c: YamlContext): Node {
    const { cursor } = this.state;
    separateOptional(cursor, n, c);
    if (isFlowEnd(cursor.peek())) return this.emptyScalar();
    return this.parseNode(n, c);
  }

  private singlePair(pair: Pair, position: Mark): MappingNode {
    return { type: 'Mapping', entries: [pair], style: 'flow', tag: Tags.map, position };
  }

  /**
   * A `:` that acts as a value indicator: followed by a non-plain character,
   * or directly after a quoted key or flow collection.
   */
  private atValueIndicator(adjacent: boolean): boolean {
    const { cursor } = this.state;
    if (cursor.peek() !== ':') return false;
    return adjacent || !isPlainSafe(cursor.peek(1), true);
  }

  private isIndicatorEnd(ch: string): boolean {
    return ch === '' || isWhite(ch) || isBreak(ch) || isFlowEnd(ch);
  }

  private expectOpen(start: Mark, close: string): void {
    const { cursor } = this.state;
    if (cursor.eof() || (cursor.atLineStart() && isDocumentMarker(cursor))) {
      const what = close === ']' ? 'sequence' : 'mapping';
      throw cursor.error(ErrorKind.ExpectedCloseDelimiter, `Flow ${what} is missing its closing '${close}'`, start);
    }
  }
}
