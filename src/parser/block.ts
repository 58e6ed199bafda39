import { isBlankOrEnd, isBreak, isDecimalDigit, isPlainFirst, isWhite } from '../chars/classifier';
import { MappingNode, Node, Pair, ScalarNode, SequenceNode } from './ast';
import { seqSpaces, YamlContext } from './context';
import { ErrorKind } from './errors';
import { FlowParser } from './flow';
import {
  anchorNameLength,
  applyProperties,
  isPropertyStart,
  measureProperties,
  NodeProperties,
  parseProperties,
} from './properties';
import { Tags } from './schema';
import { GrammarState } from './scope';
import {
  atLineEnd,
  Chomping,
  chomp,
  isContentBoundary,
  isDocumentMarker,
  emptyLine,
  lineComments,
  lineEnd,
  lineFolding,
  linePrefix,
  peekIndent,
  rejectTabIndent,
  separate,
  skipCommentLines,
  skipInlineSpace,
  validateIndentExact,
  validateIndentLessOrEqual,
  validateIndentLessThan,
} from './structure';

/** How far ahead an implicit key's `:` may be. */
export const IMPLICIT_KEY_LIMIT = 1024;

export enum BlockState {
  BlockNode = 'BlockNode',
  BlockSequenceFirstEntry = 'BlockSequenceFirstEntry',
  BlockSequenceEntry = 'BlockSequenceEntry',
  BlockMappingFirstKey = 'BlockMappingFirstKey',
  BlockMappingKey = 'BlockMappingKey',
  BlockMappingValue = 'BlockMappingValue',
}

/** Production chosen for a line that starts a block node. */
export type BlockProduction =
  | { kind: 'empty' }
  | { kind: 'sequence'; indent: number }
  | { kind: 'mapping'; indent: number }
  | { kind: 'properties'; indent: number }
  | { kind: 'scalar'; indent: number }
  | { kind: 'flow'; indent: number };

export interface BlockScalarHeader {
  literal: boolean;
  chomping: Chomping;
  explicitIndent: number | null;
}

function isIndicatorEnd(ch: string): boolean {
  return isBlankOrEnd(ch);
}

export class BlockParser {
  constructor(
    private readonly state: GrammarState,
    private readonly flow: FlowParser,
  ) {}

  /** The root node of a document. */
  parseRoot(): Node {
    return this.parseBlockNode(-1, YamlContext.BlockIn);
  }

  /**
   * A block node nested under indentation `n`. The cursor is either after
   * an indicator on the current line or at a line start. The node's
   * trailing comments are consumed, leaving the cursor at the start of the
   * next content line.
   */
  parseBlockNode(n: number, c: YamlContext): Node {
    const { cursor } = this.state;
    this.enter(BlockState.BlockNode, n);

    if (!cursor.atLineStart()) {
      skipInlineSpace(cursor);
      if (!atLineEnd(cursor)) return this.parseInline(n, c, null);
      lineComments(cursor);
    } else {
      skipCommentLines(cursor);
    }
    return this.parseNextLine(n, c, null);
  }

  /**
   * Decide which production the line at the cursor starts. Only peeks.
   */
  classifyLine(n: number, c: YamlContext): BlockProduction {
    const { cursor } = this.state;
    if (cursor.eof() || isContentBoundary(cursor)) return { kind: 'empty' };
    rejectTabIndent(cursor);

    const k = peekIndent(cursor);
    const ch = cursor.peek(k);
    const next = cursor.peek(k + 1);

    if (ch === '-' && isIndicatorEnd(next)) {
      return k > seqSpaces(n, c) ? { kind: 'sequence', indent: k } : { kind: 'empty' };
    }
    if (validateIndentLessOrEqual(cursor, n)) return { kind: 'empty' };
    if ((ch === '?' || ch === ':') && isIndicatorEnd(next)) return { kind: 'mapping', indent: k };
    if (this.isImplicitKeyAhead(k)) return { kind: 'mapping', indent: k };
    if (isPropertyStart(ch)) return { kind: 'properties', indent: k };
    if (ch === '|' || ch === '>') return { kind: 'scalar', indent: k };
    return { kind: 'flow', indent: k };
  }

  /** Content starting on a fresh line, after optional properties already read. */
  private parseNextLine(n: number, c: YamlContext, props: NodeProperties | null): Node {
    const { cursor } = this.state;
    const production = this.classifyLine(n, c);

    switch (production.kind) {
      case 'empty':
        return this.flow.emptyScalar(props, props?.position);
      case 'sequence':
        cursor.advance(production.indent);
        return this.parseBlockSequence(production.indent, props);
      case 'mapping':
        cursor.advance(production.indent);
        return this.parseBlockMapping(production.indent, props);
      case 'properties':
      case 'scalar':
      case 'flow':
        cursor.advance(production.indent);
        return this.parseInline(n, c, props);
    }
  }

  /** Node content that starts on the current line. */
  private parseInline(n: number, c: YamlContext, inherited: NodeProperties | null): Node {
    const { cursor, scope } = this.state;
    let props = inherited;

    if (isPropertyStart(cursor.peek())) {
      if (props) {
        throw cursor.error(ErrorKind.InvalidNodeProperties, 'A node can carry only one set of properties');
      }
      props = parseProperties(cursor, scope);
      if (atLineEnd(cursor)) {
        lineComments(cursor);
        return this.parseNextLine(n, c, props);
      }
      separate(cursor, n, c);
    }

    const ch = cursor.peek();
    if (ch === '|' || ch === '>') return this.parseBlockScalar(n, props);

    const node = this.flow.parseNode(n + 1, YamlContext.FlowOut, props);
    lineComments(cursor);
    return node;
  }

  /**
   * The node after `-`, `?` or an explicit `:`. A sequence or mapping
   * starting on the same line is a compact collection at that column.
   */
  parseBlockIndented(n: number, c: YamlContext): Node {
    const { cursor } = this.state;
    skipInlineSpace(cursor);

    if (!atLineEnd(cursor)) {
      const column = cursor.column();
      const ch = cursor.peek();
      const next = cursor.peek(1);
      if (ch === '-' && isIndicatorEnd(next)) {
        return this.parseBlockSequence(column, null);
      }
      if (((ch === '?' || ch === ':') && isIndicatorEnd(next)) || this.isImplicitKeyAhead(0)) {
        return this.parseBlockMapping(column, null);
      }
    }
    return this.parseBlockNode(n, c);
  }

  // ─── Collections ───────────────────────────────────────

  /** Entries at column `indent`; the cursor is on the first `-`. */
  private parseBlockSequence(indent: number, props: NodeProperties | null): SequenceNode {
    const { cursor, contexts, scope } = this.state;
    const position = cursor.mark();

    const items = contexts.within(YamlContext.BlockIn, indent, () => {
      const entries: Node[] = [];
      this.enter(BlockState.BlockSequenceFirstEntry, indent);
      for (;;) {
        cursor.advance();
        entries.push(this.parseBlockIndented(indent, YamlContext.BlockIn));

        if (cursor.eof() || isContentBoundary(cursor)) break;
        rejectTabIndent(cursor);
        if (validateIndentLessThan(cursor, indent)) break;
        if (!validateIndentExact(cursor, indent)) {
          throw cursor.error(
            ErrorKind.UnexpectedIndentation,
            `Expected a sequence entry at column ${indent + 1}, found indentation ${peekIndent(cursor)}`,
          );
        }
        if (!(cursor.peek(indent) === '-' && isIndicatorEnd(cursor.peek(indent + 1)))) break;
        cursor.advance(indent);
        this.enter(BlockState.BlockSequenceEntry, indent);
      }
      return entries;
    });

    const node: SequenceNode = { type: 'Sequence', items, style: 'block', tag: props?.tag ?? Tags.seq, position };
    return applyProperties(node, props, scope);
  }

  /** Entries at column `indent`; the cursor is on the first key. */
  private parseBlockMapping(indent: number, props: NodeProperties | null): MappingNode {
    const { cursor, contexts, scope } = this.state;
    const position = cursor.mark();

    const entries = contexts.within(YamlContext.BlockOut, indent, () => {
      const pairs: Pair[] = [];
      this.enter(BlockState.BlockMappingFirstKey, indent);
      for (;;) {
        pairs.push(this.parseMappingEntry(indent));

        if (cursor.eof() || isContentBoundary(cursor)) break;
        rejectTabIndent(cursor);
        if (validateIndentLessThan(cursor, indent)) break;
        if (!validateIndentExact(cursor, indent)) {
          throw cursor.error(
            ErrorKind.UnexpectedIndentation,
            `Expected a mapping key at column ${indent + 1}, found indentation ${peekIndent(cursor)}`,
          );
        }
        cursor.advance(indent);
        this.enter(BlockState.BlockMappingKey, indent);
      }
      return pairs;
    });

    const node: MappingNode = { type: 'Mapping', entries, style: 'block', tag: props?.tag ?? Tags.map, position };
    return applyProperties(node, props, scope);
  }

  private parseMappingEntry(indent: number): Pair {
    const { cursor } = this.state;
    const ch = cursor.peek();
    const next = cursor.peek(1);

    if (ch === '?' && isIndicatorEnd(next)) return this.parseExplicitEntry(indent);

    let key: Node;
    if (ch === ':' && isIndicatorEnd(next)) {
      key = this.flow.emptyScalar();
    } else if (this.isImplicitKeyAhead(0)) {
      key = this.flow.parseNode(indent, YamlContext.BlockKey);
      skipInlineSpace(cursor);
      if (cursor.peek() !== ':') {
        throw cursor.error(ErrorKind.UnexpectedCharacter, "Expected ':' after mapping key");
      }
    } else {
      const found = ch === '' ? 'end of input' : `'${ch}'`;
      throw cursor.error(ErrorKind.UnexpectedCharacter, `Expected a mapping key followed by ':', found ${found}`);
    }

    cursor.advance();
    this.enter(BlockState.BlockMappingValue, indent);
    return { key, value: this.parseBlockNode(indent, YamlContext.BlockOut) };
  }

  /** `? key` optionally followed by `: value` at the same column. */
  private parseExplicitEntry(indent: number): Pair {
    const { cursor } = this.state;
    cursor.advance();
    const key = this.parseBlockIndented(indent, YamlContext.BlockOut);

    const atValue =
      !cursor.eof() &&
      !isContentBoundary(cursor) &&
      validateIndentExact(cursor, indent) &&
      cursor.peek(indent) === ':' &&
      isIndicatorEnd(cursor.peek(indent + 1));
    if (!atValue) return { key, value: this.flow.emptyScalar() };

    cursor.advance(indent + 1);
    this.enter(BlockState.BlockMappingValue, indent);
    return { key, value: this.parseBlockIndented(indent, YamlContext.BlockOut) };
  }

  // ─── Implicit key lookahead ────────────────────────────

  /**
   * Whether an implicit key followed by `:` starts at `offset` on the
   * current line. Never consumes input.
   */
  isImplicitKeyAhead(offset: number): boolean {
    const { cursor } = this.state;
    let i = offset;

    const afterProps = measureProperties(cursor, i);
    if (afterProps >= 0) {
      i = afterProps;
      while (isWhite(cursor.peek(i))) i++;
    }

    const ch = cursor.peek(i);
    if (ch === '*') {
      i += 1 + anchorNameLength(cursor, i + 1);
    } else if (ch === '"' || ch === "'") {
      i = this.scanQuoted(i);
    } else if (ch === '[' || ch === '{') {
      i = this.scanBracketed(i);
    } else if (isPlainFirst(ch, cursor.peek(i + 1), false)) {
      return this.scanPlainKey(i, offset);
    } else if (afterProps < 0) {
      return false;
    }
    if (i < 0) return false;

    while (isWhite(cursor.peek(i))) i++;
    return i - offset <= IMPLICIT_KEY_LIMIT && cursor.peek(i) === ':' && isIndicatorEnd(cursor.peek(i + 1));
  }

  private scanPlainKey(from: number, offset: number): boolean {
    const { cursor } = this.state;
    for (let i = from; i - offset <= IMPLICIT_KEY_LIMIT; i++) {
      const ch = cursor.peek(i);
      if (ch === '' || isBreak(ch)) return false;
      if (ch === ':' && isIndicatorEnd(cursor.peek(i + 1))) return true;
      if (ch === '#' && isWhite(cursor.peek(i - 1))) return false;
    }
    return false;
  }

  /** Offset after a quoted scalar closed on the same line, or -1. */
  private scanQuoted(from: number): number {
    const { cursor } = this.state;
    const quote = cursor.peek(from);
    let i = from + 1;
    for (;;) {
      const ch = cursor.peek(i);
      if (ch === '' || isBreak(ch) || i - from > IMPLICIT_KEY_LIMIT) return -1;
      if (quote === '"' && ch === '\\') {
        if (isBreak(cursor.peek(i + 1))) return -1;
        i += 2;
        continue;
      }
      if (ch === quote) {
        if (quote === "'" && cursor.peek(i + 1) === "'") {
          i += 2;
          continue;
        }
        return i + 1;
      }
      i++;
    }
  }

  /** Offset after a flow collection closed on the same line, or -1. */
  private scanBracketed(from: number): number {
    const { cursor } = this.state;
    let depth = 0;
    let i = from;
    for (;;) {
      const ch = cursor.peek(i);
      if (ch === '' || isBreak(ch) || i - from > IMPLICIT_KEY_LIMIT) return -1;
      if (ch === '[' || ch === '{') {
        depth++;
      } else if (ch === ']' || ch === '}') {
        depth--;
        if (depth === 0) return i + 1;
      } else if ((ch === '"' || ch === "'") && '[{,: \t'.includes(cursor.peek(i - 1))) {
        i = this.scanQuoted(i);
        if (i < 0) return -1;
        continue;
      }
      i++;
    }
  }

  // ─── Block scalars ─────────────────────────────────────

  parseBlockScalarHeader(): BlockScalarHeader {
    const { cursor } = this.state;
    const position = cursor.mark();
    const literal = cursor.peek() === '|';
    cursor.advance();

    let chomping: Chomping = 'clip';
    let explicitIndent: number | null = null;
    let sawChomping = false;
    for (let i = 0; i < 2; i++) {
      const ch = cursor.peek();
      if ((ch === '-' || ch === '+') && !sawChomping) {
        chomping = ch === '-' ? 'strip' : 'keep';
        sawChomping = true;
      } else if (isDecimalDigit(ch) && explicitIndent === null) {
        if (ch === '0') {
          throw cursor.error(ErrorKind.InvalidBlockScalarHeader, 'Block scalar indentation indicator must be between 1 and 9');
        }
        explicitIndent = Number(ch);
      } else {
        break;
      }
      cursor.advance();
    }

    if (!atLineEnd(cursor)) {
      throw cursor.error(ErrorKind.InvalidBlockScalarHeader, `Invalid block scalar header, found '${cursor.peek()}'`, position);
    }
    lineEnd(cursor);
    return { literal, chomping, explicitIndent };
  }

  private parseBlockScalar(n: number, props: NodeProperties | null): ScalarNode {
    const { cursor, scope } = this.state;
    const position = cursor.mark();
    const header = this.parseBlockScalarHeader();
    const indent =
      header.explicitIndent !== null ? Math.max(n, 0) + header.explicitIndent : this.detectIndent(n);

    let body = '';
    let breaks = 0;
    let hasContent = false;
    let previousSpaced = false;

    for (;;) {
      if (cursor.eof() || isDocumentMarker(cursor)) break;
      if (emptyLine(cursor, indent, YamlContext.BlockIn)) {
        breaks++;
        continue;
      }
      if (cursor.eof() || validateIndentLessThan(cursor, indent)) break;

      linePrefix(cursor, indent, YamlContext.BlockIn);
      const spaced = isWhite(cursor.peek());
      if (!hasContent) {
        body += '\n'.repeat(breaks);
      } else if (header.literal || spaced || previousSpaced) {
        body += lineFolding(breaks, true);
      } else {
        body += lineFolding(breaks, false);
      }

      const start = cursor.offset;
      while (!cursor.eof() && !isBreak(cursor.peek())) cursor.advance();
      body += cursor.slice(start);
      hasContent = true;
      previousSpaced = spaced;
      breaks = cursor.consumeBreak() === '' ? 0 : 1;
    }

    skipCommentLines(cursor);

    const node: ScalarNode = {
      type: 'Scalar',
      value: chomp(body, breaks, header.chomping, hasContent),
      style: header.literal ? 'literal' : 'folded',
      tag: props?.tag ?? Tags.str,
      position,
    };
    return applyProperties(node, props, scope);
  }

  /**
   * Content indentation from the first non-empty line. Leading empty lines
   * may not be more indented than that line.
   */
  private detectIndent(n: number): number {
    const { cursor } = this.state;
    let i = 0;
    let widest = 0;

    for (;;) {
      const spaces = peekIndent(cursor, i);
      const ch = cursor.peek(i + spaces);
      if (ch === '') {
        widest = Math.max(widest, spaces);
        break;
      }
      if (isBreak(ch)) {
        widest = Math.max(widest, spaces);
        i += spaces + (ch === '\r' && cursor.peek(i + spaces + 1) === '\n' ? 2 : 1);
        continue;
      }
      if (spaces <= n || (spaces === 0 && isDocumentMarker(cursor, i))) break;
      if (widest > spaces) {
        throw cursor.error(
          ErrorKind.UnexpectedIndentation,
          `Leading empty line has ${widest} spaces, more than the block scalar's content indentation of ${spaces}`,
        );
      }
      return spaces;
    }

    return Math.max(widest, n + 1, 0);
  }

  private enter(state: BlockState, indent: number): void {
    if (this.state.tracing) this.state.trace(`${state} (indent ${indent})`);
  }
}
