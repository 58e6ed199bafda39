import { Document, Node } from './ast';
import { BlockParser } from './block';
import { ContextStack } from './context';
import { Cursor } from './cursor';
import { DEFAULT_VERSION, Directive, parseDirective, SUPPORTED_VERSIONS } from './directives';
import { ErrorKind, Mark, ScanWarning, WarningKind } from './errors';
import { FlowParser } from './flow';
import { SchemaName } from './schema';
import { DocumentScope, GrammarState } from './scope';
import { isDocumentMarker, lineEnd, peekIndent, rejectTabIndent, skipCommentLines } from './structure';

export interface ParserOptions {
  /** Fix the schema for every document instead of following `%YAML`. */
  schema?: SchemaName;
  trace?: boolean;
  onWarning?: (warning: ScanWarning) => void;
  /** Deepest nesting of collections before `NestingTooDeep`. */
  maxDepth?: number;
}

export enum ParseState {
  StreamStart = 'StreamStart',
  DirectiveOrDocumentStart = 'DirectiveOrDocumentStart',
  DocumentStart = 'DocumentStart',
  DocumentContent = 'DocumentContent',
  DocumentEnd = 'DocumentEnd',
  StreamEnd = 'StreamEnd',
}

/**
 * Stream driver. Reads directives and markers itself and hands document
 * content to the block layer. One instance parses one stream.
 */
export class Parser implements GrammarState {
  readonly cursor: Cursor;
  readonly contexts: ContextStack;
  readonly scope: DocumentScope;
  readonly tracing: boolean;

  private readonly block: BlockParser;
  private readonly onWarning?: (warning: ScanWarning) => void;
  private state = ParseState.StreamStart;
  private traceLog: string[] = [];
  private documents: Document[] = [];

  // Per-document bookkeeping
  private directiveCount = 0;
  private explicitStart = false;
  private root: Node | null = null;

  constructor(source: string, options: ParserOptions = {}) {
    this.cursor = new Cursor(source);
    this.contexts = new ContextStack(
      depth => this.cursor.error(ErrorKind.NestingTooDeep, `Nesting exceeds ${depth} levels`),
      options.maxDepth,
    );
    this.scope = new DocumentScope(options.schema);
    this.tracing = options.trace ?? false;
    this.onWarning = options.onWarning;
    this.block = new BlockParser(this, new FlowParser(this));
  }

  parse(): Document[] {
    while (this.state !== ParseState.StreamEnd) {
      this.step();
    }
    return this.documents;
  }

  getTrace(): string[] {
    return [...this.traceLog];
  }

  trace(message: string): void {
    this.traceLog.push(`[parser] ${message}`);
    if (this.tracing) {
      console.error(`  [parser] ${message}`);
    }
  }

  private step(): void {
    switch (this.state) {
      case ParseState.StreamStart:
        this.cursor.skipBom();
        this.transition(ParseState.DirectiveOrDocumentStart);
        return;
      case ParseState.DirectiveOrDocumentStart:
        this.directiveOrDocumentStart();
        return;
      case ParseState.DocumentStart:
        this.cursor.advance(3);
        this.explicitStart = true;
        this.transition(ParseState.DocumentContent);
        return;
      case ParseState.DocumentContent:
        this.documentContent();
        return;
      case ParseState.DocumentEnd:
        this.cursor.advance(3);
        lineEnd(this.cursor);
        this.closeDocument(true);
        this.transition(ParseState.DirectiveOrDocumentStart);
        return;
      case ParseState.StreamEnd:
        return;
    }
  }

  private transition(next: ParseState): void {
    if (this.tracing) this.trace(`${this.state} -> ${next}`);
    this.state = next;
  }

  // ─── Between documents ─────────────────────────────────

  private directiveOrDocumentStart(): void {
    const { cursor } = this;
    do {
      skipCommentLines(cursor);
    } while (cursor.skipBom());

    if (cursor.eof()) {
      if (this.directiveCount > 0) {
        throw cursor.error(ErrorKind.ExpectedDocumentStart, "Directives must be followed by a '---' document start marker");
      }
      this.transition(ParseState.StreamEnd);
      return;
    }

    if (cursor.peek() === '%') {
      const directive = parseDirective(cursor);
      lineEnd(cursor);
      this.applyDirective(directive);
      return;
    }

    if (isDocumentMarker(cursor)) {
      if (cursor.startsWith('---')) {
        this.transition(ParseState.DocumentStart);
        return;
      }
      if (this.directiveCount > 0) {
        throw cursor.error(ErrorKind.ExpectedDocumentStart, "Directives must be followed by a '---' document start marker");
      }
      // a stray document end marker closes nothing
      cursor.advance(3);
      lineEnd(cursor);
      return;
    }

    if (this.directiveCount > 0) {
      throw cursor.error(ErrorKind.ExpectedDocumentStart, "Directives must be followed by a '---' document start marker");
    }
    this.explicitStart = false;
    this.transition(ParseState.DocumentContent);
  }

  private applyDirective(directive: Directive): void {
    this.directiveCount++;
    switch (directive.kind) {
      case 'version': {
        if (this.scope.version !== null) {
          throw this.cursor.error(ErrorKind.MalformedDirective, 'Only one %YAML directive is allowed per document', directive.position);
        }
        const version = `${directive.major}.${directive.minor}`;
        if (SUPPORTED_VERSIONS.includes(version)) {
          this.scope.version = version;
        } else {
          this.scope.version = DEFAULT_VERSION;
          this.warn(WarningKind.UnsupportedVersion, `YAML version ${version} is not supported, reading as ${DEFAULT_VERSION}`, directive.position);
        }
        this.trace(`%YAML ${version}`);
        return;
      }
      case 'tag':
        if (!this.scope.tags.register(directive.handle, directive.prefix)) {
          this.warn(WarningKind.DuplicateTagHandle, `Tag handle ${directive.handle} was already declared, using the later prefix`, directive.position);
        }
        this.trace(`%TAG ${directive.handle} ${directive.prefix}`);
        return;
      case 'reserved':
        this.warn(WarningKind.UnknownDirective, `Ignoring unknown directive %${directive.name}`, directive.position);
        return;
    }
  }

  private warn(kind: WarningKind, message: string, position: Mark): void {
    const warning: ScanWarning = { kind, message, position };
    this.scope.warnings.push(warning);
    this.trace(`warning ${kind}: ${message}`);
    this.onWarning?.(warning);
  }

  // ─── Inside a document ─────────────────────────────────

  private documentContent(): void {
    const { cursor } = this;
    this.trace(`document ${this.documents.length + 1} opened (${this.explicitStart ? 'explicit' : 'implicit'} start)`);
    this.root = this.block.parseRoot();

    if (cursor.eof()) {
      this.closeDocument(false);
      this.transition(ParseState.StreamEnd);
      return;
    }
    if (isDocumentMarker(cursor)) {
      if (cursor.startsWith('...')) {
        this.transition(ParseState.DocumentEnd);
        return;
      }
      this.closeDocument(false);
      this.transition(ParseState.DocumentStart);
      return;
    }
    if (cursor.peek() === '%') {
      throw cursor.error(ErrorKind.DirectiveAfterContent, "Directives must come before the document's '---' marker");
    }

    rejectTabIndent(cursor);
    const indent = peekIndent(cursor);
    if (indent > 0) {
      throw cursor.error(ErrorKind.UnexpectedIndentation, `Unexpected indentation of ${indent} after the document's root node`);
    }
    throw cursor.error(ErrorKind.UnexpectedCharacter, `Unexpected content '${cursor.peek()}' after the document's root node`);
  }

  private closeDocument(explicitEnd: boolean): void {
    const root = this.root;
    if (!root) throw new Error('No document is open');
    this.documents.push({
      root,
      version: this.scope.effectiveVersion,
      tags: this.scope.tags.toRecord(),
      explicitStart: this.explicitStart,
      explicitEnd,
      warnings: this.scope.warnings,
    });
    this.trace(`document ${this.documents.length} closed (${root.type}${explicitEnd ? ', explicit end' : ''})`);

    this.scope.reset();
    this.root = null;
    this.directiveCount = 0;
    this.explicitStart = false;
  }
}

/** Parse a decoded stream into its documents. Throws the first `ScanError`. */
export function parseDocuments(source: string, options: ParserOptions = {}): Document[] {
  return new Parser(source, options).parse();
}
