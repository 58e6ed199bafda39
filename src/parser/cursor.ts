import { BOM } from '../chars/classifier';
import { ErrorKind, Mark, ScanError } from './errors';

/**
 * Read position over a decoded YAML stream.
 *
 * Productions only ever look ahead with `peek` and commit with `advance`;
 * nothing rewinds. Line and column are tracked as characters are consumed.
 */
export class Cursor {
  private pos = 0;
  private line = 1;
  private lineStart = 0;

  constructor(private readonly source: string) {}

  get offset(): number {
    return this.pos;
  }

  get length(): number {
    return this.source.length;
  }

  /** Character at `offset` from the current position, or '' past either end. */
  peek(offset = 0): string {
    const index = this.pos + offset;
    if (index < 0 || index >= this.source.length) return '';
    return this.source[index];
  }

  /** Whether the input continues with `text` at `offset`. */
  startsWith(text: string, offset = 0): boolean {
    return this.source.startsWith(text, this.pos + offset);
  }

  eof(offset = 0): boolean {
    return this.pos + offset >= this.source.length;
  }

  /** 0-based column of the current position. */
  column(): number {
    return this.pos - this.lineStart;
  }

  atLineStart(): boolean {
    return this.pos === this.lineStart;
  }

  advance(count = 1): void {
    for (let i = 0; i < count && this.pos < this.source.length; i++) {
      const ch = this.source[this.pos];
      this.pos++;
      if (ch === '\n' || ch === '\u0085' || (ch === '\r' && this.source[this.pos] !== '\n')) {
        this.line++;
        this.lineStart = this.pos;
      }
    }
  }

  /**
   * Skip a byte order mark at the current position. The mark is not part of
   * the line, so the column after it is 0.
   */
  skipBom(): boolean {
    if (this.source[this.pos] !== BOM) return false;
    this.pos++;
    if (this.pos - 1 === this.lineStart) this.lineStart = this.pos;
    return true;
  }

  /**
   * Consume one line break (CR LF counts as one) and return it normalized
   * to '\n'. Returns '' when the cursor is not on a break.
   */
  consumeBreak(): string {
    const ch = this.peek();
    if (ch === '\r' && this.peek(1) === '\n') {
      this.advance(2);
      return '\n';
    }
    if (ch === '\n' || ch === '\r' || ch === '\u0085') {
      this.advance();
      return '\n';
    }
    return '';
  }

  /** Source text between two absolute offsets. */
  slice(from: number, to: number = this.pos): string {
    return this.source.slice(from, to);
  }

  mark(): Mark {
    return { line: this.line, column: this.column() + 1, offset: this.pos };
  }

  error(kind: ErrorKind, message: string, at: Mark = this.mark()): ScanError {
    return new ScanError(kind, message, at);
  }
}
