import { Cursor } from '../src/parser/cursor';
import { ErrorKind } from '../src/parser/errors';

describe('Cursor', () => {
  it('should peek without consuming', () => {
    const cursor = new Cursor('ab');
    expect(cursor.peek()).toBe('a');
    expect(cursor.peek(1)).toBe('b');
    expect(cursor.peek(2)).toBe('');
    expect(cursor.peek(-1)).toBe('');
    expect(cursor.offset).toBe(0);
  });

  it('should track lines and columns across LF, CRLF and CR', () => {
    const cursor = new Cursor('a\nb\r\nc\rd');
    cursor.advance(2);
    expect(cursor.mark()).toEqual({ line: 2, column: 1, offset: 2 });
    cursor.advance(3);
    expect(cursor.mark()).toEqual({ line: 3, column: 1, offset: 5 });
    cursor.advance(2);
    expect(cursor.mark()).toEqual({ line: 4, column: 1, offset: 7 });
  });

  it('should consume CR LF as a single normalized break', () => {
    const cursor = new Cursor('\r\nx');
    expect(cursor.consumeBreak()).toBe('\n');
    expect(cursor.peek()).toBe('x');
    expect(cursor.consumeBreak()).toBe('');
  });

  it('should stop advancing at the end of input', () => {
    const cursor = new Cursor('ab');
    cursor.advance(5);
    expect(cursor.eof()).toBe(true);
    expect(cursor.offset).toBe(2);
  });

  it('should report columns relative to the line start', () => {
    const cursor = new Cursor('x\n  y');
    cursor.advance(4);
    expect(cursor.column()).toBe(2);
    expect(cursor.atLineStart()).toBe(false);
    expect(cursor.slice(2)).toBe('  ');
  });

  it('should skip a byte order mark without moving the column', () => {
    const cursor = new Cursor('\uFEFFa');
    expect(cursor.skipBom()).toBe(true);
    expect(cursor.atLineStart()).toBe(true);
    expect(cursor.column()).toBe(0);
    expect(cursor.peek()).toBe('a');
    expect(cursor.skipBom()).toBe(false);
  });

  it('should build errors at the current position', () => {
    const cursor = new Cursor('ab');
    cursor.advance();
    const error = cursor.error(ErrorKind.UnexpectedCharacter, "Unexpected character 'b'");
    expect(error.kind).toBe(ErrorKind.UnexpectedCharacter);
    expect(error.message).toBe("Unexpected character 'b' at line 1, column 2");
  });
});
