import { parse, parseStream } from '../src/index';
import { ErrorKind, ScanWarning, WarningKind } from '../src/parser/errors';
import { Parser } from '../src/parser/parser';
import { Tags } from '../src/parser/schema';
import { asScalar, catchScanError, plain } from './helpers';

function utf16le(text: string): Uint8Array {
  const bytes: number[] = [];
  for (const unit of text) {
    const code = unit.charCodeAt(0);
    bytes.push(code & 0xff, code >> 8);
  }
  return Uint8Array.from(bytes);
}

describe('Parser', () => {
  describe('document stream', () => {
    it('should return no documents for an empty stream', () => {
      expect(parse('')).toEqual([]);
      expect(parse('# only a comment\n\n')).toEqual([]);
    });

    it('should split documents at markers', () => {
      const documents = parse('---\na: 1\n...\n---\nb: 2\n');
      expect(documents).toHaveLength(2);
      expect(documents.map(document => plain(document.root))).toEqual([{ a: '1' }, { b: '2' }]);
    });

    it('should record explicit start and end markers', () => {
      const [first, second] = parse('---\na: 1\n...\n---\nb: 2\n');
      expect(plain(first.root)).toEqual({ a: '1' });
      expect(first.explicitStart).toBe(true);
      expect(first.explicitEnd).toBe(true);
      expect(plain(second.root)).toEqual({ b: '2' });
      expect(second.explicitEnd).toBe(false);
    });

    it('should start a new document after a bare one', () => {
      const documents = parse('a\n---\nb\n');
      expect(documents.map(document => plain(document.root))).toEqual(['a', 'b']);
      expect(documents[0].explicitStart).toBe(false);
      expect(documents[1].explicitStart).toBe(true);
    });

    it('should give an empty document a null root', () => {
      const [document] = parse('---\n');
      const root = asScalar(document.root);
      expect(root.value).toBe('');
      expect(root.tag).toBe(Tags.null);
    });

    it('should read consecutive empty documents', () => {
      expect(parse('--- \n---\n')).toHaveLength(2);
    });

    it('should read content on the start marker line', () => {
      expect(plain(parse('--- text')[0].root)).toBe('text');
      expect(plain(parse('--- |\n  x\n')[0].root)).toBe('x\n');
    });

    it('should skip byte order marks between documents', () => {
      expect(parse('\uFEFFa: 1\n').map(document => plain(document.root))).toEqual([{ a: '1' }]);
      expect(parse('a\n...\n\uFEFFb\n').map(document => plain(document.root))).toEqual(['a', 'b']);
    });

    it('should read block collections after a byte order mark', () => {
      expect(plain(parse('\uFEFF- a\n- b\n')[0].root)).toEqual(['a', 'b']);
      expect(parse('x\n...\n\uFEFFa: 1\n').map(document => plain(document.root))).toEqual(['x', { a: '1' }]);
    });

    it('should not count a byte order mark as a column', () => {
      const [document] = parse('\uFEFFa: 1\n');
      expect(document.root.position).toEqual({ line: 1, column: 1, offset: 1 });
    });

    it('should decode byte input that starts with a byte order mark', () => {
      expect(plain(parse(Buffer.from('\uFEFFa: 1\n', 'utf-8'))[0].root)).toEqual({ a: '1' });
      expect(plain(parse(utf16le('\uFEFF- a\n'))[0].root)).toEqual(['a']);
    });

    it('should ignore a document end marker with no open document', () => {
      expect(parse('...\na\n').map(document => plain(document.root))).toEqual(['a']);
    });

    it('should decode byte input', () => {
      expect(plain(parse(utf16le('a: 1\n'))[0].root)).toEqual({ a: '1' });
    });

    it('should reject content after the root node', () => {
      const error = catchScanError(() => parse('"a"\nb\n'));
      expect(error.kind).toBe(ErrorKind.UnexpectedCharacter);
      expect(error.reason).toBe("Unexpected content 'b' after the document's root node");
      expect(error.position).toEqual({ line: 2, column: 1, offset: 4 });
    });
  });

  describe('directives', () => {
    it('should record the %YAML version', () => {
      const [document] = parse('%YAML 1.1\n---\nflag: yes\n');
      expect(document.version).toBe('1.1');
      expect(document.explicitStart).toBe(true);
    });

    it('should default to version 1.2', () => {
      expect(parse('a')[0].version).toBe('1.2');
    });

    it('should warn about unsupported versions and read them as 1.2', () => {
      const [document] = parse('%YAML 1.3\n---\na\n');
      expect(document.version).toBe('1.2');
      expect(document.warnings).toEqual([
        {
          kind: WarningKind.UnsupportedVersion,
          message: 'YAML version 1.3 is not supported, reading as 1.2',
          position: { line: 1, column: 1, offset: 0 },
        },
      ]);
    });

    it('should reject a second %YAML directive', () => {
      const error = catchScanError(() => parse('%YAML 1.2\n%YAML 1.2\n---\na\n'));
      expect(error.kind).toBe(ErrorKind.MalformedDirective);
      expect(error.reason).toBe('Only one %YAML directive is allowed per document');
      expect(error.position).toEqual({ line: 2, column: 1, offset: 10 });
    });

    it('should expand named tag handles', () => {
      const [document] = parse('%TAG !e! tag:example.com,2000:\n--- !e!foo bar\n');
      const root = asScalar(document.root);
      expect(root.tag).toBe('tag:example.com,2000:foo');
      expect(root.value).toBe('bar');
      expect(document.tags).toEqual({ '!e!': 'tag:example.com,2000:' });
    });

    it('should use the later prefix for a repeated handle and warn', () => {
      const [document] = parse('%TAG !e! a:\n%TAG !e! b:\n--- !e!x y\n');
      expect(asScalar(document.root).tag).toBe('b:x');
      expect(document.warnings.map(warning => warning.kind)).toEqual([WarningKind.DuplicateTagHandle]);
    });

    it('should scope tag handles to one document', () => {
      const error = catchScanError(() => parse('%TAG !e! tag:e,2000:\n--- !e!a x\n...\n--- !e!b y\n'));
      expect(error.kind).toBe(ErrorKind.UnknownTagHandle);
      expect(error.reason).toBe('Tag handle !e! was not declared by a %TAG directive');
    });

    it('should warn about and skip unknown directives', () => {
      const seen: ScanWarning[] = [];
      const [document] = parse('%FOO bar\n---\nx\n', { onWarning: warning => seen.push(warning) });
      expect(plain(document.root)).toBe('x');
      expect(seen.map(warning => warning.message)).toEqual(['Ignoring unknown directive %FOO']);
      expect(document.warnings).toEqual(seen);
    });

    it('should require a document start marker after directives', () => {
      expect(catchScanError(() => parse('%YAML 1.2\nfoo\n')).kind).toBe(ErrorKind.ExpectedDocumentStart);
      expect(catchScanError(() => parse('%YAML 1.2\n')).kind).toBe(ErrorKind.ExpectedDocumentStart);
    });

    it('should reject directives after document content', () => {
      const error = catchScanError(() => parse('a: 1\n%TAG !x! tag:x,2000:\n'));
      expect(error.kind).toBe(ErrorKind.DirectiveAfterContent);
      expect(error.position).toEqual({ line: 2, column: 1, offset: 5 });
    });

    it('should reject a malformed %YAML directive', () => {
      const error = catchScanError(() => parse('%YAML one\n---\n'));
      expect(error.kind).toBe(ErrorKind.MalformedDirective);
      expect(error.reason).toBe('%YAML directive expects a single major.minor version');
    });
  });

  describe('options', () => {
    it('should resolve plain scalars with a fixed schema', () => {
      const [document] = parse('1', { schema: 'failsafe' });
      expect(asScalar(document.root).tag).toBe(Tags.str);
    });

    it('should resolve YAML 1.1 booleans under %YAML 1.1', () => {
      expect(asScalar(parse('%YAML 1.1\n--- yes\n')[0].root).tag).toBe(Tags.bool);
      expect(asScalar(parse('yes')[0].root).tag).toBe(Tags.str);
    });

    it('should stop at the nesting limit', () => {
      const error = catchScanError(() => parse('['.repeat(50), { maxDepth: 20 }));
      expect(error.kind).toBe(ErrorKind.NestingTooDeep);
      expect(error.reason).toBe('Nesting exceeds 20 levels');
    });
  });

  describe('parseStream', () => {
    it('should return documents on success', () => {
      const result = parseStream('a: 1');
      expect(result.ok).toBe(true);
      if (result.ok) expect(result.documents).toHaveLength(1);
    });

    it('should return the error instead of throwing', () => {
      const result = parseStream('[');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe(ErrorKind.ExpectedCloseDelimiter);
    });
  });

  describe('trace', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should log document boundaries', () => {
      const parser = new Parser('a: 1');
      parser.parse();
      expect(parser.getTrace()).toEqual([
        '[parser] document 1 opened (implicit start)',
        '[parser] document 1 closed (Mapping)',
      ]);
    });

    it('should log state transitions to stderr when tracing', () => {
      const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const parser = new Parser('a: 1', { trace: true });
      parser.parse();
      expect(parser.getTrace()).toContain('[parser] StreamStart -> DirectiveOrDocumentStart');
      expect(parser.getTrace()).toContain('[parser] BlockMappingFirstKey (indent 0)');
      expect(spy).toHaveBeenCalledWith('  [parser] StreamStart -> DirectiveOrDocumentStart');
    });
  });
});
