/**
 * Errors and warnings raised while scanning a YAML stream.
 */

export interface Mark {
  /** 1-based line. */
  line: number;
  /** 1-based column. */
  column: number;
  /** 0-based offset into the decoded stream. */
  offset: number;
}

export enum ErrorKind {
  InvalidEscape = 'InvalidEscape',
  ExpectedSeparation = 'ExpectedSeparation',
  ExpectedCloseDelimiter = 'ExpectedCloseDelimiter',
  UnexpectedIndentation = 'UnexpectedIndentation',
  UnknownAnchor = 'UnknownAnchor',
  UnknownTagHandle = 'UnknownTagHandle',
  DirectiveAfterContent = 'DirectiveAfterContent',
  MalformedDirective = 'MalformedDirective',
  UnexpectedCharacter = 'UnexpectedCharacter',
  UnterminatedScalar = 'UnterminatedScalar',
  InvalidBlockScalarHeader = 'InvalidBlockScalarHeader',
  ExpectedDocumentStart = 'ExpectedDocumentStart',
  InvalidEncoding = 'InvalidEncoding',
  InvalidNodeProperties = 'InvalidNodeProperties',
  NestingTooDeep = 'NestingTooDeep',
  AliasLimitExceeded = 'AliasLimitExceeded',
}

export enum WarningKind {
  DuplicateTagHandle = 'DuplicateTagHandle',
  UnsupportedVersion = 'UnsupportedVersion',
  UnknownDirective = 'UnknownDirective',
}

export class ScanError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly reason: string,
    public readonly position: Mark,
  ) {
    super(`${reason} at line ${position.line}, column ${position.column}`);
    this.name = 'ScanError';
  }
}

export interface ScanWarning {
  kind: WarningKind;
  message: string;
  position: Mark;
}

export function formatMark(mark: Mark): string {
  return `${mark.line}:${mark.column}`;
}
