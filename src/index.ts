export { Cursor } from './parser/cursor';
export { ContextStack, YamlContext } from './parser/context';
export type { ParametricContext } from './parser/context';
export { Parser, ParseState, parseDocuments } from './parser/parser';
export type { ParserOptions } from './parser/parser';
export * as AST from './parser/ast';
export type { Document, Node } from './parser/ast';
export { ErrorKind, ScanError, WarningKind } from './parser/errors';
export type { Mark, ScanWarning } from './parser/errors';
export { SCHEMA_NAMES, Tags, resolvePlainTag } from './parser/schema';
export type { SchemaName } from './parser/schema';
export { detectEncoding, decodeBytes } from './chars/encoding';
export type { Encoding } from './chars/encoding';
export { valueToString, valuesEqual } from './runtime/values';
export type {
  YamlValue,
  YamlNull,
  YamlBoolean,
  YamlInteger,
  YamlFloat,
  YamlString,
  YamlSequence,
  YamlMapping,
} from './runtime/values';
export { constructDocument, toJS, DEFAULT_MAX_ALIAS_EXPANSION } from './runtime/construct';
export type { ConstructOptions, JsValue } from './runtime/construct';
export { loadConfig, loadConfigForFile } from './runtime/config';
export type { TesseraConfig } from './runtime/config';
export { createToolServer, handleToolCall, serveStdio } from './server/tool-server';
export type { ToolServerOptions } from './server/tool-server';

import { toText } from './chars/encoding';
import type { Document } from './parser/ast';
import { ScanError } from './parser/errors';
import { Parser, ParserOptions } from './parser/parser';
import { constructDocument, ConstructOptions } from './runtime/construct';
import { YamlValue } from './runtime/values';

export type ParseOptions = ParserOptions;

/** Options for `load`, which also constructs values. */
export type LoadOptions = ParserOptions & Pick<ConstructOptions, 'maxAliasExpansion'>;

export type ParseResult = { ok: true; documents: Document[] } | { ok: false; error: ScanError };

/**
 * Parse a YAML stream into its documents. Throws the first `ScanError`.
 */
export function parse(input: string | Uint8Array, options: ParseOptions = {}): Document[] {
  return new Parser(toText(input), options).parse();
}

/**
 * Parse a YAML stream, reporting failure as a value instead of throwing.
 */
export function parseStream(input: string | Uint8Array, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, documents: parse(input, options) };
  } catch (error) {
    if (error instanceof ScanError) return { ok: false, error };
    throw error;
  }
}

/**
 * Parse a YAML stream and construct a typed value for every document.
 */
export function load(input: string | Uint8Array, options: LoadOptions = {}): YamlValue[] {
  return parse(input, options).map(document =>
    constructDocument(document, { schema: options.schema, maxAliasExpansion: options.maxAliasExpansion }),
  );
}
