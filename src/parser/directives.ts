import { isBlankOrEnd, isBreak, isFlowIndicator, isUriChar, isWhite } from '../chars/classifier';
import { Cursor } from './cursor';
import { ErrorKind, Mark } from './errors';
import { YAML_TAG_PREFIX } from './schema';

export type Directive =
  | { kind: 'version'; major: number; minor: number; position: Mark }
  | { kind: 'tag'; handle: string; prefix: string; position: Mark }
  | { kind: 'reserved'; name: string; parameters: string[]; position: Mark };

export const SUPPORTED_VERSIONS = ['1.1', '1.2'];

export const DEFAULT_VERSION = '1.2';

/** Handles that resolve without a `%TAG` directive. */
export const DEFAULT_TAG_HANDLES: Readonly<Record<string, string>> = {
  '!': '!',
  '!!': YAML_TAG_PREFIX,
};

const HANDLE_PATTERN = /^!(?:[0-9A-Za-z-]*!)?$/;
const VERSION_PATTERN = /^([0-9]+)\.([0-9]+)$/;

/**
 * Handle-to-prefix table built from the `%TAG` directives preceding one
 * document. Cleared at every document boundary.
 */
export class TagTable {
  private prefixes = new Map<string, string>();

  /** Register a handle; returns false when it replaced an earlier registration. */
  register(handle: string, prefix: string): boolean {
    const fresh = !this.prefixes.has(handle);
    this.prefixes.set(handle, prefix);
    return fresh;
  }

  has(handle: string): boolean {
    return this.prefixes.has(handle);
  }

  /** Prefix for `handle`, falling back to the default `!` and `!!` handles. */
  prefixFor(handle: string): string | undefined {
    return this.prefixes.get(handle) ?? DEFAULT_TAG_HANDLES[handle];
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.prefixes);
  }

  reset(): void {
    this.prefixes.clear();
  }
}

/**
 * Read one directive line. The cursor must be on the `%` at the start of a
 * line; it is left before the line break.
 */
export function parseDirective(cursor: Cursor): Directive {
  const position = cursor.mark();
  cursor.advance();

  const name = readToken(cursor);
  if (name === '') {
    throw cursor.error(ErrorKind.MalformedDirective, 'Directive name missing after %', position);
  }

  const parameters: string[] = [];
  for (;;) {
    let spaces = 0;
    while (isWhite(cursor.peek(spaces))) spaces++;
    const next = cursor.peek(spaces);
    if (next === '' || isBreak(next)) {
      cursor.advance(spaces);
      break;
    }
    if (next === '#' && spaces > 0) {
      cursor.advance(spaces);
      while (!cursor.eof() && !isBreak(cursor.peek())) cursor.advance();
      break;
    }
    if (spaces === 0) {
      throw cursor.error(ErrorKind.MalformedDirective, `Unexpected character '${next}' in %${name} directive`);
    }
    cursor.advance(spaces);
    parameters.push(readToken(cursor));
  }

  switch (name) {
    case 'YAML':
      return versionDirective(cursor, parameters, position);
    case 'TAG':
      return tagDirective(cursor, parameters, position);
    default:
      return { kind: 'reserved', name, parameters, position };
  }
}

function versionDirective(cursor: Cursor, parameters: string[], position: Mark): Directive {
  const match = parameters.length === 1 ? VERSION_PATTERN.exec(parameters[0]) : null;
  if (!match) {
    throw cursor.error(ErrorKind.MalformedDirective, '%YAML directive expects a single major.minor version', position);
  }
  return { kind: 'version', major: parseInt(match[1], 10), minor: parseInt(match[2], 10), position };
}

function tagDirective(cursor: Cursor, parameters: string[], position: Mark): Directive {
  if (parameters.length !== 2) {
    throw cursor.error(ErrorKind.MalformedDirective, '%TAG directive expects a handle and a prefix', position);
  }
  const [handle, prefix] = parameters;
  if (!HANDLE_PATTERN.test(handle)) {
    throw cursor.error(ErrorKind.MalformedDirective, `Invalid tag handle '${handle}'`, position);
  }
  const chars = Array.from(prefix);
  if (chars[0] !== '!' && isFlowIndicator(chars[0])) {
    throw cursor.error(ErrorKind.MalformedDirective, `Tag prefix '${prefix}' cannot start with a flow indicator`, position);
  }
  if (!chars.every(isUriChar)) {
    throw cursor.error(ErrorKind.MalformedDirective, `Invalid character in tag prefix '${prefix}'`, position);
  }
  return { kind: 'tag', handle, prefix, position };
}

function readToken(cursor: Cursor): string {
  const start = cursor.offset;
  while (!isBlankOrEnd(cursor.peek())) cursor.advance();
  return cursor.slice(start);
}

/**
 * Expand a shorthand tag. `!` with an empty suffix is the non-specific tag
 * and passes through unchanged. Returns undefined when the handle is unknown.
 */
export function resolveShorthand(tags: TagTable, handle: string, suffix: string): string | undefined {
  if (handle === '!' && suffix === '') return '!';
  const prefix = tags.prefixFor(handle);
  if (prefix === undefined) return undefined;
  return prefix + suffix;
}
