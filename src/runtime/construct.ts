/**
 * Construction of typed values from a document's node tree.
 *
 * The grammar already resolved every node's tag; this module only turns
 * tagged scalar text into values and builds collections around them.
 */

import { Document, MappingNode, Node, ScalarNode, SequenceNode } from '../parser/ast';
import { ErrorKind, ScanError } from '../parser/errors';
import { SCALAR_PATTERNS, SchemaName, schemaForVersion, Tags, YAML_TAG_PREFIX } from '../parser/schema';
import {
  valueToString,
  yamlBoolean,
  yamlFloat,
  yamlInteger,
  yamlMapping,
  yamlNull,
  yamlSequence,
  yamlString,
  YamlValue,
} from './values';

export const DEFAULT_MAX_ALIAS_EXPANSION = 10000;

export interface ConstructOptions {
  /** Fixed schema; by default the document's `%YAML` version decides. */
  schema?: SchemaName;
  /** Upper bound on the number of nodes aliases may expand to per document. */
  maxAliasExpansion?: number;
}

const CORE_TAGS: ReadonlySet<string> = new Set(Object.values(Tags));

const TRUE_WORDS = new Set(['true', 'yes', 'y', 'on']);

export function constructDocument(document: Document, options: ConstructOptions = {}): YamlValue {
  const schema = options.schema ?? schemaForVersion(document.version);
  const builder = new ValueConstructor(schema, options.maxAliasExpansion ?? DEFAULT_MAX_ALIAS_EXPANSION);
  return builder.construct(document.root);
}

export class ValueConstructor {
  private values = new Map<Node, YamlValue>();
  private weights = new Map<Node, number>();
  private expanded = 0;

  constructor(
    private readonly schema: SchemaName,
    private readonly maxAliasExpansion: number,
  ) {}

  construct(node: Node): YamlValue {
    if (node.type === 'Alias') {
      this.expanded += this.weight(node.target);
      if (this.expanded > this.maxAliasExpansion) {
        throw new ScanError(
          ErrorKind.AliasLimitExceeded,
          `Aliases expand to more than ${this.maxAliasExpansion} nodes`,
          node.position,
        );
      }
      return this.values.get(node.target) ?? this.construct(node.target);
    }

    const cached = this.values.get(node);
    if (cached) return cached;

    const value =
      node.type === 'Scalar'
        ? this.constructScalar(node)
        : node.type === 'Sequence'
          ? this.constructSequence(node)
          : this.constructMapping(node);
    if (node.anchor !== undefined) this.values.set(node, value);
    return value;
  }

  private constructSequence(node: SequenceNode): YamlValue {
    this.expectTag(node, Tags.seq, 'sequence');
    return yamlSequence(node.items.map(item => this.construct(item)), customTag(node.tag));
  }

  private constructMapping(node: MappingNode): YamlValue {
    this.expectTag(node, Tags.map, 'mapping');
    const entries = node.entries.map(({ key, value }): [YamlValue, YamlValue] => [this.construct(key), this.construct(value)]);
    return yamlMapping(entries, customTag(node.tag));
  }

  private expectTag(node: SequenceNode | MappingNode, tag: string, what: string): void {
    if (CORE_TAGS.has(node.tag) && node.tag !== tag) {
      throw new ScanError(ErrorKind.UnexpectedCharacter, `Tag ${shortTag(node.tag)} cannot be applied to a ${what}`, node.position);
    }
  }

  private constructScalar(node: ScalarNode): YamlValue {
    const { tag, value: text } = node;
    if (!CORE_TAGS.has(tag)) return yamlString(text, customTag(tag));

    const patterns = SCALAR_PATTERNS[this.schema === 'failsafe' ? 'core' : this.schema];
    const mismatch = () =>
      new ScanError(ErrorKind.UnexpectedCharacter, `Cannot construct ${shortTag(tag)} from '${text}'`, node.position);

    switch (tag) {
      case Tags.str:
        return yamlString(text);
      case Tags.null:
        if (text !== '' && !patterns.null.test(text)) throw mismatch();
        return yamlNull();
      case Tags.bool:
        if (!patterns.bool.test(text)) throw mismatch();
        return yamlBoolean(TRUE_WORDS.has(text.toLowerCase()));
      case Tags.int: {
        const parsed = patterns.int.test(text) ? parseInteger(text, this.schema) : null;
        if (parsed === null) throw mismatch();
        return yamlInteger(parsed);
      }
      case Tags.float: {
        const parsed = patterns.float.test(text) || patterns.int.test(text) ? parseFloatText(text, this.schema) : null;
        if (parsed === null) throw mismatch();
        return yamlFloat(parsed);
      }
      case Tags.seq:
      case Tags.map:
        throw new ScanError(ErrorKind.UnexpectedCharacter, `Tag ${shortTag(tag)} cannot be applied to a scalar`, node.position);
      default:
        return yamlString(text);
    }
  }

  /** Number of nodes `node` stands for once every alias inside it is expanded. */
  private weight(node: Node): number {
    if (node.type === 'Alias') return this.weight(node.target);
    const cached = this.weights.get(node);
    if (cached !== undefined) return cached;

    let total = 1;
    if (node.type === 'Sequence') {
      for (const item of node.items) total += this.weight(item);
    } else if (node.type === 'Mapping') {
      for (const { key, value } of node.entries) total += this.weight(key) + this.weight(value);
    }
    this.weights.set(node, total);
    return total;
  }
}

/** The tag to keep on a value: custom tags only. */
function customTag(tag: string): string | undefined {
  return CORE_TAGS.has(tag) || tag === '!' ? undefined : tag;
}

function shortTag(tag: string): string {
  return tag.startsWith(YAML_TAG_PREFIX) ? '!!' + tag.slice(YAML_TAG_PREFIX.length) : tag;
}

// ─── Number parsing ──────────────────────────────────

function toSafeInteger(value: bigint): number | bigint {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
}

function splitSign(text: string): [bigint, string] {
  if (text.startsWith('-')) return [-1n, text.slice(1)];
  if (text.startsWith('+')) return [1n, text.slice(1)];
  return [1n, text];
}

/**
 * Integer value of `text` in the given schema: decimal, `0x` hex and `0o`
 * octal, plus `0b` binary, `0`-prefixed octal, `_` separators and base 60
 * under YAML 1.1. Returns null when the text is not an integer.
 */
export function parseInteger(text: string, schema: SchemaName): number | bigint | null {
  const legacy = schema === 'yaml-1.1';
  const [sign, digits] = splitSign(legacy ? text.replace(/_/g, '') : text);
  let magnitude: bigint;

  if (legacy && digits.includes(':')) {
    magnitude = digits.split(':').reduce((total, part) => total * 60n + BigInt(part), 0n);
  } else if (/^0x[0-9a-fA-F]+$/.test(digits) || /^0o[0-7]+$/.test(digits)) {
    magnitude = BigInt(digits);
  } else if (legacy && /^0b[01]+$/.test(digits)) {
    magnitude = BigInt(digits);
  } else if (legacy && /^0[0-7]+$/.test(digits)) {
    magnitude = BigInt('0o' + digits.slice(1));
  } else if (/^[0-9]+$/.test(digits)) {
    magnitude = BigInt(digits);
  } else {
    return null;
  }

  return toSafeInteger(sign * magnitude);
}

/** Float value of `text`, including `.inf` and `.nan`. Returns null when it is not a number. */
export function parseFloatText(text: string, schema: SchemaName): number | null {
  const cleaned = schema === 'yaml-1.1' ? text.replace(/_/g, '') : text;
  const lower = cleaned.toLowerCase();

  if (lower === '.nan') return NaN;
  if (/^[-+]?\.inf$/.test(lower)) return lower.startsWith('-') ? -Infinity : Infinity;

  if (schema === 'yaml-1.1' && cleaned.includes(':')) {
    const negative = cleaned.startsWith('-');
    const parts = cleaned.replace(/^[-+]/, '').split(':');
    const value = parts.reduce((total, part) => total * 60 + Number(part), 0);
    return Number.isNaN(value) ? null : negative ? -value : value;
  }

  const integer = parseInteger(cleaned, schema);
  if (integer !== null) return Number(integer);
  const value = Number(cleaned);
  return Number.isNaN(value) ? null : value;
}

// ─── Plain JavaScript ────────────────────────────────

export type JsValue = null | boolean | number | bigint | string | JsValue[] | { [key: string]: JsValue };

/**
 * Convert a value to plain JavaScript. Mapping keys become strings; when
 * two keys map to the same string the later entry wins.
 */
export function toJS(value: YamlValue): JsValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'integer':
    case 'float':
    case 'string':
      return value.value;
    case 'sequence':
      return value.items.map(toJS);
    case 'mapping': {
      const result: { [key: string]: JsValue } = {};
      for (const [key, item] of value.entries) {
        Object.defineProperty(result, keyToString(key), {
          value: toJS(item),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return result;
    }
  }
}

function keyToString(key: YamlValue): string {
  if (key.kind === 'string') return key.value;
  if (key.kind === 'sequence' || key.kind === 'mapping') return JSON.stringify(toJS(key), bigintReplacer);
  return valueToString(key);
}

/** `JSON.stringify` replacer writing bigints as strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
