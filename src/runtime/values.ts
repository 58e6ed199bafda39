/**
 * Typed values constructed from parsed documents.
 * Every node of a document constructs to a YamlValue.
 */

export type YamlValue =
  | YamlNull
  | YamlBoolean
  | YamlInteger
  | YamlFloat
  | YamlString
  | YamlSequence
  | YamlMapping;

interface Tagged {
  /** Tag the value was constructed under, when it is not one of the core tags. */
  tag?: string;
}

export interface YamlNull extends Tagged {
  kind: 'null';
}

export interface YamlBoolean extends Tagged {
  kind: 'boolean';
  value: boolean;
}

export interface YamlInteger extends Tagged {
  kind: 'integer';
  /** A bigint only when the value is outside the safe integer range. */
  value: number | bigint;
}

export interface YamlFloat extends Tagged {
  kind: 'float';
  value: number;
}

export interface YamlString extends Tagged {
  kind: 'string';
  value: string;
}

export interface YamlSequence extends Tagged {
  kind: 'sequence';
  items: YamlValue[];
}

export interface YamlMapping extends Tagged {
  kind: 'mapping';
  /** Entries in source order. Duplicate keys are kept. */
  entries: [YamlValue, YamlValue][];
}

// ─── Constructors ────────────────────────────────────

export function yamlNull(tag?: string): YamlNull {
  return tag === undefined ? { kind: 'null' } : { kind: 'null', tag };
}

export function yamlBoolean(value: boolean, tag?: string): YamlBoolean {
  return tag === undefined ? { kind: 'boolean', value } : { kind: 'boolean', value, tag };
}

export function yamlInteger(value: number | bigint, tag?: string): YamlInteger {
  return tag === undefined ? { kind: 'integer', value } : { kind: 'integer', value, tag };
}

export function yamlFloat(value: number, tag?: string): YamlFloat {
  return tag === undefined ? { kind: 'float', value } : { kind: 'float', value, tag };
}

export function yamlString(value: string, tag?: string): YamlString {
  return tag === undefined ? { kind: 'string', value } : { kind: 'string', value, tag };
}

export function yamlSequence(items: YamlValue[], tag?: string): YamlSequence {
  return tag === undefined ? { kind: 'sequence', items } : { kind: 'sequence', items, tag };
}

export function yamlMapping(entries: [YamlValue, YamlValue][], tag?: string): YamlMapping {
  return tag === undefined ? { kind: 'mapping', entries } : { kind: 'mapping', entries, tag };
}

// ─── Utilities ───────────────────────────────────────

export function valueToString(value: YamlValue): string {
  switch (value.kind) {
    case 'null': return 'null';
    case 'boolean': return String(value.value);
    case 'integer': return value.value.toString();
    case 'float': return floatToString(value.value);
    case 'string': return value.value;
    case 'sequence': return '[' + value.items.map(valueToString).join(', ') + ']';
    case 'mapping': {
      const entries = value.entries.map(([k, v]) => `${valueToString(k)}: ${valueToString(v)}`);
      return '{' + entries.join(', ') + '}';
    }
  }
}

function floatToString(value: number): string {
  if (Number.isNaN(value)) return '.nan';
  if (value === Infinity) return '.inf';
  if (value === -Infinity) return '-.inf';
  return String(value);
}

/** Structural equality; tags are ignored. */
export function valuesEqual(a: YamlValue, b: YamlValue): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'integer':
      return b.kind === 'integer' && BigInt(a.value) === BigInt(b.value);
    case 'float':
      return b.kind === 'float' && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'sequence':
      return (
        b.kind === 'sequence' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case 'mapping':
      return (
        b.kind === 'mapping' &&
        a.entries.length === b.entries.length &&
        a.entries.every(([k, v], i) => valuesEqual(k, b.entries[i][0]) && valuesEqual(v, b.entries[i][1]))
      );
  }
}
