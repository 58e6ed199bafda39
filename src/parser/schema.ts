/**
 * Tag resolution for untagged nodes.
 *
 * The grammar only decides which tag a node carries; turning the scalar
 * text into a typed value is left to `runtime/construct`.
 */

export type SchemaName = 'failsafe' | 'json' | 'core' | 'yaml-1.1';

export const SCHEMA_NAMES: readonly SchemaName[] = ['failsafe', 'json', 'core', 'yaml-1.1'];

export const YAML_TAG_PREFIX = 'tag:yaml.org,2002:';

export const Tags = {
  str: `${YAML_TAG_PREFIX}str`,
  seq: `${YAML_TAG_PREFIX}seq`,
  map: `${YAML_TAG_PREFIX}map`,
  null: `${YAML_TAG_PREFIX}null`,
  bool: `${YAML_TAG_PREFIX}bool`,
  int: `${YAML_TAG_PREFIX}int`,
  float: `${YAML_TAG_PREFIX}float`,
} as const;

interface ScalarPatterns {
  null: RegExp;
  bool: RegExp;
  int: RegExp;
  float: RegExp;
}

export const SCALAR_PATTERNS: Record<Exclude<SchemaName, 'failsafe'>, ScalarPatterns> = {
  json: {
    null: /^null$/,
    bool: /^(?:true|false)$/,
    int: /^-?(?:0|[1-9][0-9]*)$/,
    float: /^-?(?:0|[1-9][0-9]*)(?:\.[0-9]*)?(?:[eE][-+]?[0-9]+)?$/,
  },
  core: {
    null: /^(?:~|null|Null|NULL)?$/,
    bool: /^(?:true|True|TRUE|false|False|FALSE)$/,
    int: /^(?:[-+]?[0-9]+|0o[0-7]+|0x[0-9a-fA-F]+)$/,
    float: /^(?:[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?|[-+]?\.(?:inf|Inf|INF)|\.(?:nan|NaN|NAN))$/,
  },
  'yaml-1.1': {
    null: /^(?:~|null|Null|NULL)?$/,
    bool: /^(?:y|Y|yes|Yes|YES|n|N|no|No|NO|true|True|TRUE|false|False|FALSE|on|On|ON|off|Off|OFF)$/,
    int: /^(?:[-+]?0b[01_]+|[-+]?0[0-7_]+|[-+]?(?:0|[1-9][0-9_]*)|[-+]?0x[0-9a-fA-F_]+|[-+]?[1-9][0-9_]*(?::[0-5]?[0-9])+)$/,
    float: /^(?:[-+]?(?:[0-9][0-9_]*)?\.[0-9_]*(?:[eE][-+][0-9]+)?|[-+]?[0-9][0-9_]*(?::[0-5]?[0-9])+\.[0-9_]*|[-+]?\.(?:inf|Inf|INF)|\.(?:nan|NaN|NAN))$/,
  },
};

export function isSchemaName(value: unknown): value is SchemaName {
  return typeof value === 'string' && SCHEMA_NAMES.some(name => name === value);
}

/** Resolve the tag of an untagged plain scalar. */
export function resolvePlainTag(value: string, schema: SchemaName): string {
  if (schema === 'failsafe') return Tags.str;
  // an empty node is null in every schema that has null
  if (value === '') return Tags.null;
  const patterns = SCALAR_PATTERNS[schema];
  if (patterns.null.test(value)) return Tags.null;
  if (patterns.bool.test(value)) return Tags.bool;
  if (patterns.int.test(value)) return Tags.int;
  if (patterns.float.test(value)) return Tags.float;
  return Tags.str;
}

/** Schema a document should use when the caller did not fix one. */
export function schemaForVersion(version: string): SchemaName {
  return version === '1.1' ? 'yaml-1.1' : 'core';
}
