import { Mark, ScanWarning } from './errors';

export type Node = ScalarNode | SequenceNode | MappingNode | AliasNode;

export type ScalarStyle = 'plain' | 'single-quoted' | 'double-quoted' | 'literal' | 'folded';

export type CollectionStyle = 'block' | 'flow';

export interface BaseNode {
  position: Mark;
  /** Name given by an `&anchor` property, if any. */
  anchor?: string;
}

export interface ScalarNode extends BaseNode {
  type: 'Scalar';
  value: string;
  style: ScalarStyle;
  /** Resolved tag; `!` for the explicit non-specific tag. */
  tag: string;
}

export interface SequenceNode extends BaseNode {
  type: 'Sequence';
  items: Node[];
  style: CollectionStyle;
  tag: string;
}

export interface Pair {
  key: Node;
  value: Node;
}

export interface MappingNode extends BaseNode {
  type: 'Mapping';
  /** Entries in source order; keys are not deduplicated. */
  entries: Pair[];
  style: CollectionStyle;
  tag: string;
}

export interface AliasNode {
  type: 'Alias';
  name: string;
  /** The anchored node this alias refers to. Never an ancestor of the alias. */
  target: Node;
  position: Mark;
}

export interface Document {
  root: Node;
  /** `%YAML` version in effect, e.g. "1.2". */
  version: string;
  /** Tag handles registered by `%TAG` directives for this document. */
  tags: Record<string, string>;
  explicitStart: boolean;
  explicitEnd: boolean;
  warnings: ScanWarning[];
}
