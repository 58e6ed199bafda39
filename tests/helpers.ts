import { parse, ParseOptions } from '../src/index';
import { MappingNode, Node, ScalarNode, SequenceNode } from '../src/parser/ast';
import { ScanError } from '../src/parser/errors';

export type Plain = string | Plain[] | { [key: string]: Plain };

export function catchScanError(fn: () => unknown): ScanError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ScanError) return error;
    throw error;
  }
  throw new Error('Expected a ScanError');
}

/** Root node of the only document in `source`. */
export function rootOf(source: string, options: ParseOptions = {}): Node {
  const documents = parse(source, options);
  if (documents.length !== 1) {
    throw new Error(`Expected one document, got ${documents.length}`);
  }
  return documents[0].root;
}

export function asScalar(node: Node): ScalarNode {
  if (node.type !== 'Scalar') throw new Error(`Expected Scalar, got ${node.type}`);
  return node;
}

export function asSequence(node: Node): SequenceNode {
  if (node.type !== 'Sequence') throw new Error(`Expected Sequence, got ${node.type}`);
  return node;
}

export function asMapping(node: Node): MappingNode {
  if (node.type !== 'Mapping') throw new Error(`Expected Mapping, got ${node.type}`);
  return node;
}

/** Scalar text of a node tree, with aliases followed and mapping keys flattened to strings. */
export function plain(node: Node): Plain {
  switch (node.type) {
    case 'Scalar':
      return node.value;
    case 'Alias':
      return plain(node.target);
    case 'Sequence':
      return node.items.map(plain);
    case 'Mapping': {
      const result: { [key: string]: Plain } = {};
      for (const { key, value } of node.entries) {
        result[String(plain(key))] = plain(value);
      }
      return result;
    }
  }
}

export function plainOf(source: string, options: ParseOptions = {}): Plain {
  return plain(rootOf(source, options));
}
