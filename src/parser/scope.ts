import { Node } from './ast';
import { ContextStack } from './context';
import { Cursor } from './cursor';
import { DEFAULT_VERSION, TagTable } from './directives';
import { ScanWarning } from './errors';
import { SchemaName, resolvePlainTag, schemaForVersion } from './schema';

/** Anchors defined so far in the current document. Later definitions shadow earlier ones. */
export class AnchorTable {
  private nodes = new Map<string, Node>();

  define(name: string, node: Node): void {
    this.nodes.set(name, node);
  }

  lookup(name: string): Node | undefined {
    return this.nodes.get(name);
  }

  reset(): void {
    this.nodes.clear();
  }
}

/**
 * Everything that lives for exactly one document: the directives that
 * precede it, its anchors, and the warnings raised while reading it.
 */
export class DocumentScope {
  readonly tags = new TagTable();
  readonly anchors = new AnchorTable();
  version: string | null = null;
  warnings: ScanWarning[] = [];

  constructor(private readonly fixedSchema?: SchemaName) {}

  get effectiveVersion(): string {
    return this.version ?? DEFAULT_VERSION;
  }

  schema(): SchemaName {
    return this.fixedSchema ?? schemaForVersion(this.effectiveVersion);
  }

  resolvePlainTag(value: string): string {
    return resolvePlainTag(value, this.schema());
  }

  reset(): void {
    this.tags.reset();
    this.anchors.reset();
    this.version = null;
    this.warnings = [];
  }
}

/** State shared by the block and flow layers during one parse. */
export interface GrammarState {
  readonly cursor: Cursor;
  readonly contexts: ContextStack;
  readonly scope: DocumentScope;
  readonly tracing: boolean;
  trace(message: string): void;
}
