/**
 * MCP tool layer.
 *
 * Exposes the parser to MCP clients as two tools, `parse_yaml` and
 * `validate_yaml`. The handler is transport-free so it can be called
 * directly; `createToolServer` wires it into an MCP `Server`.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { Parser } from '../parser/parser';
import { formatMark, ScanError, ScanWarning } from '../parser/errors';
import { isSchemaName, SchemaName, SCHEMA_NAMES } from '../parser/schema';
import { bigintReplacer, constructDocument, toJS } from '../runtime/construct';

export const SERVER_NAME = 'tessera-yaml';
export const SERVER_VERSION = '0.1.0';

export interface ToolServerOptions {
  /** Schema used when a call does not name one. */
  schema?: SchemaName;
  trace?: boolean;
  maxAliasExpansion?: number;
}

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export const TOOLS = [
  {
    name: 'parse_yaml',
    description: 'Parse a YAML stream and return every document as JSON.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'YAML source text' },
        schema: { type: 'string', enum: [...SCHEMA_NAMES], description: 'Scalar resolution schema (default: core)' },
      },
      required: ['text'],
    },
  },
  {
    name: 'validate_yaml',
    description: 'Check that a YAML stream is well formed and report its document count and warnings.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'YAML source text' },
      },
      required: ['text'],
    },
  },
];

/**
 * Handles tool calls. Keeps a trace like the parser does; the trace covers
 * the most recent call only, since one handler serves a whole session.
 */
export class YamlToolHandler {
  private traceEnabled: boolean;
  private traceLog: string[] = [];

  constructor(private readonly options: ToolServerOptions = {}) {
    this.traceEnabled = options.trace ?? false;
  }

  handle(name: string, args: Record<string, unknown>): ToolResult {
    this.traceLog = [];
    this.trace(`call ${name}`);
    const text = args.text;
    if (typeof text !== 'string') {
      return errorResult('Missing required string argument "text"');
    }

    switch (name) {
      case 'parse_yaml': {
        const schema = args.schema ?? this.options.schema;
        if (schema !== undefined && !isSchemaName(schema)) {
          return errorResult(`Unknown schema "${String(schema)}". Expected one of: ${SCHEMA_NAMES.join(', ')}`);
        }
        return this.parseYaml(text, schema);
      }
      case 'validate_yaml':
        return this.validateYaml(text);
      default:
        return errorResult(`Unknown tool: ${name}`);
    }
  }

  getTrace(): string[] {
    return [...this.traceLog];
  }

  private parseYaml(text: string, schema: SchemaName | undefined): ToolResult {
    try {
      const documents = new Parser(text, { schema }).parse();
      const values = documents.map(document =>
        toJS(constructDocument(document, { schema, maxAliasExpansion: this.options.maxAliasExpansion })),
      );
      this.trace(`parse_yaml: ${documents.length} document(s)`);
      return textResult(JSON.stringify(values, bigintReplacer, 2));
    } catch (error) {
      return this.scanFailure(error);
    }
  }

  private validateYaml(text: string): ToolResult {
    try {
      const documents = new Parser(text, { schema: this.options.schema }).parse();
      const warnings = documents.flatMap(document => document.warnings);
      this.trace(`validate_yaml: ${documents.length} document(s), ${warnings.length} warning(s)`);
      const lines = [`valid: ${documents.length} document(s)`, ...warnings.map(formatWarning)];
      return textResult(lines.join('\n'));
    } catch (error) {
      return this.scanFailure(error);
    }
  }

  private scanFailure(error: unknown): ToolResult {
    if (!(error instanceof ScanError)) throw error;
    this.trace(`failed: ${error.kind} at ${formatMark(error.position)}`);
    return errorResult(`${error.kind}: ${error.message}`);
  }

  private trace(message: string): void {
    this.traceLog.push(`[server] ${message}`);
    if (this.traceEnabled) {
      console.error(`  [server] ${message}`);
    }
  }
}

function textResult(text: string): ToolResult {
  return { content: [{ type: 'text' as const, text }] };
}

function errorResult(text: string): ToolResult {
  return { content: [{ type: 'text' as const, text }], isError: true };
}

function formatWarning(warning: ScanWarning): string {
  return `warning ${warning.kind} at ${formatMark(warning.position)}: ${warning.message}`;
}

/**
 * Run one tool call without a transport.
 */
export function handleToolCall(name: string, args: Record<string, unknown>, options: ToolServerOptions = {}): ToolResult {
  return new YamlToolHandler(options).handle(name, args);
}

/**
 * Create an MCP server exposing the YAML tools.
 */
export function createToolServer(options: ToolServerOptions = {}): Server {
  const handler = new YamlToolHandler(options);
  const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
  server.setRequestHandler(CallToolRequestSchema, async request =>
    handler.handle(request.params.name, request.params.arguments ?? {}),
  );

  return server;
}

/**
 * Serve the YAML tools over stdio until the client disconnects.
 */
export async function serveStdio(options: ToolServerOptions = {}): Promise<Server> {
  const server = createToolServer(options);
  await server.connect(new StdioServerTransport());
  return server;
}
