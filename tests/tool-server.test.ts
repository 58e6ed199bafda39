import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { createToolServer, handleToolCall, serveStdio, TOOLS, YamlToolHandler } from '../src/server/tool-server';

type MockHandler = (request: unknown) => Promise<unknown>;
const mockHandlers = new Map<unknown, MockHandler>();

// Mock the MCP SDK server modules
jest.mock('@modelcontextprotocol/sdk/server/index.js', () => {
  return {
    Server: jest.fn().mockImplementation(() => ({
      setRequestHandler: jest.fn((schema: unknown, handler: MockHandler) => {
        mockHandlers.set(schema, handler);
      }),
      connect: jest.fn().mockResolvedValue(undefined),
    })),
  };
});

jest.mock('@modelcontextprotocol/sdk/server/stdio.js', () => {
  return {
    StdioServerTransport: jest.fn().mockImplementation(() => ({})),
  };
});

function handlerFor(schema: unknown): MockHandler {
  const handler = mockHandlers.get(schema);
  if (!handler) throw new Error('No handler registered');
  return handler;
}

describe('YAML tool server', () => {
  describe('handleToolCall()', () => {
    it('should return parsed documents as JSON', () => {
      const result = handleToolCall('parse_yaml', { text: 'a: 1\n---\n- x\n' });
      expect(result.isError).toBeUndefined();
      expect(JSON.parse(result.content[0].text)).toEqual([{ a: 1 }, ['x']]);
    });

    it('should honor the schema argument', () => {
      const result = handleToolCall('parse_yaml', { text: 'a: 1', schema: 'failsafe' });
      expect(JSON.parse(result.content[0].text)).toEqual([{ a: '1' }]);
    });

    it('should write large integers as strings', () => {
      const result = handleToolCall('parse_yaml', { text: '12345678901234567890' });
      expect(result.content[0].text).toBe('[\n  "12345678901234567890"\n]');
    });

    it('should reject an unknown schema', () => {
      const result = handleToolCall('parse_yaml', { text: 'a', schema: 'xml' });
      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe('Unknown schema "xml". Expected one of: failsafe, json, core, yaml-1.1');
    });

    it('should require the text argument', () => {
      const result = handleToolCall('validate_yaml', {});
      expect(result).toEqual({
        content: [{ type: 'text', text: 'Missing required string argument "text"' }],
        isError: true,
      });
    });

    it('should report the document count and warnings', () => {
      const result = handleToolCall('validate_yaml', { text: '%FOO\n---\na\n---\nb\n' });
      expect(result.content[0].text).toBe(
        'valid: 2 document(s)\nwarning UnknownDirective at 1:1: Ignoring unknown directive %FOO',
      );
    });

    it('should report scan errors as tool errors', () => {
      const result = handleToolCall('validate_yaml', { text: '[1, 2' });
      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe(
        "ExpectedCloseDelimiter: Flow sequence is missing its closing ']' at line 1, column 1",
      );
    });

    it('should reject unknown tools', () => {
      expect(handleToolCall('format_yaml', { text: '' }).content[0].text).toBe('Unknown tool: format_yaml');
    });
  });

  describe('YamlToolHandler', () => {
    it('should keep only the latest call in the trace', () => {
      const handler = new YamlToolHandler();
      handler.handle('validate_yaml', { text: 'a' });
      handler.handle('parse_yaml', { text: '[1]' });
      expect(handler.getTrace()).toEqual(['[server] call parse_yaml', '[server] parse_yaml: 1 document(s)']);
    });

    it('should trace each call', () => {
      const handler = new YamlToolHandler();
      handler.handle('validate_yaml', { text: 'a' });
      expect(handler.getTrace()).toEqual([
        '[server] call validate_yaml',
        '[server] validate_yaml: 1 document(s), 0 warning(s)',
      ]);
    });

    it('should apply the configured alias limit', () => {
      const handler = new YamlToolHandler({ maxAliasExpansion: 1 });
      const result = handler.handle('parse_yaml', { text: 'a: &x [1]\nb: *x\n' });
      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe('AliasLimitExceeded: Aliases expand to more than 1 nodes at line 2, column 4');
    });
  });

  describe('MCP server', () => {
    beforeEach(() => {
      jest.clearAllMocks();
      mockHandlers.clear();
    });

    it('should register as a tools server', () => {
      createToolServer();
      expect(Server).toHaveBeenCalledWith({ name: 'tessera-yaml', version: '0.1.0' }, { capabilities: { tools: {} } });
    });

    it('should list both tools', async () => {
      createToolServer();
      await expect(handlerFor(ListToolsRequestSchema)({ method: 'tools/list' })).resolves.toEqual({ tools: TOOLS });
    });

    it('should route tool calls to the handler', async () => {
      createToolServer({ schema: 'failsafe' });
      const result = await handlerFor(CallToolRequestSchema)({
        method: 'tools/call',
        params: { name: 'parse_yaml', arguments: { text: '[1, 2]' } },
      });
      expect(result).toEqual({ content: [{ type: 'text', text: '[\n  [\n    "1",\n    "2"\n  ]\n]' }] });
    });

    it('should connect over stdio', async () => {
      const server = await serveStdio();
      expect(StdioServerTransport).toHaveBeenCalledTimes(1);
      expect(server.connect).toHaveBeenCalledTimes(1);
    });
  });
});
