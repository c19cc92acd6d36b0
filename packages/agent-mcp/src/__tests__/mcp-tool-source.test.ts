import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { ToolCatalog } from '@conclave/agent-tools';
import { MCPToolSource, collectText, toParameterSchema } from '../client/mcp-tool-source.js';

// ── MCP SDK mock ───────────────────────────────────────────────────────

vi.mock('@modelcontextprotocol/sdk/client/index.js', () => {
  const Client = vi.fn();
  Client.prototype.connect = vi.fn().mockResolvedValue(undefined);
  Client.prototype.close = vi.fn().mockResolvedValue(undefined);
  Client.prototype.listTools = vi.fn().mockResolvedValue({
    tools: [
      {
        name: 'fetch_page',
        description: 'Fetch a web page',
        inputSchema: {
          type: 'object',
          properties: { url: { type: 'string', format: 'uri' }, depth: { type: 'integer', minimum: 0 } },
          required: ['url'],
        },
      },
      {
        name: 'summarize',
        inputSchema: { type: 'object' },
      },
      {
        name: 'delete_cache',
        description: 'Drop the cache',
        inputSchema: { type: 'object', properties: {} },
      },
    ],
  });
  Client.prototype.callTool = vi.fn().mockResolvedValue({
    content: [
      { type: 'text', text: 'page body ' },
      { type: 'image', data: 'AAAA', mimeType: 'image/png' },
      { type: 'text', text: 'token=test-secret' },
    ],
    isError: false,
  });
  return { Client };
});

vi.mock('@modelcontextprotocol/sdk/client/stdio.js', () => ({
  StdioClientTransport: vi.fn().mockImplementation(() => ({})),
}));

vi.mock('@modelcontextprotocol/sdk/client/sse.js', () => ({
  SSEClientTransport: vi.fn().mockImplementation(() => ({})),
}));

// ── Tests ──────────────────────────────────────────────────────────────

const context = { agentName: 'researcher', taskId: 'task-1' };

describe('MCPToolSource', () => {
  beforeEach(() => {
    vi.mocked(Client.prototype.callTool).mockClear();
    vi.mocked(Client.prototype.connect).mockClear();
  });

  describe('connect()', () => {
    it('connects via stdio and discovers tools', async () => {
      const onConnected = vi.fn();
      const source = new MCPToolSource(
        { name: 'web', transport: 'stdio', command: 'mcp-web', args: ['--quiet'] },
        { onConnected },
      );

      await source.connect();

      expect(source.connected).toBe(true);
      expect(source.toolNames).toEqual(['mcp_web_fetch_page', 'mcp_web_summarize', 'mcp_web_delete_cache']);
      expect(StdioClientTransport).toHaveBeenCalledWith({ command: 'mcp-web', args: ['--quiet'], env: undefined });
      expect(onConnected).toHaveBeenCalledWith('web', 3);
    });

    it('is idempotent', async () => {
      const source = new MCPToolSource({ name: 'web', transport: 'stdio', command: 'mcp-web' });

      await source.connect();
      await source.connect();

      expect(Client.prototype.connect).toHaveBeenCalledTimes(1);
    });

    it('rejects a stdio config without a command', () => {
      expect(() => new MCPToolSource({ name: 'x', transport: 'stdio' })).toThrow('stdio transport requires "command"');
    });

    it('rejects an sse config without a url', () => {
      expect(() => new MCPToolSource({ name: 'x', transport: 'sse' })).toThrow('sse transport requires "url"');
    });
  });

  describe('allowlist', () => {
    it('exposes only allowed tools and reports the rest', async () => {
      const onDenied = vi.fn();
      const source = new MCPToolSource(
        { name: 'web', transport: 'stdio', command: 'mcp-web', allowedTools: ['fetch_page', 'summarize'] },
        { onDenied },
      );

      await source.connect();

      expect(source.toolNames).toEqual(['mcp_web_fetch_page', 'mcp_web_summarize']);
      expect(onDenied).toHaveBeenCalledWith('web', 'delete_cache', 'not in allowlist');
    });
  });

  describe('registerInto()', () => {
    it('adds the tools to the catalog with converted parameters', async () => {
      const source = new MCPToolSource({ name: 'web', transport: 'stdio', command: 'mcp-web' });
      await source.connect();
      const catalog = new ToolCatalog();

      source.registerInto(catalog);
      const registry = catalog.resolve(['mcp_web_fetch_page', 'mcp_web_summarize'], context);

      expect(registry.get('mcp_web_fetch_page')?.definition.function).toEqual({
        name: 'mcp_web_fetch_page',
        description: 'Fetch a web page',
        parameters: {
          type: 'object',
          properties: { url: { type: 'string' }, depth: { type: 'integer', minimum: 0 } },
          required: ['url'],
        },
      });
      expect(registry.get('mcp_web_summarize')?.definition.function.description).toBe('MCP tool summarize on web');
    });
  });

  describe('tool calls', () => {
    it('calls the remote tool, audits redacted input and redacts output', async () => {
      const onAudit = vi.fn();
      const controller = new AbortController();
      const source = new MCPToolSource(
        {
          name: 'web',
          transport: 'stdio',
          command: 'mcp-web',
          redactInputFields: ['apiKey'],
          redactOutputPatterns: ['token=\\S+'],
        },
        { onAudit },
      );
      await source.connect();
      const catalog = new ToolCatalog();
      source.registerInto(catalog);
      const tool = catalog.resolve(['mcp_web_fetch_page'], { ...context, signal: controller.signal }).get('mcp_web_fetch_page');

      const result = await tool?.executor({ url: 'https://example.test', apiKey: 'test-secret' });

      expect(result).toEqual({ success: true, output: 'page body [REDACTED]' });
      expect(Client.prototype.callTool).toHaveBeenCalledWith(
        { name: 'fetch_page', arguments: { url: 'https://example.test', apiKey: 'test-secret' } },
        undefined,
        { signal: controller.signal },
      );
      expect(onAudit).toHaveBeenCalledWith('web', 'fetch_page', { url: 'https://example.test', apiKey: '[REDACTED]' }, 'researcher');
    });

    it('returns a server-side tool error as a failed result', async () => {
      vi.mocked(Client.prototype.callTool).mockResolvedValueOnce({
        content: [{ type: 'text', text: 'page not found' }],
        isError: true,
      });
      const source = new MCPToolSource({ name: 'web', transport: 'stdio', command: 'mcp-web' });
      await source.connect();
      const catalog = new ToolCatalog();
      source.registerInto(catalog);

      const result = await catalog.resolve(['mcp_web_fetch_page'], context).get('mcp_web_fetch_page')?.executor({ url: 'x' });

      expect(result?.success).toBe(false);
      expect(result?.error).toBe('MCP_TOOL_ERROR: page not found');
    });

    it('returns a transport failure as a failed result', async () => {
      vi.mocked(Client.prototype.callTool).mockRejectedValueOnce(new Error('server exited'));
      const source = new MCPToolSource({ name: 'web', transport: 'stdio', command: 'mcp-web' });
      await source.connect();
      const catalog = new ToolCatalog();
      source.registerInto(catalog);

      const result = await catalog.resolve(['mcp_web_fetch_page'], context).get('mcp_web_fetch_page')?.executor({ url: 'x' });

      expect(result?.error).toBe('MCP_CALL_FAILED: server exited');
    });

    it('fails once the source is disposed', async () => {
      const source = new MCPToolSource({ name: 'web', transport: 'stdio', command: 'mcp-web' });
      await source.connect();
      const catalog = new ToolCatalog();
      source.registerInto(catalog);
      const tool = catalog.resolve(['mcp_web_fetch_page'], context).get('mcp_web_fetch_page');

      await source.dispose();
      const result = await tool?.executor({ url: 'x' });

      expect(source.connected).toBe(false);
      expect(result?.errorDetails?.code).toBe('MCP_DISCONNECTED');
    });
  });
});

describe('toParameterSchema', () => {
  it('keeps supported keywords and drops the rest', () => {
    expect(
      toParameterSchema({
        type: 'array',
        items: { type: 'string', enum: ['a', 'b'], pattern: '^a' },
        description: 'letters',
        minItems: 1,
      }),
    ).toEqual({ type: 'array', description: 'letters', items: { type: 'string', enum: ['a', 'b'] } });
  });

  it('ignores unknown types and non-objects', () => {
    expect(toParameterSchema({ type: 'null' })).toEqual({});
    expect(toParameterSchema('string')).toEqual({});
  });
});

describe('collectText', () => {
  it('joins text parts', () => {
    expect(collectText([{ type: 'text', text: 'a' }, { type: 'resource' }, { type: 'text', text: 'b' }])).toBe('ab');
    expect(collectText(undefined)).toBe('');
  });
});
