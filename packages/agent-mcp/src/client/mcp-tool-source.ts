/**
 * MCPToolSource: exposes the tools of an MCP server as catalog tools.
 *
 * Connects to an MCP server (stdio / SSE), discovers its tools and registers
 * each one into a ToolCatalog under `mcp_<server>_<tool>`.
 *
 * Security envelope:
 * - Allowlist: only listed tool names are exposed
 * - Audit trail: every call is reported through onAudit, with input fields redacted
 * - Output redaction: configured patterns are replaced before the model sees them
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { z } from 'zod';
import type { ToolDefinition, ToolParameterSchema, ToolResult } from '@conclave/agent-contracts';
import { toolError, toolErrorFromException } from '@conclave/agent-tools';
import type { Tool, ToolCatalog, ToolContext } from '@conclave/agent-tools';

// ═══════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════

export const MCPServerConfigSchema = z
  .object({
    /** Used in exposed tool names: `mcp_<name>_<tool>` */
    name: z.string().regex(/^[A-Za-z0-9_-]{1,32}$/, 'name must be 1-32 characters of letters, digits, "_" or "-"'),
    transport: z.enum(['stdio', 'sse']),
    /** stdio: command launching the server process */
    command: z.string().min(1).optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).optional(),
    /** sse: server URL */
    url: z.string().url().optional(),
    /** Only these server tools are exposed; empty exposes all */
    allowedTools: z.array(z.string()).default([]),
    /** Input fields replaced before audit reporting */
    redactInputFields: z.array(z.string()).default([]),
    /** Regex sources; matches in tool output become [REDACTED] */
    redactOutputPatterns: z.array(z.string()).default([]),
  })
  .refine((config) => config.transport !== 'stdio' || config.command !== undefined, {
    message: 'stdio transport requires "command"',
    path: ['command'],
  })
  .refine((config) => config.transport !== 'sse' || config.url !== undefined, {
    message: 'sse transport requires "url"',
    path: ['url'],
  });

export type MCPServerConfig = z.output<typeof MCPServerConfigSchema>;
export type MCPServerConfigInput = z.input<typeof MCPServerConfigSchema>;

export interface MCPSourceCallbacks {
  /** Called before each tool execution (for audit trail) */
  onAudit?: (serverName: string, toolName: string, input: Record<string, unknown>, agentName: string) => void;
  /** Called when a tool is blocked by the allowlist */
  onDenied?: (serverName: string, toolName: string, reason: string) => void;
  /** Called after successful connection */
  onConnected?: (serverName: string, toolCount: number) => void;
}

interface DiscoveredTool {
  /** Name on the MCP server */
  remoteName: string;
  definition: ToolDefinition;
}

// ═══════════════════════════════════════════════════════════════════════
// Schema conversion
// ═══════════════════════════════════════════════════════════════════════

const PARAMETER_TYPES = ['string', 'number', 'integer', 'boolean', 'object', 'array'] as const;
type ParameterType = (typeof PARAMETER_TYPES)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isParameterType(value: unknown): value is ParameterType {
  return PARAMETER_TYPES.some((type) => type === value);
}

/**
 * Keep the JSON schema keywords the function-calling format understands.
 */
export function toParameterSchema(value: unknown): ToolParameterSchema {
  if (!isRecord(value)) {
    return {};
  }
  const schema: ToolParameterSchema = {};
  if (isParameterType(value.type)) schema.type = value.type;
  if (typeof value.description === 'string') schema.description = value.description;
  if (isStringArray(value.enum)) schema.enum = value.enum;
  if (value.items !== undefined) schema.items = toParameterSchema(value.items);
  if (isRecord(value.properties)) schema.properties = toProperties(value.properties);
  if (isStringArray(value.required)) schema.required = value.required;
  if (typeof value.minimum === 'number') schema.minimum = value.minimum;
  if (typeof value.maximum === 'number') schema.maximum = value.maximum;
  return schema;
}

function toProperties(properties: Record<string, unknown>): Record<string, ToolParameterSchema> {
  return Object.fromEntries(Object.entries(properties).map(([key, value]) => [key, toParameterSchema(value)]));
}

/**
 * Concatenate the text parts of an MCP tool result.
 */
export function collectText(content: unknown): string {
  if (!Array.isArray(content)) {
    return '';
  }
  let output = '';
  for (const item of content) {
    if (isRecord(item) && item.type === 'text' && typeof item.text === 'string') {
      output += item.text;
    }
  }
  return output;
}

// ═══════════════════════════════════════════════════════════════════════
// MCPToolSource
// ═══════════════════════════════════════════════════════════════════════

/**
 * A set of catalog tools backed by a remote MCP server.
 *
 * Usage:
 *   const source = new MCPToolSource(config, callbacks);
 *   await source.connect();              // discovers server tools
 *   source.registerInto(catalog);        // exposes them as mcp_<name>_* tools
 *   await source.dispose();              // clean disconnect
 */
export class MCPToolSource {
  readonly prefix: string;

  private readonly config: MCPServerConfig;
  private readonly callbacks: MCPSourceCallbacks;
  private readonly redactPatterns: RegExp[];
  private client: Client | null = null;
  private discovered: DiscoveredTool[] = [];
  private isConnected = false;

  constructor(config: MCPServerConfigInput, callbacks: MCPSourceCallbacks = {}) {
    this.config = MCPServerConfigSchema.parse(config);
    this.callbacks = callbacks;
    this.prefix = `mcp_${this.config.name}_`;
    this.redactPatterns = this.config.redactOutputPatterns.map((source) => new RegExp(source, 'g'));
  }

  get connected(): boolean {
    return this.isConnected;
  }

  /** Exposed tool names, in server order */
  get toolNames(): string[] {
    return this.discovered.map((tool) => tool.definition.function.name);
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  /**
   * Connect to the MCP server and discover its tools. A second call is a no-op.
   */
  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    const client = new Client({ name: `conclave-mcp-${this.config.name}`, version: '1.0.0' });
    await client.connect(this.buildTransport());
    this.client = client;
    await this.discoverTools(client);
    this.isConnected = true;
    this.callbacks.onConnected?.(this.config.name, this.discovered.length);
  }

  async dispose(): Promise<void> {
    if (this.client && this.isConnected) {
      await this.client.close();
    }
    this.isConnected = false;
    this.client = null;
    this.discovered = [];
  }

  /**
   * Register every discovered tool. Returns the names added.
   */
  registerInto(catalog: ToolCatalog): string[] {
    for (const tool of this.discovered) {
      catalog.register(tool.definition.function.name, (context) => this.createTool(tool, context));
    }
    return this.toolNames;
  }

  // ── Transport ────────────────────────────────────────────────────────

  private buildTransport(): StdioClientTransport | SSEClientTransport {
    const { transport, command, url } = this.config;
    if (transport === 'stdio' && command) {
      return new StdioClientTransport({ command, args: this.config.args, env: this.config.env });
    }
    if (transport === 'sse' && url) {
      return new SSEClientTransport(new URL(url));
    }
    throw new Error(`MCP server "${this.config.name}": ${transport} transport is missing its endpoint`);
  }

  // ── Tool Discovery ───────────────────────────────────────────────────

  private async discoverTools(client: Client): Promise<void> {
    const { tools } = await client.listTools();
    const allowlist = this.config.allowedTools;

    this.discovered = [];
    for (const serverTool of tools) {
      if (allowlist.length > 0 && !allowlist.includes(serverTool.name)) {
        this.callbacks.onDenied?.(this.config.name, serverTool.name, 'not in allowlist');
        continue;
      }

      const schema = toParameterSchema(serverTool.inputSchema);
      this.discovered.push({
        remoteName: serverTool.name,
        definition: {
          type: 'function',
          function: {
            name: `${this.prefix}${serverTool.name}`.slice(0, 64),
            description: serverTool.description ?? `MCP tool ${serverTool.name} on ${this.config.name}`,
            parameters: {
              type: 'object',
              properties: schema.properties ?? {},
              ...(schema.required ? { required: schema.required } : {}),
            },
          },
        },
      });
    }
  }

  // ── Execution ────────────────────────────────────────────────────────

  private createTool(tool: DiscoveredTool, context: ToolContext): Tool {
    return {
      definition: tool.definition,
      executor: (input) => this.callTool(tool.remoteName, input, context),
    };
  }

  private async callTool(remoteName: string, input: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const client = this.client;
    if (!client || !this.isConnected) {
      return toolError({ code: 'MCP_DISCONNECTED', message: `MCP server "${this.config.name}" is not connected` });
    }

    this.callbacks.onAudit?.(this.config.name, remoteName, this.redactInput(input), context.agentName);

    try {
      const result = await client.callTool({ name: remoteName, arguments: input }, undefined, {
        signal: context.signal,
      });
      const output = this.redactOutput(collectText(result.content));
      if (result.isError === true) {
        return toolError({ code: 'MCP_TOOL_ERROR', message: output || `${remoteName} failed` });
      }
      return { success: true, output };
    } catch (error) {
      return toolErrorFromException('MCP_CALL_FAILED', error);
    }
  }

  // ── Redaction ────────────────────────────────────────────────────────

  private redactInput(input: Record<string, unknown>): Record<string, unknown> {
    const fields = this.config.redactInputFields;
    if (fields.length === 0) {
      return input;
    }
    const redacted = { ...input };
    for (const field of fields) {
      if (field in redacted) {
        redacted[field] = '[REDACTED]';
      }
    }
    return redacted;
  }

  private redactOutput(output: string): string {
    return this.redactPatterns.reduce((text, pattern) => text.replace(pattern, '[REDACTED]'), output);
  }
}
