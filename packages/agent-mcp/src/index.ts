/**
 * Model Context Protocol adapter: MCP server tools as catalog tools.
 */

export { MCPToolSource, MCPServerConfigSchema, toParameterSchema, collectText } from './client/mcp-tool-source.js';
export type { MCPServerConfig, MCPServerConfigInput, MCPSourceCallbacks } from './client/mcp-tool-source.js';
