/**
 * Tool registry for managing available tools
 */

import type { ToolDefinition } from '@conclave/agent-contracts';
import type { Tool, ToolContext, ToolFactory } from './types.js';

/**
 * The set of tools one agent run may call.
 */
export class ToolRegistry {
  private tools = new Map<string, Tool>();

  /**
   * Register a tool
   */
  register(tool: Tool): void {
    this.tools.set(tool.definition.function.name, tool);
  }

  /**
   * Get tool by name
   */
  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Get all tool definitions for LLM
   */
  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition);
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys()).sort();
  }
}

/**
 * Process-wide catalogue of tool factories, resolved by name for each run.
 */
export class ToolCatalog {
  private factories = new Map<string, ToolFactory>();

  register(name: string, factory: ToolFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return Array.from(this.factories.keys()).sort();
  }

  /**
   * Names from `requested` that the catalogue cannot provide.
   */
  missing(requested: readonly string[]): string[] {
    return requested.filter((name) => !this.factories.has(name));
  }

  /**
   * Build a registry holding the requested tools, in request order.
   * Unknown names are skipped; callers validate with `missing()` first.
   */
  resolve(requested: readonly string[], context: ToolContext): ToolRegistry {
    const registry = new ToolRegistry();
    for (const name of new Set(requested)) {
      const factory = this.factories.get(name);
      if (factory) {
        registry.register(factory(context));
      }
    }
    return registry;
  }
}
