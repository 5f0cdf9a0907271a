/**
 * Tool registry for managing available tools
 *
 * One registry is shared by every session; per-call state travels in
 * ToolExecCtx.
 */

import type { Capability, ToolDefinition, ToolResult } from '@baton/agent-contracts';
import type { Tool, ToolExecCtx } from './types.js';

export class ToolRegistry {
  private tools = new Map<string, Tool>();

  /**
   * Register a tool. Re-registering a name replaces the previous tool.
   */
  register(tool: Tool): void {
    this.tools.set(tool.definition.name, tool);
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
   * Tools an agent holding `capabilities` may call
   */
  forCapabilities(capabilities: readonly Capability[]): Tool[] {
    return Array.from(this.tools.values()).filter((tool) =>
      capabilities.includes(tool.policy.capability),
    );
  }

  /**
   * Get tool definitions for LLM, optionally restricted to a capability set
   */
  getDefinitions(capabilities?: readonly Capability[]): ToolDefinition[] {
    const tools = capabilities ? this.forCapabilities(capabilities) : Array.from(this.tools.values());
    return tools.map((t) => t.definition);
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys()).sort();
  }

  /**
   * Execute a tool
   */
  async execute(name: string, input: Record<string, unknown>, ctx: ToolExecCtx): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }

    return tool.executor(input, ctx);
  }
}
