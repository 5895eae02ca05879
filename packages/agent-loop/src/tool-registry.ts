/**
 * Tool registry: the name-to-executor map a session dispatches tool calls to.
 */

import type { RegisteredTool, ToolDefinition } from "./types.js";

export class ToolRegistry {
  private _tools: Map<string, RegisteredTool> = new Map();

  constructor(tools: Iterable<RegisteredTool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Register a tool. A tool registered under an existing name replaces it.
   */
  register(tool: RegisteredTool): void {
    this._tools.set(tool.definition.name, tool);
  }

  /** No-op if the tool does not exist. */
  unregister(name: string): void {
    this._tools.delete(name);
  }

  get(name: string): RegisteredTool | undefined {
    return this._tools.get(name);
  }

  /**
   * Return all tool definitions, in registration order (for sending to the model).
   */
  definitions(): ToolDefinition[] {
    return Array.from(this._tools.values()).map((t) => t.definition);
  }

  names(): string[] {
    return Array.from(this._tools.keys());
  }

  get size(): number {
    return this._tools.size;
  }
}
