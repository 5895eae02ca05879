/**
 * Tool type definitions for the session loop.
 */

import type { ToolDefinition } from "@switchboard/llm-client";

export type { ToolDefinition };

/**
 * Runs a tool. Receives the decoded argument object; the return value is
 * JSON-encoded and sent back to the model (`undefined` becomes `null`).
 */
export type ToolExecutor = (args: Record<string, unknown>) => unknown | Promise<unknown>;

/**
 * A tool with its definition and executor function.
 */
export interface RegisteredTool {
  definition: ToolDefinition;
  execute: ToolExecutor;
}

/**
 * The result of executing a tool call, as fed back to the model.
 */
export interface ToolResult {
  toolCallId: string;
  /** JSON text. Failures are encoded as `{"error": "..."}`. */
  content: string;
  isError: boolean;
}
