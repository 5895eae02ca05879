/**
 * Message and tool types for the LLM client.
 */

import { Role } from "./enums.js";

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** Declares a callable capability to the model. Owned by the caller. */
export interface ToolDefinition {
  /** Unique identifier; [a-zA-Z][a-zA-Z0-9_]* max 64 chars. */
  readonly name: string;
  /** Human-readable description for the model. */
  readonly description: string;
  /** JSON Schema defining the input (root must be "object"). */
  readonly parameters: Record<string, unknown>;
}

/** A model-initiated tool invocation, finalized at the end of a turn. */
export interface ToolCall {
  /** Provider-assigned identifier, echoed back on the tool result. */
  readonly id: string;
  /** Tool name. */
  readonly name: string;
  /** Raw JSON argument text, exactly as the model produced it. */
  readonly arguments: string;
}

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

/** The fundamental unit of conversation. */
export interface Message {
  readonly role: Role;
  readonly content: string;
  /** Links a tool-result message to its tool call. */
  readonly toolCallId?: string;
  /** Tool calls requested by an assistant message. */
  readonly toolCalls?: readonly ToolCall[];
}

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

export function createSystemMessage(text: string): Message {
  return { role: Role.SYSTEM, content: text };
}

export function createUserMessage(text: string): Message {
  return { role: Role.USER, content: text };
}

/** Create an assistant message, attaching tool calls only when there are any. */
export function createAssistantMessage(
  text: string,
  toolCalls: readonly ToolCall[] = [],
): Message {
  if (toolCalls.length === 0) {
    return { role: Role.ASSISTANT, content: text };
  }
  return { role: Role.ASSISTANT, content: text, toolCalls };
}

/** Create a tool-result message. `content` is the JSON-encoded result. */
export function createToolResultMessage(
  toolCallId: string,
  content: string,
): Message {
  return { role: Role.TOOL, content, toolCallId };
}
