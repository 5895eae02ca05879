/**
 * Core enums for the LLM client.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** The four conversation roles every backend understands. */
export const Role = {
  /** High-level instructions shaping model behavior. Typically first. */
  SYSTEM: "system",
  /** Human input. */
  USER: "user",
  /** Model output. Text and tool calls. */
  ASSISTANT: "assistant",
  /** Tool execution results, linked by toolCallId. */
  TOOL: "tool",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// RequestKind
// ---------------------------------------------------------------------------

/** How a dispatched request delivers its result. */
export const RequestKind = {
  /** Whole response delivered once, eligible for caching. */
  ONESHOT: "oneshot",
  /** Incremental deltas followed by a completion. Never cached. */
  STREAM: "stream",
} as const satisfies Record<string, string>;

export type RequestKind = (typeof RequestKind)[keyof typeof RequestKind];
