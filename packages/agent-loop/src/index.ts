export const VERSION = "0.1.0";

// Core types
export type {
  ToolDefinition,
  ToolExecutor,
  RegisteredTool,
  ToolResult,
} from "./types.js";

// Tool registry
export { ToolRegistry } from "./tool-registry.js";

// Events
export type { EventKind, SessionEvent } from "./events.js";
export { EventEmitter } from "./events.js";

// Session
export type {
  ChatSessionConfig,
  FinishCallback,
  StreamingDispatcher,
} from "./session.js";
export { ChatSession, SessionState, parseArguments } from "./session.js";
