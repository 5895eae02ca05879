/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, RequestKind } from "./enums.js";

// Message types
export type { Message, ToolCall, ToolDefinition } from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  createToolResultMessage,
} from "./message.js";

// Request types
export type {
  ResponseFormat,
  RequestOptions,
  RequestDescriptor,
  Completion,
  Outcome,
  ParseResult,
  RequestCallback,
  ChunkCallback,
  CompleteCallback,
  RequestHandle,
} from "./request.js";

// Error types
export {
  SDKError,
  ConfigurationError,
  NetworkError,
  ParseError,
  ProviderError,
  RequestTimeoutError,
  CancelledError,
  QueueOverflowError,
  ToolExecutionError,
  IterationLimitError,
  SessionBusyError,
  errorMessage,
  toSDKError,
} from "./errors.js";
