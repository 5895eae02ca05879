/**
 * ProviderAdapter interface: the contract every backend must implement.
 *
 * Adapters are pure: `prepare` and `parse` never perform I/O and depend only
 * on their inputs plus read-only configuration.
 */

import type {
  Message,
  ParseResult,
  RequestDescriptor,
  RequestOptions,
} from "../types/index.js";

/** Options as seen by `prepare`: `stream` is decided by the dispatcher. */
export interface PrepareOptions extends RequestOptions {
  readonly stream: boolean;
}

export interface ProviderAdapter {
  /** Provider name, e.g. "openai", "anthropic", "ollama". */
  readonly name: string;

  /**
   * Whether the backend speaks the chat-completions SSE protocol. When false,
   * streaming requests fall back to one non-streaming call.
   */
  readonly supportsStreaming: boolean;

  /** Whether `prepare` needs a credential. Checked before dispatch. */
  readonly requiresApiKey: boolean;

  /** True when a credential is configured. */
  hasApiKey(): boolean;

  /** Map the universal model onto the backend's wire request. */
  prepare(messages: readonly Message[], options: PrepareOptions): RequestDescriptor;

  /** Decode a complete (non-streaming) response body. */
  parse(rawBody: string): ParseResult;
}
