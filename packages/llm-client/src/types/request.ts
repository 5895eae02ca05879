/**
 * Request, descriptor and result types shared by adapters, transport and
 * dispatcher.
 */

import type { Message, ToolCall, ToolDefinition } from "./message.js";
import type { SDKError } from "./errors.js";

// ---------------------------------------------------------------------------
// ResponseFormat
// ---------------------------------------------------------------------------

/** Controls the format of the model's response. */
export type ResponseFormat =
  | { readonly type: "json_object" }
  | {
      readonly type: "json_schema";
      /** Passed through as the provider's `json_schema` object (name, schema, strict). */
      readonly jsonSchema: Record<string, unknown>;
    };

// ---------------------------------------------------------------------------
// RequestOptions
// ---------------------------------------------------------------------------

/**
 * Per-call configuration. Every field is optional; unset fields fall back to
 * the adapter's configured defaults.
 */
export interface RequestOptions {
  /** Adapter name; uses the dispatcher's default provider if omitted. */
  readonly provider?: string;
  readonly model?: string;
  readonly temperature?: number;
  /** Maximum tokens to generate. */
  readonly maxTokens?: number;
  readonly responseFormat?: ResponseFormat;
  readonly tools?: readonly ToolDefinition[];
  /** Only consulted by `converse()`; the entry point decides otherwise. */
  readonly stream?: boolean;
}

// ---------------------------------------------------------------------------
// RequestDescriptor
// ---------------------------------------------------------------------------

/** The adapter's sole output. Opaque to everything except the transport. */
export interface RequestDescriptor {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  /** Serialized JSON body. */
  readonly body: string;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** A finished model response: full text plus any tool calls it requested. */
export interface Completion {
  readonly text: string;
  readonly toolCalls: readonly ToolCall[];
}

/** Either a value or the error that prevented it. */
export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: SDKError };

/** What `ProviderAdapter.parse` returns for a raw response body. */
export type ParseResult = Outcome<Completion>;

/** Receives a finished one-shot request. */
export type RequestCallback = (outcome: Outcome<string>) => void;

/** Receives each incremental text fragment of a streaming request. */
export type ChunkCallback = (delta: string) => void;

/** Receives the end of a streaming request. */
export type CompleteCallback = (outcome: Outcome<Completion>) => void;

/** Returned by the dispatcher's entry points. */
export interface RequestHandle {
  readonly id: string;
  /** True when the request had to wait for a free slot. */
  readonly queued: boolean;
}
