/**
 * Chat Completions streaming decoder.
 *
 * Wire format:
 * - data: {"choices":[{"delta":{"content":"text"}}]}
 * - data: {"choices":[{"delta":{"tool_calls":[{"index":0,...}]}}]}
 * - data: {"error":{...}}
 * - data: [DONE]
 *
 * Bytes go in through `push`; text deltas come out through `onChunk` as soon
 * as their frame completes, and `onComplete` fires exactly once.
 */

import { z } from "zod";
import type { Logger } from "../logger.js";
import {
  ProviderError,
  type ChunkCallback,
  type CompleteCallback,
  type SDKError,
  type ToolCall,
} from "../types/index.js";
import { SSEDecoder, extractProviderError, type SSEEvent } from "../utils/index.js";

// ---------------------------------------------------------------------------
// Chunk shape
// ---------------------------------------------------------------------------

// OpenAI-compatible servers send `null` for fields a fragment does not
// carry; null and absent are treated alike.
const toolCallFragmentSchema = z.object({
  index: z.number().int().nonnegative().nullish(),
  id: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish(),
    })
    .nullish(),
});

type ToolCallFragment = z.infer<typeof toolCallFragmentSchema>;

const chatChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z.array(toolCallFragmentSchema).nullish(),
          })
          .nullish(),
        error: z.unknown().optional(),
      }),
    )
    .nullish(),
});

// ---------------------------------------------------------------------------
// Streaming state
// ---------------------------------------------------------------------------

interface ToolCallBuilder {
  index: number;
  id: string;
  name: string;
  argumentsBuffer: string;
}

export interface ChatStreamHandlers {
  onChunk: ChunkCallback;
  onComplete: CompleteCallback;
}

export interface ChatStreamParserOptions {
  /** Attributed on provider errors found in the stream. */
  provider: string;
  logger?: Logger;
}

export class ChatStreamParser {
  private readonly sse = new SSEDecoder();
  private readonly textChunks: string[] = [];
  private readonly builders = new Map<number, ToolCallBuilder>();
  private finished = false;

  constructor(
    private readonly handlers: ChatStreamHandlers,
    private readonly options: ChatStreamParserOptions,
  ) {}

  /** True once `onComplete` has fired; further input is ignored. */
  get isFinished(): boolean {
    return this.finished;
  }

  /** Feed one network read. */
  push(chunk: Uint8Array | string): void {
    if (this.finished) return;
    this.handleEvents(this.sse.push(chunk));
  }

  /**
   * The byte stream ended. A stream that closes without `[DONE]` completes
   * with whatever was accumulated.
   */
  end(): void {
    if (this.finished) return;
    this.handleEvents(this.sse.flush());
    if (!this.finished) {
      this.complete();
    }
  }

  /** Terminate with an error (transport failure, abort). */
  fail(error: SDKError): void {
    if (this.finished) return;
    this.finished = true;
    this.handlers.onComplete({ ok: false, error });
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private handleEvents(events: SSEEvent[]): void {
    for (const event of events) {
      this.handleEvent(event);
      if (this.finished) return;
    }
  }

  private handleEvent(event: SSEEvent): void {
    const data = event.data.trim();
    if (data === "") return;

    if (data === "[DONE]") {
      this.complete();
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch (err) {
      this.options.logger?.debug({ err, data }, "skipping undecodable stream frame");
      return;
    }

    const topLevelError = extractProviderError(payload, this.options.provider);
    if (topLevelError) {
      this.fail(topLevelError);
      return;
    }

    const parsed = chatChunkSchema.safeParse(payload);
    if (!parsed.success) {
      this.options.logger?.warn({ data }, "skipping stream frame of unexpected shape");
      return;
    }

    const choice = parsed.data.choices?.[0];
    if (!choice) return;

    if (choice.error !== undefined && choice.error !== null) {
      this.fail(
        extractProviderError({ error: choice.error }, this.options.provider) ??
          new ProviderError("Unknown API error", { provider: this.options.provider }),
      );
      return;
    }

    const delta = choice.delta;
    if (!delta) return;

    if (typeof delta.content === "string" && delta.content !== "") {
      this.textChunks.push(delta.content);
      this.handlers.onChunk(delta.content);
    }

    for (const fragment of delta.tool_calls ?? []) {
      this.accumulate(fragment);
    }
  }

  /** Fragments for an index append to its builder; they never overwrite. */
  private accumulate(fragment: ToolCallFragment): void {
    const index = fragment.index ?? 0;
    let builder = this.builders.get(index);
    if (!builder) {
      builder = { index, id: "", name: "", argumentsBuffer: "" };
      this.builders.set(index, builder);
    }

    if (fragment.id && builder.id === "") {
      builder.id = fragment.id;
    }
    builder.name += fragment.function?.name ?? "";
    builder.argumentsBuffer += fragment.function?.arguments ?? "";
  }

  private complete(): void {
    if (this.finished) return;
    this.finished = true;

    const toolCalls: ToolCall[] = [...this.builders.values()]
      .sort((a, b) => a.index - b.index)
      .map((builder) => ({
        id: builder.id || `call_${builder.index}`,
        name: builder.name,
        arguments: builder.argumentsBuffer,
      }));

    this.handlers.onComplete({
      ok: true,
      value: { text: this.textChunks.join(""), toolCalls },
    });
  }
}
