/**
 * ChatSession: the tool-calling loop.
 *
 * Each `send` runs an explicit state machine:
 *
 *   awaiting_turn -> streaming_model -> finished
 *                                    -> executing_tools -> awaiting_turn
 *
 * One streaming request per turn; tool calls requested by the model are run
 * through the registry and their results appended before the next turn.
 */

import { z } from "zod";
import type {
  Completion,
  Dispatcher,
  Logger,
  Message,
  Outcome,
  RequestOptions,
  ToolCall,
} from "@switchboard/llm-client";
import {
  ConfigurationError,
  IterationLimitError,
  SessionBusyError,
  ToolExecutionError,
  createAssistantMessage,
  createToolResultMessage,
  createUserMessage,
  errorMessage,
  makeLogger,
  toSDKError,
} from "@switchboard/llm-client";

import { EventEmitter } from "./events.js";
import type { EventKind } from "./events.js";
import type { ToolRegistry } from "./tool-registry.js";
import type { ToolResult } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The one dispatcher operation a session needs. */
export type StreamingDispatcher = Pick<Dispatcher, "requestStream">;

/**
 * Session configuration.
 */
export interface ChatSessionConfig {
  dispatcher: StreamingDispatcher;
  tools: ToolRegistry;
  /** Tool rounds allowed per `send`. Must be a positive integer. */
  maxIterations: number;
  /** Passed on every turn; `tools` is replaced by the registry's definitions. */
  options?: RequestOptions;
  /** Seed history, e.g. a system message. */
  messages?: readonly Message[];
  logger?: Logger;
}

/**
 * Session lifecycle states.
 */
export const SessionState = {
  AWAITING_TURN: "awaiting_turn",
  STREAMING_MODEL: "streaming_model",
  EXECUTING_TOOLS: "executing_tools",
  FINISHED: "finished",
} as const satisfies Record<string, string>;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

/** Receives the final text of a `send`, or the error that ended it. */
export type FinishCallback = (outcome: Outcome<string>) => void;

const argumentsSchema = z.record(z.unknown());

// ---------------------------------------------------------------------------
// ChatSession
// ---------------------------------------------------------------------------

export class ChatSession {
  readonly events: EventEmitter;

  private readonly _dispatcher: StreamingDispatcher;
  private readonly _tools: ToolRegistry;
  private readonly _maxIterations: number;
  private readonly _options: RequestOptions;
  private readonly _logger: Logger;
  private _messages: Message[];
  private _state: SessionState = SessionState.AWAITING_TURN;
  private _iterationCount = 0;
  private _running = false;

  constructor(config: ChatSessionConfig) {
    if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
      throw new ConfigurationError(
        `maxIterations must be a positive integer, got ${config.maxIterations}`,
      );
    }
    this._dispatcher = config.dispatcher;
    this._tools = config.tools;
    this._maxIterations = config.maxIterations;
    this._options = config.options ?? {};
    this._messages = [...(config.messages ?? [])];
    this._logger = config.logger ?? makeLogger({ component: "session" });
    this.events = new EventEmitter();
  }

  // -----------------------------------------------------------------------
  // Accessors
  // -----------------------------------------------------------------------

  get messages(): Message[] {
    return [...this._messages];
  }

  get state(): SessionState {
    return this._state;
  }

  /** Tool rounds completed during the current (or last) `send`. */
  get iterationCount(): number {
    return this._iterationCount;
  }

  get maxIterations(): number {
    return this._maxIterations;
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Append a user message and run turns until the model answers without
   * tool calls, an error occurs, or the iteration cap is hit. `onFinish`
   * fires exactly once.
   */
  send(userText: string, onChunk: (delta: string) => void, onFinish: FinishCallback): void {
    if (this._running) {
      const error = new SessionBusyError("A send is already in progress on this session");
      queueMicrotask(() => this._notify(onFinish, { ok: false, error }));
      return;
    }

    this._running = true;
    this._iterationCount = 0;
    this._messages.push(createUserMessage(userText));

    this._run(onChunk)
      .catch((err: unknown): Outcome<string> => ({ ok: false, error: toSDKError(err) }))
      .then((outcome) => this._finish(outcome, onFinish))
      .catch((err: unknown) => {
        this._logger.error({ err }, "session finish handler threw");
      });
  }

  /** Promise form of `send`. */
  ask(userText: string, onChunk: (delta: string) => void = () => {}): Promise<string> {
    return new Promise((resolve, reject) => {
      this.send(userText, onChunk, (outcome) => {
        if (outcome.ok) resolve(outcome.value);
        else reject(outcome.error);
      });
    });
  }

  // -----------------------------------------------------------------------
  // Loop
  // -----------------------------------------------------------------------

  private async _run(onChunk: (delta: string) => void): Promise<Outcome<string>> {
    for (;;) {
      this._state = SessionState.AWAITING_TURN;
      this._emit("TURN_START", { iteration: this._iterationCount });

      this._state = SessionState.STREAMING_MODEL;
      const turn = await this._streamTurn(onChunk);
      if (!turn.ok) return turn;

      const { text, toolCalls } = turn.value;
      this._messages.push(createAssistantMessage(text, toolCalls));
      if (toolCalls.length === 0) {
        return { ok: true, value: text };
      }

      this._state = SessionState.EXECUTING_TOOLS;
      for (const call of toolCalls) {
        const result = await this._executeToolCall(call);
        this._messages.push(createToolResultMessage(result.toolCallId, result.content));
      }

      this._iterationCount += 1;
      if (this._iterationCount >= this._maxIterations) {
        const error = new IterationLimitError(
          `Stopped after ${this._maxIterations} tool iteration(s) without a final answer`,
          { maxIterations: this._maxIterations },
        );
        this._emit("ITERATION_LIMIT", { iterations: this._iterationCount });
        return { ok: false, error };
      }
    }
  }

  /** One model turn over the full history. Resolves; never rejects. */
  private _streamTurn(onChunk: (delta: string) => void): Promise<Outcome<Completion>> {
    const options: RequestOptions = {
      ...this._options,
      tools: this._tools.size > 0 ? this._tools.definitions() : this._options.tools,
    };

    return new Promise((resolve) => {
      this._dispatcher.requestStream(
        [...this._messages],
        options,
        (delta) => {
          this._emit("TEXT_DELTA", { delta });
          onChunk(delta);
        },
        resolve,
      );
    });
  }

  private _finish(outcome: Outcome<string>, onFinish: FinishCallback): void {
    this._state = SessionState.FINISHED;
    this._running = false;

    if (outcome.ok) {
      this._emit("FINISHED", { text: outcome.value, iterations: this._iterationCount });
    } else {
      this._emit("ERROR", { error: outcome.error.message, code: outcome.error.code });
      this._emit("FINISHED", { iterations: this._iterationCount });
    }
    this._notify(onFinish, outcome);
  }

  // -----------------------------------------------------------------------
  // Tool execution
  // -----------------------------------------------------------------------

  private async _executeToolCall(call: ToolCall): Promise<ToolResult> {
    this._emit("TOOL_CALL_START", {
      callId: call.id,
      toolName: call.name,
      arguments: call.arguments,
    });

    const result = await this._runTool(call);
    this._emit("TOOL_CALL_END", {
      callId: call.id,
      toolName: call.name,
      isError: result.isError,
      content: result.content,
    });
    return result;
  }

  private async _runTool(call: ToolCall): Promise<ToolResult> {
    const args = parseArguments(call.arguments);
    if (!args.ok) {
      return errorResult(call, args.message);
    }

    const tool = this._tools.get(call.name);
    if (!tool) {
      this._logger.warn({ toolName: call.name, callId: call.id }, "model requested unknown tool");
      return errorResult(call, `Unknown tool: ${call.name}`);
    }

    try {
      const value = await tool.execute(args.value);
      const encoded = JSON.stringify(value === undefined ? null : value);
      if (typeof encoded !== "string") {
        throw new ToolExecutionError(
          `Tool ${call.name} returned a value that cannot be JSON-encoded`,
          { toolName: call.name },
        );
      }
      return { toolCallId: call.id, content: encoded, isError: false };
    } catch (err) {
      const error =
        err instanceof ToolExecutionError
          ? err
          : new ToolExecutionError(`Tool ${call.name} failed: ${errorMessage(err)}`, {
              toolName: call.name,
              cause: err,
            });
      this._logger.warn({ err: error, toolName: call.name, callId: call.id }, error.message);
      return errorResult(call, error.message);
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Listener errors are logged so they cannot derail the loop. */
  private _emit(kind: EventKind, data: Record<string, unknown>): void {
    try {
      this.events.emit({ kind, timestamp: Date.now(), data });
    } catch (err) {
      this._logger.error({ err, kind }, "session event handler threw");
    }
  }

  private _notify(onFinish: FinishCallback, outcome: Outcome<string>): void {
    try {
      onFinish(outcome);
    } catch (err) {
      this._logger.error({ err }, "session finish callback threw");
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type ParsedArguments =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; message: string };

/** Decode a tool call's raw argument text. Empty text means no arguments. */
export function parseArguments(raw: string): ParsedArguments {
  if (raw.trim() === "") {
    return { ok: true, value: {} };
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    return { ok: false, message: `Invalid JSON arguments: ${errorMessage(err)}` };
  }

  // Valid JSON that is not an object (null, a number, an array) means no arguments.
  const parsed = argumentsSchema.safeParse(decoded);
  return { ok: true, value: parsed.success ? parsed.data : {} };
}

function errorResult(call: ToolCall, message: string): ToolResult {
  return {
    toolCallId: call.id,
    content: JSON.stringify({ error: message }),
    isError: true,
  };
}
