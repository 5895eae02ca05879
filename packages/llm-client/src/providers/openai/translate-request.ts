/**
 * Translate messages and options into the Chat Completions wire format.
 *
 * Shared by every OpenAI-compatible backend (OpenAI itself, Google's
 * compatibility endpoint, vLLM, Together, ...).
 */

import {
  Role,
  type Message,
  type ResponseFormat,
  type ToolDefinition,
} from "../../types/index.js";
import type { ProviderSettings } from "../../config.js";
import type { PrepareOptions } from "../adapter.js";

// ---------------------------------------------------------------------------
// Chat Completions native types
// ---------------------------------------------------------------------------

export interface ChatCompletionToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string | null;
  tool_calls?: ChatCompletionToolCall[];
  tool_call_id?: string;
}

export interface ChatCompletionToolDef {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export type ChatCompletionResponseFormat =
  | { type: "json_object" }
  | { type: "json_schema"; json_schema: Record<string, unknown> };

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  temperature: number;
  max_tokens?: number;
  stream: boolean;
  tools?: ChatCompletionToolDef[];
  response_format?: ChatCompletionResponseFormat;
}

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function translateMessage(msg: Message): ChatCompletionMessage {
  switch (msg.role) {
    case Role.ASSISTANT: {
      const toolCalls = msg.toolCalls ?? [];
      if (toolCalls.length === 0) {
        return { role: "assistant", content: msg.content };
      }
      return {
        role: "assistant",
        // The API rejects "" alongside tool_calls on some backends.
        content: msg.content === "" ? null : msg.content,
        tool_calls: toolCalls.map((tc) => ({
          id: tc.id,
          type: "function" as const,
          function: { name: tc.name, arguments: tc.arguments },
        })),
      };
    }

    case Role.TOOL:
      return {
        role: "tool",
        content: msg.content,
        tool_call_id: msg.toolCallId ?? "",
      };

    default:
      return { role: msg.role, content: msg.content };
  }
}

function translateTools(tools: readonly ToolDefinition[]): ChatCompletionToolDef[] {
  return tools.map((tool) => ({
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

function translateResponseFormat(format: ResponseFormat): ChatCompletionResponseFormat {
  switch (format.type) {
    case "json_object":
      return { type: "json_object" };
    case "json_schema":
      return { type: "json_schema", json_schema: format.jsonSchema };
  }
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateRequest(
  messages: readonly Message[],
  options: PrepareOptions,
  defaults: ProviderSettings,
): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    model: options.model ?? defaults.model,
    messages: messages.map(translateMessage),
    temperature: options.temperature ?? defaults.temperature,
    stream: options.stream,
  };

  const maxTokens = options.maxTokens ?? defaults.maxTokens;
  if (maxTokens !== undefined) {
    body.max_tokens = maxTokens;
  }

  if (options.tools && options.tools.length > 0) {
    body.tools = translateTools(options.tools);
  }

  if (options.responseFormat) {
    body.response_format = translateResponseFormat(options.responseFormat);
  }

  return body;
}
