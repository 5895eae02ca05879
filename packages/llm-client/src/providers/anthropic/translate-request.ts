/**
 * Translate messages and options into Anthropic Messages API format.
 *
 * - SYSTEM messages -> extracted to the top-level `system` field
 * - Assistant tool calls -> `tool_use` content blocks
 * - TOOL messages -> user role with `tool_result` content blocks, merged
 *   when consecutive so roles keep alternating
 */

import {
  Role,
  type Message,
  type ToolDefinition,
} from "../../types/index.js";
import type { ProviderSettings } from "../../config.js";
import type { PrepareOptions } from "../adapter.js";

// ---------------------------------------------------------------------------
// Anthropic native types (request body)
// ---------------------------------------------------------------------------

export type AnthropicContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string };

export interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicContentBlock[];
}

export interface AnthropicToolDefinition {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface AnthropicRequestBody {
  model: string;
  messages: AnthropicMessage[];
  max_tokens: number;
  system?: string;
  temperature: number;
  tools?: AnthropicToolDefinition[];
}

/** Anthropic requires `max_tokens`; used when neither options nor settings give one. */
const FALLBACK_MAX_TOKENS = 4096;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Tool-call arguments as an object; malformed text becomes `{}`. */
function toolInput(rawArguments: string): Record<string, unknown> {
  if (rawArguments.trim() === "") return {};
  try {
    const parsed: unknown = JSON.parse(rawArguments);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function translateAssistant(msg: Message): AnthropicMessage {
  const toolCalls = msg.toolCalls ?? [];
  if (toolCalls.length === 0) {
    return { role: "assistant", content: msg.content };
  }

  const blocks: AnthropicContentBlock[] = [];
  if (msg.content !== "") {
    blocks.push({ type: "text", text: msg.content });
  }
  for (const tc of toolCalls) {
    blocks.push({
      type: "tool_use",
      id: tc.id,
      name: tc.name,
      input: toolInput(tc.arguments),
    });
  }
  return { role: "assistant", content: blocks };
}

function translateTools(tools: readonly ToolDefinition[]): AnthropicToolDefinition[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameters,
  }));
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateRequest(
  messages: readonly Message[],
  options: PrepareOptions,
  defaults: ProviderSettings,
): AnthropicRequestBody {
  const systemParts: string[] = [];
  const translated: AnthropicMessage[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case Role.SYSTEM:
        systemParts.push(msg.content);
        break;

      case Role.USER:
        translated.push({ role: "user", content: msg.content });
        break;

      case Role.ASSISTANT:
        translated.push(translateAssistant(msg));
        break;

      case Role.TOOL: {
        const block: AnthropicContentBlock = {
          type: "tool_result",
          tool_use_id: msg.toolCallId ?? "",
          content: msg.content,
        };
        const previous = translated[translated.length - 1];
        if (
          previous &&
          previous.role === "user" &&
          Array.isArray(previous.content) &&
          previous.content.every((b) => b.type === "tool_result")
        ) {
          previous.content.push(block);
        } else {
          translated.push({ role: "user", content: [block] });
        }
        break;
      }
    }
  }

  const body: AnthropicRequestBody = {
    model: options.model ?? defaults.model,
    messages: translated,
    max_tokens: options.maxTokens ?? defaults.maxTokens ?? FALLBACK_MAX_TOKENS,
    temperature: options.temperature ?? defaults.temperature,
  };

  if (systemParts.length > 0) {
    body.system = systemParts.join("\n\n");
  }

  if (options.tools && options.tools.length > 0) {
    body.tools = translateTools(options.tools);
  }

  return body;
}
