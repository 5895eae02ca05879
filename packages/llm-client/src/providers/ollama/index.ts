/**
 * Ollama provider adapter for the `/api/generate` endpoint.
 *
 * The generate endpoint takes a single prompt string, so the conversation is
 * flattened into labelled paragraphs. No credential and no tool support.
 */

import { z } from "zod";
import type { PrepareOptions, ProviderAdapter } from "../adapter.js";
import type { ProviderSettings } from "../../config.js";
import {
  ParseError,
  Role,
  type Message,
  type ParseResult,
  type RequestDescriptor,
} from "../../types/index.js";
import {
  extractProviderError,
  mergeHeaders,
  parseJsonBody,
} from "../../utils/index.js";

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

export interface OllamaGenerateBody {
  model: string;
  prompt: string;
  stream: false;
  options: { temperature: number; num_predict?: number };
  format?: "json";
}

const generateResponseSchema = z.object({
  response: z.string(),
});

const ROLE_LABELS: Record<Message["role"], string> = {
  [Role.SYSTEM]: "System",
  [Role.USER]: "User",
  [Role.ASSISTANT]: "Assistant",
  [Role.TOOL]: "Tool",
};

/** Flatten a conversation for backends without a chat format. */
export function messagesToPrompt(messages: readonly Message[]): string {
  return messages
    .map((msg) => `${ROLE_LABELS[msg.role]}: ${msg.content}`)
    .join("\n\n");
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class OllamaAdapter implements ProviderAdapter {
  readonly name = "ollama";
  readonly supportsStreaming = false;
  readonly requiresApiKey = false;
  private readonly settings: ProviderSettings;

  constructor(settings: ProviderSettings) {
    this.settings = settings;
  }

  hasApiKey(): boolean {
    return Boolean(this.settings.apiKey);
  }

  prepare(messages: readonly Message[], options: PrepareOptions): RequestDescriptor {
    const body: OllamaGenerateBody = {
      model: options.model ?? this.settings.model,
      prompt: messagesToPrompt(messages),
      stream: false,
      options: { temperature: options.temperature ?? this.settings.temperature },
    };

    const maxTokens = options.maxTokens ?? this.settings.maxTokens;
    if (maxTokens !== undefined) {
      body.options.num_predict = maxTokens;
    }
    if (options.responseFormat) {
      body.format = "json";
    }

    return {
      url: this.settings.endpoint,
      headers: mergeHeaders(),
      body: JSON.stringify(body),
    };
  }

  parse(rawBody: string): ParseResult {
    const decoded = parseJsonBody(rawBody);
    if (!decoded.ok) return decoded;

    const providerError = extractProviderError(decoded.value, this.name);
    if (providerError) return { ok: false, error: providerError };

    const parsed = generateResponseSchema.safeParse(decoded.value);
    if (!parsed.success) {
      return {
        ok: false,
        error: new ParseError("Invalid response format", { cause: parsed.error }),
      };
    }
    return { ok: true, value: { text: parsed.data.response, toolCalls: [] } };
  }
}
