/**
 * Anthropic provider adapter.
 *
 * Uses the Messages API (POST /v1/messages).
 * Authentication via x-api-key header + anthropic-version header.
 * Its event stream is not the chat-completions protocol, so streaming
 * requests fall back to a single call.
 */

import type { PrepareOptions, ProviderAdapter } from "../adapter.js";
import type { ProviderSettings } from "../../config.js";
import type {
  Message,
  ParseResult,
  RequestDescriptor,
} from "../../types/index.js";
import { mergeHeaders } from "../../utils/index.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

export const ANTHROPIC_VERSION = "2023-06-01";

export interface AnthropicAdapterOptions {
  settings: ProviderSettings;
  defaultHeaders?: Record<string, string>;
}

export class AnthropicAdapter implements ProviderAdapter {
  readonly name = "anthropic";
  readonly supportsStreaming = false;
  readonly requiresApiKey = true;
  private readonly settings: ProviderSettings;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: AnthropicAdapterOptions) {
    this.settings = options.settings;
    this.defaultHeaders = options.defaultHeaders ?? {};
  }

  hasApiKey(): boolean {
    return Boolean(this.settings.apiKey);
  }

  prepare(messages: readonly Message[], options: PrepareOptions): RequestDescriptor {
    return {
      url: this.settings.endpoint,
      headers: mergeHeaders(
        {
          "x-api-key": this.settings.apiKey ?? "",
          "anthropic-version": ANTHROPIC_VERSION,
        },
        this.defaultHeaders,
      ),
      body: JSON.stringify(translateRequest(messages, options, this.settings)),
    };
  }

  parse(rawBody: string): ParseResult {
    return translateResponse(rawBody, this.name);
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
