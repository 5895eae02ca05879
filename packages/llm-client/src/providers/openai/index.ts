/**
 * OpenAI provider adapter for the Chat Completions API.
 *
 * Also serves any OpenAI-compatible endpoint: pass a different `name` and
 * `endpoint` (see `createGoogleAdapter`).
 * Authentication via `Authorization: Bearer <key>`.
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

export interface OpenAIAdapterOptions {
  settings: ProviderSettings;
  /** Defaults to "openai". */
  name?: string;
  defaultHeaders?: Record<string, string>;
}

export class OpenAIAdapter implements ProviderAdapter {
  readonly name: string;
  readonly supportsStreaming = true;
  readonly requiresApiKey = true;
  private readonly settings: ProviderSettings;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: OpenAIAdapterOptions) {
    this.name = options.name ?? "openai";
    this.settings = options.settings;
    this.defaultHeaders = options.defaultHeaders ?? {};
  }

  hasApiKey(): boolean {
    return Boolean(this.settings.apiKey);
  }

  prepare(messages: readonly Message[], options: PrepareOptions): RequestDescriptor {
    const headers: Record<string, string> = {};
    if (this.settings.apiKey) {
      headers["Authorization"] = `Bearer ${this.settings.apiKey}`;
    }

    return {
      url: this.settings.endpoint,
      headers: mergeHeaders(headers, this.defaultHeaders),
      body: JSON.stringify(translateRequest(messages, options, this.settings)),
    };
  }

  parse(rawBody: string): ParseResult {
    return translateResponse(rawBody, this.name);
  }
}

/** Google Gemini through its OpenAI-compatible endpoint. */
export function createGoogleAdapter(settings: ProviderSettings): OpenAIAdapter {
  return new OpenAIAdapter({ name: "google", settings });
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
