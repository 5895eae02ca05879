/**
 * Barrel re-export for all provider adapters, plus the registry builder.
 */

import type { EngineConfig } from "../config.js";
import type { ProviderAdapter } from "./adapter.js";
import { AnthropicAdapter } from "./anthropic/index.js";
import { OllamaAdapter } from "./ollama/index.js";
import { OpenAIAdapter, createGoogleAdapter } from "./openai/index.js";

// Adapter interface
export type { ProviderAdapter, PrepareOptions } from "./adapter.js";

// OpenAI adapter (Chat Completions, also Google-compatible)
export { OpenAIAdapter, createGoogleAdapter } from "./openai/index.js";
export type { OpenAIAdapterOptions } from "./openai/index.js";

// Anthropic adapter
export { AnthropicAdapter, ANTHROPIC_VERSION } from "./anthropic/index.js";
export type { AnthropicAdapterOptions } from "./anthropic/index.js";

// Ollama adapter
export { OllamaAdapter, messagesToPrompt } from "./ollama/index.js";

/**
 * Build the built-in adapter registry from an engine configuration.
 * Custom adapters can be merged into the returned record by name.
 */
export function createProviders(config: EngineConfig): Record<string, ProviderAdapter> {
  return {
    openai: new OpenAIAdapter({ settings: config.api.openai }),
    anthropic: new AnthropicAdapter({ settings: config.api.anthropic }),
    ollama: new OllamaAdapter(config.api.ollama),
    google: createGoogleAdapter(config.api.google),
  };
}
