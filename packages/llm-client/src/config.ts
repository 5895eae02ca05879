/**
 * Engine configuration: defaults, validation and environment loading.
 */

import { z } from "zod";
import { ConfigurationError } from "./types/index.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** Longest delay a timer accepts; Node fires anything larger after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const providerSettingsSchema = z.object({
  endpoint: z.string().url(),
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive().optional(),
});

export const engineConfigSchema = z.object({
  /** Default provider for requests that do not name one. */
  provider: z.string().min(1),
  api: z.object({
    openai: providerSettingsSchema,
    anthropic: providerSettingsSchema,
    ollama: providerSettingsSchema,
    google: providerSettingsSchema,
  }),
  performance: z.object({
    maxConcurrentRequests: z.number().int().positive(),
    cacheResponses: z.boolean(),
    cacheTtlSeconds: z.number().nonnegative(),
    requestTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
  }),
});

export type ProviderSettings = z.infer<typeof providerSettingsSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type BuiltinProvider = keyof EngineConfig["api"];

/** Partial overrides accepted by `resolveConfig`. */
export interface EngineConfigOverrides {
  provider?: string;
  api?: { [K in BuiltinProvider]?: Partial<ProviderSettings> };
  performance?: Partial<EngineConfig["performance"]>;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: EngineConfig = {
  provider: "openai",
  api: {
    openai: {
      endpoint: "https://api.openai.com/v1/chat/completions",
      model: "gpt-4o-mini",
      temperature: 0.3,
      maxTokens: 4096,
    },
    anthropic: {
      endpoint: "https://api.anthropic.com/v1/messages",
      model: "claude-sonnet-4-20250514",
      temperature: 0.3,
      maxTokens: 4096,
    },
    ollama: {
      endpoint: "http://localhost:11434/api/generate",
      model: "codellama",
      temperature: 0.3,
    },
    google: {
      endpoint:
        "https://generativelanguage.googleapis.com/v1beta/openai/chat/completions",
      model: "gemini-2.5-flash",
      temperature: 0.3,
      maxTokens: 4096,
    },
  },
  performance: {
    maxConcurrentRequests: 2,
    cacheResponses: true,
    cacheTtlSeconds: 3600,
    requestTimeoutMs: 30_000,
  },
};

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws {ConfigurationError} listing every invalid field.
 */
export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const api = overrides.api ?? {};
  const candidate = {
    provider: overrides.provider ?? DEFAULT_CONFIG.provider,
    api: {
      openai: { ...DEFAULT_CONFIG.api.openai, ...api.openai },
      anthropic: { ...DEFAULT_CONFIG.api.anthropic, ...api.anthropic },
      ollama: { ...DEFAULT_CONFIG.api.ollama, ...api.ollama },
      google: { ...DEFAULT_CONFIG.api.google, ...api.google },
    },
    performance: { ...DEFAULT_CONFIG.performance, ...overrides.performance },
  };

  const parsed = engineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

/**
 * Build a configuration from environment variables.
 *
 * Reads `OPENAI_API_KEY`, `ANTHROPIC_API_KEY`, `GOOGLE_API_KEY` /
 * `GEMINI_API_KEY`, `OLLAMA_HOST` and `SWITCHBOARD_PROVIDER`.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EngineConfigOverrides = {},
): EngineConfig {
  const ollamaHost = nonEmpty(env.OLLAMA_HOST);

  return resolveConfig({
    provider: overrides.provider ?? nonEmpty(env.SWITCHBOARD_PROVIDER),
    api: {
      openai: { apiKey: nonEmpty(env.OPENAI_API_KEY), ...overrides.api?.openai },
      anthropic: {
        apiKey: nonEmpty(env.ANTHROPIC_API_KEY),
        ...overrides.api?.anthropic,
      },
      ollama: {
        ...(ollamaHost
          ? { endpoint: `${ollamaHost.replace(/\/$/, "")}/api/generate` }
          : {}),
        ...overrides.api?.ollama,
      },
      google: {
        apiKey: nonEmpty(env.GOOGLE_API_KEY) ?? nonEmpty(env.GEMINI_API_KEY),
        ...overrides.api?.google,
      },
    },
    performance: overrides.performance,
  });
}
