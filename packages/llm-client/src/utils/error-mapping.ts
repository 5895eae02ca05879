/**
 * Error mapping for provider responses.
 *
 * Turns HTTP failures and error payloads into the typed error hierarchy.
 */

import { z } from "zod";
import { ParseError, ProviderError } from "../types/index.js";

// ---------------------------------------------------------------------------
// Error payload shapes
// ---------------------------------------------------------------------------

/**
 * `{"error": "..."}` (Ollama) or `{"error": {"message", "type", "code"}}`
 * (OpenAI, Anthropic, Google).
 */
const errorEnvelopeSchema = z.object({
  error: z.union([
    z.string(),
    z
      .object({
        message: z.string().optional(),
        type: z.string().optional(),
        code: z.union([z.string(), z.number()]).nullable().optional(),
      })
      .passthrough(),
  ]),
});

/** Longest body excerpt quoted in an error message. */
const EXCERPT_LIMIT = 200;

function excerpt(text: string): string {
  return text.length > EXCERPT_LIMIT ? `${text.slice(0, EXCERPT_LIMIT)}...` : text;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Decode a response body as JSON.
 * Returns a `ParseError` quoting the start of the body when it is not JSON.
 */
export function parseJsonBody(
  text: string,
): { ok: true; value: unknown } | { ok: false; error: ParseError } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return {
      ok: false,
      error: new ParseError(`Failed to parse response: ${excerpt(text)}`, {
        cause: err,
      }),
    };
  }
}

/**
 * Extract a provider-reported error from a decoded payload.
 * Returns `undefined` when the payload carries no `error` field.
 */
export function extractProviderError(
  payload: unknown,
  provider: string,
  statusCode?: number,
): ProviderError | undefined {
  const parsed = errorEnvelopeSchema.safeParse(payload);
  if (!parsed.success) return undefined;

  const { error } = parsed.data;
  if (typeof error === "string") {
    return new ProviderError(error || "Unknown error", { provider, statusCode });
  }

  const code = error.code ?? error.type;
  return new ProviderError(error.message ?? "Unknown error", {
    provider,
    statusCode,
    errorCode: code == null ? undefined : String(code),
  });
}

/**
 * Map a non-2xx HTTP response to a `ProviderError`, using the body's error
 * message when there is one.
 */
export function mapHttpError(
  status: number,
  bodyText: string,
  provider: string,
): ProviderError {
  const decoded = parseJsonBody(bodyText);
  if (decoded.ok) {
    const fromPayload = extractProviderError(decoded.value, provider, status);
    if (fromPayload) return fromPayload;
  }

  const detail = bodyText.trim() === "" ? "empty response body" : excerpt(bodyText);
  return new ProviderError(`HTTP ${status}: ${detail}`, {
    provider,
    statusCode: status,
  });
}
