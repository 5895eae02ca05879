/**
 * Decode a Chat Completions response body.
 */

import { z } from "zod";
import { ParseError, type ParseResult } from "../../types/index.js";
import { extractProviderError, parseJsonBody } from "../../utils/index.js";

// ---------------------------------------------------------------------------
// Chat Completions response shape
// ---------------------------------------------------------------------------

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string(),
                }),
              }),
            )
            .optional(),
        }),
      }),
    )
    .min(1),
});

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateResponse(rawBody: string, providerName: string): ParseResult {
  const decoded = parseJsonBody(rawBody);
  if (!decoded.ok) return decoded;

  const providerError = extractProviderError(decoded.value, providerName);
  if (providerError) return { ok: false, error: providerError };

  const parsed = chatCompletionSchema.safeParse(decoded.value);
  if (!parsed.success) {
    return {
      ok: false,
      error: new ParseError("Invalid response format", { cause: parsed.error }),
    };
  }

  const [choice] = parsed.data.choices;
  const message = choice?.message;
  return {
    ok: true,
    value: {
      text: message?.content ?? "",
      toolCalls: (message?.tool_calls ?? []).map((tc) => ({
        id: tc.id,
        name: tc.function.name,
        arguments: tc.function.arguments,
      })),
    },
  };
}
