/**
 * Decode an Anthropic Messages API response body.
 */

import { z } from "zod";
import { ParseError, type ParseResult, type ToolCall } from "../../types/index.js";
import { extractProviderError, parseJsonBody } from "../../utils/index.js";

const messageSchema = z.object({
  content: z.array(
    z
      .object({
        type: z.string(),
        text: z.string().optional(),
        id: z.string().optional(),
        name: z.string().optional(),
        input: z.unknown().optional(),
      })
      .passthrough(),
  ),
});

export function translateResponse(rawBody: string, providerName: string): ParseResult {
  const decoded = parseJsonBody(rawBody);
  if (!decoded.ok) return decoded;

  const providerError = extractProviderError(decoded.value, providerName);
  if (providerError) return { ok: false, error: providerError };

  const parsed = messageSchema.safeParse(decoded.value);
  if (!parsed.success) {
    return {
      ok: false,
      error: new ParseError("Invalid response format", { cause: parsed.error }),
    };
  }

  const textParts: string[] = [];
  const toolCalls: ToolCall[] = [];

  for (const block of parsed.data.content) {
    if (block.type === "text" && block.text !== undefined) {
      textParts.push(block.text);
    } else if (block.type === "tool_use" && block.id && block.name) {
      toolCalls.push({
        id: block.id,
        name: block.name,
        arguments: JSON.stringify(block.input ?? {}),
      });
    }
    // Thinking and other block kinds carry nothing the caller consumes.
  }

  if (textParts.length === 0 && toolCalls.length === 0) {
    return { ok: false, error: new ParseError("Invalid response format") };
  }

  return { ok: true, value: { text: textParts.join(""), toolCalls } };
}
