/**
 * Drive a response body through a `ChatStreamParser`.
 */

import { CancelledError } from "../types/index.js";
import type { ChatStreamParser } from "./chat-stream.js";

/**
 * Read `body` to the end (or until the parser finishes) and feed every read
 * to `parser`. Rejects with `CancelledError` once `signal` is aborted; any
 * read failure propagates to the caller, which decides how to report it.
 */
export async function pumpStream(
  body: ReadableStream<Uint8Array>,
  parser: ChatStreamParser,
  signal: AbortSignal,
): Promise<void> {
  const reader = body.getReader();

  try {
    while (!parser.isFinished) {
      if (signal.aborted) {
        throw new CancelledError("Stream aborted");
      }

      const { done, value } = await reader.read();
      if (done) {
        parser.end();
        return;
      }
      parser.push(value);
    }

    // `[DONE]` or an error frame arrived before the body closed.
    await reader.cancel();
  } finally {
    reader.releaseLock();
  }
}
