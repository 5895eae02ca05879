/**
 * Barrel re-export for streaming modules.
 */

export { ChatStreamParser } from "./chat-stream.js";
export type { ChatStreamHandlers, ChatStreamParserOptions } from "./chat-stream.js";
export { pumpStream } from "./pump.js";
