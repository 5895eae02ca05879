/**
 * Barrel re-export for utility modules.
 */

// HTTP transport
export { FetchTransport, mergeHeaders } from "./http.js";
export type { Transport, TransportContext } from "./http.js";

// SSE decoder
export { SSEDecoder, parseSSEStream } from "./sse.js";
export type { SSEEvent } from "./sse.js";

// Error mapping
export { mapHttpError, extractProviderError, parseJsonBody } from "./error-mapping.js";

// Deterministic serialization
export { stableStringify } from "./stable-json.js";
