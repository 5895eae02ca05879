/**
 * HTTP transport built on the native `fetch` API.
 *
 * The dispatcher talks to the network only through the `Transport`
 * interface, so tests can substitute an in-process fake.
 */

import {
  CancelledError,
  NetworkError,
  errorMessage,
  type RequestDescriptor,
} from "../types/index.js";
import { mapHttpError } from "./error-mapping.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Per-exchange context handed to the transport by the dispatcher. */
export interface TransportContext {
  /** Aborted on timeout or cancel-all. */
  readonly signal: AbortSignal;
  /** Provider name, for error attribution. */
  readonly provider: string;
}

export interface Transport {
  /** POST and resolve with the full response body text. */
  send(request: RequestDescriptor, context: TransportContext): Promise<string>;
  /** POST and resolve with the response body stream once headers arrive. */
  open(
    request: RequestDescriptor,
    context: TransportContext,
  ): Promise<ReadableStream<Uint8Array>>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

function mapFetchFailure(
  error: unknown,
  request: RequestDescriptor,
  context: TransportContext,
): Error {
  if (context.signal.aborted) {
    return new CancelledError("Request aborted", { cause: error });
  }
  return new NetworkError(
    `Failed to connect to ${request.url}: ${errorMessage(error)}`,
    { cause: error },
  );
}

// ---------------------------------------------------------------------------
// FetchTransport
// ---------------------------------------------------------------------------

export class FetchTransport implements Transport {
  async send(
    request: RequestDescriptor,
    context: TransportContext,
  ): Promise<string> {
    const res = await this.post(request, context);
    const text = await this.readText(res, request, context);

    if (!res.ok) {
      throw mapHttpError(res.status, text, context.provider);
    }
    return text;
  }

  async open(
    request: RequestDescriptor,
    context: TransportContext,
  ): Promise<ReadableStream<Uint8Array>> {
    const res = await this.post(request, context);

    if (!res.ok) {
      const text = await this.readText(res, request, context);
      throw mapHttpError(res.status, text, context.provider);
    }
    if (!res.body) {
      throw new NetworkError("Response body is null -- streaming not supported");
    }
    return res.body;
  }

  private async post(
    request: RequestDescriptor,
    context: TransportContext,
  ): Promise<Response> {
    try {
      return await fetch(request.url, {
        method: "POST",
        headers: { ...request.headers },
        body: request.body,
        signal: context.signal,
      });
    } catch (err) {
      throw mapFetchFailure(err, request, context);
    }
  }

  private async readText(
    res: Response,
    request: RequestDescriptor,
    context: TransportContext,
  ): Promise<string> {
    try {
      return await res.text();
    } catch (err) {
      throw mapFetchFailure(err, request, context);
    }
  }
}
