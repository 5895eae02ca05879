/**
 * Server-Sent Events (SSE) frame decoder.
 *
 * Push-based: feed it network reads of any size and it returns the events
 * completed by that read. Follows the W3C event-stream rules:
 *   - `event:` lines set the event type
 *   - `data:` lines form the payload (multiple `data:` lines are joined with "\n")
 *   - `retry:` lines set a reconnection interval
 *   - Lines starting with `:` are comments (ignored)
 *   - A blank line dispatches the accumulated event
 *
 * Reads may split a frame anywhere, including inside a field name, between
 * `\r` and `\n`, or inside a multibyte UTF-8 sequence.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single parsed SSE event. */
export interface SSEEvent {
  /** The event type (from `event:` line). `undefined` if not specified. */
  event?: string;
  /** The event data (from `data:` lines, joined with newlines). */
  data: string;
  /** Reconnection interval in milliseconds (from `retry:` line). */
  retry?: number;
}

interface SSEAccumulator {
  eventType: string | undefined;
  dataLines: string[];
  retry: number | undefined;
}

// ---------------------------------------------------------------------------
// Internal: parse a single non-blank, non-comment line into field accumulators.
// ---------------------------------------------------------------------------

function processField(line: string, acc: SSEAccumulator): void {
  const colonIdx = line.indexOf(":");
  let field: string;
  let value: string;

  if (colonIdx === -1) {
    field = line;
    value = "";
  } else {
    field = line.slice(0, colonIdx);
    value = line.slice(colonIdx + 1);
    // Strip a single leading space if present.
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }
  }

  switch (field) {
    case "event":
      acc.eventType = value;
      break;
    case "data":
      acc.dataLines.push(value);
      break;
    case "retry": {
      const parsed = parseInt(value, 10);
      if (!Number.isNaN(parsed)) {
        acc.retry = parsed;
      }
      break;
    }
    // Unknown fields are ignored.
  }
}

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

export class SSEDecoder {
  private readonly decoder = new TextDecoder();
  /** Carry-over text: an incomplete trailing line. */
  private buffer = "";
  private acc: SSEAccumulator = {
    eventType: undefined,
    dataLines: [],
    retry: undefined,
  };

  /** Append one network read and return every event it completed. */
  push(chunk: Uint8Array | string): SSEEvent[] {
    this.buffer +=
      typeof chunk === "string"
        ? chunk
        : this.decoder.decode(chunk, { stream: true });

    // A trailing "\r" may be the first half of "\r\n"; wait for the next read.
    let held = "";
    if (this.buffer.endsWith("\r")) {
      held = "\r";
      this.buffer = this.buffer.slice(0, -1);
    }

    const lines = this.buffer.split(/\r\n|\r|\n/);
    // The last element is either "" (the read ended on a newline) or a
    // partial line that needs more data.
    this.buffer = (lines.pop() ?? "") + held;

    return this.processLines(lines);
  }

  /**
   * Signal end of input. Dispatches a trailing event that was never
   * terminated by a blank line.
   */
  flush(): SSEEvent[] {
    this.buffer += this.decoder.decode();
    const lines = this.buffer.split(/\r\n|\r|\n/);
    this.buffer = "";

    const events = this.processLines(lines);
    if (this.acc.dataLines.length > 0) {
      events.push(this.dispatch());
    }
    return events;
  }

  private processLines(lines: string[]): SSEEvent[] {
    const events: SSEEvent[] = [];

    for (const line of lines) {
      if (line === "") {
        // Blank line = event boundary.  Dispatch if we have data.
        if (this.acc.dataLines.length > 0) {
          events.push(this.dispatch());
        } else {
          this.reset();
        }
        continue;
      }

      if (line.startsWith(":")) {
        continue;
      }

      processField(line, this.acc);
    }

    return events;
  }

  private dispatch(): SSEEvent {
    const event: SSEEvent = {
      event: this.acc.eventType,
      data: this.acc.dataLines.join("\n"),
      retry: this.acc.retry,
    };
    this.reset();
    return event;
  }

  private reset(): void {
    this.acc = { eventType: undefined, dataLines: [], retry: undefined };
  }
}

// ---------------------------------------------------------------------------
// Async iterator form
// ---------------------------------------------------------------------------

/**
 * Parse an SSE byte stream into events.
 *
 * The reader lock is released when iteration stops, including on an early
 * `break` by the consumer.
 */
export async function* parseSSEStream(
  stream: ReadableStream<Uint8Array>,
): AsyncGenerator<SSEEvent> {
  const decoder = new SSEDecoder();
  const reader = stream.getReader();

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield* decoder.push(value);
    }
    yield* decoder.flush();
  } finally {
    reader.releaseLock();
  }
}
