/**
 * Error hierarchy for the LLM client.
 *
 * All library errors inherit from SDKError and carry a stable `code` so
 * callers can branch without `instanceof` across package boundaries.
 */

// ---------------------------------------------------------------------------
// SDKError: base for all library errors
// ---------------------------------------------------------------------------

export class SDKError extends Error {
  /** Stable machine-readable classification. */
  readonly code: string;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = "SDKError";
    this.code = options?.code ?? "sdk_error";
  }
}

// ---------------------------------------------------------------------------
// Request-scoped errors
// ---------------------------------------------------------------------------

/** Misconfiguration: missing credential, unknown provider, invalid settings. */
export class ConfigurationError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: "configuration" });
    this.name = "ConfigurationError";
  }
}

/** Connection or transport failure before a response was read. */
export class NetworkError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: "network" });
    this.name = "NetworkError";
  }
}

/** Malformed JSON or a payload of unexpected shape. */
export class ParseError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: "parse" });
    this.name = "ParseError";
  }
}

/** A well-formed error reported by the backend. */
export class ProviderError extends SDKError {
  /** Which provider returned the error. */
  readonly provider: string;
  /** HTTP status code, if applicable. */
  readonly statusCode?: number;
  /** Provider-specific error code or type. */
  readonly errorCode?: string;

  constructor(
    message: string,
    options: {
      provider: string;
      statusCode?: number;
      errorCode?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause, code: "provider" });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.statusCode = options.statusCode;
    this.errorCode = options.errorCode;
  }
}

/** The request outlived its deadline and was torn down. */
export class RequestTimeoutError extends SDKError {
  readonly timeoutMs: number;

  constructor(message: string, options: { timeoutMs: number; cause?: unknown }) {
    super(message, { cause: options.cause, code: "timeout" });
    this.name = "RequestTimeoutError";
    this.timeoutMs = options.timeoutMs;
  }
}

/** The request was cancelled before it completed. */
export class CancelledError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: "cancelled" });
    this.name = "CancelledError";
  }
}

/**
 * Soft condition: the in-flight limit was reached and the request was queued.
 * Never delivered through a request's error channel.
 */
export class QueueOverflowError extends SDKError {
  readonly queueSize: number;

  constructor(message: string, options: { queueSize: number }) {
    super(message, { code: "queue_overflow" });
    this.name = "QueueOverflowError";
    this.queueSize = options.queueSize;
  }
}

// ---------------------------------------------------------------------------
// Session-scoped errors
// ---------------------------------------------------------------------------

/** A tool threw or returned something that cannot be JSON-encoded. */
export class ToolExecutionError extends SDKError {
  readonly toolName: string;

  constructor(message: string, options: { toolName: string; cause?: unknown }) {
    super(message, { cause: options.cause, code: "tool_execution" });
    this.name = "ToolExecutionError";
    this.toolName = options.toolName;
  }
}

/** The tool-calling loop hit its iteration cap. */
export class IterationLimitError extends SDKError {
  readonly maxIterations: number;

  constructor(message: string, options: { maxIterations: number }) {
    super(message, { code: "iteration_limit" });
    this.name = "IterationLimitError";
    this.maxIterations = options.maxIterations;
  }
}

/** `send` was called while the session was still running a previous one. */
export class SessionBusyError extends SDKError {
  constructor(message: string) {
    super(message, { code: "session_busy" });
    this.name = "SessionBusyError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Human-readable message for any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Normalize a foreign throwable into the SDKError hierarchy. */
export function toSDKError(error: unknown): SDKError {
  if (error instanceof SDKError) return error;
  return new SDKError(errorMessage(error), { cause: error });
}
