/**
 * Dispatcher: the orchestration layer between callers and provider adapters.
 *
 * Bounds how many requests are on the wire at once, queues the rest in FIFO
 * order, memoizes one-shot responses, enforces a per-request deadline, and
 * exposes both callback and promise entry points.
 *
 * All mutable state (in-flight table, queue, cache) belongs to the instance.
 * Queued work starts only when an in-flight request finishes.
 */

import { ResponseCache, cacheKey } from "./cache.js";
import { MAX_TIMEOUT_MS, type EngineConfig } from "./config.js";
import { makeLogger, type Logger } from "./logger.js";
import { createProviders } from "./providers/index.js";
import type { ProviderAdapter } from "./providers/adapter.js";
import { ChatStreamParser, pumpStream } from "./streaming/index.js";
import {
  CancelledError,
  ConfigurationError,
  QueueOverflowError,
  RequestKind,
  RequestTimeoutError,
  toSDKError,
  type ChunkCallback,
  type CompleteCallback,
  type Completion,
  type Message,
  type Outcome,
  type RequestCallback,
  type RequestDescriptor,
  type RequestHandle,
  type RequestOptions,
} from "./types/index.js";
import { FetchTransport, type Transport, type TransportContext } from "./utils/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DispatcherConfig {
  /** Named provider adapters. */
  providers: Record<string, ProviderAdapter>;
  /** Key into `providers` used when `options.provider` is omitted. */
  defaultProvider?: string;
  /** Upper bound on requests on the wire. Default 2. */
  maxConcurrent?: number;
  /** Per-request deadline in milliseconds. Default 30000. */
  timeoutMs?: number;
  cache?: {
    /** Default true. */
    enabled?: boolean;
    /** Default one hour. */
    ttlMs?: number;
  };
  transport?: Transport;
  logger?: Logger;
  /** Clock in milliseconds, shared with the cache. */
  now?: () => number;
  /** Called whenever a request has to wait for a free slot. */
  onQueued?: (notice: QueueOverflowError) => void;
}

/** Everything in a `DispatcherConfig` except what an `EngineConfig` supplies. */
export type DispatcherExtras = Pick<
  DispatcherConfig,
  "transport" | "logger" | "now" | "onQueued"
> & {
  /** Extra or replacement adapters, merged over the built-in ones. */
  providers?: Record<string, ProviderAdapter>;
};

export interface DispatcherStats {
  inFlight: number;
  queued: number;
  cached: number;
}

type PendingRequest =
  | { kind: typeof RequestKind.ONESHOT; callback: RequestCallback }
  | {
      kind: typeof RequestKind.STREAM;
      onChunk: ChunkCallback;
      onComplete: CompleteCallback;
    };

/** A request admitted past validation, waiting for or holding a slot. */
interface QueueEntry {
  id: string;
  adapter: ProviderAdapter;
  messages: readonly Message[];
  options: RequestOptions;
  pending: PendingRequest;
  /** Present for one-shot requests when caching is enabled. */
  cacheKey?: string;
}

interface RequestState {
  id: string;
  provider: string;
  kind: RequestKind;
  /** Flips to false exactly once: completion, timeout or cancel-all. */
  active: boolean;
  deadline: number;
  controller: AbortController;
  timer: ReturnType<typeof setTimeout>;
  /** True when deltas arrive over SSE rather than as one buffered body. */
  streaming: boolean;
  entry: QueueEntry;
}

const DEFAULT_MAX_CONCURRENT = 2;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_CACHE_TTL_MS = 3_600_000;

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class Dispatcher {
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly defaultProvider: string;
  private readonly maxConcurrent: number;
  private readonly timeoutMs: number;
  private readonly cache: ResponseCache<string> | undefined;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly onQueued: ((notice: QueueOverflowError) => void) | undefined;

  private readonly inFlight = new Map<string, RequestState>();
  private readonly queue: QueueEntry[] = [];
  private sequence = 0;

  constructor(config: DispatcherConfig) {
    const maxConcurrent = config.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new ConfigurationError(
        `maxConcurrent must be a positive integer, got ${maxConcurrent}`,
      );
    }
    const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!(timeoutMs > 0 && timeoutMs <= MAX_TIMEOUT_MS)) {
      throw new ConfigurationError(
        `timeoutMs must be positive and at most ${MAX_TIMEOUT_MS}, got ${timeoutMs}`,
      );
    }

    this.providers = { ...config.providers };
    this.defaultProvider = config.defaultProvider ?? "openai";
    this.maxConcurrent = maxConcurrent;
    this.timeoutMs = timeoutMs;
    this.now = config.now ?? Date.now;
    this.cache =
      config.cache?.enabled === false
        ? undefined
        : new ResponseCache<string>(config.cache?.ttlMs ?? DEFAULT_CACHE_TTL_MS, this.now);
    this.transport = config.transport ?? new FetchTransport();
    this.logger = config.logger ?? makeLogger({ component: "dispatcher" });
    this.onQueued = config.onQueued;
  }

  // -----------------------------------------------------------------------
  // Static factory
  // -----------------------------------------------------------------------

  /** Wire the built-in adapters and performance settings of an engine config. */
  static fromConfig(config: EngineConfig, extras: DispatcherExtras = {}): Dispatcher {
    const { performance } = config;
    return new Dispatcher({
      providers: { ...createProviders(config), ...extras.providers },
      defaultProvider: config.provider,
      maxConcurrent: performance.maxConcurrentRequests,
      timeoutMs: performance.requestTimeoutMs,
      cache: {
        enabled: performance.cacheResponses,
        ttlMs: performance.cacheTtlSeconds * 1000,
      },
      transport: extras.transport,
      logger: extras.logger,
      now: extras.now,
      onQueued: extras.onQueued,
    });
  }

  // -----------------------------------------------------------------------
  // Callback entry points
  // -----------------------------------------------------------------------

  /** One-shot request. `callback` fires exactly once, never synchronously. */
  request(
    messages: readonly Message[],
    options: RequestOptions,
    callback: RequestCallback,
  ): RequestHandle {
    return this.submit(messages, options, { kind: RequestKind.ONESHOT, callback });
  }

  /**
   * Streaming request. Never cached. Adapters without streaming support
   * deliver the whole text as a single chunk before `onComplete`.
   */
  requestStream(
    messages: readonly Message[],
    options: RequestOptions,
    onChunk: ChunkCallback,
    onComplete: CompleteCallback,
  ): RequestHandle {
    return this.submit(messages, options, {
      kind: RequestKind.STREAM,
      onChunk,
      onComplete,
    });
  }

  // -----------------------------------------------------------------------
  // Promise entry points
  // -----------------------------------------------------------------------

  complete(messages: readonly Message[], options: RequestOptions = {}): Promise<string> {
    return new Promise((resolve, reject) => {
      this.request(messages, options, (outcome) => {
        if (outcome.ok) resolve(outcome.value);
        else reject(outcome.error);
      });
    });
  }

  stream(
    messages: readonly Message[],
    options: RequestOptions,
    onChunk: ChunkCallback,
  ): Promise<Completion> {
    return new Promise((resolve, reject) => {
      this.requestStream(messages, options, onChunk, (outcome) => {
        if (outcome.ok) resolve(outcome.value);
        else reject(outcome.error);
      });
    });
  }

  /**
   * Route on `options.stream`: streaming when true, one-shot otherwise.
   * Resolves with the final text either way.
   */
  async converse(
    messages: readonly Message[],
    options: RequestOptions = {},
    onChunk: ChunkCallback = () => {},
  ): Promise<string> {
    if (options.stream) {
      const completion = await this.stream(messages, options, onChunk);
      return completion.text;
    }
    return this.complete(messages, options);
  }

  // -----------------------------------------------------------------------
  // Control
  // -----------------------------------------------------------------------

  /**
   * Abort everything on the wire and drop the queue. Every outstanding
   * callback receives a `CancelledError`; the dispatcher is empty on return.
   */
  cancelAll(): void {
    const active = [...this.inFlight.values()];
    const queued = this.queue.splice(0);
    this.inFlight.clear();

    for (const state of active) {
      state.active = false;
      clearTimeout(state.timer);
    }
    for (const state of active) {
      state.controller.abort();
    }

    if (active.length > 0 || queued.length > 0) {
      this.logger.debug(
        { inFlight: active.length, queued: queued.length },
        "cancelling all requests",
      );
    }

    for (const state of active) {
      this.deliver(state.id, state.entry.pending, this.cancelled(), !state.streaming);
    }
    for (const entry of queued) {
      this.deliver(entry.id, entry.pending, this.cancelled(), true);
    }
  }

  clearCache(): void {
    this.cache?.clear();
  }

  stats(): DispatcherStats {
    return {
      inFlight: this.inFlight.size,
      queued: this.queue.length,
      cached: this.cache?.size ?? 0,
    };
  }

  // -----------------------------------------------------------------------
  // Admission
  // -----------------------------------------------------------------------

  private submit(
    messages: readonly Message[],
    options: RequestOptions,
    pending: PendingRequest,
  ): RequestHandle {
    this.sequence += 1;
    const id = `req_${this.sequence}`;

    const resolved = this.resolveAdapter(options.provider);
    if (!resolved.ok) {
      this.deliverLater(id, pending, { ok: false, error: resolved.error });
      return { id, queued: false };
    }

    const adapter = resolved.value;
    const key = this.keyFor(adapter, messages, options, pending);
    if (!key.ok) {
      this.deliverLater(id, pending, { ok: false, error: key.error });
      return { id, queued: false };
    }

    const entry: QueueEntry = {
      id,
      adapter,
      messages: [...messages],
      options,
      pending,
      cacheKey: key.value,
    };

    if (this.serveFromCache(entry)) {
      return { id, queued: false };
    }

    if (this.inFlight.size < this.maxConcurrent) {
      this.start(entry);
      return { id, queued: false };
    }

    this.queue.push(entry);
    const notice = new QueueOverflowError(
      `In-flight limit of ${this.maxConcurrent} reached; ${this.queue.length} request(s) queued`,
      { queueSize: this.queue.length },
    );
    this.logger.warn(
      { requestId: id, provider: adapter.name, queueSize: this.queue.length },
      notice.message,
    );
    if (this.onQueued) {
      const hook = this.onQueued;
      this.invoke(id, () => hook(notice));
    }
    return { id, queued: true };
  }

  private resolveAdapter(name: string | undefined): Outcome<ProviderAdapter> {
    const providerName = name ?? this.defaultProvider;
    const adapter = this.providers[providerName];
    if (!adapter) {
      return {
        ok: false,
        error: new ConfigurationError(`Unknown provider: ${providerName}`),
      };
    }
    if (adapter.requiresApiKey && !adapter.hasApiKey()) {
      return {
        ok: false,
        error: new ConfigurationError(`${providerName} API key not configured`),
      };
    }
    return { ok: true, value: adapter };
  }

  /**
   * Cache key of a one-shot request, taken from the wire request the adapter
   * would send, so options left to the adapter's defaults key the same as
   * the defaults spelled out.
   */
  private keyFor(
    adapter: ProviderAdapter,
    messages: readonly Message[],
    options: RequestOptions,
    pending: PendingRequest,
  ): Outcome<string | undefined> {
    if (pending.kind !== RequestKind.ONESHOT || !this.cache) {
      return { ok: true, value: undefined };
    }
    try {
      const descriptor = adapter.prepare(messages, { ...options, stream: false });
      return { ok: true, value: cacheKey(adapter.name, descriptor) };
    } catch (err) {
      return { ok: false, error: toSDKError(err) };
    }
  }

  /** Answer a one-shot request from the cache. Returns true on a hit. */
  private serveFromCache(entry: QueueEntry): boolean {
    if (!this.cache || entry.cacheKey === undefined) return false;

    const hit = this.cache.get(entry.cacheKey);
    if (hit === undefined) return false;

    this.logger.debug({ requestId: entry.id, provider: entry.adapter.name }, "cache hit");
    this.deliverLater(entry.id, entry.pending, {
      ok: true,
      value: { text: hit, toolCalls: [] },
    });
    return true;
  }

  /** Start queued work while slots are free, in FIFO order. */
  private drain(): void {
    while (this.inFlight.size < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) return;
      // An identical request may have completed while this one waited.
      if (this.serveFromCache(next)) continue;
      this.start(next);
    }
  }

  // -----------------------------------------------------------------------
  // Execution
  // -----------------------------------------------------------------------

  private start(entry: QueueEntry): void {
    const { adapter } = entry;
    const streaming = entry.pending.kind === RequestKind.STREAM && adapter.supportsStreaming;

    let descriptor: RequestDescriptor;
    try {
      descriptor = adapter.prepare(entry.messages, { ...entry.options, stream: streaming });
    } catch (err) {
      this.deliverLater(entry.id, entry.pending, { ok: false, error: toSDKError(err) });
      return;
    }

    const state: RequestState = {
      id: entry.id,
      provider: adapter.name,
      kind: entry.pending.kind,
      active: true,
      deadline: this.now() + this.timeoutMs,
      controller: new AbortController(),
      timer: setTimeout(() => this.expire(state), this.timeoutMs),
      streaming,
      entry,
    };
    this.inFlight.set(state.id, state);

    this.logger.debug(
      { requestId: state.id, provider: state.provider, kind: state.kind, streaming },
      "dispatching request",
    );

    const { pending } = entry;
    const run =
      streaming && pending.kind === RequestKind.STREAM
        ? this.runStream(state, descriptor, pending.onChunk)
        : this.runOneShot(state, descriptor);
    run.catch((err: unknown) => {
      this.settle(state, { ok: false, error: toSDKError(err) });
    });
  }

  private async runOneShot(state: RequestState, descriptor: RequestDescriptor): Promise<void> {
    try {
      const rawBody = await this.transport.send(descriptor, this.contextFor(state));
      this.settle(state, state.entry.adapter.parse(rawBody));
    } catch (err) {
      this.settle(state, { ok: false, error: toSDKError(err) });
    }
  }

  private async runStream(
    state: RequestState,
    descriptor: RequestDescriptor,
    onChunk: ChunkCallback,
  ): Promise<void> {
    try {
      const body = await this.transport.open(descriptor, this.contextFor(state));
      if (!state.active) {
        await body.cancel();
        return;
      }

      const parser = new ChatStreamParser(
        {
          onChunk: (delta) => {
            if (state.active) this.invoke(state.id, () => onChunk(delta));
          },
          onComplete: (outcome) => this.settle(state, outcome),
        },
        { provider: state.provider, logger: this.logger.child({ requestId: state.id }) },
      );
      await pumpStream(body, parser, state.controller.signal);
    } catch (err) {
      this.settle(state, { ok: false, error: toSDKError(err) });
    }
  }

  private contextFor(state: RequestState): TransportContext {
    return { signal: state.controller.signal, provider: state.provider };
  }

  // -----------------------------------------------------------------------
  // Completion
  // -----------------------------------------------------------------------

  /** Network completion. A no-op once the request is no longer active. */
  private settle(state: RequestState, outcome: Outcome<Completion>): void {
    if (!state.active) {
      this.logger.debug(
        { requestId: state.id, provider: state.provider },
        "dropping completion of inactive request",
      );
      return;
    }
    this.retire(state);

    if (outcome.ok && state.entry.cacheKey !== undefined) {
      this.cache?.set(state.entry.cacheKey, outcome.value.text);
    }
    if (!outcome.ok) {
      this.logger.debug(
        { requestId: state.id, provider: state.provider, code: outcome.error.code },
        outcome.error.message,
      );
    }

    // Queued work starts before the caller hears back.
    this.drain();
    this.deliver(state.id, state.entry.pending, outcome, !state.streaming);
  }

  /** Deadline reached. A no-op once the request is no longer active. */
  private expire(state: RequestState): void {
    if (!state.active) return;
    this.retire(state);
    state.controller.abort();

    const error = new RequestTimeoutError(
      `Request ${state.id} timed out after ${this.timeoutMs}ms`,
      { timeoutMs: this.timeoutMs },
    );
    this.logger.warn({ requestId: state.id, provider: state.provider }, error.message);

    this.drain();
    this.deliver(state.id, state.entry.pending, { ok: false, error }, !state.streaming);
  }

  private retire(state: RequestState): void {
    state.active = false;
    clearTimeout(state.timer);
    this.inFlight.delete(state.id);
  }

  private cancelled(): Outcome<Completion> {
    return { ok: false, error: new CancelledError("Request cancelled") };
  }

  // -----------------------------------------------------------------------
  // Delivery
  // -----------------------------------------------------------------------

  /**
   * Hand the outcome to the caller's callbacks. `buffered` marks a streaming
   * request whose text has not been chunked yet.
   */
  private deliver(
    id: string,
    pending: PendingRequest,
    outcome: Outcome<Completion>,
    buffered: boolean,
  ): void {
    if (pending.kind === RequestKind.ONESHOT) {
      const result: Outcome<string> = outcome.ok
        ? { ok: true, value: outcome.value.text }
        : outcome;
      this.invoke(id, () => pending.callback(result));
      return;
    }

    if (outcome.ok && buffered && outcome.value.text !== "") {
      const text = outcome.value.text;
      this.invoke(id, () => pending.onChunk(text));
    }
    this.invoke(id, () => pending.onComplete(outcome));
  }

  /** Early exits still report asynchronously, after the entry point returns. */
  private deliverLater(
    id: string,
    pending: PendingRequest,
    outcome: Outcome<Completion>,
  ): void {
    if (!outcome.ok) {
      this.logger.debug({ requestId: id, code: outcome.error.code }, outcome.error.message);
    }
    queueMicrotask(() => {
      this.deliver(id, pending, outcome, true);
    });
  }

  private invoke(requestId: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.logger.error({ err, requestId }, "request callback threw");
    }
  }
}
