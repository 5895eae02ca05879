import { describe, it, expect, vi, afterEach } from "vitest";
import { Dispatcher } from "../src/dispatcher.js";
import type { DispatcherConfig } from "../src/dispatcher.js";
import { resolveConfig, type ProviderSettings } from "../src/config.js";
import { makeNoopLogger } from "../src/logger.js";
import { OllamaAdapter } from "../src/providers/ollama/index.js";
import { OpenAIAdapter } from "../src/providers/openai/index.js";
import {
  CancelledError,
  ConfigurationError,
  NetworkError,
  ProviderError,
  QueueOverflowError,
  RequestTimeoutError,
  createUserMessage,
  type Completion,
  type Message,
  type Outcome,
} from "../src/types/index.js";
import {
  FakeTransport,
  type FakeExchange,
  chatBody,
  contentFrame,
  flush,
} from "./helpers/fake-transport.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const openaiSettings: ProviderSettings = {
  endpoint: "https://llm.test/v1/chat/completions",
  apiKey: "test-secret",
  model: "gpt-test",
  temperature: 0.3,
};

const ollamaSettings: ProviderSettings = {
  endpoint: "http://ollama.test/api/generate",
  model: "llama-test",
  temperature: 0.3,
};

function setup(overrides: Partial<DispatcherConfig> = {}) {
  const transport = new FakeTransport();
  const dispatcher = new Dispatcher({
    providers: {
      openai: new OpenAIAdapter({ settings: openaiSettings }),
      ollama: new OllamaAdapter(ollamaSettings),
    },
    transport,
    logger: makeNoopLogger(),
    ...overrides,
  });
  active.push(dispatcher);
  return { dispatcher, transport };
}

function user(text: string): Message[] {
  return [createUserMessage(text)];
}

function firstUserContent(exchange: FakeExchange): unknown {
  return JSON.parse(exchange.request.body).messages[0].content;
}

const active: Dispatcher[] = [];

afterEach(() => {
  for (const dispatcher of active.splice(0)) {
    dispatcher.cancelAll();
  }
  vi.useRealTimers();
});

// ---------------------------------------------------------------------------
// One-shot requests
// ---------------------------------------------------------------------------

describe("Dispatcher.request", () => {
  it("sends the adapter's descriptor and delivers the parsed text", async () => {
    const { dispatcher, transport } = setup();
    const callback = vi.fn();

    const handle = dispatcher.request(user("hello"), {}, callback);

    expect(handle).toEqual({ id: "req_1", queued: false });
    expect(transport.exchanges).toHaveLength(1);
    const exchange = transport.at(0);
    expect(exchange.kind).toBe("send");
    expect(exchange.request.url).toBe("https://llm.test/v1/chat/completions");
    expect(exchange.request.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(exchange.payload).toEqual({
      model: "gpt-test",
      messages: [{ role: "user", content: "hello" }],
      temperature: 0.3,
      stream: false,
    });

    exchange.respond(chatBody("hi there"));
    await flush();

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith({ ok: true, value: "hi there" });
    expect(dispatcher.stats()).toEqual({ inFlight: 0, queued: 0, cached: 1 });
  });

  it("numbers requests sequentially", () => {
    const { dispatcher } = setup();
    expect(dispatcher.request(user("a"), {}, () => {}).id).toBe("req_1");
    expect(dispatcher.request(user("b"), {}, () => {}).id).toBe("req_2");
  });

  it("reports a provider error payload through the callback", async () => {
    const { dispatcher, transport } = setup();
    const callback = vi.fn<(outcome: Outcome<string>) => void>();

    dispatcher.request(user("hello"), {}, callback);
    transport.at(0).respond(
      JSON.stringify({ error: { message: "Invalid key", type: "invalid_request_error" } }),
    );
    await flush();

    const outcome = callback.mock.calls[0]?.[0];
    expect(outcome?.ok).toBe(false);
    if (outcome && !outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ProviderError);
      expect(outcome.error.message).toBe("Invalid key");
    }
    expect(dispatcher.stats().cached).toBe(0);
  });

  it("reports transport failures through the callback", async () => {
    const { dispatcher, transport } = setup();
    const callback = vi.fn<(outcome: Outcome<string>) => void>();

    dispatcher.request(user("hello"), {}, callback);
    transport.at(0).fail(new NetworkError("Failed to connect to https://llm.test: refused"));
    await flush();

    const outcome = callback.mock.calls[0]?.[0];
    if (!outcome || outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toBeInstanceOf(NetworkError);
    expect(outcome.error.message).toBe("Failed to connect to https://llm.test: refused");
  });
});

// ---------------------------------------------------------------------------
// Credential and provider checks
// ---------------------------------------------------------------------------

describe("configuration errors", () => {
  it("rejects a provider without its credential, asynchronously", async () => {
    const { dispatcher, transport } = setup({
      providers: {
        openai: new OpenAIAdapter({ settings: { ...openaiSettings, apiKey: undefined } }),
      },
    });
    const callback = vi.fn<(outcome: Outcome<string>) => void>();

    dispatcher.request(user("hello"), {}, callback);
    expect(callback).not.toHaveBeenCalled();

    await flush();
    const outcome = callback.mock.calls[0]?.[0];
    if (!outcome || outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toBeInstanceOf(ConfigurationError);
    expect(outcome.error.message).toBe("openai API key not configured");
    expect(transport.exchanges).toHaveLength(0);
  });

  it("does not require a credential for ollama", () => {
    const { dispatcher, transport } = setup();
    dispatcher.request(user("hello"), { provider: "ollama" }, () => {});
    expect(transport.exchanges).toHaveLength(1);
    expect(transport.at(0).request.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("rejects an unknown provider", async () => {
    const { dispatcher } = setup();
    const onComplete = vi.fn<(outcome: Outcome<Completion>) => void>();

    dispatcher.requestStream(user("hello"), { provider: "nope" }, () => {}, onComplete);
    await flush();

    const outcome = onComplete.mock.calls[0]?.[0];
    if (!outcome || outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toBeInstanceOf(ConfigurationError);
    expect(outcome.error.message).toBe("Unknown provider: nope");
  });

  it("refuses a non-positive concurrency limit", () => {
    expect(() => setup({ maxConcurrent: 0 })).toThrow(ConfigurationError);
  });

  it("refuses a timeout longer than a timer can hold", () => {
    expect(() => setup({ timeoutMs: 2 ** 31 })).toThrow(
      "timeoutMs must be positive and at most 2147483647, got 2147483648",
    );
    expect(() => setup({ timeoutMs: 0 })).toThrow(ConfigurationError);
    expect(() => setup({ timeoutMs: 2_147_483_647 })).not.toThrow();
  });
});

// ---------------------------------------------------------------------------
// Admission and queueing
// ---------------------------------------------------------------------------

describe("admission", () => {
  it("holds requests beyond the limit and starts them in FIFO order", async () => {
    const { dispatcher, transport } = setup({ maxConcurrent: 2 });

    const handles = ["a", "b", "c", "d"].map((text) =>
      dispatcher.request(user(text), {}, () => {}),
    );

    expect(handles.map((h) => h.queued)).toEqual([false, false, true, true]);
    expect(transport.exchanges).toHaveLength(2);
    expect(dispatcher.stats()).toEqual({ inFlight: 2, queued: 2, cached: 0 });

    transport.at(0).respond(chatBody("A"));
    await flush();
    expect(transport.exchanges).toHaveLength(3);
    expect(firstUserContent(transport.at(2))).toBe("c");

    transport.at(1).respond(chatBody("B"));
    await flush();
    expect(transport.exchanges).toHaveLength(4);
    expect(firstUserContent(transport.at(3))).toBe("d");
    expect(dispatcher.stats()).toEqual({ inFlight: 2, queued: 0, cached: 2 });
  });

  it("starts the next queued request before notifying the caller", async () => {
    const { dispatcher, transport } = setup({ maxConcurrent: 1 });
    const seen: number[] = [];

    dispatcher.request(user("first"), {}, () => seen.push(transport.exchanges.length));
    dispatcher.request(user("second"), {}, () => {});

    transport.at(0).respond(chatBody("done"));
    await flush();

    expect(seen).toEqual([2]);
  });

  it("passes a QueueOverflowError notice to onQueued", () => {
    const onQueued = vi.fn<(notice: QueueOverflowError) => void>();
    const { dispatcher } = setup({ maxConcurrent: 1, onQueued });

    dispatcher.request(user("a"), {}, () => {});
    dispatcher.request(user("b"), {}, () => {});
    dispatcher.request(user("c"), {}, () => {});

    expect(onQueued).toHaveBeenCalledTimes(2);
    const notice = onQueued.mock.calls[1]?.[0];
    expect(notice).toBeInstanceOf(QueueOverflowError);
    expect(notice?.queueSize).toBe(2);
    expect(notice?.message).toBe("In-flight limit of 1 reached; 2 request(s) queued");
  });

  it("keeps draining when a caller callback throws", async () => {
    const logger = makeNoopLogger();
    const errorSpy = vi.spyOn(logger, "error");
    const { dispatcher, transport } = setup({ maxConcurrent: 1, logger });

    dispatcher.request(user("a"), {}, () => {
      throw new Error("caller bug");
    });
    const second = vi.fn();
    dispatcher.request(user("b"), {}, second);

    transport.at(0).respond(chatBody("A"));
    await flush();
    transport.at(1).respond(chatBody("B"));
    await flush();

    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: "req_1" }),
      "request callback threw",
    );
    expect(second).toHaveBeenCalledWith({ ok: true, value: "B" });
  });
});

// ---------------------------------------------------------------------------
// Response cache
// ---------------------------------------------------------------------------

describe("response cache", () => {
  it("serves an identical request within the TTL without network access", async () => {
    let clock = 1_000;
    const { dispatcher, transport } = setup({
      now: () => clock,
      cache: { ttlMs: 1_000 },
    });

    dispatcher.request(user("same"), {}, () => {});
    transport.at(0).respond(chatBody("cached answer"));
    await flush();

    clock = 1_999;
    const hit = vi.fn();
    expect(dispatcher.request(user("same"), {}, hit).queued).toBe(false);
    await flush();
    expect(hit).toHaveBeenCalledWith({ ok: true, value: "cached answer" });
    expect(transport.exchanges).toHaveLength(1);

    clock = 2_000;
    dispatcher.request(user("same"), {}, () => {});
    expect(transport.exchanges).toHaveLength(2);
  });

  it("keys on output-affecting options but not on the stream flag", async () => {
    const { dispatcher, transport } = setup();

    dispatcher.request(user("same"), { temperature: 0.5 }, () => {});
    transport.at(0).respond(chatBody("warm"));
    await flush();

    dispatcher.request(user("same"), { temperature: 0.5, stream: true }, () => {});
    expect(transport.exchanges).toHaveLength(1);

    dispatcher.request(user("same"), { temperature: 0.9 }, () => {});
    expect(transport.exchanges).toHaveLength(2);
  });

  it("treats defaults left unset and defaults spelled out as the same request", async () => {
    const { dispatcher, transport } = setup();

    dispatcher.request(user("x"), {}, () => {});
    transport.at(0).respond(chatBody("first"));
    await flush();

    const hit = vi.fn();
    dispatcher.request(
      user("x"),
      { provider: "openai", model: "gpt-test", temperature: 0.3 },
      hit,
    );
    await flush();

    expect(transport.exchanges).toHaveLength(1);
    expect(hit).toHaveBeenCalledWith({ ok: true, value: "first" });
  });

  it("answers a queued duplicate from the cache once the first completes", async () => {
    const { dispatcher, transport } = setup({ maxConcurrent: 1 });
    const first = vi.fn();
    const second = vi.fn();

    dispatcher.request(user("dup"), {}, first);
    expect(dispatcher.request(user("dup"), {}, second).queued).toBe(true);

    transport.at(0).respond(chatBody("answer"));
    await flush();

    expect(transport.exchanges).toHaveLength(1);
    expect(first).toHaveBeenCalledWith({ ok: true, value: "answer" });
    expect(second).toHaveBeenCalledWith({ ok: true, value: "answer" });
  });

  it("never caches when disabled", async () => {
    const { dispatcher, transport } = setup({ cache: { enabled: false } });

    dispatcher.request(user("same"), {}, () => {});
    transport.at(0).respond(chatBody("x"));
    await flush();
    dispatcher.request(user("same"), {}, () => {});

    expect(transport.exchanges).toHaveLength(2);
    expect(dispatcher.stats().cached).toBe(0);
  });

  it("clearCache forgets stored responses", async () => {
    const { dispatcher, transport } = setup();

    dispatcher.request(user("same"), {}, () => {});
    transport.at(0).respond(chatBody("x"));
    await flush();
    expect(dispatcher.stats().cached).toBe(1);

    dispatcher.clearCache();
    expect(dispatcher.stats().cached).toBe(0);
    dispatcher.request(user("same"), {}, () => {});
    expect(transport.exchanges).toHaveLength(2);
  });

  it("never caches streaming requests", async () => {
    const { dispatcher, transport } = setup();

    dispatcher.requestStream(user("same"), {}, () => {}, () => {});
    transport.at(0).accept().frames(contentFrame("x"), "[DONE]");
    await flush();
    dispatcher.requestStream(user("same"), {}, () => {}, () => {});

    expect(transport.exchanges).toHaveLength(2);
    expect(dispatcher.stats().cached).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Streaming
// ---------------------------------------------------------------------------

describe("Dispatcher.requestStream", () => {
  it("delivers deltas as frames arrive, then the completion", async () => {
    const { dispatcher, transport } = setup();
    const chunks: string[] = [];
    const onComplete = vi.fn();

    dispatcher.requestStream(user("hi"), {}, (d) => chunks.push(d), onComplete);
    const exchange = transport.at(0);
    expect(exchange.kind).toBe("open");
    expect(exchange.payload).toMatchObject({ stream: true });

    const body = exchange.accept();
    body.frames(contentFrame("Hel"));
    await flush();
    expect(chunks).toEqual(["Hel"]);
    expect(onComplete).not.toHaveBeenCalled();

    body.frames(contentFrame("lo"), "[DONE]");
    await flush();
    expect(chunks).toEqual(["Hel", "lo"]);
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(onComplete).toHaveBeenCalledWith({
      ok: true,
      value: { text: "Hello", toolCalls: [] },
    });
    expect(dispatcher.stats().inFlight).toBe(0);
  });

  it("reports an error frame as a ProviderError", async () => {
    const { dispatcher, transport } = setup();
    const onComplete = vi.fn<(outcome: Outcome<Completion>) => void>();

    dispatcher.requestStream(user("hi"), {}, () => {}, onComplete);
    transport
      .at(0)
      .accept()
      .frames(JSON.stringify({ error: { message: "overloaded", type: "server_error" } }));
    await flush();

    const outcome = onComplete.mock.calls[0]?.[0];
    if (!outcome || outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toBeInstanceOf(ProviderError);
    expect(outcome.error.message).toBe("overloaded");
  });

  it("falls back to one call for adapters without streaming", async () => {
    const { dispatcher, transport } = setup();
    const chunks: string[] = [];
    const onComplete = vi.fn();

    dispatcher.requestStream(user("hi"), { provider: "ollama" }, (d) => chunks.push(d), onComplete);
    const exchange = transport.at(0);
    expect(exchange.kind).toBe("send");
    expect(exchange.payload).toMatchObject({ stream: false, prompt: "User: hi" });

    exchange.respond(JSON.stringify({ response: "full text" }));
    await flush();

    expect(chunks).toEqual(["full text"]);
    expect(onComplete).toHaveBeenCalledWith({
      ok: true,
      value: { text: "full text", toolCalls: [] },
    });
  });

  it("skips the chunk when the fallback text is empty", async () => {
    const { dispatcher, transport } = setup();
    const onChunk = vi.fn();
    const onComplete = vi.fn();

    dispatcher.requestStream(user("hi"), { provider: "ollama" }, onChunk, onComplete);
    transport.at(0).respond(JSON.stringify({ response: "" }));
    await flush();

    expect(onChunk).not.toHaveBeenCalled();
    expect(onComplete).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Timeouts
// ---------------------------------------------------------------------------

describe("timeouts", () => {
  it("aborts at the deadline and ignores the late completion", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const { dispatcher, transport } = setup({ timeoutMs: 1_000 });
    const callback = vi.fn<(outcome: Outcome<string>) => void>();

    dispatcher.request(user("slow"), {}, callback);
    vi.advanceTimersByTime(999);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    const outcome = callback.mock.calls[0]?.[0];
    if (!outcome || outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toBeInstanceOf(RequestTimeoutError);
    expect(outcome.error.message).toBe("Request req_1 timed out after 1000ms");
    expect(transport.at(0).aborted).toBe(true);

    transport.at(0).respond(chatBody("too late"));
    await flush();
    expect(callback).toHaveBeenCalledTimes(1);
    expect(dispatcher.stats()).toEqual({ inFlight: 0, queued: 0, cached: 0 });
  });

  it("clears the deadline when the response wins", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const { dispatcher, transport } = setup({ timeoutMs: 1_000 });
    const callback = vi.fn();

    dispatcher.request(user("fast"), {}, callback);
    transport.at(0).respond(chatBody("quick"));
    await flush();
    vi.advanceTimersByTime(5_000);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith({ ok: true, value: "quick" });
  });

  it("starts queued work when a request times out", () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const { dispatcher, transport } = setup({ maxConcurrent: 1, timeoutMs: 1_000 });

    dispatcher.request(user("a"), {}, () => {});
    dispatcher.request(user("b"), {}, () => {});
    expect(transport.exchanges).toHaveLength(1);

    vi.advanceTimersByTime(1_000);
    expect(transport.exchanges).toHaveLength(2);
    expect(firstUserContent(transport.at(1))).toBe("b");
  });

  it("times out a stream mid-flight", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const { dispatcher, transport } = setup({ timeoutMs: 1_000 });
    const chunks: string[] = [];
    const onComplete = vi.fn<(outcome: Outcome<Completion>) => void>();

    dispatcher.requestStream(user("hi"), {}, (d) => chunks.push(d), onComplete);
    const body = transport.at(0).accept();
    body.frames(contentFrame("partial"));
    await flush();

    vi.advanceTimersByTime(1_000);
    await flush();

    expect(chunks).toEqual(["partial"]);
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(onComplete.mock.calls[0]?.[0].ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// cancelAll
// ---------------------------------------------------------------------------

describe("Dispatcher.cancelAll", () => {
  it("aborts active requests, drops the queue and notifies every caller once", async () => {
    const { dispatcher, transport } = setup({ maxConcurrent: 3 });
    const a = vi.fn();
    const c = vi.fn();
    const d = vi.fn();
    const e = vi.fn();
    const oneShots = [a, c, d, e];
    const onComplete = vi.fn<(outcome: Outcome<Completion>) => void>();

    dispatcher.request(user("a"), {}, a);
    dispatcher.requestStream(user("b"), {}, () => {}, onComplete);
    dispatcher.request(user("c"), {}, c);
    dispatcher.request(user("d"), {}, d);
    dispatcher.request(user("e"), {}, e);
    expect(dispatcher.stats()).toEqual({ inFlight: 3, queued: 2, cached: 0 });

    dispatcher.cancelAll();

    expect(dispatcher.stats()).toEqual({ inFlight: 0, queued: 0, cached: 0 });
    expect(transport.exchanges.every((ex) => ex.aborted)).toBe(true);
    for (const callback of oneShots) {
      expect(callback).toHaveBeenCalledTimes(1);
      const outcome = callback.mock.calls[0]?.[0];
      expect(outcome.error).toBeInstanceOf(CancelledError);
    }
    const streamOutcome = onComplete.mock.calls[0]?.[0];
    if (!streamOutcome || streamOutcome.ok) throw new Error("expected a failure");
    expect(streamOutcome.error).toBeInstanceOf(CancelledError);

    await flush();
    expect(transport.exchanges).toHaveLength(3);
    for (const callback of oneShots) {
      expect(callback).toHaveBeenCalledTimes(1);
    }
    expect(onComplete).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Promise entry points
// ---------------------------------------------------------------------------

describe("promise wrappers", () => {
  it("complete resolves with the text", async () => {
    const { dispatcher, transport } = setup();
    const pending = dispatcher.complete(user("hi"));
    transport.at(0).respond(chatBody("hello"));
    await expect(pending).resolves.toBe("hello");
  });

  it("complete rejects with the error", async () => {
    const { dispatcher } = setup();
    await expect(dispatcher.complete(user("hi"), { provider: "nope" })).rejects.toThrow(
      "Unknown provider: nope",
    );
  });

  it("stream resolves with the completion", async () => {
    const { dispatcher, transport } = setup();
    const chunks: string[] = [];
    const pending = dispatcher.stream(user("hi"), {}, (d) => chunks.push(d));
    transport.at(0).accept().frames(contentFrame("a"), contentFrame("b"), "[DONE]");

    await expect(pending).resolves.toEqual({ text: "ab", toolCalls: [] });
    expect(chunks).toEqual(["a", "b"]);
  });

  it("converse routes on the stream option", async () => {
    const { dispatcher, transport } = setup();

    const streamed = dispatcher.converse(user("s"), { stream: true });
    expect(transport.at(0).kind).toBe("open");
    transport.at(0).accept().frames(contentFrame("streamed"), "[DONE]");
    await expect(streamed).resolves.toBe("streamed");

    const buffered = dispatcher.converse(user("b"));
    expect(transport.at(1).kind).toBe("send");
    transport.at(1).respond(chatBody("buffered"));
    await expect(buffered).resolves.toBe("buffered");
  });
});

// ---------------------------------------------------------------------------
// fromConfig
// ---------------------------------------------------------------------------

describe("Dispatcher.fromConfig", () => {
  it("wires the built-in adapters and performance settings", () => {
    const transport = new FakeTransport();
    const config = resolveConfig({
      api: { openai: { apiKey: "test-secret" } },
      performance: { maxConcurrentRequests: 1 },
    });
    const dispatcher = Dispatcher.fromConfig(config, { transport, logger: makeNoopLogger() });
    active.push(dispatcher);

    dispatcher.request(user("a"), {}, () => {});
    const second = dispatcher.request(user("b"), {}, () => {});

    expect(second.queued).toBe(true);
    expect(transport.at(0).request.url).toBe("https://api.openai.com/v1/chat/completions");
    expect(transport.at(0).payload).toMatchObject({ model: "gpt-4o-mini", max_tokens: 4096 });
  });

  it("merges extra adapters over the built-in ones", () => {
    const transport = new FakeTransport();
    const custom = new OllamaAdapter({ ...ollamaSettings, model: "custom-model" });
    const dispatcher = Dispatcher.fromConfig(resolveConfig(), {
      transport,
      logger: makeNoopLogger(),
      providers: { local: custom },
    });
    active.push(dispatcher);

    dispatcher.request(user("a"), { provider: "local" }, () => {});
    expect(transport.at(0).payload).toMatchObject({ model: "custom-model" });
  });
});
