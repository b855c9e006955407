import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseEngineConfig } from "../config/loader.js";
import type { EngineConfigInput } from "../config/types.js";
import {
  ProviderError,
  ProviderUnavailableError,
  RateLimitError,
  StreamingError,
} from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { ConversationEngine } from "./runtime.js";
import type { SSEStream } from "./stream-parser.js";
import { HttpTransport } from "./transport.js";
import type { SSEEvent } from "./types.js";

const logger = createLogger("test", { level: "fatal" });
const ENDPOINT = "https://api.example.com/v1/chat";
const context = { provider: "acme", model: "test-model" };

function transport(config: EngineConfigInput = {}): HttpTransport {
  return new HttpTransport(parseEngineConfig(config), logger);
}

function eventBody(text: string): ReadableStream<Uint8Array> {
  const bytes = new TextEncoder().encode(text);
  return new ReadableStream({
    start(controller) {
      controller.enqueue(bytes);
      controller.close();
    },
  });
}

async function collect(stream: SSEStream): Promise<SSEEvent[]> {
  const events: SSEEvent[] = [];
  for await (const event of stream.events()) events.push(event);
  return events;
}

describe("HttpTransport.send", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("retries a 503 after the Retry-After delay", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(
        new Response("unavailable", { status: 503, headers: { "Retry-After": "3" } }),
      )
      .mockResolvedValueOnce(new Response("ok", { status: 200 }));

    const promise = transport().send(ENDPOINT, { method: "POST" }, context);
    await vi.advanceTimersByTimeAsync(3000);

    const response = await promise;
    expect(response.status).toBe(200);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it("retries a connection failure with the configured backoff", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(new Response("ok", { status: 200 }));

    const promise = transport({ retry: { initialDelayMs: 100 } }).send(
      ENDPOINT,
      { method: "POST" },
      context,
    );
    await vi.advanceTimersByTimeAsync(100);

    expect((await promise).status).toBe(200);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it("gives up after maxRetries with the last provider error", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => new Response("busy", { status: 503 }));

    const settled = transport({ retry: { maxRetries: 2, initialDelayMs: 100 } })
      .send(ENDPOINT, { method: "POST" }, context)
      .catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(300);

    const error = await settled;
    expect(error).toBeInstanceOf(ProviderUnavailableError);
    if (error instanceof ProviderUnavailableError) {
      expect(error.message).toBe("acme returned 503: busy");
      expect(error.model).toBe("test-model");
    }
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it("fails at once on a status outside the retry list", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response(JSON.stringify({ error: { message: "invalid api key" } }), {
        status: 401,
        headers: { "x-request-id": "req-1" },
      }),
    );

    const error = await transport()
      .send(ENDPOINT, { method: "POST" }, context)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.code).toBe("AUTHENTICATION");
      expect(error.statusCode).toBe(401);
      expect(error.requestId).toBe("req-1");
      expect(error.message).toBe("acme returned 401: invalid api key");
    }
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("carries a 429 Retry-After hint on the rate limit error", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("slow down", { status: 429, headers: { "Retry-After": "2" } }),
    );

    const error = await transport({ retry: { maxRetries: 0 } })
      .send(ENDPOINT, { method: "POST" }, context)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitError);
    if (error instanceof RateLimitError) {
      expect(error.retryAfterMs).toBe(2000);
    }
  });
});

describe("HttpTransport.stream", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses leniently by default", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response(eventBody("data: {bad json}\n\n"), { status: 200 }),
    );

    const stream = await transport().stream(ENDPOINT, { method: "POST" }, context);
    expect(await collect(stream)).toEqual([{ data: "{bad json}" }]);
  });

  it("parses strictly when the engine config asks for it", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response(eventBody("data: {bad json}\n\n"), { status: 200 }),
    );
    const engine = new ConversationEngine({ strictStreamParsing: true }, { logger });

    const stream = await engine.getTransport().stream(ENDPOINT, { method: "POST" }, context);
    await expect(collect(stream)).rejects.toThrow(StreamingError);
  });

  it("lets the caller override the configured mode", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response(eventBody("data: {bad json}\n\n"), { status: 200 }),
    );

    const stream = await transport({ strictStreamParsing: true }).stream(
      ENDPOINT,
      { method: "POST" },
      context,
      { strictParsing: false },
    );
    expect(await collect(stream)).toEqual([{ data: "{bad json}" }]);
  });

  it("sends a streaming request only once", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("busy", { status: 503 }));

    await expect(
      transport().stream(ENDPOINT, { method: "POST" }, context),
    ).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("throws when the response has no body", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response(null, { status: 200 }));

    await expect(transport().stream(ENDPOINT, { method: "POST" }, context)).rejects.toThrow(
      "No response body for streaming",
    );
  });
});
