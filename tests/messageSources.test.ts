import { describe, expect, it, vi } from "vitest";

import type { HttpClientConfig } from "../src/config/configManager.js";
import { HttpPollingSource } from "../src/sources/httpPollingSource.js";
import { createProvider, createProviders, providerNames, UnknownProviderError } from "../src/sources/providerRegistry.js";
import { QueueSource, SourceNotStartedError } from "../src/sources/queueSource.js";
import { HttpStatusError, type FetchLike } from "../src/sources/retryingHttpClient.js";
import type { MessageHandler } from "../src/sources/types.js";
import { NoopLogger } from "../src/telemetry/logger.js";
import type { MessageRecord } from "../src/trading/types.js";

const HTTP: HttpClientConfig = {
  baseUrl: "http://feed.test/api/",
  timeoutMs: 1_000,
  rateLimitPerSecond: 0,
  retry: { maxAttempts: 3, initialDelayMs: 100, backoffMultiplier: 2, maxDelayMs: 1_000 },
};

function recordingHandler(fail?: (record: MessageRecord) => boolean) {
  const records: MessageRecord[] = [];
  const handler = vi.fn<MessageHandler>(async (record) => {
    if (fail?.(record)) {
      throw new Error("boom");
    }
    records.push(record);
    return { kind: "duplicate" };
  });
  return { handler, records };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function feed(batches: unknown[]): FetchLike {
  return vi.fn<FetchLike>(async (input) => {
    if (input.endsWith("/messages/ack")) {
      return new Response("", { status: 200 });
    }
    return jsonResponse(batches.shift() ?? { messages: [] });
  });
}

describe("QueueSource", () => {
  it("rejects pushes until started", async () => {
    const source = new QueueSource({ name: "desk" });

    await expect(source.push({ messageId: "1", text: "hi" })).rejects.toBeInstanceOf(SourceNotStartedError);
    expect(source.started).toBe(false);
  });

  it("fills in the channel and delivers in push order", async () => {
    const source = new QueueSource({ channelId: "desk" });
    const seen: string[] = [];
    await source.start(async (record) => {
      if (record.messageId === "1") {
        await new Promise((resolve) => setTimeout(resolve, 20));
      }
      if (record.messageId === "2") {
        throw new Error("boom");
      }
      seen.push(`${record.channelId}:${record.messageId}:${String(record.edited)}`);
      return { kind: "duplicate" };
    });

    const first = source.push({ messageId: "1", text: "a" });
    const second = source.push({ messageId: "2", text: "b" });
    const third = source.push({ messageId: "3", channelId: "vip", text: "c", edited: true });

    await expect(first).resolves.toEqual({ kind: "duplicate" });
    await expect(second).rejects.toThrow("boom");
    await expect(third).resolves.toEqual({ kind: "duplicate" });
    expect(seen).toEqual(["desk:1:false", "vip:3:true"]);

    await source.stop();
    expect(source.started).toBe(false);
  });
});

describe("HttpPollingSource", () => {
  it("delivers a batch, acknowledges it and advances the cursor", async () => {
    const fetchImpl = feed([
      {
        messages: [
          { id: 1, text: "BUY XAUUSD @ 2000 SL 1990", replyTo: null },
          { id: "2", channelId: "vip", text: "close half", replyTo: 1, edited: false },
        ],
      },
    ]);
    const source = new HttpPollingSource({ http: HTTP, apiKey: "test-secret", channelId: "feed", fetchImpl });
    const { handler, records } = recordingHandler();

    expect(await source.pollOnce(handler)).toBe(2);
    expect(await source.pollOnce(handler)).toBe(0);

    expect(records).toEqual([
      { channelId: "feed", messageId: "1", replyToMessageId: undefined, text: "BUY XAUUSD @ 2000 SL 1990", edited: false },
      { channelId: "vip", messageId: "2", replyToMessageId: "1", text: "close half", edited: false },
    ]);
    expect(source.lastCursor).toBe("2");
    expect(vi.mocked(fetchImpl).mock.calls.map(([url, init]) => `${init.method} ${url}`)).toEqual([
      "GET http://feed.test/api/messages?limit=50",
      "POST http://feed.test/api/messages/ack",
      "GET http://feed.test/api/messages?since=2&limit=50",
    ]);
    const ack = vi.mocked(fetchImpl).mock.calls[1]?.[1];
    expect(ack?.body).toBe('{"ids":["1","2"]}');
    expect(ack?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
  });

  it("stops the batch at the first handler failure", async () => {
    const fetchImpl = feed([
      {
        messages: [
          { id: "1", text: "a" },
          { id: "2", text: "b" },
          { id: "3", text: "c" },
        ],
      },
    ]);
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const source = new HttpPollingSource({ http: HTTP, fetchImpl, logger });
    const { handler, records } = recordingHandler((record) => record.messageId === "2");

    expect(await source.pollOnce(handler)).toBe(1);

    expect(records.map((record) => record.messageId)).toEqual(["1"]);
    expect(source.lastCursor).toBe("1");
    expect(vi.mocked(fetchImpl).mock.calls[1]?.[1].body).toBe('{"ids":["1"]}');
    expect(logger.warn).toHaveBeenCalledWith("Message delivery failed; batch stopped", {
      source: "http-poll",
      messageId: "2",
      error: "boom",
    });
  });

  it("retries server errors and gives up on client errors", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const responses = [new Response("busy", { status: 503 }), jsonResponse({ messages: [] }), new Response("no", { status: 404 })];
    const fetchImpl = vi.fn<FetchLike>(async () => responses.shift() ?? jsonResponse({ messages: [] }));
    const source = new HttpPollingSource({ http: HTTP, fetchImpl, sleep });
    const { handler } = recordingHandler();

    expect(await source.pollOnce(handler)).toBe(0);
    expect(sleep).toHaveBeenCalledTimes(1);

    const rejected = source.pollOnce(handler);
    await expect(rejected).rejects.toBeInstanceOf(HttpStatusError);
    await expect(rejected).rejects.toMatchObject({ status: 404, attempts: 1, body: "no" });
    await expect(source.pollOnce(handler)).resolves.toBe(0);
    expect(fetchImpl).toHaveBeenCalledTimes(4);
  });

  it("rejects batches that do not match the message shape", async () => {
    const source = new HttpPollingSource({ http: HTTP, fetchImpl: feed([{ messages: [{ id: "", text: "x" }] }]) });
    const { handler } = recordingHandler();

    await expect(source.pollOnce(handler)).rejects.toThrow();
    expect(handler).not.toHaveBeenCalled();
  });

  it("polls on its own once started", async () => {
    const fetchImpl = feed([{ messages: [{ id: "7", text: "hello" }] }]);
    const source = new HttpPollingSource({ http: HTTP, fetchImpl, pollIntervalMs: 60_000 });
    const { handler } = recordingHandler();

    expect(await source.pollOnce()).toBe(0);
    await source.start(handler);
    await vi.waitFor(() => expect(source.lastCursor).toBe("7"));
    await source.stop();

    expect(handler).toHaveBeenCalledTimes(1);
  });
});

describe("provider registry", () => {
  const context = { logger: new NoopLogger(), apiKey: "test-secret" };

  it("knows the queue and http-poll providers", () => {
    expect(providerNames()).toEqual(["queue", "http-poll"]);
  });

  it("builds sources from configuration entries", async () => {
    const [queue, poller] = createProviders(
      [
        { name: "queue", options: { channelId: "desk" } },
        { name: "http-poll", options: { baseUrl: "http://feed.test/api", pollIntervalMs: 500 } },
      ],
      context,
    );

    expect(queue).toBeInstanceOf(QueueSource);
    expect(poller).toBeInstanceOf(HttpPollingSource);
    if (!(queue instanceof QueueSource)) {
      throw new Error("expected a queue source");
    }
    const { handler, records } = recordingHandler();
    await queue.start(handler);
    await queue.push({ messageId: "1", text: "hi" });
    expect(records[0]?.channelId).toBe("desk");
  });

  it("rejects unknown providers and invalid options", () => {
    expect(() => createProvider({ name: "carrier-pigeon", options: {} }, context)).toThrow(
      new UnknownProviderError("carrier-pigeon"),
    );
    expect(() => createProvider({ name: "http-poll", options: { baseUrl: "not a url" } }, context)).toThrow();
  });
});
