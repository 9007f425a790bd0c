import requestFactory from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { createApp } from "../../src/server.js";
import { BASE_TIME, createHarness, type Harness } from "../support/harness.js";

const gold = { contractSize: 100, minVolume: 0.01, volumeStep: 0.01, tradable: true, leverage: 100 };
const GOLD_BUY = "BUY XAUUSD @ 2000 SL 1990 TP 2010 2020";

describe("API service contracts", () => {
  let harness: Harness;
  let request: ReturnType<typeof requestFactory>;

  beforeEach(async () => {
    harness = await createHarness({ paper: { instruments: { XAUUSD: gold }, prices: { XAUUSD: 2000 } } });
    request = requestFactory(createApp(harness.runtime));
  });

  async function ingestSignal(messageId = "100"): Promise<string> {
    const response = await request.post("/api/messages").send({ messageId, text: GOLD_BUY });
    await harness.runtime.engine.idle();
    expect(response.status).toBe(202);
    expect(response.body.outcome.kind).toBe("signal_created");
    return String(response.body.outcome.signalId);
  }

  it("reports health", async () => {
    const response = await request.get("/api/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok", activeSignals: 0 });
  });

  it("parses signal text without recording it", async () => {
    const response = await request.post("/api/parse").send({ text: GOLD_BUY });

    expect(response.status).toBe(200);
    expect(response.body.signal).toMatchObject({
      symbol: "XAUUSD",
      direction: "buy",
      entryPrices: [2000],
      stopLoss: 1990,
      takeProfits: [2010, 2020],
    });
    expect(harness.store.listSignals()).toEqual([]);
  });

  it("explains why text is not a signal", async () => {
    const rejected = await request.post("/api/parse").send({ text: "BUY XAUUSD @ 2000 TP 2010" });
    const invalid = await request.post("/api/parse").send({});

    expect(rejected.status).toBe(422);
    expect(rejected.body).toEqual({
      error: "missing_field(stopLoss)",
      reason: { code: "missing_field", field: "stopLoss" },
    });
    expect(invalid.status).toBe(400);
    expect(invalid.body).toEqual({ error: "text: Required" });
  });

  it("ingests messages once and exposes the resulting signal", async () => {
    const signalId = await ingestSignal();

    const replay = await request.post("/api/messages").send({ messageId: "100", text: GOLD_BUY });
    const active = await request.get("/api/signals/active");
    const detail = await request.get(`/api/signals/${signalId}`);
    const positions = await request.get("/api/positions");

    expect(replay.body).toEqual({ outcome: { kind: "duplicate" } });
    expect(active.body.items).toHaveLength(1);
    expect(detail.body).toMatchObject({ id: signalId, status: "open", source: { channelId: "signals", messageId: "100" } });
    expect(positions.body.items).toHaveLength(1);
    expect(positions.body.items[0]).toMatchObject({ signalId, signalStatus: "open", ticket: { id: "paper-1", volume: 0.2 } });
  });

  it("routes replies through the same pipeline", async () => {
    const signalId = await ingestSignal();

    const response = await request.post("/api/messages").send({ messageId: 101, replyToMessageId: 100, text: "close half" });
    await harness.runtime.engine.idle();

    expect(response.status).toBe(202);
    expect(response.body.outcome).toEqual({ kind: "command_queued", signalId, command: "halfClose" });
    expect(harness.runtime.engine.getSignal(signalId)?.status).toBe("partially_closed");
  });

  it("applies operator commands once per request id", async () => {
    const signalId = await ingestSignal();

    const first = await request.post(`/api/signals/${signalId}/commands`).send({ kind: "halfClose", requestId: "r-1" });
    const repeat = await request.post(`/api/signals/${signalId}/commands`).send({ kind: "halfClose", requestId: "r-1" });
    const events = await request.get("/api/events?limit=3");

    expect(first.status).toBe(200);
    expect(first.body).toMatchObject({ status: "applied", signal: { status: "partially_closed" } });
    expect(repeat.body).toEqual({ status: "ignored", reason: "duplicate" });
    expect(events.body.items.map((entry: { type: string }) => entry.type)).toEqual(["half_closed", "placed", "created"]);
  });

  it("validates command bodies and targets", async () => {
    const signalId = await ingestSignal();

    const invalid = await request.post(`/api/signals/${signalId}/commands`).send({ kind: "edit", stopLoss: -1 });
    const missing = await request.post("/api/signals/missing/commands").send({ kind: "delete" });
    const unknown = await request.get("/api/signals/missing");

    expect(invalid.status).toBe(400);
    expect(invalid.body).toEqual({ error: "stopLoss: Number must be greater than 0" });
    expect(missing.status).toBe(404);
    expect(unknown.status).toBe(404);
    expect(unknown.body).toEqual({ error: "Signal not found" });
  });

  it("refuses an edit that names no new level", async () => {
    const signalId = await ingestSignal();

    const empty = await request.post(`/api/signals/${signalId}/commands`).send({ kind: "edit" });
    const noTargets = await request.post(`/api/signals/${signalId}/commands`).send({ kind: "edit", takeProfits: [] });

    expect(empty.status).toBe(400);
    expect(empty.body).toEqual({ error: "body: edit needs stopLoss or takeProfits" });
    expect(noTargets.status).toBe(400);
    expect(noTargets.body).toEqual({ error: "takeProfits: Array must contain at least 1 element(s)" });
    expect(harness.runtime.engine.getSignal(signalId)?.history.map((event) => event.type)).toEqual(["created", "placed"]);
  });

  it("reports channel performance", async () => {
    await ingestSignal();

    const all = await request.get("/api/reports/channels");
    const one = await request.get("/api/reports/channels/signals");
    const unknown = await request.get("/api/reports/channels/nope");
    const invalid = await request.get("/api/reports/channels?minPositions=0");

    expect(all.status).toBe(200);
    expect(all.body.items).toHaveLength(1);
    expect(all.body.items[0]).toMatchObject({ channelId: "signals", totalPositions: 1, openPositions: 1, netProfit: 0 });
    expect(one.body).toMatchObject({ channelId: "signals", totalVolume: 0.2, firstTradeAt: BASE_TIME });
    expect(unknown.status).toBe(404);
    expect(unknown.body).toEqual({ error: "Channel not found" });
    expect(invalid.status).toBe(400);
    expect(invalid.body).toEqual({ error: "minPositions: Number must be greater than 0" });
  });

  it("limits the history listing", async () => {
    await ingestSignal("100");
    harness.clock.now += 1_000;
    const latest = await ingestSignal("200");

    const response = await request.get("/api/signals/history?limit=1");

    expect(response.body.items.map((signal: { id: string }) => signal.id)).toEqual([latest]);
  });

  it("answers 503 while the store is unavailable", async () => {
    harness.store.setAvailable(false);

    const response = await request.post("/api/messages").send({ messageId: "100", text: GOLD_BUY });
    const health = await request.get("/api/health");

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ error: "Signal store unavailable: store unavailable" });
    expect(health.body).toEqual({ status: "halted", activeSignals: 0 });
  });

  it("answers 503 when the queue source is stopped", async () => {
    await harness.queue.stop();

    const response = await request.post("/api/messages").send({ messageId: "100", text: GOLD_BUY });

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ error: "Message source queue is not started" });
  });
});
