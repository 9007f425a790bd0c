import { describe, expect, it } from "vitest";

import type { Command, CommandIntent } from "../src/trading/types.js";
import { createHarness, message, reply, testSettings, type Harness } from "./support/harness.js";

const gold = { contractSize: 100, minVolume: 0.01, volumeStep: 0.01, tradable: true, leverage: 100 };
const GOLD_BUY = "BUY XAUUSD @ 2000 SL 1990 TP 2010 2020";

async function goldHarness(settings = testSettings()): Promise<Harness> {
  return createHarness({ settings, paper: { instruments: { XAUUSD: gold } } });
}

async function openSignal(harness: Harness, messageId = "100", text = GOLD_BUY): Promise<string> {
  const outcome = await harness.queue.push(message(messageId, text));
  await harness.runtime.engine.idle();
  if (outcome.kind !== "signal_created") {
    throw new Error(`expected a new signal, got ${outcome.kind}`);
  }
  return outcome.signalId;
}

function consoleCommand(signalId: string, requestId: string, intent: CommandIntent): Command {
  return { ...intent, targetSignalId: signalId, source: { channelId: "console", messageId: requestId } };
}

describe("LifecycleEngine", () => {
  it("places a filled position and opens the signal", async () => {
    const harness = await goldHarness();
    harness.paper.setPrice("XAUUSD", 2000);

    const signalId = await openSignal(harness);
    const signal = harness.runtime.engine.getSignal(signalId);

    expect(signal?.status).toBe("open");
    expect(signal?.tickets).toHaveLength(1);
    expect(signal?.tickets[0]).toMatchObject({
      id: "paper-1",
      kind: "position",
      volume: 0.2,
      initialVolume: 0.2,
      openPrice: 2000,
      stopLoss: 1990,
      takeProfit: 2020,
    });
    expect(signal?.history.map((event) => event.type)).toEqual(["created", "placed"]);
    expect((await harness.journal.recent(2)).map((entry) => entry.type)).toEqual(["placed", "created"]);
  });

  it("ignores a replayed message without placing again", async () => {
    const harness = await goldHarness();
    await openSignal(harness);

    const replay = await harness.queue.push(message("100", GOLD_BUY));
    await harness.runtime.engine.idle();

    expect(replay).toEqual({ kind: "duplicate" });
    expect(harness.store.listSignals()).toHaveLength(1);
    expect(harness.paper.calls.filter((call) => call.operation === "placeOrder")).toHaveLength(1);
  });

  it("applies an edit followed by a delete in arrival order", async () => {
    const harness = await goldHarness();
    const signalId = await openSignal(harness);

    await harness.queue.push(reply("101", "100", "move sl to 1995"));
    await harness.queue.push(reply("102", "100", "delete"));
    await harness.runtime.engine.idle();

    const signal = harness.runtime.engine.getSignal(signalId);
    expect(signal?.status).toBe("cancelled");
    expect(signal?.stopLoss).toBe(1995);
    expect(signal?.tickets[0]).toMatchObject({ kind: "order", closeReason: "command" });
    expect(signal?.history.map((event) => event.type)).toEqual(["created", "placed", "edited", "deleted"]);
    expect(await harness.paper.listOpenTickets()).toEqual([]);
  });

  it("closes half of every filled position", async () => {
    const harness = await goldHarness();
    harness.paper.setPrice("XAUUSD", 2000);
    const signalId = await openSignal(harness);

    await harness.queue.push(reply("101", "100", "close half"));
    await harness.runtime.engine.idle();

    const signal = harness.runtime.engine.getSignal(signalId);
    expect(signal?.status).toBe("partially_closed");
    expect(signal?.tickets[0]?.volume).toBe(0.1);
    expect((await harness.paper.listOpenTickets())[0]?.volume).toBe(0.1);
  });

  it("moves the stop-loss to entry once and ignores a repeat", async () => {
    const harness = await goldHarness();
    harness.paper.setPrice("XAUUSD", 2000);
    const signalId = await openSignal(harness);

    const first = await harness.runtime.pipeline.dispatchCommand(consoleCommand(signalId, "rf-1", { kind: "riskFree" }));
    const second = await harness.runtime.pipeline.dispatchCommand(consoleCommand(signalId, "rf-2", { kind: "riskFree" }));

    expect(first.status).toBe("applied");
    expect(first.signal?.tickets[0]?.stopLoss).toBe(2000);
    expect(second).toMatchObject({ status: "ignored", reason: "stop_loss_already_at_or_beyond_entry" });
  });

  it("cancels leftover pending legs on take-profit-now and keeps filled positions", async () => {
    const harness = await goldHarness(testSettings({ dualEntry: { enabled: true } }));
    harness.paper.setPrice("XAUUSD", 2000);
    const signalId = await openSignal(harness, "100", "BUY XAUUSD 2000 - 1995 SL 1990 TP 2010 2020");
    expect(harness.runtime.engine.getSignal(signalId)?.tickets.map((ticket) => [ticket.id, ticket.kind])).toEqual([
      ["paper-1", "position"],
      ["paper-2", "order"],
    ]);

    await harness.queue.push(reply("101", "100", "tp hit, close now"));
    await harness.runtime.engine.idle();

    const signal = harness.runtime.engine.getSignal(signalId);
    expect(signal?.status).toBe("open");
    expect(signal?.history.at(-1)).toMatchObject({
      type: "take_profit_now",
      detail: { cancelled: ["paper-2"], kept: ["paper-1"] },
    });
    expect((await harness.paper.listOpenTickets()).map((ticket) => ticket.id)).toEqual(["paper-1"]);
  });

  it("cancels a signal whose only leg is still pending on take-profit-now", async () => {
    const harness = await goldHarness();
    const signalId = await openSignal(harness);

    await harness.queue.push(reply("101", "100", "tp hit, close now"));
    await harness.runtime.engine.idle();

    expect(harness.runtime.engine.getSignal(signalId)?.status).toBe("cancelled");
    expect(await harness.paper.listOpenTickets()).toEqual([]);
  });

  it("leaves a fully filled signal alone on take-profit-now", async () => {
    const harness = await goldHarness();
    harness.paper.setPrice("XAUUSD", 2000);
    const signalId = await openSignal(harness);

    const result = await harness.runtime.pipeline.dispatchCommand(
      consoleCommand(signalId, "tp-1", { kind: "takeProfitNow" }),
    );

    expect(result).toMatchObject({ status: "ignored", reason: "no_pending_orders" });
    expect(harness.runtime.engine.getSignal(signalId)?.status).toBe("open");
    expect(harness.runtime.engine.listOpenPositions()).toHaveLength(1);
  });

  it("applies a delete that arrives during placement once the placement is done", async () => {
    const harness = await goldHarness();
    const release = harness.paper.holdPlacements();

    const created = await harness.queue.push(message("100", GOLD_BUY));
    if (created.kind !== "signal_created") {
      throw new Error(`expected a new signal, got ${created.kind}`);
    }
    expect(await harness.queue.push(reply("101", "100", "delete"))).toEqual({
      kind: "command_queued",
      signalId: created.signalId,
      command: "delete",
    });
    expect(harness.runtime.engine.getSignal(created.signalId)?.status).toBe("pending");

    release();
    await harness.runtime.engine.idle();

    const signal = harness.runtime.engine.getSignal(created.signalId);
    expect(signal?.status).toBe("cancelled");
    expect(signal?.history.map((event) => event.type)).toEqual(["created", "placed", "deleted"]);
    expect(signal?.tickets[0]).toMatchObject({ id: "paper-1", kind: "order", closeReason: "command" });
    expect(
      harness.paper.calls
        .filter((call) => call.operation === "placeOrder" || call.operation === "cancelOrder")
        .map((call) => call.operation),
    ).toEqual(["placeOrder", "cancelOrder"]);
  });

  it("rejects edits that break the level ordering", async () => {
    const harness = await goldHarness();
    const signalId = await openSignal(harness);

    const result = await harness.runtime.pipeline.dispatchCommand(
      consoleCommand(signalId, "edit-1", { kind: "edit", stopLoss: 2005 }),
    );

    expect(result).toMatchObject({
      status: "ignored",
      reason: "invalid_levels: stop-loss 2005 must be below entry 2000 for a buy",
    });
    expect(harness.runtime.engine.getSignal(signalId)?.stopLoss).toBe(1990);
  });

  it("moves a signal to error when sizing rejects it", async () => {
    const harness = await goldHarness(testSettings({ sizing: { mode: "fixed", volume: 10 } }));
    const signalId = await openSignal(harness);

    const signal = harness.runtime.engine.getSignal(signalId);
    expect(signal?.status).toBe("error");
    expect(signal?.errorReason).toBe("sizing_rejected(insufficient_margin)");
    expect(signal?.tickets).toEqual([]);
    expect(harness.notifier.events.map((event) => event.type)).toEqual(["sizing_rejected"]);
    expect(harness.paper.calls.some((call) => call.operation === "placeOrder")).toBe(false);

    const riskFree = await harness.runtime.pipeline.dispatchCommand(consoleCommand(signalId, "c-1", { kind: "riskFree" }));
    const deleted = await harness.runtime.pipeline.dispatchCommand(consoleCommand(signalId, "c-2", { kind: "delete" }));
    expect(riskFree).toMatchObject({ status: "ignored", reason: "not_applicable_in_error" });
    expect(deleted.status).toBe("applied");
    expect(harness.runtime.engine.getSignal(signalId)?.status).toBe("cancelled");
  });

  it("moves a signal to error once placement retries are exhausted", async () => {
    const harness = await goldHarness();
    harness.paper.failNext("placeOrder", 4);

    const signalId = await openSignal(harness);

    const signal = harness.runtime.engine.getSignal(signalId);
    expect(signal?.status).toBe("error");
    expect(signal?.errorReason).toBe("Venue call placeOrder failed after 4 attempt(s): Simulated placeOrder failure");
    expect(signal?.history.at(-1)?.type).toBe("placement_failed");
    expect(harness.notifier.events[0]).toMatchObject({ type: "signal_error" });
  });

  it("recovers an errored signal through a later command", async () => {
    const harness = await goldHarness();
    harness.paper.setPrice("XAUUSD", 2000);
    const signalId = await openSignal(harness);
    harness.paper.failNext("closePartial", 4);

    const failed = await harness.runtime.pipeline.dispatchCommand(consoleCommand(signalId, "h-1", { kind: "halfClose" }));
    const retried = await harness.runtime.pipeline.dispatchCommand(consoleCommand(signalId, "h-2", { kind: "halfClose" }));

    expect(failed).toMatchObject({
      status: "failed",
      reason: "Venue call closePartial failed after 4 attempt(s): Simulated closePartial failure",
    });
    expect(failed.signal?.status).toBe("error");
    expect(retried.status).toBe("applied");
    expect(retried.signal?.status).toBe("partially_closed");
  });

  it("answers read queries from the stored snapshot", async () => {
    const harness = await goldHarness();
    harness.paper.setPrice("XAUUSD", 2000);
    const first = await openSignal(harness, "100");
    harness.clock.now += 1_000;
    const second = await openSignal(harness, "200", "SELL XAUUSD @ 2000 SL 2010 TP 1990");

    expect(harness.runtime.engine.listActiveSignals().map((signal) => signal.id)).toEqual([first, second]);
    expect(harness.runtime.engine.listOpenPositions().map((position) => position.signalId)).toEqual([first, second]);
    expect(harness.runtime.engine.signalHistory(1).map((signal) => signal.id)).toEqual([second]);
    expect(
      await harness.runtime.pipeline.dispatchCommand(consoleCommand("missing", "x-1", { kind: "delete" })),
    ).toEqual({ status: "ignored", reason: "unknown_signal" });
  });
});
