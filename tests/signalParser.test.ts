import fc from "fast-check";
import { beforeAll, describe, expect, it } from "vitest";

import { buildParsers } from "../src/runtime/botRuntime.js";
import { ParseRejectedError } from "../src/trading/errors.js";
import type { SignalParser } from "../src/trading/signalParser.js";
import { loadTestConfig, testSettings } from "./support/harness.js";

describe("SignalParser", () => {
  let parser: SignalParser;
  let dualEntryParser: SignalParser;

  beforeAll(async () => {
    parser = buildParsers(await loadTestConfig()).parser;
    dualEntryParser = buildParsers(await loadTestConfig(testSettings({ dualEntry: { enabled: true } }))).parser;
  });

  it("parses the canonical buy message", () => {
    const text = "BUY EURUSD @ 1.0850 SL 1.0800 TP 1.0900 1.0950";

    expect(parser.parse(text)).toEqual({
      kind: "signal",
      signal: {
        symbol: "EURUSD",
        rawSymbol: "EURUSD",
        direction: "buy",
        entryPrices: [1.085],
        stopLoss: 1.08,
        takeProfits: [1.09, 1.095],
        text,
      },
    });
  });

  it("resolves hashtag aliases and comma decimals on a sell", () => {
    const outcome = parser.parse("Sell #GOLD @ 2650,5 SL 2660 TP1 2640 TP2 2630");

    expect(outcome.kind).toBe("signal");
    if (outcome.kind !== "signal") return;
    expect(outcome.signal).toMatchObject({
      symbol: "XAUUSD",
      rawSymbol: "GOLD",
      direction: "sell",
      entryPrices: [2650.5],
      stopLoss: 2660,
      takeProfits: [2640, 2630],
    });
  });

  it("reads grouped thousands and an entry right after the symbol", () => {
    const outcome = parser.parse("BUY BTCUSD 42,150 SL 41,000 TP 44,000");

    expect(outcome.kind).toBe("signal");
    if (outcome.kind !== "signal") return;
    expect(outcome.signal.entryPrices).toEqual([42150]);
    expect(outcome.signal.stopLoss).toBe(41000);
    expect(outcome.signal.takeProfits).toEqual([44000]);
  });

  it("reads take-profits joined by a bare comma as separate targets", () => {
    const outcome = parser.parse("BUY XAUUSD @ 2000 SL 1990 TP 2010,2020");

    expect(outcome.kind === "signal" ? outcome.signal.takeProfits : undefined).toEqual([2010, 2020]);
  });

  it("normalizes Persian digits and direction words", () => {
    const outcome = parser.parse("خرید EURUSD ۱.۰۸۵۰ SL ۱.۰۸۰۰ TP ۱.۰۹۰۰");

    expect(outcome.kind).toBe("signal");
    if (outcome.kind !== "signal") return;
    expect(outcome.signal).toMatchObject({
      symbol: "EURUSD",
      direction: "buy",
      entryPrices: [1.085],
      stopLoss: 1.08,
      takeProfits: [1.09],
    });
  });

  it("keeps a second entry only when dual entry is enabled", () => {
    const text = "SELL GBPUSD 1.2700 - 1.2720 SL 1.2760 TP 1.2650";

    const dual = dualEntryParser.parse(text);
    const single = parser.parse(text);

    expect(dual.kind === "signal" ? dual.signal.entryPrices : undefined).toEqual([1.27, 1.272]);
    expect(single.kind === "signal" ? single.signal.entryPrices : undefined).toEqual([1.27]);
  });

  it("reports the first missing field", () => {
    expect(parser.parse("EURUSD looks strong today")).toEqual({
      kind: "rejected",
      reason: { code: "missing_field", field: "direction" },
    });
    expect(parser.parse("BUY EURUSD SL 1.0800")).toEqual({
      kind: "rejected",
      reason: { code: "missing_field", field: "firstPrice" },
    });
    expect(parser.parse("BUY EURUSD @ 1.0850 TP 1.0900")).toEqual({
      kind: "rejected",
      reason: { code: "missing_field", field: "stopLoss" },
    });
    expect(parser.parse("   ")).toEqual({ kind: "rejected", reason: { code: "empty_text" } });
  });

  it("rejects a buy whose stop-loss sits above the entry instead of correcting it", () => {
    expect(parser.parse("BUY EURUSD @ 1.0850 SL 1.0900 TP 1.0950")).toEqual({
      kind: "rejected",
      reason: { code: "invalid_levels", message: "stop-loss 1.09 must be below entry 1.085 for a buy" },
    });
    expect(() => parser.parseOrThrow("BUY EURUSD @ 1.0850 SL 1.0900")).toThrow(ParseRejectedError);
  });

  it("rejects take-profits that do not move away from the entry", () => {
    const outcome = parser.parse("BUY EURUSD @ 1.0850 SL 1.0800 TP 1.0950 1.0900");

    expect(outcome).toEqual({
      kind: "rejected",
      reason: { code: "invalid_levels", message: "take-profit 1.09 is out of order after 1.095" },
    });
  });

  it("describes outcomes for logging", () => {
    expect(parser.describe(parser.parse("BUY EURUSD @ 1.0850 SL 1.0800"))).toBe("buy EURUSD");
    expect(parser.describe(parser.parse("hello"))).toBe("missing_field(direction)");
  });

  it("recovers integer levels exactly", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1_000, max: 90_000 }),
        fc.integer({ min: 1, max: 500 }),
        fc.integer({ min: 0, max: 500 }),
        (entry, risk, reward) => {
          const outcome = parser.parse(`BUY XAUUSD @ ${entry} SL ${entry - risk} TP ${entry + reward}`);
          expect(outcome.kind).toBe("signal");
          if (outcome.kind !== "signal") return;
          expect(outcome.signal.entryPrices).toEqual([entry]);
          expect(outcome.signal.stopLoss).toBe(entry - risk);
          expect(outcome.signal.takeProfits).toEqual([entry + reward]);
        },
      ),
    );
  });
});
