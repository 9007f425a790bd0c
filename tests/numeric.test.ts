import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { normalizeDigits, parseNumericToken, splitNumberList } from "../src/trading/numeric.js";

const fractionDigits = fc
  .array(fc.integer({ min: 0, max: 9 }), { minLength: 1, maxLength: 5 })
  .map((digits) => digits.join(""));

describe("numeric helpers", () => {
  it("maps Persian and Arabic-Indic digits to ASCII", () => {
    expect(normalizeDigits("۱۲۳٫۵")).toBe("123.5");
    expect(normalizeDigits("SL ٤٥")).toBe("SL 45");
  });

  it.each([
    ["2,650", 2650],
    ["140,2", 140.2],
    ["0,850", 0.85],
    ["1.234,5", 1234.5],
    ["1,234.5", 1234.5],
    ["1.234.567", 1234567],
    ["1234,567", 1234.567],
    ["1.0850", 1.085],
  ])("reads %s as %d", (token, expected) => {
    expect(parseNumericToken(token)).toBe(expected);
  });

  it("refuses tokens that are not numbers", () => {
    expect(parseNumericToken("12a")).toBeUndefined();
    expect(parseNumericToken("")).toBeUndefined();
  });

  it("splits captured price lists", () => {
    expect(splitNumberList("2660/2670, 2680")).toEqual([2660, 2670, 2680]);
    expect(splitNumberList("1.0900 1.0950")).toEqual([1.09, 1.095]);
  });

  it("separates prices joined by a bare comma", () => {
    expect(splitNumberList("2010,2020")).toEqual([2010, 2020]);
    expect(splitNumberList("1.0900,1.0950")).toEqual([1.09, 1.095]);
    expect(splitNumberList("2,650")).toEqual([2650]);
    expect(splitNumberList("1234,567")).toEqual([1234.567]);
  });

  it("treats a lone dot as a decimal separator", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 99_999 }), fractionDigits, (whole, fraction) => {
        expect(parseNumericToken(`${whole}.${fraction}`)).toBe(Number.parseFloat(`${whole}.${fraction}`));
      }),
    );
  });

  it("treats a lone comma as a decimal separator unless it groups three digits", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 99_999 }),
        fractionDigits.filter((fraction) => fraction.length !== 3),
        (whole, fraction) => {
          expect(parseNumericToken(`${whole},${fraction}`)).toBe(Number.parseFloat(`${whole}.${fraction}`));
        },
      ),
    );
  });
});
