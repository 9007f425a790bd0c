import type { Direction } from "./types.js";

function isPositivePrice(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Checks the level ordering a signal must satisfy: for a buy the stop-loss sits
 * below every entry and targets climb from the highest entry; a sell mirrors it.
 * Returns a description of the first violation, or undefined when valid.
 */
export function validateSignalLevels(
  direction: Direction,
  entryPrices: readonly number[],
  stopLoss: number,
  takeProfits: readonly number[],
): string | undefined {
  if (entryPrices.length === 0) {
    return "at least one entry price is required";
  }
  const prices = [...entryPrices, stopLoss, ...takeProfits];
  if (!prices.every(isPositivePrice)) {
    return "prices must be positive numbers";
  }

  const lowestEntry = Math.min(...entryPrices);
  const highestEntry = Math.max(...entryPrices);
  const [firstTarget] = takeProfits;

  if (direction === "buy") {
    if (stopLoss >= lowestEntry) {
      return `stop-loss ${stopLoss} must be below entry ${lowestEntry} for a buy`;
    }
    if (firstTarget !== undefined && firstTarget < highestEntry) {
      return `take-profit ${firstTarget} must not be below entry ${highestEntry} for a buy`;
    }
  } else {
    if (stopLoss <= highestEntry) {
      return `stop-loss ${stopLoss} must be above entry ${highestEntry} for a sell`;
    }
    if (firstTarget !== undefined && firstTarget > lowestEntry) {
      return `take-profit ${firstTarget} must not be above entry ${lowestEntry} for a sell`;
    }
  }

  for (let index = 1; index < takeProfits.length; index += 1) {
    const previous = takeProfits[index - 1] ?? 0;
    const current = takeProfits[index] ?? 0;
    const ordered = direction === "buy" ? current > previous : current < previous;
    if (!ordered) {
      return `take-profit ${current} is out of order after ${previous}`;
    }
  }
  return undefined;
}

export function dedupePrices(values: readonly number[]): number[] {
  const seen = new Set<number>();
  const result: number[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }
  return result;
}
