import type { SignalFilters } from "../config/schemas.js";

export type FilterVerdict =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: "channel_filtered" | "symbol_filtered" | "outside_trading_window" };

function minutesOfDay(clock: string): number {
  const [hours = "0", minutes = "0"] = clock.split(":");
  return Number.parseInt(hours, 10) * 60 + Number.parseInt(minutes, 10);
}

function passesList(list: { readonly allow: readonly string[]; readonly deny: readonly string[] }, value: string): boolean {
  const normalized = value.toUpperCase();
  if (list.deny.some((item) => item.toUpperCase() === normalized)) {
    return false;
  }
  return list.allow.length === 0 || list.allow.some((item) => item.toUpperCase() === normalized);
}

/** Start inclusive, end exclusive, in UTC; a window whose end precedes its start wraps past midnight. */
export function withinTradingWindow(window: SignalFilters["tradingWindow"], at: Date): boolean {
  if (!window) {
    return true;
  }
  const start = minutesOfDay(window.start);
  const end = minutesOfDay(window.end);
  const current = at.getUTCHours() * 60 + at.getUTCMinutes();
  if (start === end) {
    return true;
  }
  return start < end ? current >= start && current < end : current >= start || current < end;
}

export function channelAllowed(filters: SignalFilters, channelId: string): boolean {
  return passesList(filters.channels, channelId);
}

export function evaluateSignalFilters(
  filters: SignalFilters,
  candidate: { readonly channelId: string; readonly symbol: string; readonly at: Date },
): FilterVerdict {
  if (!channelAllowed(filters, candidate.channelId)) {
    return { allowed: false, reason: "channel_filtered" };
  }
  if (!passesList(filters.symbols, candidate.symbol)) {
    return { allowed: false, reason: "symbol_filtered" };
  }
  if (!withinTradingWindow(filters.tradingWindow, candidate.at)) {
    return { allowed: false, reason: "outside_trading_window" };
  }
  return { allowed: true };
}
