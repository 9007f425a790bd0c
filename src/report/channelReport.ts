import type { SignalStore } from "../storage/signalStore.js";
import { NoopLogger, type Logger } from "../telemetry/logger.js";
import type { Ticket } from "../trading/types.js";
import type { ClosedVenueTicket, ExecutionVenue } from "../venue/types.js";

/** Money values are in account currency, rounded to cents; `winRate` is a percentage. */
export interface ChannelStats {
  readonly channelId: string;
  readonly totalPositions: number;
  readonly openPositions: number;
  readonly closedPositions: number;
  readonly winningPositions: number;
  readonly losingPositions: number;
  readonly totalProfit: number;
  readonly totalLoss: number;
  readonly netProfit: number;
  readonly largestWin: number;
  /** Zero or negative. */
  readonly largestLoss: number;
  readonly averageWin: number;
  readonly averageLoss: number;
  readonly winRate: number;
  readonly profitFactor: number;
  readonly maxDrawdown: number;
  readonly currentDrawdown: number;
  readonly totalVolume: number;
  readonly firstTradeAt?: number;
  readonly lastTradeAt?: number;
}

/** Positions filled at or after `from` and before `until`. */
export interface ReportPeriod {
  readonly from?: number;
  readonly until?: number;
}

export interface CompareOptions extends ReportPeriod {
  /** Channels with fewer positions in the period are left out. Defaults to 1. */
  readonly minPositions?: number;
}

export interface ChannelReporterOptions {
  readonly store: Pick<SignalStore, "listSignals">;
  readonly venue: Pick<ExecutionVenue, "closedTickets">;
  readonly logger?: Logger;
}

interface Position {
  readonly ticket: Ticket;
  readonly filledAt: number;
}

interface Outcome {
  readonly profit: number;
  readonly closedAt: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function sumAbs(values: readonly number[]): number {
  return values.reduce((total, value) => total + Math.abs(value), 0);
}

/** Deepest fall of the running total below its earlier peak; the peak starts at zero. */
export function maxDrawdown(pnl: readonly number[]): number {
  let cumulative = 0;
  let peak = 0;
  let deepest = 0;
  for (const value of pnl) {
    cumulative += value;
    peak = Math.max(peak, cumulative);
    deepest = Math.max(deepest, peak - cumulative);
  }
  return deepest;
}

export function currentDrawdown(pnl: readonly number[]): number {
  let cumulative = 0;
  let peak = 0;
  for (const value of pnl) {
    cumulative += value;
    peak = Math.max(peak, cumulative);
  }
  return Math.max(0, peak - cumulative);
}

function inPeriod(at: number, period: ReportPeriod): boolean {
  return (period.from === undefined || at >= period.from) && (period.until === undefined || at < period.until);
}

/**
 * Per-channel trading performance. A position is a ticket that filled; its
 * result is the profit the venue realized over all of its closes, so open
 * positions count toward volume and dates only.
 */
export class ChannelReporter {
  private readonly store: Pick<SignalStore, "listSignals">;
  private readonly venue: Pick<ExecutionVenue, "closedTickets">;
  private readonly logger: Logger;

  constructor(options: ChannelReporterOptions) {
    this.store = options.store;
    this.venue = options.venue;
    this.logger = options.logger ?? new NoopLogger();
  }

  /** Channels that produced at least one signal, sorted by id. */
  channels(): string[] {
    return [...new Set(this.store.listSignals().map((signal) => signal.source.channelId))].sort();
  }

  async analyze(channelId: string, period: ReportPeriod = {}): Promise<ChannelStats> {
    const closed = await this.closedById();
    return this.summarize(channelId, period, closed);
  }

  /** Every channel's stats, best net profit first. */
  async compare(options: CompareOptions = {}): Promise<ChannelStats[]> {
    const closed = await this.closedById();
    const minPositions = options.minPositions ?? 1;
    return this.channels()
      .map((channelId) => this.summarize(channelId, options, closed))
      .filter((stats) => stats.totalPositions >= minPositions)
      .sort((left, right) => right.netProfit - left.netProfit || left.channelId.localeCompare(right.channelId));
  }

  private async closedById(): Promise<Map<string, ClosedVenueTicket>> {
    const closed = await this.venue.closedTickets();
    return new Map(closed.map((record) => [record.id, record]));
  }

  private positionsOf(channelId: string, period: ReportPeriod): Position[] {
    return this.store
      .listSignals()
      .filter((signal) => signal.source.channelId === channelId)
      .flatMap((signal) => signal.tickets)
      .flatMap((ticket) =>
        ticket.filledAt !== undefined && inPeriod(ticket.filledAt, period) ? [{ ticket, filledAt: ticket.filledAt }] : [],
      );
  }

  private summarize(channelId: string, period: ReportPeriod, closed: ReadonlyMap<string, ClosedVenueTicket>): ChannelStats {
    const outcomes: Outcome[] = [];
    let openPositions = 0;
    let totalVolume = 0;
    let firstTradeAt: number | undefined;
    let lastTradeAt: number | undefined;

    for (const { ticket, filledAt } of this.positionsOf(channelId, period)) {
      const record = closed.get(ticket.id);
      if (record) {
        outcomes.push({ profit: record.profit, closedAt: record.closedAt });
      } else if (ticket.closedAt === undefined) {
        openPositions += 1;
      } else {
        this.logger.warn("Closed position has no venue record", { channelId, ticketId: ticket.id });
        continue;
      }
      totalVolume += ticket.initialVolume;
      firstTradeAt = firstTradeAt === undefined ? filledAt : Math.min(firstTradeAt, filledAt);
      lastTradeAt = lastTradeAt === undefined ? filledAt : Math.max(lastTradeAt, filledAt);
    }

    const pnl = outcomes.sort((left, right) => left.closedAt - right.closedAt).map((outcome) => outcome.profit);
    const wins = pnl.filter((profit) => profit > 0);
    const losses = pnl.filter((profit) => profit < 0);
    const totalProfit = sumAbs(wins);
    const totalLoss = sumAbs(losses);

    const stats: ChannelStats = {
      channelId,
      totalPositions: openPositions + pnl.length,
      openPositions,
      closedPositions: pnl.length,
      winningPositions: wins.length,
      losingPositions: losses.length,
      totalProfit: round2(totalProfit),
      totalLoss: round2(totalLoss),
      netProfit: round2(totalProfit - totalLoss),
      largestWin: round2(wins.reduce((largest, profit) => Math.max(largest, profit), 0)),
      largestLoss: round2(losses.reduce((largest, profit) => Math.min(largest, profit), 0)),
      averageWin: wins.length > 0 ? round2(totalProfit / wins.length) : 0,
      averageLoss: losses.length > 0 ? round2(totalLoss / losses.length) : 0,
      winRate: pnl.length > 0 ? round2((wins.length / pnl.length) * 100) : 0,
      profitFactor: totalLoss > 0 ? round2(totalProfit / totalLoss) : 0,
      maxDrawdown: round2(maxDrawdown(pnl)),
      currentDrawdown: round2(currentDrawdown(pnl)),
      totalVolume: round2(totalVolume),
      firstTradeAt,
      lastTradeAt,
    };
    this.logger.info("Channel report", {
      channelId,
      positions: stats.totalPositions,
      closed: stats.closedPositions,
      netProfit: stats.netProfit,
    });
    return stats;
  }
}
