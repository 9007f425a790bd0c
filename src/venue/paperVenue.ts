import type { Direction, TicketKind } from "../trading/types.js";
import type {
  AccountState,
  ClosedVenueTicket,
  ExecutionVenue,
  InstrumentInfo,
  OrderParams,
  VenueOperation,
  VenueTicket,
} from "./types.js";

interface PaperTicket {
  id: string;
  signalId: string;
  symbol: string;
  direction: Direction;
  kind: TicketKind;
  volume: number;
  entryPrice: number;
  openPrice: number;
  stopLoss?: number;
  takeProfit?: number;
  closedVolume: number;
  realized: number;
}

export interface PaperVenueOptions {
  readonly balance?: number;
  readonly instruments?: Readonly<Record<string, InstrumentInfo>>;
  readonly prices?: Readonly<Record<string, number>>;
  readonly defaultInstrument?: InstrumentInfo;
  readonly ticketPrefix?: string;
  readonly now?: () => number;
}

export interface PaperVenueCall {
  readonly operation: VenueOperation;
  readonly ticketId?: string;
  readonly volume?: number;
  readonly stopLoss?: number;
  readonly takeProfit?: number;
}

const DEFAULT_INSTRUMENT: InstrumentInfo = {
  contractSize: 100_000,
  minVolume: 0.01,
  volumeStep: 0.01,
  tradable: true,
  leverage: 100,
};

export class PaperVenueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PaperVenueError";
  }
}

function sign(direction: Direction): number {
  return direction === "buy" ? 1 : -1;
}

/**
 * In-process venue with a settable price book. Orders fill once the price
 * reaches their entry, positions close on their stop-loss or take-profit, and
 * floating profit is reported in account currency.
 */
export class PaperVenue implements ExecutionVenue {
  readonly calls: PaperVenueCall[] = [];
  private readonly tickets = new Map<string, PaperTicket>();
  private readonly prices = new Map<string, number>();
  private readonly instruments: Map<string, InstrumentInfo>;
  private readonly defaultInstrument: InstrumentInfo;
  private readonly ticketPrefix: string;
  private readonly failures = new Map<VenueOperation, number>();
  private readonly closed: ClosedVenueTicket[] = [];
  private readonly now: () => number;
  private balance: number;
  private sequence = 0;

  constructor(options: PaperVenueOptions = {}) {
    this.balance = options.balance ?? 10_000;
    this.instruments = new Map(Object.entries(options.instruments ?? {}));
    this.defaultInstrument = options.defaultInstrument ?? DEFAULT_INSTRUMENT;
    this.ticketPrefix = options.ticketPrefix ?? "paper";
    this.now = options.now ?? Date.now;
    for (const [symbol, price] of Object.entries(options.prices ?? {})) {
      this.prices.set(symbol, price);
    }
  }

  /** Makes the next `count` calls of `operation` throw. */
  failNext(operation: VenueOperation, count = 1): void {
    this.failures.set(operation, count);
  }

  setPrice(symbol: string, price: number): void {
    this.prices.set(symbol, price);
    for (const ticket of [...this.tickets.values()]) {
      if (ticket.symbol === symbol) {
        this.evaluate(ticket, price);
      }
    }
  }

  async placeOrder(params: OrderParams): Promise<VenueTicket> {
    this.record({ operation: "placeOrder", volume: params.volume });
    this.sequence += 1;
    const ticket: PaperTicket = {
      id: `${this.ticketPrefix}-${this.sequence}`,
      signalId: params.signalId,
      symbol: params.symbol,
      direction: params.direction,
      kind: "order",
      volume: params.volume,
      entryPrice: params.entryPrice,
      openPrice: params.entryPrice,
      stopLoss: params.stopLoss,
      takeProfit: params.takeProfit,
      closedVolume: 0,
      realized: 0,
    };
    this.tickets.set(ticket.id, ticket);
    const price = this.prices.get(params.symbol);
    if (price !== undefined) {
      this.evaluate(ticket, price);
    }
    return this.snapshot(ticket);
  }

  async modify(ticketId: string, stopLoss?: number, takeProfit?: number): Promise<void> {
    this.record({ operation: "modify", ticketId, stopLoss, takeProfit });
    const ticket = this.requireTicket(ticketId);
    if (stopLoss !== undefined) {
      ticket.stopLoss = stopLoss;
    }
    if (takeProfit !== undefined) {
      ticket.takeProfit = takeProfit;
    }
  }

  async closePartial(ticketId: string, volume: number): Promise<void> {
    this.record({ operation: "closePartial", ticketId, volume });
    const ticket = this.requireTicket(ticketId);
    if (ticket.kind !== "position") {
      throw new PaperVenueError(`Ticket ${ticketId} is not an open position`);
    }
    const price = this.prices.get(ticket.symbol) ?? ticket.openPrice;
    this.realize(ticket, price, Math.min(volume, ticket.volume));
  }

  async cancelOrder(ticketId: string): Promise<void> {
    this.record({ operation: "cancelOrder", ticketId });
    const ticket = this.requireTicket(ticketId);
    if (ticket.kind !== "order") {
      throw new PaperVenueError(`Ticket ${ticketId} is already filled`);
    }
    this.tickets.delete(ticketId);
  }

  async listOpenTickets(): Promise<VenueTicket[]> {
    this.record({ operation: "listOpenTickets" });
    return [...this.tickets.values()].map((ticket) => this.snapshot(ticket));
  }

  async closedTickets(): Promise<ClosedVenueTicket[]> {
    this.record({ operation: "closedTickets" });
    return [...this.closed];
  }

  async accountState(): Promise<AccountState> {
    this.record({ operation: "accountState" });
    let floating = 0;
    let margin = 0;
    for (const ticket of this.tickets.values()) {
      if (ticket.kind !== "position") {
        continue;
      }
      const instrument = this.instrumentFor(ticket.symbol);
      floating += this.profitFor(ticket, this.prices.get(ticket.symbol) ?? ticket.openPrice, ticket.volume);
      margin += (ticket.volume * instrument.contractSize * ticket.openPrice) / (instrument.leverage ?? 1);
    }
    return { balance: this.balance, equity: this.balance + floating, margin };
  }

  async instrumentInfo(symbol: string): Promise<InstrumentInfo> {
    this.record({ operation: "instrumentInfo" });
    return this.instrumentFor(symbol);
  }

  private record(call: PaperVenueCall): void {
    this.calls.push(call);
    const pending = this.failures.get(call.operation) ?? 0;
    if (pending > 0) {
      this.failures.set(call.operation, pending - 1);
      throw new PaperVenueError(`Simulated ${call.operation} failure`);
    }
  }

  private requireTicket(ticketId: string): PaperTicket {
    const ticket = this.tickets.get(ticketId);
    if (!ticket) {
      throw new PaperVenueError(`Unknown ticket ${ticketId}`);
    }
    return ticket;
  }

  private instrumentFor(symbol: string): InstrumentInfo {
    return this.instruments.get(symbol) ?? this.defaultInstrument;
  }

  private profitFor(ticket: PaperTicket, price: number, volume: number): number {
    const { contractSize } = this.instrumentFor(ticket.symbol);
    return (price - ticket.openPrice) * sign(ticket.direction) * volume * contractSize;
  }

  private evaluate(ticket: PaperTicket, price: number): void {
    const direction = sign(ticket.direction);
    if (ticket.kind === "order") {
      if ((price - ticket.entryPrice) * direction <= 0) {
        ticket.kind = "position";
        ticket.openPrice = ticket.entryPrice;
      }
      return;
    }
    const stopped = ticket.stopLoss !== undefined && (price - ticket.stopLoss) * direction <= 0;
    const targeted = ticket.takeProfit !== undefined && (price - ticket.takeProfit) * direction >= 0;
    if (stopped || targeted) {
      this.realize(ticket, price, ticket.volume);
    }
  }

  private realize(ticket: PaperTicket, price: number, volume: number): void {
    const profit = this.profitFor(ticket, price, volume);
    this.balance += profit;
    ticket.realized += profit;
    ticket.closedVolume = Number((ticket.closedVolume + volume).toFixed(8));
    const remaining = Number((ticket.volume - volume).toFixed(8));
    if (remaining > 0) {
      ticket.volume = remaining;
      return;
    }
    this.tickets.delete(ticket.id);
    this.closed.push({
      id: ticket.id,
      signalId: ticket.signalId,
      symbol: ticket.symbol,
      direction: ticket.direction,
      volume: ticket.closedVolume,
      openPrice: ticket.openPrice,
      closePrice: price,
      profit: ticket.realized,
      closedAt: this.now(),
    });
  }

  private snapshot(ticket: PaperTicket): VenueTicket {
    const currentPrice = this.prices.get(ticket.symbol) ?? ticket.openPrice;
    return {
      id: ticket.id,
      signalId: ticket.signalId,
      symbol: ticket.symbol,
      direction: ticket.direction,
      kind: ticket.kind,
      volume: ticket.volume,
      openPrice: ticket.openPrice,
      stopLoss: ticket.stopLoss,
      takeProfit: ticket.takeProfit,
      currentPrice,
      profit: ticket.kind === "position" ? this.profitFor(ticket, currentPrice, ticket.volume) : 0,
    };
  }
}
