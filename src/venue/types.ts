import type { Direction, TicketKind } from "../trading/types.js";

export interface OrderParams {
  readonly signalId: string;
  readonly symbol: string;
  readonly direction: Direction;
  readonly volume: number;
  readonly entryPrice: number;
  readonly stopLoss: number;
  readonly takeProfit?: number;
  readonly leg: number;
}

/** A ticket as the venue reports it, including live pricing. */
export interface VenueTicket {
  readonly id: string;
  readonly signalId?: string;
  readonly symbol: string;
  readonly direction: Direction;
  readonly kind: TicketKind;
  readonly volume: number;
  readonly openPrice: number;
  readonly stopLoss?: number;
  readonly takeProfit?: number;
  readonly currentPrice: number;
  readonly profit: number;
}

/** A position the venue has fully closed, with the profit realized over all of its closes. */
export interface ClosedVenueTicket {
  readonly id: string;
  readonly signalId?: string;
  readonly symbol: string;
  readonly direction: Direction;
  readonly volume: number;
  readonly openPrice: number;
  readonly closePrice: number;
  readonly profit: number;
  readonly closedAt: number;
}

export interface AccountState {
  readonly balance: number;
  readonly equity: number;
  /** Margin currently in use. */
  readonly margin: number;
}

export interface InstrumentInfo {
  readonly contractSize: number;
  readonly minVolume: number;
  readonly tradable: boolean;
  /** Defaults to `minVolume`. */
  readonly volumeStep?: number;
  /** Defaults to 1 (fully margined). */
  readonly leverage?: number;
}

export interface ExecutionVenue {
  placeOrder(params: OrderParams): Promise<VenueTicket>;
  modify(ticketId: string, stopLoss?: number, takeProfit?: number): Promise<void>;
  closePartial(ticketId: string, volume: number): Promise<void>;
  cancelOrder(ticketId: string): Promise<void>;
  listOpenTickets(): Promise<VenueTicket[]>;
  closedTickets(): Promise<ClosedVenueTicket[]>;
  accountState(): Promise<AccountState>;
  instrumentInfo(symbol: string): Promise<InstrumentInfo>;
}

export type VenueOperation = keyof ExecutionVenue;
