export type Direction = "buy" | "sell";

export type SignalStatus = "pending" | "open" | "partially_closed" | "closed" | "cancelled" | "error";

export type TicketKind = "order" | "position";

export const ACTIVE_STATUSES: readonly SignalStatus[] = ["pending", "open", "partially_closed", "error"];

export interface MessageRef {
  readonly channelId: string;
  readonly messageId: string;
}

export interface MessageRecord extends MessageRef {
  readonly replyToMessageId?: string;
  readonly text: string;
  readonly edited: boolean;
}

export interface ParsedSignal {
  readonly symbol: string;
  readonly rawSymbol: string;
  readonly direction: Direction;
  /** One price, or two when dual-entry handling is enabled and a second entry was found. */
  readonly entryPrices: readonly number[];
  readonly stopLoss: number;
  readonly takeProfits: readonly number[];
  readonly text: string;
}

export type TicketCloseReason = "command" | "expired" | "venue" | "profit_saving";

export interface Ticket {
  readonly id: string;
  readonly signalId: string;
  readonly symbol: string;
  readonly direction: Direction;
  readonly kind: TicketKind;
  readonly leg: number;
  readonly volume: number;
  readonly initialVolume: number;
  readonly volumeStep: number;
  readonly minVolume: number;
  readonly openPrice: number;
  readonly stopLoss?: number;
  readonly takeProfit?: number;
  readonly openedAt: number;
  readonly filledAt?: number;
  /** Indexes of profit-saving steps already fired for this ticket. */
  readonly consumedProfitSteps: readonly number[];
  readonly closedAt?: number;
  readonly closeReason?: TicketCloseReason;
}

export type SignalEventType =
  | "created"
  | "placed"
  | "placement_failed"
  | "sizing_rejected"
  | "edited"
  | "risk_free"
  | "half_closed"
  | "take_profit_now"
  | "deleted"
  | "trailing_stop"
  | "profit_saved"
  | "order_filled"
  | "order_expired"
  | "closed_at_venue"
  | "adopted"
  | "command_ignored"
  | "venue_failure";

export interface SignalEvent {
  readonly at: number;
  readonly type: SignalEventType;
  readonly status: SignalStatus;
  readonly ticketId?: string;
  readonly detail?: Record<string, unknown>;
}

export interface Signal {
  readonly id: string;
  readonly symbol: string;
  readonly rawSymbol: string;
  readonly direction: Direction;
  readonly entryPrices: readonly number[];
  readonly stopLoss: number;
  readonly takeProfits: readonly number[];
  readonly source: MessageRef;
  readonly status: SignalStatus;
  readonly tickets: readonly Ticket[];
  readonly history: readonly SignalEvent[];
  readonly errorReason?: string;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export type CommandKind = "edit" | "delete" | "riskFree" | "halfClose" | "takeProfitNow";

export type CommandIntent =
  | {
      readonly kind: "edit";
      readonly stopLoss?: number;
      readonly takeProfits?: readonly number[];
    }
  | { readonly kind: "delete" }
  | { readonly kind: "riskFree" }
  | { readonly kind: "halfClose" }
  | { readonly kind: "takeProfitNow" };

export type Command = CommandIntent & {
  readonly targetSignalId: string;
  readonly source: MessageRef;
};

export function messageKey(ref: MessageRef): string {
  return `${ref.channelId}:${ref.messageId}`;
}

export function isTicketActive(ticket: Ticket): boolean {
  return ticket.closedAt === undefined;
}

export function activeTickets(signal: Signal): Ticket[] {
  return signal.tickets.filter(isTicketActive);
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
