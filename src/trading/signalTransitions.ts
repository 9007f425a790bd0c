import {
  activeTickets,
  type Signal,
  type SignalEventType,
  type SignalStatus,
  type Ticket,
} from "./types.js";

export function withEvent(
  signal: Signal,
  type: SignalEventType,
  at: number,
  extra: { readonly ticketId?: string; readonly detail?: Record<string, unknown> } = {},
): Signal {
  return {
    ...signal,
    updatedAt: at,
    history: [...signal.history, { at, type, status: signal.status, ...extra }],
  };
}

export function withTicket(signal: Signal, ticket: Ticket): Signal {
  const exists = signal.tickets.some((item) => item.id === ticket.id);
  return {
    ...signal,
    tickets: exists ? signal.tickets.map((item) => (item.id === ticket.id ? ticket : item)) : [...signal.tickets, ticket],
  };
}

export function withStatus(signal: Signal, status: SignalStatus, errorReason?: string): Signal {
  return { ...signal, status, errorReason: status === "error" ? errorReason ?? signal.errorReason : undefined };
}

/**
 * Status implied by the tickets a signal owns. Signals without tickets keep
 * their status; an errored signal keeps it while it still has live tickets
 * unless `clearError` is set.
 */
export function deriveStatus(signal: Signal, clearError = false): SignalStatus {
  if (signal.tickets.length === 0) {
    return signal.status;
  }
  const active = activeTickets(signal);
  if (active.length === 0) {
    return signal.tickets.some((ticket) => ticket.filledAt !== undefined) ? "closed" : "cancelled";
  }
  if (signal.status === "error" && !clearError) {
    return "error";
  }
  const reduced =
    signal.tickets.some((ticket) => ticket.closedAt !== undefined && ticket.filledAt !== undefined) ||
    active.some((ticket) => ticket.volume < ticket.initialVolume);
  return reduced ? "partially_closed" : "open";
}

export function settle(signal: Signal, clearError = false): Signal {
  return withStatus(signal, deriveStatus(signal, clearError));
}

export function isTerminal(status: SignalStatus): boolean {
  return status === "closed" || status === "cancelled";
}

/** True when `candidate` is a strictly better stop-loss than `current` for the direction. */
export function improvesStopLoss(direction: Signal["direction"], current: number | undefined, candidate: number): boolean {
  if (current === undefined) {
    return true;
  }
  return direction === "buy" ? candidate > current : candidate < current;
}
