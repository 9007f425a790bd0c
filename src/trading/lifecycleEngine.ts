import crypto from "node:crypto";

import { roundVolumeDown, volumeStepOf, type SizingCalculator } from "../risk/sizingCalculator.js";
import type { EventJournal } from "../storage/eventJournal.js";
import type { SignalStore } from "../storage/signalStore.js";
import { describeError, NoopLogger, type Logger } from "../telemetry/logger.js";
import type { NotificationEvent, Notifier } from "../telemetry/notificationService.js";
import type { AccountState, ExecutionVenue, InstrumentInfo, VenueTicket } from "../venue/types.js";
import { StoreUnavailableError } from "./errors.js";
import { KeyedSerializer } from "./keyedSerializer.js";
import { validateSignalLevels } from "./signalValidation.js";
import {
  improvesStopLoss,
  isTerminal,
  settle,
  withEvent,
  withStatus,
  withTicket,
} from "./signalTransitions.js";
import {
  activeTickets,
  ACTIVE_STATUSES,
  assertNever,
  type Command,
  type CommandKind,
  type MessageRef,
  type ParsedSignal,
  type Signal,
  type Ticket,
  type TicketCloseReason,
} from "./types.js";

export interface LifecycleEngineOptions {
  readonly store: SignalStore;
  /** Expected to carry its own timeout and retry policy. */
  readonly venue: ExecutionVenue;
  readonly sizing: SizingCalculator;
  readonly journal?: EventJournal;
  readonly notifier?: Notifier;
  readonly logger?: Logger;
  readonly now?: () => number;
  readonly idFactory?: () => string;
}

export type CommandResult =
  | { readonly status: "applied"; readonly signal: Signal }
  | { readonly status: "ignored"; readonly reason: string; readonly signal?: Signal }
  | { readonly status: "failed"; readonly reason: string; readonly signal: Signal };

export type StoreFailureListener = (error: StoreUnavailableError) => void;

export interface OpenPosition {
  readonly signalId: string;
  readonly signalStatus: Signal["status"];
  readonly ticket: Ticket;
}

/** Progress made before a venue call failed part-way through a multi-ticket action. */
class PartialFailure extends Error {
  constructor(
    readonly signal: Signal,
    readonly failure: unknown,
  ) {
    super(describeError(failure));
    this.name = "PartialFailure";
  }
}

function supportsCommand(signal: Signal, kind: CommandKind): boolean {
  switch (signal.status) {
    case "closed":
    case "cancelled":
      return false;
    case "pending":
      return kind === "delete" || kind === "edit";
    case "open":
    case "partially_closed":
      return true;
    case "error":
      return kind === "delete" || activeTickets(signal).length > 0;
    default:
      return assertNever(signal.status);
  }
}

/**
 * Single authority over signal and ticket state. Every mutation of a signal
 * runs on that signal's queue, so messages, operator commands and monitor
 * adjustments for one signal apply strictly in the order they were submitted
 * while different signals progress concurrently.
 */
export class LifecycleEngine {
  private readonly store: SignalStore;
  private readonly venue: ExecutionVenue;
  private readonly sizing: SizingCalculator;
  private readonly journal?: EventJournal;
  private readonly notifier?: Notifier;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private readonly queue = new KeyedSerializer();
  private readonly storeFailureListeners: StoreFailureListener[] = [];

  constructor(options: LifecycleEngineOptions) {
    this.store = options.store;
    this.venue = options.venue;
    this.sizing = options.sizing;
    this.journal = options.journal;
    this.notifier = options.notifier;
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? (() => crypto.randomUUID());
  }

  /**
   * Records a new pending signal and queues its placement. Resolves once the
   * pending record is durable; placement continues in the background.
   */
  async submitSignal(parsed: ParsedSignal, source: MessageRef): Promise<Signal> {
    const createdAt = this.now();
    const signal = withEvent(
      {
        id: this.idFactory(),
        symbol: parsed.symbol,
        rawSymbol: parsed.rawSymbol,
        direction: parsed.direction,
        entryPrices: [...parsed.entryPrices],
        stopLoss: parsed.stopLoss,
        takeProfits: [...parsed.takeProfits],
        source,
        status: "pending",
        tickets: [],
        history: [],
        createdAt,
        updatedAt: createdAt,
      },
      "created",
      createdAt,
    );

    await this.commit(undefined, signal);
    this.logger.info("Signal accepted", { signalId: signal.id, symbol: signal.symbol, direction: signal.direction });

    void this.queue.run(signal.id, () => this.place(signal.id)).catch((error) => {
      this.logger.error("Placement task failed", { signalId: signal.id, error: describeError(error) });
    });
    return signal;
  }

  /** Called whenever a write fails because the store is unavailable, including writes of background tasks. */
  onStoreFailure(listener: StoreFailureListener): void {
    this.storeFailureListeners.push(listener);
  }

  /** Applies a command after everything already queued for its signal. */
  submitCommand(command: Command): Promise<CommandResult> {
    return this.queue.run(command.targetSignalId, () => this.applyCommand(command));
  }

  applyTrailingStop(signalId: string, ticketId: string, stopLoss: number): Promise<boolean> {
    return this.queue.run(signalId, async () => {
      const located = this.locateActiveTicket(signalId, ticketId);
      if (!located || located.ticket.kind !== "position" || !this.isManaged(located.signal)) {
        return false;
      }
      const { signal, ticket } = located;
      if (!improvesStopLoss(ticket.direction, ticket.stopLoss, stopLoss)) {
        return false;
      }
      try {
        await this.venue.modify(ticket.id, stopLoss, undefined);
      } catch (error) {
        this.logger.warn("Trailing stop update failed", { signalId, ticketId, error: describeError(error) });
        return false;
      }
      const next = withEvent(withTicket(signal, { ...ticket, stopLoss }), "trailing_stop", this.now(), {
        ticketId,
        detail: { from: ticket.stopLoss, to: stopLoss },
      });
      await this.commit(signal, next);
      return true;
    });
  }

  applyProfitSaving(signalId: string, ticketId: string, stepIndex: number, fraction: number): Promise<boolean> {
    return this.queue.run(signalId, async () => {
      const located = this.locateActiveTicket(signalId, ticketId);
      if (!located || located.ticket.kind !== "position" || !this.isManaged(located.signal)) {
        return false;
      }
      const { signal, ticket } = located;
      if (ticket.consumedProfitSteps.includes(stepIndex)) {
        return false;
      }

      let closing = Math.max(roundVolumeDown(ticket.volume * fraction, ticket.volumeStep), ticket.minVolume);
      if (ticket.volume - closing < ticket.minVolume) {
        closing = ticket.volume;
      }
      try {
        await this.venue.closePartial(ticket.id, closing);
      } catch (error) {
        this.logger.warn("Profit saving close failed", { signalId, ticketId, stepIndex, error: describeError(error) });
        return false;
      }

      const at = this.now();
      const remaining = roundVolumeDown(ticket.volume - closing, ticket.volumeStep);
      const updated: Ticket = {
        ...ticket,
        volume: remaining,
        consumedProfitSteps: [...ticket.consumedProfitSteps, stepIndex],
        ...(remaining <= 0 ? { closedAt: at, closeReason: "profit_saving" as const } : {}),
      };
      const next = withEvent(settle(withTicket(signal, updated)), "profit_saved", at, {
        ticketId,
        detail: { step: stepIndex, closedVolume: closing, remainingVolume: remaining },
      });
      await this.commit(signal, next);
      return true;
    });
  }

  expireOrder(signalId: string, ticketId: string): Promise<boolean> {
    return this.queue.run(signalId, async () => {
      const located = this.locateActiveTicket(signalId, ticketId);
      if (!located || located.ticket.kind !== "order") {
        return false;
      }
      const { signal, ticket } = located;
      try {
        await this.venue.cancelOrder(ticket.id);
      } catch (error) {
        this.logger.warn("Expiring pending order failed", { signalId, ticketId, error: describeError(error) });
        return false;
      }
      const at = this.now();
      const next = withEvent(
        settle(withTicket(signal, { ...ticket, closedAt: at, closeReason: "expired" })),
        "order_expired",
        at,
        { ticketId, detail: { ageMs: at - ticket.openedAt } },
      );
      await this.commit(signal, next);
      return true;
    });
  }

  /** Brings one stored ticket in line with what the venue reports (undefined: gone from the venue). */
  reconcileTicket(signalId: string, ticketId: string, live: VenueTicket | undefined): Promise<boolean> {
    return this.queue.run(signalId, async () => {
      const located = this.locateActiveTicket(signalId, ticketId);
      if (!located) {
        return false;
      }
      const { signal, ticket } = located;
      const at = this.now();

      if (!live) {
        const next = withEvent(
          settle(withTicket(signal, { ...ticket, closedAt: at, closeReason: "venue" })),
          "closed_at_venue",
          at,
          { ticketId, detail: { kind: ticket.kind } },
        );
        await this.commit(signal, next);
        return true;
      }

      if (ticket.kind === "order" && live.kind === "position") {
        const filled: Ticket = { ...ticket, kind: "position", openPrice: live.openPrice, volume: live.volume, filledAt: at };
        const next = withEvent(settle(withTicket(signal, filled)), "order_filled", at, {
          ticketId,
          detail: { openPrice: live.openPrice },
        });
        await this.commit(signal, next);
        return true;
      }

      if (live.volume < ticket.volume) {
        const next = withEvent(settle(withTicket(signal, { ...ticket, volume: live.volume })), "closed_at_venue", at, {
          ticketId,
          detail: { remainingVolume: live.volume },
        });
        await this.commit(signal, next);
        return true;
      }
      return false;
    });
  }

  /**
   * Records a venue ticket that belongs to the signal but is missing from the
   * store, such as an order whose placement write was lost.
   */
  adoptTicket(signalId: string, live: VenueTicket): Promise<boolean> {
    return this.queue.run(signalId, async () => {
      const signal = this.store.getSignal(signalId);
      if (!signal || signal.tickets.some((ticket) => ticket.id === live.id)) {
        return false;
      }
      if (isTerminal(signal.status)) {
        this.logger.warn("Venue ticket belongs to a finished signal", { signalId, ticketId: live.id, status: signal.status });
        return false;
      }
      const instrument = await this.venue.instrumentInfo(signal.symbol);
      const at = this.now();
      const ticket = this.ticketFrom(signal, live, instrument, at, {
        leg: signal.tickets.length,
        stopLoss: live.stopLoss,
        takeProfit: live.takeProfit,
      });
      const next = withEvent(settle(withTicket(signal, ticket)), "adopted", at, {
        ticketId: ticket.id,
        detail: { kind: ticket.kind, volume: ticket.volume },
      });
      await this.commit(signal, next);
      this.logger.warn("Adopted venue ticket missing from the store", { signalId, ticketId: ticket.id });
      return true;
    });
  }

  getSignal(signalId: string): Signal | undefined {
    return this.store.getSignal(signalId);
  }

  listActiveSignals(): Signal[] {
    return this.store
      .listSignals()
      .filter((signal) => ACTIVE_STATUSES.includes(signal.status))
      .sort((left, right) => left.createdAt - right.createdAt);
  }

  listOpenPositions(): OpenPosition[] {
    return this.store.listSignals().flatMap((signal) =>
      activeTickets(signal).map((ticket) => ({ signalId: signal.id, signalStatus: signal.status, ticket })),
    );
  }

  signalHistory(limit = 20): Signal[] {
    return [...this.store.listSignals()].sort((left, right) => right.updatedAt - left.updatedAt).slice(0, limit);
  }

  /** Resolves when every queued placement, command and adjustment has finished. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  private isManaged(signal: Signal): boolean {
    return signal.status === "open" || signal.status === "partially_closed";
  }

  private locateActiveTicket(signalId: string, ticketId: string): { signal: Signal; ticket: Ticket } | undefined {
    const signal = this.store.getSignal(signalId);
    const ticket = signal?.tickets.find((item) => item.id === ticketId);
    if (!signal || !ticket || ticket.closedAt !== undefined) {
      return undefined;
    }
    return { signal, ticket };
  }

  private async place(signalId: string): Promise<void> {
    const signal = this.store.getSignal(signalId);
    if (!signal || signal.status !== "pending") {
      return;
    }

    let account: AccountState;
    let instrument: InstrumentInfo;
    try {
      [account, instrument] = await Promise.all([this.venue.accountState(), this.venue.instrumentInfo(signal.symbol)]);
    } catch (error) {
      await this.fail(signal, signal, "placement_failed", error);
      return;
    }

    const sizing = this.sizing.size(signal, account, instrument);
    if (!sizing.ok) {
      const reason = `sizing_rejected(${sizing.kind})`;
      const next = withEvent(withStatus(signal, "error", reason), "sizing_rejected", this.now(), {
        detail: { kind: sizing.kind, message: sizing.message },
      });
      await this.commit(signal, next);
      this.logger.warn("Sizing rejected signal", { signalId, kind: sizing.kind, message: sizing.message });
      this.alert({ type: "sizing_rejected", signal: next, kind: sizing.kind, message: sizing.message });
      return;
    }

    let next = signal;
    const failures: string[] = [];
    for (const order of sizing.orders) {
      try {
        const live = await this.venue.placeOrder(order);
        const at = this.now();
        const ticket = this.ticketFrom(signal, live, instrument, at, order);
        next = withTicket(next, ticket);
        next = withEvent(settle(next), "placed", at, {
          ticketId: ticket.id,
          detail: { leg: order.leg, volume: ticket.volume, kind: ticket.kind },
        });
      } catch (error) {
        failures.push(describeError(error));
        this.logger.error("Order placement failed", { signalId, leg: order.leg, error: describeError(error) });
      }
    }

    if (next.tickets.length === 0) {
      await this.fail(signal, next, "placement_failed", new Error(failures.join("; ")));
      return;
    }
    if (failures.length > 0) {
      next = withEvent(next, "venue_failure", this.now(), { detail: { operation: "placeOrder", failures } });
    }
    await this.commit(signal, next);
  }

  private ticketFrom(
    signal: Signal,
    live: VenueTicket,
    instrument: InstrumentInfo,
    at: number,
    levels: { readonly leg: number; readonly stopLoss?: number; readonly takeProfit?: number },
  ): Ticket {
    return {
      id: live.id,
      signalId: signal.id,
      symbol: signal.symbol,
      direction: signal.direction,
      kind: live.kind,
      leg: levels.leg,
      volume: live.volume,
      initialVolume: live.volume,
      volumeStep: volumeStepOf(instrument),
      minVolume: instrument.minVolume,
      openPrice: live.openPrice,
      stopLoss: levels.stopLoss,
      takeProfit: levels.takeProfit,
      openedAt: at,
      filledAt: live.kind === "position" ? at : undefined,
      consumedProfitSteps: [],
    };
  }

  private async applyCommand(command: Command): Promise<CommandResult> {
    const signal = this.store.getSignal(command.targetSignalId);
    if (!signal) {
      return { status: "ignored", reason: "unknown_signal" };
    }
    if (!supportsCommand(signal, command.kind)) {
      this.logger.info("Command not applicable", { signalId: signal.id, kind: command.kind, status: signal.status });
      return { status: "ignored", reason: `not_applicable_in_${signal.status}`, signal };
    }

    try {
      switch (command.kind) {
        case "delete":
          return await this.deleteAll(signal);
        case "takeProfitNow":
          return await this.takeProfitNow(signal);
        case "riskFree":
          return await this.riskFree(signal);
        case "halfClose":
          return await this.halfClose(signal);
        case "edit":
          return await this.edit(signal, command.stopLoss, command.takeProfits);
        default:
          return assertNever(command);
      }
    } catch (error) {
      if (error instanceof PartialFailure) {
        const failed = await this.fail(signal, error.signal, "venue_failure", error.failure, command.kind);
        return { status: "failed", reason: describeError(error.failure), signal: failed };
      }
      throw error;
    }
  }

  private async deleteAll(signal: Signal): Promise<CommandResult> {
    let next = signal;
    for (const ticket of activeTickets(signal)) {
      next = await this.closeTicket(next, ticket, "command");
    }
    const at = this.now();
    next = next.tickets.length === 0 ? withStatus(next, "cancelled") : settle(next, true);
    next = withEvent(next, "deleted", at);
    await this.commit(signal, next);
    return { status: "applied", signal: next };
  }

  /** The target was reached: leftover pending legs are cancelled, filled positions stay under management. */
  private async takeProfitNow(signal: Signal): Promise<CommandResult> {
    const pending = activeTickets(signal).filter((ticket) => ticket.kind === "order");
    if (pending.length === 0) {
      return { status: "ignored", reason: "no_pending_orders", signal };
    }
    let next = signal;
    for (const ticket of pending) {
      next = await this.closeTicket(next, ticket, "command");
    }
    next = withEvent(settle(next, true), "take_profit_now", this.now(), {
      detail: { cancelled: pending.map((ticket) => ticket.id), kept: activeTickets(next).map((ticket) => ticket.id) },
    });
    await this.commit(signal, next);
    return { status: "applied", signal: next };
  }

  private async closeTicket(signal: Signal, ticket: Ticket, reason: TicketCloseReason): Promise<Signal> {
    try {
      if (ticket.kind === "order") {
        await this.venue.cancelOrder(ticket.id);
      } else {
        await this.venue.closePartial(ticket.id, ticket.volume);
      }
    } catch (error) {
      throw new PartialFailure(signal, error);
    }
    return withTicket(signal, { ...ticket, closedAt: this.now(), closeReason: reason });
  }

  private async riskFree(signal: Signal): Promise<CommandResult> {
    let next = signal;
    const moved: string[] = [];
    for (const ticket of activeTickets(signal)) {
      if (!improvesStopLoss(ticket.direction, ticket.stopLoss, ticket.openPrice)) {
        continue;
      }
      try {
        await this.venue.modify(ticket.id, ticket.openPrice, undefined);
      } catch (error) {
        throw new PartialFailure(next, error);
      }
      next = withTicket(next, { ...ticket, stopLoss: ticket.openPrice });
      moved.push(ticket.id);
    }
    if (moved.length === 0) {
      return { status: "ignored", reason: "stop_loss_already_at_or_beyond_entry", signal };
    }
    next = withEvent(settle(next, true), "risk_free", this.now(), { detail: { tickets: moved } });
    await this.commit(signal, next);
    return { status: "applied", signal: next };
  }

  private async halfClose(signal: Signal): Promise<CommandResult> {
    const positions = activeTickets(signal).filter((ticket) => ticket.kind === "position");
    if (positions.length === 0) {
      return { status: "ignored", reason: "no_filled_positions", signal };
    }

    let next = signal;
    for (const ticket of positions) {
      const half = roundVolumeDown(ticket.volume / 2, ticket.volumeStep);
      if (half < ticket.minVolume || ticket.volume - half < ticket.minVolume) {
        next = await this.closeTicket(next, ticket, "command");
        continue;
      }
      try {
        await this.venue.closePartial(ticket.id, half);
      } catch (error) {
        throw new PartialFailure(next, error);
      }
      next = withTicket(next, { ...ticket, volume: roundVolumeDown(ticket.volume - half, ticket.volumeStep) });
    }
    next = withEvent(settle(next, true), "half_closed", this.now(), { detail: { tickets: positions.map((t) => t.id) } });
    await this.commit(signal, next);
    return { status: "applied", signal: next };
  }

  private async edit(
    signal: Signal,
    stopLoss: number | undefined,
    takeProfits: readonly number[] | undefined,
  ): Promise<CommandResult> {
    const nextStop = stopLoss ?? signal.stopLoss;
    const nextTargets = takeProfits ?? signal.takeProfits;
    const violation = validateSignalLevels(signal.direction, signal.entryPrices, nextStop, nextTargets);
    if (violation) {
      this.logger.info("Edit rejected", { signalId: signal.id, reason: violation });
      return { status: "ignored", reason: `invalid_levels: ${violation}`, signal };
    }

    const finalTarget = takeProfits ? takeProfits[takeProfits.length - 1] : undefined;
    let next: Signal = { ...signal, stopLoss: nextStop, takeProfits: [...nextTargets] };
    for (const ticket of activeTickets(signal)) {
      try {
        await this.venue.modify(ticket.id, stopLoss, finalTarget);
      } catch (error) {
        throw new PartialFailure(next, error);
      }
      next = withTicket(next, {
        ...ticket,
        stopLoss: stopLoss ?? ticket.stopLoss,
        takeProfit: finalTarget ?? ticket.takeProfit,
      });
    }
    next = withEvent(next.tickets.length > 0 ? settle(next, true) : next, "edited", this.now(), {
      detail: { stopLoss: nextStop, takeProfits: nextTargets },
    });
    await this.commit(signal, next);
    return { status: "applied", signal: next };
  }

  private async fail(
    previous: Signal,
    progressed: Signal,
    eventType: "placement_failed" | "venue_failure",
    error: unknown,
    operation?: string,
  ): Promise<Signal> {
    const message = describeError(error);
    const settled = settle(progressed);
    const next = withEvent(
      isTerminal(settled.status) ? settled : withStatus(settled, "error", message),
      eventType,
      this.now(),
      { detail: { error: message, operation } },
    );
    await this.commit(previous, next);
    if (next.status === "error") {
      this.alert({ type: "signal_error", signal: next, message });
    }
    return next;
  }

  private alert(event: NotificationEvent): void {
    if (!this.notifier) {
      return;
    }
    void this.notifier.notify(event).catch((error) => {
      this.logger.warn("Notification failed", { error: describeError(error) });
    });
  }

  /** Persists `next` and journals the events it added on top of `previous`. */
  private async commit(previous: Signal | undefined, next: Signal): Promise<void> {
    try {
      await this.store.saveSignal(next);
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        for (const listener of this.storeFailureListeners) {
          listener(error);
        }
      }
      throw error;
    }
    if (previous?.status !== next.status) {
      this.logger.info("Signal transition", { signalId: next.id, from: previous?.status, to: next.status });
    }
    const journal = this.journal;
    if (!journal) {
      return;
    }
    const added = next.history.slice(previous?.history.length ?? 0);
    for (const event of added) {
      await journal.append(next.id, next.symbol, event).catch((error) => {
        this.logger.warn("Journal append failed", { signalId: next.id, error: describeError(error) });
      });
    }
  }
}
