import type { ProfitSavingPolicy, TrailingStopPolicy } from "../config/schemas.js";
import { describeError, NoopLogger, type Logger } from "../telemetry/logger.js";
import type { LifecycleEngine } from "../trading/lifecycleEngine.js";
import { improvesStopLoss } from "../trading/signalTransitions.js";
import { activeTickets, type Direction, type Signal, type Ticket } from "../trading/types.js";
import type { ExecutionVenue, VenueTicket } from "../venue/types.js";

export interface PositionMonitorOptions {
  readonly engine: LifecycleEngine;
  readonly venue: ExecutionVenue;
  readonly trailingStop: TrailingStopPolicy;
  readonly profitSaving: ProfitSavingPolicy;
  readonly pendingOrderExpiryMs: number;
  readonly intervalMs: number;
  readonly logger?: Logger;
  readonly now?: () => number;
}

export interface MonitorTickReport {
  readonly checked: number;
  readonly reconciled: number;
  readonly trailed: number;
  readonly profitSaved: number;
  readonly expired: number;
  readonly adopted: number;
  readonly failures: number;
}

type Counter = { -readonly [K in keyof MonitorTickReport]: number };

export function favorableMove(direction: Direction, openPrice: number, currentPrice: number): number {
  return direction === "buy" ? currentPrice - openPrice : openPrice - currentPrice;
}

/** The policy with the symbol's own threshold and step, when it has any. */
export function trailingPolicyFor(policy: TrailingStopPolicy, symbol: string): TrailingStopPolicy {
  const levels = policy.symbols[symbol];
  return levels ? { ...policy, threshold: levels.threshold, step: levels.step } : policy;
}

/** Stop-loss the trailing policy asks for, or undefined when it would not tighten the current one. */
export function trailingStopCandidate(
  policy: TrailingStopPolicy,
  ticket: Pick<Ticket, "direction" | "openPrice" | "stopLoss">,
  live: Pick<VenueTicket, "currentPrice" | "profit">,
): number | undefined {
  if (!policy.enabled) {
    return undefined;
  }
  const metric =
    policy.metric === "floatingProfit" ? live.profit : favorableMove(ticket.direction, ticket.openPrice, live.currentPrice);
  if (!(metric > policy.threshold)) {
    return undefined;
  }
  const candidate = ticket.direction === "buy" ? live.currentPrice - policy.step : live.currentPrice + policy.step;
  return improvesStopLoss(ticket.direction, ticket.stopLoss, candidate) ? candidate : undefined;
}

/** Indexes of profit-saving steps whose threshold the ticket has crossed and that have not fired yet. */
export function dueProfitSteps(
  policy: ProfitSavingPolicy,
  signal: Pick<Signal, "takeProfits">,
  ticket: Pick<Ticket, "direction" | "openPrice" | "consumedProfitSteps">,
  currentPrice: number,
): number[] {
  if (!policy.enabled) {
    return [];
  }
  const move = favorableMove(ticket.direction, ticket.openPrice, currentPrice);
  const thresholds =
    policy.mode === "distance"
      ? policy.thresholds
      : signal.takeProfits.map((target) => Math.abs(target - ticket.openPrice));

  const due: number[] = [];
  policy.closeFractions.forEach((_, index) => {
    const threshold = thresholds[index];
    if (threshold !== undefined && move >= threshold && !ticket.consumedProfitSteps.includes(index)) {
      due.push(index);
    }
  });
  return due;
}

/**
 * Periodically compares stored tickets with the venue and feeds trailing-stop,
 * profit-saving and expiry decisions back into the lifecycle engine. A failure
 * on one ticket is logged and retried next tick; it never stops the others.
 *
 * Signals are read before the venue is asked, so a ticket placed while the
 * listing is in flight is left for the next tick instead of being taken for
 * one that vanished.
 */
export class PositionMonitor {
  private readonly options: PositionMonitorOptions;
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer?: NodeJS.Timeout;
  private running?: Promise<MonitorTickReport>;

  constructor(options: PositionMonitorOptions) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      if (this.running) {
        return;
      }
      void this.tick().catch((error) => {
        this.logger.error("Monitor tick failed", { error: describeError(error) });
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.running?.catch(() => undefined);
  }

  tick(): Promise<MonitorTickReport> {
    const run = this.runTick().finally(() => {
      if (this.running === run) {
        this.running = undefined;
      }
    });
    this.running = run;
    return run;
  }

  private async runTick(): Promise<MonitorTickReport> {
    const counter: Counter = {
      checked: 0,
      reconciled: 0,
      trailed: 0,
      profitSaved: 0,
      expired: 0,
      adopted: 0,
      failures: 0,
    };

    const signals = this.options.engine.listActiveSignals();
    let live: VenueTicket[];
    try {
      live = await this.options.venue.listOpenTickets();
    } catch (error) {
      this.logger.warn("Unable to list venue tickets", { error: describeError(error) });
      return { ...counter, failures: 1 };
    }
    const liveById = new Map(live.map((ticket) => [ticket.id, ticket]));

    for (const signal of signals) {
      for (const ticket of activeTickets(signal)) {
        counter.checked += 1;
        try {
          await this.inspect(signal, ticket, liveById.get(ticket.id), counter);
        } catch (error) {
          counter.failures += 1;
          this.logger.warn("Ticket check failed", {
            signalId: signal.id,
            ticketId: ticket.id,
            error: describeError(error),
          });
        }
      }
    }

    const known = new Set(signals.flatMap((signal) => signal.tickets.map((ticket) => ticket.id)));
    for (const ticket of live) {
      if (!ticket.signalId || known.has(ticket.id)) {
        continue;
      }
      try {
        if (await this.options.engine.adoptTicket(ticket.signalId, ticket)) {
          counter.adopted += 1;
        }
      } catch (error) {
        counter.failures += 1;
        this.logger.warn("Adopting venue ticket failed", {
          signalId: ticket.signalId,
          ticketId: ticket.id,
          error: describeError(error),
        });
      }
    }
    return counter;
  }

  private async inspect(signal: Signal, ticket: Ticket, live: VenueTicket | undefined, counter: Counter): Promise<void> {
    const { engine } = this.options;

    const filledSinceLastTick = live !== undefined && ticket.kind === "order" && live.kind === "position";
    const reducedAtVenue = live !== undefined && live.volume < ticket.volume;
    if (!live || filledSinceLastTick || reducedAtVenue) {
      if (await engine.reconcileTicket(signal.id, ticket.id, live)) {
        counter.reconciled += 1;
      }
      return;
    }

    if (ticket.kind === "order") {
      if (this.now() - ticket.openedAt > this.options.pendingOrderExpiryMs && (await engine.expireOrder(signal.id, ticket.id))) {
        counter.expired += 1;
      }
      return;
    }

    if (signal.status !== "open" && signal.status !== "partially_closed") {
      return;
    }

    const policy = trailingPolicyFor(this.options.trailingStop, ticket.symbol);
    const candidate = trailingStopCandidate(policy, ticket, live);
    if (candidate !== undefined && (await engine.applyTrailingStop(signal.id, ticket.id, candidate))) {
      counter.trailed += 1;
    }

    for (const step of dueProfitSteps(this.options.profitSaving, signal, ticket, live.currentPrice)) {
      const fraction = this.options.profitSaving.closeFractions[step];
      if (fraction !== undefined && (await engine.applyProfitSaving(signal.id, ticket.id, step, fraction))) {
        counter.profitSaved += 1;
      }
    }
  }
}
