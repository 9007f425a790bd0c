import crypto from "node:crypto";

import type { ChannelReporter, ChannelStats } from "../report/channelReport.js";
import { NoopLogger, type Logger } from "../telemetry/logger.js";
import type { CommandResult, LifecycleEngine, OpenPosition } from "../trading/lifecycleEngine.js";
import { normalizeDigits, parseNumericToken, splitNumberList } from "../trading/numeric.js";
import { assertNever, type Command, type CommandIntent, type Signal } from "../trading/types.js";

export type ValueField = "stopLoss" | "takeProfits";

export type SessionState =
  | { readonly kind: "main_menu" }
  | { readonly kind: "viewing_signal"; readonly signalId: string }
  | { readonly kind: "awaiting_value"; readonly signalId: string; readonly field: ValueField };

export type ConsoleAction = "delete" | "riskFree" | "halfClose" | "takeProfitNow" | "editStopLoss" | "editTakeProfits";

export type ConsoleInput =
  | { readonly type: "menu" }
  | { readonly type: "list" }
  | { readonly type: "report" }
  | { readonly type: "select"; readonly signalId: string }
  | { readonly type: "action"; readonly action: ConsoleAction }
  | { readonly type: "text"; readonly value: string }
  | { readonly type: "back" };

export interface ConsoleView {
  readonly state: SessionState;
  readonly lines: readonly string[];
  readonly error?: string;
  readonly result?: CommandResult;
}

export type ConsoleQueries = Pick<LifecycleEngine, "getSignal" | "listActiveSignals" | "listOpenPositions" | "signalHistory">;

export type ChannelReports = Pick<ChannelReporter, "compare">;

export type CommandDispatcher = (command: Command) => Promise<CommandResult>;

const MAIN_MENU: SessionState = { kind: "main_menu" };

/** Per-user console state. Only the console reads or writes it. */
export class SessionContext {
  private readonly sessions = new Map<string, SessionState>();

  get(userId: string): SessionState {
    return this.sessions.get(userId) ?? MAIN_MENU;
  }

  set(userId: string, state: SessionState): void {
    this.sessions.set(userId, state);
  }
}

export interface OperatorConsoleOptions {
  readonly queries: ConsoleQueries;
  readonly dispatch: CommandDispatcher;
  readonly reports: ChannelReports;
  readonly sessions?: SessionContext;
  readonly logger?: Logger;
  readonly idFactory?: () => string;
}

export function describeSignal(signal: Signal): string {
  const entries = signal.entryPrices.join("/");
  const targets = signal.takeProfits.length > 0 ? signal.takeProfits.join(", ") : "none";
  return `${signal.id} ${signal.symbol} ${signal.direction} @ ${entries} SL ${signal.stopLoss} TP ${targets} [${signal.status}]`;
}

function describePosition(position: OpenPosition): string {
  const { ticket } = position;
  return `${ticket.id} ${ticket.symbol} ${ticket.direction} ${ticket.kind} ${ticket.volume} @ ${ticket.openPrice} SL ${ticket.stopLoss ?? "-"}`;
}

function describeStats(stats: ChannelStats): string {
  return `${stats.channelId}: ${stats.totalPositions} positions, ${stats.closedPositions} closed, win rate ${stats.winRate}%, net ${stats.netProfit}`;
}

function describeResult(kind: Command["kind"], result: CommandResult): string {
  switch (result.status) {
    case "applied":
      return `${kind}: applied, status ${result.signal.status}`;
    case "ignored":
    case "failed":
      return `${kind}: ${result.status} (${result.reason})`;
    default:
      return assertNever(result);
  }
}

/**
 * Menu-driven operator front end. It renders the engine's read queries and
 * sends every change through the shared command dispatcher; invalid input
 * answers with an error line and leaves the session where it was.
 */
export class OperatorConsole {
  private readonly queries: ConsoleQueries;
  private readonly dispatch: CommandDispatcher;
  private readonly reports: ChannelReports;
  private readonly sessions: SessionContext;
  private readonly logger: Logger;
  private readonly idFactory: () => string;

  constructor(options: OperatorConsoleOptions) {
    this.queries = options.queries;
    this.dispatch = options.dispatch;
    this.reports = options.reports;
    this.sessions = options.sessions ?? new SessionContext();
    this.logger = options.logger ?? new NoopLogger();
    this.idFactory = options.idFactory ?? (() => crypto.randomUUID());
  }

  listActiveSignals(): Signal[] {
    return this.queries.listActiveSignals();
  }

  listOpenPositions(): OpenPosition[] {
    return this.queries.listOpenPositions();
  }

  signalHistory(limit?: number): Signal[] {
    return this.queries.signalHistory(limit);
  }

  stateOf(userId: string): SessionState {
    return this.sessions.get(userId);
  }

  async handle(userId: string, input: ConsoleInput): Promise<ConsoleView> {
    const state = this.sessions.get(userId);
    switch (input.type) {
      case "menu":
        return this.enter(userId, MAIN_MENU, this.menuLines());
      case "list":
        return this.enter(userId, MAIN_MENU, this.listLines());
      case "report":
        return this.enter(userId, MAIN_MENU, await this.reportLines());
      case "select":
        return this.select(userId, state, input.signalId);
      case "action":
        return this.action(userId, state, input.action);
      case "text":
        return this.text(userId, state, input.value);
      case "back":
        return this.back(userId, state);
      default:
        return assertNever(input);
    }
  }

  private enter(userId: string, state: SessionState, lines: readonly string[], result?: CommandResult): ConsoleView {
    this.sessions.set(userId, state);
    return { state, lines, result };
  }

  private reject(state: SessionState, error: string): ConsoleView {
    return { state, lines: [`Error: ${error}`], error };
  }

  private menuLines(): string[] {
    return ["Main menu", "list: active signals", "report: channel performance", "select <id>: open a signal"];
  }

  private async reportLines(): Promise<string[]> {
    const stats = await this.reports.compare();
    if (stats.length === 0) {
      return ["No filled positions yet"];
    }
    return ["Channel performance", ...stats.map(describeStats)];
  }

  private listLines(): string[] {
    const active = this.queries.listActiveSignals();
    if (active.length === 0) {
      return ["No active signals"];
    }
    const positions = this.queries.listOpenPositions();
    return [
      `Active signals (${active.length})`,
      ...active.map(describeSignal),
      `Open tickets (${positions.length})`,
      ...positions.map(describePosition),
    ];
  }

  private signalLines(signal: Signal): string[] {
    const tickets = signal.tickets
      .filter((ticket) => ticket.closedAt === undefined)
      .map((ticket) => `  ${ticket.id} ${ticket.kind} ${ticket.volume} @ ${ticket.openPrice} SL ${ticket.stopLoss ?? "-"}`);
    return [describeSignal(signal), ...tickets];
  }

  private select(userId: string, state: SessionState, signalId: string): ConsoleView {
    if (state.kind === "awaiting_value") {
      return this.reject(state, "finish or cancel the pending edit first");
    }
    const signal = this.queries.getSignal(signalId);
    if (!signal) {
      return this.reject(state, `unknown signal ${signalId}`);
    }
    return this.enter(userId, { kind: "viewing_signal", signalId }, this.signalLines(signal));
  }

  private async action(userId: string, state: SessionState, action: ConsoleAction): Promise<ConsoleView> {
    if (state.kind !== "viewing_signal") {
      return this.reject(state, "select a signal first");
    }
    const signal = this.queries.getSignal(state.signalId);
    if (!signal) {
      return this.reject(state, `unknown signal ${state.signalId}`);
    }

    switch (action) {
      case "editStopLoss":
        return this.enter(userId, { kind: "awaiting_value", signalId: signal.id, field: "stopLoss" }, [
          `Enter the new stop loss for ${signal.symbol}`,
        ]);
      case "editTakeProfits":
        return this.enter(userId, { kind: "awaiting_value", signalId: signal.id, field: "takeProfits" }, [
          `Enter the new take profits for ${signal.symbol}, separated by commas or spaces`,
        ]);
      case "delete":
      case "riskFree":
      case "halfClose":
      case "takeProfitNow":
        return this.issue(userId, signal.id, { kind: action });
      default:
        return assertNever(action);
    }
  }

  private async text(userId: string, state: SessionState, value: string): Promise<ConsoleView> {
    if (state.kind !== "awaiting_value") {
      return this.reject(state, "no value was requested");
    }
    const normalized = normalizeDigits(value.trim());
    if (state.field === "stopLoss") {
      const stopLoss = parseNumericToken(normalized);
      if (stopLoss === undefined || !(stopLoss > 0)) {
        return this.reject(state, `invalid stop loss: ${value}`);
      }
      return this.issue(userId, state.signalId, { kind: "edit", stopLoss });
    }

    const takeProfits = /^[\d.,\s/]+$/u.test(normalized) ? splitNumberList(normalized).filter((price) => price > 0) : [];
    if (takeProfits.length === 0) {
      return this.reject(state, `invalid take profits: ${value}`);
    }
    return this.issue(userId, state.signalId, { kind: "edit", takeProfits });
  }

  private back(userId: string, state: SessionState): ConsoleView {
    switch (state.kind) {
      case "awaiting_value": {
        const signal = this.queries.getSignal(state.signalId);
        if (!signal) {
          return this.enter(userId, MAIN_MENU, this.menuLines());
        }
        return this.enter(userId, { kind: "viewing_signal", signalId: signal.id }, this.signalLines(signal));
      }
      case "viewing_signal":
      case "main_menu":
        return this.enter(userId, MAIN_MENU, this.menuLines());
      default:
        return assertNever(state);
    }
  }

  private async issue(userId: string, signalId: string, intent: CommandIntent): Promise<ConsoleView> {
    const command: Command = {
      ...intent,
      targetSignalId: signalId,
      source: { channelId: "console", messageId: `${userId}:${this.idFactory()}` },
    };
    const result = await this.dispatch(command);
    this.logger.info("Console command", { userId, signalId, kind: command.kind, result: result.status });

    const signal = result.signal ?? this.queries.getSignal(signalId);
    const lines = [describeResult(command.kind, result), ...(signal ? this.signalLines(signal) : [])];
    return this.enter(userId, { kind: "viewing_signal", signalId }, lines, result);
  }
}
