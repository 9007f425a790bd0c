import crypto from "node:crypto";

import type { SignalFilters } from "../config/schemas.js";
import type { SignalStore } from "../storage/signalStore.js";
import { describeError, NoopLogger, type Logger } from "../telemetry/logger.js";
import type { CommandClassifier } from "./commandClassifier.js";
import { describeRejectReason, StoreUnavailableError, UnresolvedCommandTargetError } from "./errors.js";
import { KeyedSerializer } from "./keyedSerializer.js";
import type { CommandResult, LifecycleEngine } from "./lifecycleEngine.js";
import { channelAllowed, evaluateSignalFilters } from "./signalFilters.js";
import type { SignalParser } from "./signalParser.js";
import { messageKey, type Command, type CommandKind, type MessageRecord } from "./types.js";

export type IngestOutcome =
  | { readonly kind: "signal_created"; readonly signalId: string }
  | { readonly kind: "command_queued"; readonly signalId: string; readonly command: CommandKind }
  | { readonly kind: "duplicate" }
  | { readonly kind: "ignored"; readonly reason: string }
  | { readonly kind: "unresolved_target"; readonly replyToMessageId?: string };

export interface IngestionPipelineOptions {
  readonly parser: SignalParser;
  readonly classifier: CommandClassifier;
  readonly engine: LifecycleEngine;
  readonly store: SignalStore;
  readonly filters?: SignalFilters;
  readonly logger?: Logger;
  readonly now?: () => number;
}

const OPEN_FILTERS: SignalFilters = {
  channels: { allow: [], deny: [] },
  symbols: { allow: [], deny: [] },
};

function editKey(record: MessageRecord): string {
  const digest = crypto.createHash("sha1").update(record.text).digest("hex");
  return `${messageKey(record)}:edit:${digest}`;
}

/**
 * Routes every delivered message: replies become commands for the signal they
 * answer, edits of a signal message become edit commands, anything else is
 * parsed as a new signal. Each message key is handled at most once, and
 * deliveries of the same key from several sources are handled one at a time.
 *
 * A {@link StoreUnavailableError} halts the pipeline, whether it came from this
 * call or from a background write of the engine; later calls ping the store
 * first and keep rejecting until it answers again, so sources never
 * acknowledge a message that was not recorded.
 */
export class IngestionPipeline {
  private readonly parser: SignalParser;
  private readonly classifier: CommandClassifier;
  private readonly engine: LifecycleEngine;
  private readonly store: SignalStore;
  private readonly filters: SignalFilters;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly inFlight = new KeyedSerializer();
  private haltedBy?: StoreUnavailableError;

  constructor(options: IngestionPipelineOptions) {
    this.parser = options.parser;
    this.classifier = options.classifier;
    this.engine = options.engine;
    this.store = options.store;
    this.filters = options.filters ?? OPEN_FILTERS;
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? Date.now;
    this.engine.onStoreFailure((error) => this.halt(error));
  }

  get halted(): boolean {
    return this.haltedBy !== undefined;
  }

  async handle(record: MessageRecord): Promise<IngestOutcome> {
    return this.inFlight.run(messageKey(record), () => this.guard(() => this.route(record)));
  }

  /**
   * Shared command path for replies and operator commands. Resolves with the
   * engine's result once the command has been applied.
   */
  async dispatchCommand(command: Command): Promise<CommandResult> {
    const key = messageKey(command.source);
    return this.inFlight.run(key, () =>
      this.guard(async () => {
        if (this.store.hasProcessed(key)) {
          return { status: "ignored", reason: "duplicate" };
        }
        await this.store.markProcessed(key);
        return this.engine.submitCommand(command);
      }),
    );
  }

  private async guard<T>(task: () => Promise<T>): Promise<T> {
    if (this.haltedBy) {
      await this.checkStore();
    }
    try {
      return await task();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        this.halt(error);
      }
      throw error;
    }
  }

  private halt(error: StoreUnavailableError): void {
    if (this.haltedBy) {
      return;
    }
    this.haltedBy = error;
    this.logger.error("Store unavailable; ingestion halted", { error: error.message });
  }

  private async checkStore(): Promise<void> {
    try {
      await this.store.ping();
    } catch (error) {
      throw error instanceof StoreUnavailableError ? error : new StoreUnavailableError(error);
    }
    this.logger.info("Store reachable again; ingestion resumed");
    this.haltedBy = undefined;
  }

  private async route(record: MessageRecord): Promise<IngestOutcome> {
    if (record.replyToMessageId) {
      return this.routeReply(record, record.replyToMessageId);
    }
    if (record.edited) {
      const edited = await this.routeEdit(record);
      if (edited) {
        return edited;
      }
    }
    return this.routeNewSignal(record);
  }

  private async routeReply(record: MessageRecord, replyToMessageId: string): Promise<IngestOutcome> {
    const key = messageKey(record);
    if (this.store.hasProcessed(key)) {
      return { kind: "duplicate" };
    }

    const classified = this.classifier.classify(record.text);
    if (classified.kind === "not_a_command") {
      this.logger.info("Reply is not a command", { key, reason: classified.reason });
      return { kind: "ignored", reason: classified.reason };
    }

    const target = this.store.findBySource({ channelId: record.channelId, messageId: replyToMessageId });
    if (!target) {
      const error = new UnresolvedCommandTargetError(record.channelId, replyToMessageId);
      this.logger.info("Command discarded", { key, command: classified.command.kind, error: error.message });
      return { kind: "unresolved_target", replyToMessageId };
    }

    await this.store.markProcessed(key);
    this.enqueue({
      ...classified.command,
      targetSignalId: target.id,
      source: { channelId: record.channelId, messageId: record.messageId },
    });
    return { kind: "command_queued", signalId: target.id, command: classified.command.kind };
  }

  private async routeEdit(record: MessageRecord): Promise<IngestOutcome | undefined> {
    const existing = this.store.findBySource(record);
    if (!existing) {
      return undefined;
    }
    const key = editKey(record);
    if (this.store.hasProcessed(key)) {
      return { kind: "duplicate" };
    }

    const outcome = this.parser.parse(record.text);
    if (outcome.kind === "rejected") {
      const reason = describeRejectReason(outcome.reason);
      this.logger.info("Edited signal rejected", { key: messageKey(record), reason });
      return { kind: "ignored", reason };
    }

    await this.store.markProcessed(key);
    this.enqueue({
      kind: "edit",
      stopLoss: outcome.signal.stopLoss,
      takeProfits: outcome.signal.takeProfits,
      targetSignalId: existing.id,
      source: { channelId: record.channelId, messageId: key },
    });
    return { kind: "command_queued", signalId: existing.id, command: "edit" };
  }

  private async routeNewSignal(record: MessageRecord): Promise<IngestOutcome> {
    const key = messageKey(record);
    if (this.store.hasProcessed(key) || this.store.findBySource(record)) {
      return { kind: "duplicate" };
    }
    if (!channelAllowed(this.filters, record.channelId)) {
      return { kind: "ignored", reason: "channel_filtered" };
    }

    const outcome = this.parser.parse(record.text);
    if (outcome.kind === "rejected") {
      const reason = describeRejectReason(outcome.reason);
      this.logger.info("Message is not a signal", { key, reason });
      return { kind: "ignored", reason };
    }

    const verdict = evaluateSignalFilters(this.filters, {
      channelId: record.channelId,
      symbol: outcome.signal.symbol,
      at: new Date(this.now()),
    });
    if (!verdict.allowed) {
      this.logger.info("Signal filtered", { key, symbol: outcome.signal.symbol, reason: verdict.reason });
      return { kind: "ignored", reason: verdict.reason };
    }

    const signal = await this.engine.submitSignal(outcome.signal, {
      channelId: record.channelId,
      messageId: record.messageId,
    });
    await this.store.markProcessed(key);
    return { kind: "signal_created", signalId: signal.id };
  }

  private enqueue(command: Command): void {
    void this.engine
      .submitCommand(command)
      .then((result) => {
        this.logger.info("Command processed", {
          signalId: command.targetSignalId,
          kind: command.kind,
          result: result.status,
          reason: result.status === "applied" ? undefined : result.reason,
        });
      })
      .catch((error) => {
        this.logger.error("Command failed", {
          signalId: command.targetSignalId,
          kind: command.kind,
          error: describeError(error),
        });
      });
  }
}
