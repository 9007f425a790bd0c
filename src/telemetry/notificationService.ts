import type { SizingRejectionKind } from "../trading/errors.js";
import type { Signal } from "../trading/types.js";
import { ConsoleLogger, describeError, type Logger } from "./logger.js";

export type NotificationEvent =
  | {
      readonly type: "signal_error";
      readonly signal: Signal;
      readonly message: string;
    }
  | {
      readonly type: "sizing_rejected";
      readonly signal: Signal;
      readonly kind: SizingRejectionKind;
      readonly message: string;
    };

export interface Notifier {
  notify(event: NotificationEvent): Promise<void>;
}

export interface NotificationServiceOptions {
  readonly webhookUrl?: string;
  readonly emitToLog?: boolean;
  readonly timeoutMs?: number;
  readonly logger?: Logger;
  readonly fetchImpl?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 5_000;

/** Delivers operator-facing alerts to a webhook; delivery problems are only logged. */
export class NotificationService implements Notifier {
  private readonly webhookUrl?: string;
  private readonly emitToLog: boolean;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options?: NotificationServiceOptions) {
    this.webhookUrl = options?.webhookUrl;
    this.emitToLog = options?.emitToLog ?? true;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options?.logger ?? new ConsoleLogger("notify");
    this.fetchImpl = options?.fetchImpl ?? fetch;
  }

  async notify(event: NotificationEvent): Promise<void> {
    if (this.emitToLog) {
      this.log(event);
    }
    if (!this.webhookUrl) {
      return;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    timeout.unref();

    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          event: event.type,
          timestamp: Date.now(),
          signal: {
            id: event.signal.id,
            symbol: event.signal.symbol,
            direction: event.signal.direction,
            status: event.signal.status,
            source: event.signal.source,
          },
          kind: event.type === "sizing_rejected" ? event.kind : undefined,
          message: event.message,
        }),
        signal: controller.signal,
      });
      if (!response.ok) {
        this.logger.warn("Webhook responded with an error status", { status: response.status });
      }
    } catch (error) {
      this.logger.warn("Failed to deliver webhook notification", { error: describeError(error) });
    } finally {
      clearTimeout(timeout);
    }
  }

  private log(event: NotificationEvent): void {
    const label = event.type === "sizing_rejected" ? "Sizing rejected signal" : "Signal moved to error";
    this.logger.error(label, {
      signalId: event.signal.id,
      symbol: event.signal.symbol,
      direction: event.signal.direction,
      kind: event.type === "sizing_rejected" ? event.kind : undefined,
      message: event.message,
    });
  }
}
