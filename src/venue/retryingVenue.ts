import type { VenueCallConfig } from "../config/configManager.js";
import { computeDelay, sleep as defaultSleep, withTimeout, type Sleep } from "../runtime/backoff.js";
import { VenueCallFailedError } from "../trading/errors.js";
import { describeError, NoopLogger, type Logger } from "../telemetry/logger.js";
import type {
  AccountState,
  ClosedVenueTicket,
  ExecutionVenue,
  InstrumentInfo,
  OrderParams,
  VenueOperation,
  VenueTicket,
} from "./types.js";

export interface RetryingVenueOptions {
  readonly venue: ExecutionVenue;
  readonly calls: VenueCallConfig;
  readonly logger?: Logger;
  readonly sleep?: Sleep;
  readonly random?: () => number;
}

/**
 * Wraps a venue so that every call carries a timeout and is retried with
 * exponential backoff. A timed-out call counts as failed, never as an unknown
 * success. Once attempts are exhausted the caller gets a
 * {@link VenueCallFailedError}.
 */
export class RetryingVenue implements ExecutionVenue {
  private readonly venue: ExecutionVenue;
  private readonly calls: VenueCallConfig;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(options: RetryingVenueOptions) {
    this.venue = options.venue;
    this.calls = options.calls;
    this.logger = options.logger ?? new NoopLogger();
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  placeOrder(params: OrderParams): Promise<VenueTicket> {
    return this.call("placeOrder", () => this.venue.placeOrder(params));
  }

  modify(ticketId: string, stopLoss?: number, takeProfit?: number): Promise<void> {
    return this.call("modify", () => this.venue.modify(ticketId, stopLoss, takeProfit));
  }

  closePartial(ticketId: string, volume: number): Promise<void> {
    return this.call("closePartial", () => this.venue.closePartial(ticketId, volume));
  }

  cancelOrder(ticketId: string): Promise<void> {
    return this.call("cancelOrder", () => this.venue.cancelOrder(ticketId));
  }

  listOpenTickets(): Promise<VenueTicket[]> {
    return this.call("listOpenTickets", () => this.venue.listOpenTickets());
  }

  closedTickets(): Promise<ClosedVenueTicket[]> {
    return this.call("closedTickets", () => this.venue.closedTickets());
  }

  accountState(): Promise<AccountState> {
    return this.call("accountState", () => this.venue.accountState());
  }

  instrumentInfo(symbol: string): Promise<InstrumentInfo> {
    return this.call("instrumentInfo", () => this.venue.instrumentInfo(symbol));
  }

  private async call<T>(operation: VenueOperation, task: () => Promise<T>): Promise<T> {
    const { maxAttempts } = this.calls.retry;
    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await withTimeout(task(), this.calls.timeoutMs);
      } catch (error) {
        lastError = error;
        if (attempt >= maxAttempts) {
          break;
        }
        const delay = computeDelay(attempt, this.calls.retry, this.random);
        this.logger.warn("Venue call retry", { operation, attempt, delay, error: describeError(error) });
        await this.sleep(delay);
      }
    }
    this.logger.error("Venue call exhausted retries", {
      operation,
      attempts: maxAttempts,
      error: describeError(lastError),
    });
    throw new VenueCallFailedError(operation, maxAttempts, lastError);
  }
}
