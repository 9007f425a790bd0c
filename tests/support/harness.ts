import { ConfigManager, type EngineConfig } from "../../src/config/configManager.js";
import { EngineSettingsSchema, type EngineSettingsInput } from "../../src/config/schemas.js";
import { createEngineRuntime, type EngineRuntime } from "../../src/runtime/botRuntime.js";
import { QueueSource } from "../../src/sources/queueSource.js";
import { InMemoryEventJournal } from "../../src/storage/eventJournal.js";
import { EnvSecretStore } from "../../src/storage/secretStore.js";
import { InMemorySignalStore } from "../../src/storage/signalStore.js";
import { NoopLogger } from "../../src/telemetry/logger.js";
import type { NotificationEvent, Notifier } from "../../src/telemetry/notificationService.js";
import type { MessageRecord, Signal } from "../../src/trading/types.js";
import { PaperVenue, type PaperVenueOptions } from "../../src/venue/paperVenue.js";
import type { OrderParams, VenueTicket } from "../../src/venue/types.js";

export const BASE_TIME = Date.UTC(2024, 0, 2, 10, 0, 0);

export const TEST_SETTINGS: EngineSettingsInput = {
  sizing: { mode: "fixed", volume: 0.2 },
  trailingStop: { enabled: false, threshold: 0.002, step: 0.001 },
  profitSaving: { enabled: false },
  symbols: { aliases: { GOLD: "XAUUSD" } },
};

export function testSettings(overrides: Partial<EngineSettingsInput> = {}): EngineSettingsInput {
  return { ...TEST_SETTINGS, ...overrides };
}

/** Repository pattern and keyword tables with test settings; the process environment is ignored. */
export async function loadTestConfig(settings: EngineSettingsInput = TEST_SETTINGS): Promise<EngineConfig> {
  const manager = new ConfigManager(new EnvSecretStore("ENGINE_", {}), {});
  const config = await manager.load();
  return { ...config, settings: EngineSettingsSchema.parse(settings) };
}

export class RecordingNotifier implements Notifier {
  readonly events: NotificationEvent[] = [];

  async notify(event: NotificationEvent): Promise<void> {
    this.events.push(event);
  }
}

function gate(): { promise: Promise<void>; release: () => void } {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

/** Paper venue whose placements and listings can be held until the test releases them. */
export class ControlledVenue extends PaperVenue {
  /** Runs right after an order reached the venue, before the engine sees the result. */
  afterPlace?: () => void;
  private placeGate: Promise<void> = Promise.resolve();
  private listGate: Promise<void> = Promise.resolve();

  holdPlacements(): () => void {
    const held = gate();
    this.placeGate = held.promise;
    return held.release;
  }

  /** The listing is taken immediately; only its answer is held. */
  holdListings(): () => void {
    const held = gate();
    this.listGate = held.promise;
    return held.release;
  }

  override async placeOrder(params: OrderParams): Promise<VenueTicket> {
    await this.placeGate;
    const ticket = await super.placeOrder(params);
    this.afterPlace?.();
    return ticket;
  }

  override async listOpenTickets(): Promise<VenueTicket[]> {
    const tickets = await super.listOpenTickets();
    await this.listGate;
    return tickets;
  }
}

export interface Harness {
  readonly runtime: EngineRuntime;
  readonly store: InMemorySignalStore;
  readonly journal: InMemoryEventJournal;
  readonly paper: ControlledVenue;
  readonly notifier: RecordingNotifier;
  readonly queue: QueueSource;
  readonly clock: { now: number };
}

export interface HarnessOptions {
  readonly settings?: EngineSettingsInput;
  readonly paper?: PaperVenueOptions;
}

export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const config = await loadTestConfig(options.settings);
  const clock = { now: BASE_TIME };
  const store = new InMemorySignalStore();
  const journal = new InMemoryEventJournal();
  const paper = new ControlledVenue({ now: () => clock.now, ...options.paper });
  const notifier = new RecordingNotifier();
  const queue = new QueueSource({ channelId: "signals" });

  const runtime = await createEngineRuntime(config, {
    store,
    journal,
    venue: paper,
    notifier,
    logger: new NoopLogger(),
    providers: [queue],
    now: () => clock.now,
    sleep: async () => undefined,
  });
  await queue.start((record) => runtime.pipeline.handle(record));

  return { runtime, store, journal, paper, notifier, queue, clock };
}

export function message(messageId: string, text: string, extra: Partial<MessageRecord> = {}): MessageRecord {
  return { channelId: "signals", messageId, text, edited: false, ...extra };
}

export function reply(messageId: string, replyToMessageId: string, text: string): MessageRecord {
  return message(messageId, text, { replyToMessageId });
}

export function buildSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    id: "sig-1",
    symbol: "XAUUSD",
    rawSymbol: "XAUUSD",
    direction: "buy",
    entryPrices: [2000],
    stopLoss: 1990,
    takeProfits: [2010, 2020],
    source: { channelId: "signals", messageId: "1" },
    status: "pending",
    tickets: [],
    history: [],
    createdAt: BASE_TIME,
    updatedAt: BASE_TIME,
    ...overrides,
  };
}
