import fs from "node:fs/promises";

import { StoreUnavailableError } from "../trading/errors.js";
import { messageKey, type MessageRef, type Signal } from "../trading/types.js";
import { ensureDataDir, resolveDataFile } from "./dataPaths.js";
import { SignalStoreDocumentSchema, type SignalStoreDocument } from "./signalSchema.js";

/**
 * Persistence for signals and processed message keys. Reads are served from an
 * in-memory snapshot and never wait on writers; writes resolve only once the
 * change is durable, and reject with {@link StoreUnavailableError} otherwise.
 */
export interface SignalStore {
  getSignal(id: string): Signal | undefined;
  findBySource(ref: MessageRef): Signal | undefined;
  listSignals(): readonly Signal[];
  saveSignal(signal: Signal): Promise<void>;
  hasProcessed(key: string): boolean;
  markProcessed(key: string): Promise<void>;
  /** Resolves when the store accepts writes again. */
  ping(): Promise<void>;
}

abstract class SnapshotSignalStore implements SignalStore {
  protected readonly signals = new Map<string, Signal>();
  protected readonly bySource = new Map<string, string>();
  protected readonly processed = new Set<string>();

  getSignal(id: string): Signal | undefined {
    return this.signals.get(id);
  }

  findBySource(ref: MessageRef): Signal | undefined {
    const id = this.bySource.get(messageKey(ref));
    return id ? this.signals.get(id) : undefined;
  }

  listSignals(): readonly Signal[] {
    return [...this.signals.values()];
  }

  hasProcessed(key: string): boolean {
    return this.processed.has(key);
  }

  /** A write that fails to persist is rolled back, so the snapshot never runs ahead of durable state. */
  async saveSignal(signal: Signal): Promise<void> {
    const previous = this.signals.get(signal.id);
    const sourceKey = messageKey(signal.source);
    this.signals.set(signal.id, signal);
    this.bySource.set(sourceKey, signal.id);
    try {
      await this.persist();
    } catch (error) {
      if (previous) {
        this.signals.set(signal.id, previous);
      } else {
        this.signals.delete(signal.id);
        this.bySource.delete(sourceKey);
      }
      throw error;
    }
  }

  async markProcessed(key: string): Promise<void> {
    const known = this.processed.has(key);
    this.processed.add(key);
    try {
      await this.persist();
    } catch (error) {
      if (!known) {
        this.processed.delete(key);
      }
      throw error;
    }
  }

  abstract ping(): Promise<void>;

  protected abstract persist(): Promise<void>;

  protected hydrate(document: SignalStoreDocument): void {
    for (const signal of document.signals) {
      this.signals.set(signal.id, signal);
      this.bySource.set(messageKey(signal.source), signal.id);
    }
    for (const key of document.processedMessages) {
      this.processed.add(key);
    }
  }

  protected toDocument(): SignalStoreDocument {
    return {
      signals: [...this.signals.values()].map((signal) => ({
        ...signal,
        entryPrices: [...signal.entryPrices],
        takeProfits: [...signal.takeProfits],
        tickets: signal.tickets.map((ticket) => ({
          ...ticket,
          consumedProfitSteps: [...ticket.consumedProfitSteps],
        })),
        history: [...signal.history],
      })),
      processedMessages: [...this.processed],
    };
  }
}

export class InMemorySignalStore extends SnapshotSignalStore {
  private available = true;

  /** Simulates an outage of the backing storage. */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  async ping(): Promise<void> {
    if (!this.available) {
      throw new StoreUnavailableError();
    }
  }

  protected async persist(): Promise<void> {
    await this.ping();
  }
}

const SIGNAL_STORE_FILE = "signals.json";

export class JsonFileSignalStore extends SnapshotSignalStore {
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(private readonly fileName: string) {
    super();
  }

  static async open(fileName = SIGNAL_STORE_FILE): Promise<JsonFileSignalStore> {
    const store = new JsonFileSignalStore(fileName);
    await store.load();
    return store;
  }

  async ping(): Promise<void> {
    try {
      const dir = await ensureDataDir();
      await fs.access(dir, fs.constants.W_OK);
    } catch (error) {
      throw new StoreUnavailableError(error);
    }
  }

  protected persist(): Promise<void> {
    const write = this.writeChain.then(() => this.writeDocument());
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(resolveDataFile(this.fileName), { encoding: "utf8" });
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return;
      }
      throw new StoreUnavailableError(error);
    }
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new StoreUnavailableError(error);
    }
    const parsed = SignalStoreDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreUnavailableError(new Error(`Corrupt ${this.fileName}: ${parsed.error.message}`));
    }
    this.hydrate(parsed.data);
  }

  private async writeDocument(): Promise<void> {
    try {
      await ensureDataDir();
      const filePath = resolveDataFile(this.fileName);
      const tempPath = `${filePath}.tmp`;
      await fs.writeFile(tempPath, JSON.stringify(this.toDocument(), null, 2), { encoding: "utf8" });
      await fs.rename(tempPath, filePath);
    } catch (error) {
      throw new StoreUnavailableError(error);
    }
  }
}
