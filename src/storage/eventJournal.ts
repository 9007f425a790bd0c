import crypto from "node:crypto";

import { z } from "zod";

import type { SignalEvent, SignalEventType, SignalStatus } from "../trading/types.js";
import { SignalEventSchema } from "./signalSchema.js";
import { appendNdjsonRecord, readNdjsonRecords } from "./ndjsonStore.js";

const SIGNAL_EVENTS_FILE = "signal-events.ndjson";

export interface JournalEntry {
  readonly id: string;
  readonly signalId: string;
  readonly symbol: string;
  readonly at: number;
  readonly type: SignalEventType;
  readonly status: SignalStatus;
  readonly ticketId?: string;
  readonly detail?: Record<string, unknown>;
}

const JournalEntrySchema = SignalEventSchema.extend({
  id: z.string(),
  signalId: z.string(),
  symbol: z.string(),
});

/** Append-only audit trail of signal transitions. */
export interface EventJournal {
  append(signalId: string, symbol: string, event: SignalEvent): Promise<JournalEntry>;
  recent(limit?: number): Promise<JournalEntry[]>;
}

export class NdjsonEventJournal implements EventJournal {
  constructor(private readonly fileName = SIGNAL_EVENTS_FILE) {}

  async append(signalId: string, symbol: string, event: SignalEvent): Promise<JournalEntry> {
    const entry: JournalEntry = {
      id: crypto.randomUUID(),
      signalId,
      symbol,
      ...event,
    };
    await appendNdjsonRecord({ fileName: this.fileName, record: entry });
    return entry;
  }

  async recent(limit?: number): Promise<JournalEntry[]> {
    return readNdjsonRecords({
      fileName: this.fileName,
      limit,
      mapper: (item) => {
        const parsed = JournalEntrySchema.safeParse(item);
        return parsed.success ? parsed.data : undefined;
      },
    });
  }
}

export class InMemoryEventJournal implements EventJournal {
  private readonly entries: JournalEntry[] = [];

  async append(signalId: string, symbol: string, event: SignalEvent): Promise<JournalEntry> {
    const entry: JournalEntry = { id: crypto.randomUUID(), signalId, symbol, ...event };
    this.entries.push(entry);
    return entry;
  }

  async recent(limit?: number): Promise<JournalEntry[]> {
    const newestFirst = [...this.entries].reverse();
    return limit === undefined ? newestFirst : newestFirst.slice(0, limit);
  }
}
