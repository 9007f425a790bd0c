import type { IngestOutcome } from "../trading/ingestionPipeline.js";
import type { MessageRecord } from "../trading/types.js";
import type { MessageHandler, MessageSource } from "./types.js";

export interface QueueSourceOptions {
  readonly name?: string;
  /** Channel assigned to pushed records that carry none. */
  readonly channelId?: string;
}

export type QueuedMessage = Omit<MessageRecord, "channelId" | "edited"> & {
  readonly channelId?: string;
  readonly edited?: boolean;
};

export class SourceNotStartedError extends Error {
  constructor(readonly source: string) {
    super(`Message source ${source} is not started`);
    this.name = "SourceNotStartedError";
  }
}

/** In-process push source. Pushed records reach the handler one at a time, in push order. */
export class QueueSource implements MessageSource {
  readonly name: string;
  private readonly channelId: string;
  private handler?: MessageHandler;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: QueueSourceOptions = {}) {
    this.name = options.name ?? "queue";
    this.channelId = options.channelId ?? "queue";
  }

  async start(handler: MessageHandler): Promise<void> {
    this.handler = handler;
  }

  async stop(): Promise<void> {
    this.handler = undefined;
    await this.tail;
  }

  get started(): boolean {
    return this.handler !== undefined;
  }

  push(message: QueuedMessage): Promise<IngestOutcome> {
    const handler = this.handler;
    if (!handler) {
      return Promise.reject(new SourceNotStartedError(this.name));
    }
    const record: MessageRecord = {
      ...message,
      channelId: message.channelId ?? this.channelId,
      edited: message.edited ?? false,
    };
    const result = this.tail.then(() => handler(record));
    this.tail = result.catch(() => undefined);
    return result;
  }
}
