import type { IngestOutcome } from "../trading/ingestionPipeline.js";
import type { MessageRecord } from "../trading/types.js";

export type MessageHandler = (record: MessageRecord) => Promise<IngestOutcome>;

/**
 * Delivers channel messages to a handler in arrival order. A source only
 * treats a message as consumed once the handler resolves; a rejection leaves
 * it for redelivery.
 */
export interface MessageSource {
  readonly name: string;
  start(handler: MessageHandler): Promise<void>;
  stop(): Promise<void>;
}
