import { z } from "zod";

import type { HttpClientConfig } from "../config/configManager.js";
import type { Sleep } from "../runtime/backoff.js";
import { describeError, NoopLogger, type Logger } from "../telemetry/logger.js";
import type { MessageRecord } from "../trading/types.js";
import { RetryingHttpClient, type FetchLike } from "./retryingHttpClient.js";
import type { MessageHandler, MessageSource } from "./types.js";

const RemoteMessageSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  channelId: z.string().min(1).optional(),
  text: z.string(),
  replyTo: z.union([z.string().min(1), z.number().int()]).transform(String).nullish(),
  edited: z.boolean().optional(),
});

const MessageBatchSchema = z.object({
  messages: z.array(RemoteMessageSchema),
});

export type RemoteMessage = z.infer<typeof RemoteMessageSchema>;

export interface HttpPollingSourceOptions {
  readonly name?: string;
  readonly http: HttpClientConfig;
  readonly apiKey?: string;
  readonly channelId?: string;
  readonly pollIntervalMs?: number;
  readonly batchSize?: number;
  readonly logger?: Logger;
  readonly fetchImpl?: FetchLike;
  readonly sleep?: Sleep;
}

function buildAuthHeaders(apiKey?: string): Record<string, string> {
  if (!apiKey) {
    return {};
  }
  return { Authorization: `Bearer ${apiKey}` };
}

/**
 * Polls `GET messages?since=<last id>` and acknowledges, through
 * `POST messages/ack`, every message the handler accepted. A handler failure
 * ends the batch; the cursor stays on the last accepted message so the rest is
 * fetched again on the next poll.
 */
export class HttpPollingSource implements MessageSource {
  readonly name: string;
  private readonly http: RetryingHttpClient;
  private readonly apiKey?: string;
  private readonly channelId: string;
  private readonly pollIntervalMs: number;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private handler?: MessageHandler;
  private timer?: NodeJS.Timeout;
  private polling?: Promise<number>;
  private cursor?: string;

  constructor(options: HttpPollingSourceOptions) {
    this.name = options.name ?? "http-poll";
    this.logger = options.logger ?? new NoopLogger();
    this.http = new RetryingHttpClient({
      http: options.http,
      logger: this.logger,
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
    });
    this.apiKey = options.apiKey;
    this.channelId = options.channelId ?? "remote";
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.batchSize = options.batchSize ?? 50;
  }

  get lastCursor(): string | undefined {
    return this.cursor;
  }

  async start(handler: MessageHandler): Promise<void> {
    this.handler = handler;
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.handler = undefined;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.polling) {
      await this.polling.catch(() => 0);
    }
  }

  /** Fetches and delivers one batch. Resolves with the number of messages acknowledged. */
  async pollOnce(handler: MessageHandler | undefined = this.handler): Promise<number> {
    if (!handler) {
      return 0;
    }
    const payload = await this.http.get("messages", {
      searchParams: { since: this.cursor, limit: this.batchSize },
      headers: buildAuthHeaders(this.apiKey),
    });
    const batch = MessageBatchSchema.parse(payload);

    const delivered: string[] = [];
    for (const message of batch.messages) {
      try {
        await handler(this.toRecord(message));
      } catch (error) {
        this.logger.warn("Message delivery failed; batch stopped", {
          source: this.name,
          messageId: message.id,
          error: describeError(error),
        });
        break;
      }
      delivered.push(message.id);
      this.cursor = message.id;
    }

    if (delivered.length > 0) {
      await this.http.post("messages/ack", {
        headers: { "Content-Type": "application/json", ...buildAuthHeaders(this.apiKey) },
        body: JSON.stringify({ ids: delivered }),
      });
    }
    return delivered.length;
  }

  private toRecord(message: RemoteMessage): MessageRecord {
    return {
      channelId: message.channelId ?? this.channelId,
      messageId: message.id,
      replyToMessageId: message.replyTo ?? undefined,
      text: message.text,
      edited: message.edited ?? false,
    };
  }

  private schedule(delayMs: number): void {
    if (!this.handler) {
      return;
    }
    this.timer = setTimeout(() => {
      this.polling = this.pollOnce();
      void this.polling
        .catch((error) => {
          this.logger.error("Polling failed", { source: this.name, error: describeError(error) });
          return 0;
        })
        .finally(() => {
          this.polling = undefined;
          this.schedule(this.pollIntervalMs);
        });
    }, delayMs);
    this.timer.unref();
  }
}
