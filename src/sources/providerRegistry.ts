import { z } from "zod";

import { DEFAULT_SOURCE_HTTP, type HttpClientConfig } from "../config/configManager.js";
import type { ProviderEntry } from "../config/schemas.js";
import type { Logger } from "../telemetry/logger.js";
import { HttpPollingSource } from "./httpPollingSource.js";
import { QueueSource } from "./queueSource.js";
import type { MessageSource } from "./types.js";

export interface ProviderContext {
  readonly logger: Logger;
  readonly apiKey?: string;
}

type ProviderFactory = (options: Record<string, unknown>, context: ProviderContext) => MessageSource;

const QueueOptionsSchema = z.object({
  channelId: z.string().min(1).optional(),
});

const HttpPollOptionsSchema = z.object({
  baseUrl: z.string().url(),
  channelId: z.string().min(1).optional(),
  pollIntervalMs: z.number().int().positive().optional(),
  batchSize: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
  rateLimitPerSecond: z.number().nonnegative().optional(),
});

/** Every provider the process can run. Adding one means adding an entry here. */
const PROVIDERS = {
  queue: (options) => {
    const parsed = QueueOptionsSchema.parse(options);
    return new QueueSource({ name: "queue", channelId: parsed.channelId });
  },
  "http-poll": (options, context) => {
    const parsed = HttpPollOptionsSchema.parse(options);
    const http: HttpClientConfig = {
      ...DEFAULT_SOURCE_HTTP,
      baseUrl: parsed.baseUrl,
      timeoutMs: parsed.timeoutMs ?? DEFAULT_SOURCE_HTTP.timeoutMs,
      rateLimitPerSecond: parsed.rateLimitPerSecond ?? DEFAULT_SOURCE_HTTP.rateLimitPerSecond,
    };
    return new HttpPollingSource({
      name: "http-poll",
      http,
      apiKey: context.apiKey,
      channelId: parsed.channelId,
      pollIntervalMs: parsed.pollIntervalMs,
      batchSize: parsed.batchSize,
      logger: context.logger,
    });
  },
} satisfies Record<string, ProviderFactory>;

export type ProviderName = keyof typeof PROVIDERS;

export class UnknownProviderError extends Error {
  constructor(readonly provider: string) {
    super(`Unknown message provider: ${provider}`);
    this.name = "UnknownProviderError";
  }
}

export function providerNames(): ProviderName[] {
  return Object.keys(PROVIDERS).filter(isProviderName);
}

function isProviderName(name: string): name is ProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, name);
}

export function createProvider(entry: ProviderEntry, context: ProviderContext): MessageSource {
  if (!isProviderName(entry.name)) {
    throw new UnknownProviderError(entry.name);
  }
  return PROVIDERS[entry.name](entry.options, context);
}

export function createProviders(entries: readonly ProviderEntry[], context: ProviderContext): MessageSource[] {
  return entries.map((entry) => createProvider(entry, context));
}
