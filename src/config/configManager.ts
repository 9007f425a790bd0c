import fs from "node:fs/promises";
import path from "node:path";

import type { z } from "zod";

import { projectRoot } from "../storage/dataPaths.js";
import { defaultSecretStore, type SecretStore } from "../storage/secretStore.js";
import {
  EngineSettingsSchema,
  KeywordTableSchema,
  PatternTableSchema,
  type EngineSettings,
  type KeywordTableConfig,
  type PatternTableConfig,
} from "./schemas.js";

export interface RetryPolicyConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
}

export interface HttpClientConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly rateLimitPerSecond: number;
  readonly retry: RetryPolicyConfig;
}

export interface VenueCallConfig {
  readonly timeoutMs: number;
  readonly retry: RetryPolicyConfig;
}

export interface EngineEnvironment {
  readonly settingsPath: string;
  readonly patternsPath: string;
  readonly keywordsPath: string;
  readonly venue: VenueCallConfig;
  readonly monitorIntervalMs?: number;
  readonly port: number;
  readonly notificationWebhookUrl?: string;
  readonly sourceApiKey?: string;
}

export interface EngineConfig {
  readonly environment: EngineEnvironment;
  readonly settings: EngineSettings;
  readonly patterns: PatternTableConfig;
  readonly keywords: KeywordTableConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  const parsed = parseNumber(value, Number.NaN);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function buildRetryPolicy(
  env: NodeJS.ProcessEnv,
  prefix: string,
  defaults: RetryPolicyConfig,
): RetryPolicyConfig {
  return {
    maxAttempts: Math.floor(parseNumber(env[`${prefix}_RETRY_MAX_ATTEMPTS`], defaults.maxAttempts)),
    initialDelayMs: parseNumber(env[`${prefix}_RETRY_INITIAL_DELAY_MS`], defaults.initialDelayMs),
    backoffMultiplier: parseNumber(env[`${prefix}_RETRY_BACKOFF_MULTIPLIER`], defaults.backoffMultiplier),
    maxDelayMs: parseNumber(env[`${prefix}_RETRY_MAX_DELAY_MS`], defaults.maxDelayMs),
  };
}

export const DEFAULT_VENUE_CALLS: VenueCallConfig = {
  timeoutMs: 10_000,
  retry: {
    maxAttempts: 4,
    initialDelayMs: 400,
    backoffMultiplier: 2,
    maxDelayMs: 6_000,
  },
};

export const DEFAULT_SOURCE_HTTP: HttpClientConfig = {
  baseUrl: "http://127.0.0.1:8080/",
  timeoutMs: 5_000,
  rateLimitPerSecond: 4,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 250,
    backoffMultiplier: 2,
    maxDelayMs: 4_000,
  },
};

function defaultConfigFile(fileName: string): string {
  return path.join(projectRoot(), "config", fileName);
}

export async function readJsonDocument<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.infer<S>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, { encoding: "utf8" });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read ${filePath}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${filePath}: ${message}`);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${filePath}: ${issues}`);
  }
  return result.data;
}

export class ConfigManager {
  constructor(
    private readonly secretStore: SecretStore = defaultSecretStore,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  getEnvironment(): EngineEnvironment {
    const env = this.env;
    return {
      settingsPath: env.ENGINE_SETTINGS_PATH?.trim() || defaultConfigFile("settings.json"),
      patternsPath: env.ENGINE_PATTERNS_PATH?.trim() || defaultConfigFile("patterns.json"),
      keywordsPath: env.ENGINE_KEYWORDS_PATH?.trim() || defaultConfigFile("keywords.json"),
      venue: {
        timeoutMs: parseNumber(env.VENUE_TIMEOUT_MS, DEFAULT_VENUE_CALLS.timeoutMs),
        retry: buildRetryPolicy(env, "VENUE", DEFAULT_VENUE_CALLS.retry),
      },
      monitorIntervalMs: parseOptionalNumber(env.MONITOR_INTERVAL_MS),
      port: Math.floor(parseNumber(env.PORT, 3000)),
      notificationWebhookUrl: env.NOTIFICATION_WEBHOOK_URL?.trim() || undefined,
      sourceApiKey: this.secretStore.getSecret("SOURCE_POLL_API_KEY"),
    };
  }

  async loadSettings(filePath = this.getEnvironment().settingsPath): Promise<EngineSettings> {
    return readJsonDocument(filePath, EngineSettingsSchema);
  }

  async loadPatterns(filePath = this.getEnvironment().patternsPath): Promise<PatternTableConfig> {
    return readJsonDocument(filePath, PatternTableSchema);
  }

  async loadKeywords(filePath = this.getEnvironment().keywordsPath): Promise<KeywordTableConfig> {
    return readJsonDocument(filePath, KeywordTableSchema);
  }

  async load(): Promise<EngineConfig> {
    const environment = this.getEnvironment();
    const [settings, patterns, keywords] = await Promise.all([
      this.loadSettings(environment.settingsPath),
      this.loadPatterns(environment.patternsPath),
      this.loadKeywords(environment.keywordsPath),
    ]);
    const monitorIntervalMs = environment.monitorIntervalMs;
    return {
      environment,
      settings: monitorIntervalMs ? { ...settings, monitor: { intervalMs: monitorIntervalMs } } : settings,
      patterns,
      keywords,
    };
  }
}

export const defaultConfigManager = new ConfigManager();
