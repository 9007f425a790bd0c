import type { EngineConfig } from "../config/configManager.js";
import { OperatorConsole } from "../console/operatorConsole.js";
import { PositionMonitor } from "../monitor/positionMonitor.js";
import { ChannelReporter } from "../report/channelReport.js";
import { SizingCalculator } from "../risk/sizingCalculator.js";
import { createProviders } from "../sources/providerRegistry.js";
import { QueueSource } from "../sources/queueSource.js";
import type { MessageSource } from "../sources/types.js";
import { NdjsonEventJournal, type EventJournal } from "../storage/eventJournal.js";
import { JsonFileSignalStore, type SignalStore } from "../storage/signalStore.js";
import { ConsoleLogger, describeError, type Logger } from "../telemetry/logger.js";
import { NotificationService, type Notifier } from "../telemetry/notificationService.js";
import { CommandClassifier } from "../trading/commandClassifier.js";
import { IngestionPipeline } from "../trading/ingestionPipeline.js";
import { LifecycleEngine } from "../trading/lifecycleEngine.js";
import { compilePatternTable } from "../trading/patternTable.js";
import { SignalParser } from "../trading/signalParser.js";
import { AliasSymbolResolver } from "../trading/symbolResolver.js";
import { PaperVenue } from "../venue/paperVenue.js";
import { RetryingVenue } from "../venue/retryingVenue.js";
import type { ExecutionVenue } from "../venue/types.js";
import type { Sleep } from "./backoff.js";

export interface RuntimeOverrides {
  readonly store?: SignalStore;
  readonly journal?: EventJournal;
  /** Raw venue; the runtime always wraps it with timeouts and retries. */
  readonly venue?: ExecutionVenue;
  readonly notifier?: Notifier;
  readonly logger?: Logger;
  readonly providers?: readonly MessageSource[];
  readonly now?: () => number;
  readonly sleep?: Sleep;
}

export interface EngineRuntime {
  readonly config: EngineConfig;
  readonly logger: Logger;
  readonly parser: SignalParser;
  readonly classifier: CommandClassifier;
  readonly store: SignalStore;
  readonly journal: EventJournal;
  readonly venue: ExecutionVenue;
  readonly engine: LifecycleEngine;
  readonly monitor: PositionMonitor;
  readonly pipeline: IngestionPipeline;
  readonly console: OperatorConsole;
  readonly reports: ChannelReporter;
  readonly providers: readonly MessageSource[];
  /** The in-process push provider, when one is configured. */
  readonly queue?: QueueSource;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** Compiles the pattern and keyword tables once; reloading means building a new parser and classifier. */
export function buildParsers(config: EngineConfig): { parser: SignalParser; classifier: CommandClassifier } {
  const { settings, patterns, keywords } = config;
  const parser = new SignalParser({
    patterns: compilePatternTable(patterns),
    symbols: new AliasSymbolResolver({
      aliases: settings.symbols.aliases,
      known: settings.symbols.known,
      stopWords: patterns.symbolStopWords,
    }),
    dualEntry: settings.dualEntry.enabled,
  });
  return { parser, classifier: new CommandClassifier({ keywords, parser }) };
}

export async function createEngineRuntime(
  config: EngineConfig,
  overrides: RuntimeOverrides = {},
): Promise<EngineRuntime> {
  const { settings, environment } = config;
  const logger = overrides.logger ?? new ConsoleLogger("engine");
  const { parser, classifier } = buildParsers(config);

  const store = overrides.store ?? (await JsonFileSignalStore.open());
  const journal = overrides.journal ?? new NdjsonEventJournal();
  const notifier = overrides.notifier ?? new NotificationService({ webhookUrl: environment.notificationWebhookUrl, logger });
  const venue = new RetryingVenue({
    venue: overrides.venue ?? new PaperVenue(),
    calls: environment.venue,
    logger,
    sleep: overrides.sleep,
  });

  const engine = new LifecycleEngine({
    store,
    venue,
    sizing: new SizingCalculator({ sizing: settings.sizing, dualEntry: settings.dualEntry }),
    journal,
    notifier,
    logger,
    now: overrides.now,
  });
  const monitor = new PositionMonitor({
    engine,
    venue,
    trailingStop: settings.trailingStop,
    profitSaving: settings.profitSaving,
    pendingOrderExpiryMs: settings.pendingOrderExpiryMinutes * 60_000,
    intervalMs: settings.monitor.intervalMs,
    logger,
    now: overrides.now,
  });
  const pipeline = new IngestionPipeline({
    parser,
    classifier,
    engine,
    store,
    filters: settings.filters,
    logger,
    now: overrides.now,
  });
  const reports = new ChannelReporter({ store, venue, logger });
  const operatorConsole = new OperatorConsole({
    queries: engine,
    dispatch: (command) => pipeline.dispatchCommand(command),
    reports,
    logger,
  });

  const providers =
    overrides.providers ?? createProviders(settings.providers, { logger, apiKey: environment.sourceApiKey });
  const queue = providers.find((provider): provider is QueueSource => provider instanceof QueueSource);
  const handler = (record: Parameters<IngestionPipeline["handle"]>[0]) => pipeline.handle(record);

  return {
    config,
    logger,
    parser,
    classifier,
    store,
    journal,
    venue,
    engine,
    monitor,
    pipeline,
    console: operatorConsole,
    reports,
    providers,
    queue,
    async start() {
      for (const provider of providers) {
        await provider.start(handler);
        logger.info("Provider started", { provider: provider.name });
      }
      monitor.start();
    },
    async stop() {
      await monitor.stop();
      const results = await Promise.allSettled(providers.map((provider) => provider.stop()));
      results.forEach((result, index) => {
        if (result.status === "rejected") {
          logger.error("Provider failed to stop", {
            provider: providers[index]?.name,
            error: describeError(result.reason),
          });
        }
      });
      await engine.idle();
    },
  };
}
