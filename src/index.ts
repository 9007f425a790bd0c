export { ConfigManager, ConfigError, defaultConfigManager } from "./config/configManager.js";
export type { EngineConfig, EngineEnvironment } from "./config/configManager.js";
export type { EngineSettings } from "./config/schemas.js";
export { OperatorConsole, SessionContext } from "./console/operatorConsole.js";
export type { ConsoleInput, ConsoleView, SessionState } from "./console/operatorConsole.js";
export { PositionMonitor } from "./monitor/positionMonitor.js";
export { ChannelReporter } from "./report/channelReport.js";
export type { ChannelStats, CompareOptions, ReportPeriod } from "./report/channelReport.js";
export { SizingCalculator } from "./risk/sizingCalculator.js";
export { buildParsers, createEngineRuntime } from "./runtime/botRuntime.js";
export type { EngineRuntime, RuntimeOverrides } from "./runtime/botRuntime.js";
export { createApp } from "./server.js";
export { HttpPollingSource } from "./sources/httpPollingSource.js";
export { createProvider, createProviders } from "./sources/providerRegistry.js";
export { QueueSource } from "./sources/queueSource.js";
export type { MessageHandler, MessageSource } from "./sources/types.js";
export { InMemoryEventJournal, NdjsonEventJournal } from "./storage/eventJournal.js";
export { InMemorySignalStore, JsonFileSignalStore } from "./storage/signalStore.js";
export type { SignalStore } from "./storage/signalStore.js";
export { ConsoleLogger, NoopLogger } from "./telemetry/logger.js";
export type { Logger } from "./telemetry/logger.js";
export { NotificationService } from "./telemetry/notificationService.js";
export { CommandClassifier } from "./trading/commandClassifier.js";
export * from "./trading/errors.js";
export { IngestionPipeline } from "./trading/ingestionPipeline.js";
export type { IngestOutcome } from "./trading/ingestionPipeline.js";
export { LifecycleEngine } from "./trading/lifecycleEngine.js";
export type { CommandResult, OpenPosition } from "./trading/lifecycleEngine.js";
export { SignalParser } from "./trading/signalParser.js";
export type { ParseOutcome } from "./trading/signalParser.js";
export * from "./trading/types.js";
export { PaperVenue } from "./venue/paperVenue.js";
export { RetryingVenue } from "./venue/retryingVenue.js";
export type { ExecutionVenue } from "./venue/types.js";
