// =============================================================================
// journal-analysis-coordinator — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Domain
// ─────────────────────────────────────────────────────────────────────────────

export type {
  JournalEntry,
  JournalEntryInput,
  ExtractedPattern,
  PatternCascade,
  EntryContext,
  ExtractionResult,
} from "./domain/journal.schema.js";
export {
  JournalEntrySchema,
  ExtractionResultWireSchema,
  CascadeResponseWireSchema,
  parseJournalEntry,
} from "./domain/journal.schema.js";
export { PatternBank } from "./domain/pattern-bank.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { ExtractionPort } from "./ports/extraction.port.js";
export type { PatternRepositoryPort } from "./ports/pattern-repository.port.js";
export type { EntryLookupPort } from "./ports/entry-lookup.port.js";
export type { DedupLedgerPort } from "./ports/dedup-ledger.port.js";

// ─────────────────────────────────────────────────────────────────────────────
// Coordinator
// ─────────────────────────────────────────────────────────────────────────────

export { AnalysisCoordinator } from "./coordinator/analysis-coordinator.js";
export type { AnalysisCoordinatorOptions, RejectionReason } from "./coordinator/analysis-coordinator.js";
export { CoordinatorEventBus } from "./coordinator/event-bus.js";
export type {
  CoordinatorStatus,
  CoordinatorEvent,
  CoordinatorEventMap,
  CoordinatorEventType,
  CoordinatorEventHandler,
  CoordinatorEventBusOptions,
} from "./coordinator/event-bus.js";
export { TaskTracker } from "./coordinator/task-tracker.js";
export { backoffDelayMs } from "./coordinator/backoff.js";

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export { LlmExtractionAdapter } from "./adapters/extraction/llm-extraction.adapter.js";
export type { LlmExtractionAdapterOptions, TimestampedText } from "./adapters/extraction/llm-extraction.adapter.js";
export { cleanJsonResponse, parseExtractionResponse, parseCascadeResponse } from "./adapters/extraction/response-parser.js";
export { InMemoryDedupLedger } from "./adapters/dedup-ledger/in-memory-dedup-ledger.adapter.js";
export type { InMemoryDedupLedgerOptions } from "./adapters/dedup-ledger/in-memory-dedup-ledger.adapter.js";
export { InMemoryJournalStore } from "./adapters/storage/in-memory-journal.adapter.js";
export type { StoredPattern, StoredCascade } from "./adapters/storage/in-memory-journal.adapter.js";
export { PostgresJournalStore } from "./adapters/storage/postgres/postgres-journal.adapter.js";
export type { PostgresJournalStoreOptions } from "./adapters/storage/postgres/postgres-journal.adapter.js";

// ─────────────────────────────────────────────────────────────────────────────
// Config, logging & errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  CoordinatorConfigSchema,
  DEFAULT_COORDINATOR_CONFIG,
  resolveCoordinatorConfig,
  loadCoordinatorConfig,
} from "./config/coordinator-config.js";
export type { CoordinatorConfig, CoordinatorConfigInput } from "./config/coordinator-config.js";
export { createLogger, consoleSink, silentSink, describeError } from "./logging/logger.js";
export type { Logger, LogEntry, LogLevel, LogSink, LoggerOptions } from "./logging/logger.js";
export {
  JournalAnalysisError,
  ExtractionError,
  PersistenceError,
  EntryNotFoundError,
  ConfigurationError,
  toErrorMessage,
  toError,
} from "./errors.js";
export type { JournalAnalysisErrorCode } from "./errors.js";
