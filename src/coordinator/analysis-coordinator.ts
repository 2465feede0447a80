// =============================================================================
// AnalysisCoordinator — Admission, background processing and retry backoff
// =============================================================================
//
// Owns all bookkeeping for journal entry analysis:
//   pending   ids with a processing attempt queued or in flight
//   failures  id → consecutive failure count (kept at the ceiling as the
//             "failed" record until retryFailed())
//   reserved  ids sleeping in a backoff window, each with the timer allowed
//             to resume it
//
// Every read-modify-write of that state happens between awaits, so the event
// loop serializes it without locks.
//
// =============================================================================

import type { ExtractionPort } from "../ports/extraction.port.js";
import type { PatternRepositoryPort } from "../ports/pattern-repository.port.js";
import type { EntryLookupPort } from "../ports/entry-lookup.port.js";
import type { DedupLedgerPort } from "../ports/dedup-ledger.port.js";
import type { JournalEntry } from "../domain/journal.schema.js";
import type { CoordinatorConfig, CoordinatorConfigInput } from "../config/coordinator-config.js";
import { resolveCoordinatorConfig } from "../config/coordinator-config.js";
import type { Logger } from "../logging/logger.js";
import { createLogger, describeError } from "../logging/logger.js";
import { EntryNotFoundError, toError } from "../errors.js";
import { backoffDelayMs } from "./backoff.js";
import { CoordinatorEventBus } from "./event-bus.js";
import type {
  CoordinatorEventHandler,
  CoordinatorEventMap,
  CoordinatorEventType,
  CoordinatorStatus,
} from "./event-bus.js";
import { TaskTracker } from "./task-tracker.js";

export interface AnalysisCoordinatorOptions {
  extraction: ExtractionPort;
  repository: PatternRepositoryPort;
  entries: EntryLookupPort;
  dedup: DedupLedgerPort;
  config?: CoordinatorConfigInput;
  /** Defaults to a console logger at `config.logLevel` */
  logger?: Logger;
  /** Supply a bus to share it with other components */
  events?: CoordinatorEventBus;
}

export type RejectionReason = "already-analyzed" | "pending" | "awaiting-retry" | "recently-analyzed" | "not-configured";

export class AnalysisCoordinator {
  readonly config: CoordinatorConfig;
  readonly events: CoordinatorEventBus;

  private readonly extraction: ExtractionPort;
  private readonly repository: PatternRepositoryPort;
  private readonly entries: EntryLookupPort;
  private readonly dedup: DedupLedgerPort;
  private readonly logger: Logger;
  private readonly tasks = new TaskTracker();

  private readonly pending = new Set<string>();
  private readonly failures = new Map<string, number>();
  private readonly reserved = new Map<string, NodeJS.Timeout>();
  private blockingCalls = 0;
  private _lastError: string | null = null;

  constructor(options: AnalysisCoordinatorOptions) {
    this.config = resolveCoordinatorConfig(options.config);
    this.extraction = options.extraction;
    this.repository = options.repository;
    this.entries = options.entries;
    this.dedup = options.dedup;
    this.logger = (options.logger ?? createLogger({ level: this.config.logLevel })).child("coordinator");
    this.events =
      options.events ??
      new CoordinatorEventBus({
        onHandlerError: (err, type) => this.logger.error("listener_failed", { type, error: describeError(err) }),
      });
  }

  // ===========================================================================
  // Submission
  // ===========================================================================

  /**
   * Queue an entry for background analysis. Returns immediately; the outcome
   * is only observable through status and events.
   *
   * @returns whether the entry was admitted
   */
  submit(entry: JournalEntry): boolean {
    const rejection = this.admissionCheck(entry);
    if (rejection) {
      this.logger.debug("submission_rejected", { entryId: entry.id, reason: rejection });
      return false;
    }

    this.pending.add(entry.id);
    this.publishStatus();
    this.tasks.spawn(() => this.process(entry));
    return true;
  }

  private admissionCheck(entry: JournalEntry): RejectionReason | null {
    if (entry.isAnalyzed) return "already-analyzed";
    if (this.pending.has(entry.id)) return "pending";
    if (this.reserved.has(entry.id)) return "awaiting-retry";
    if (this.dedup.wasRecentlyAnalyzed(entry.id)) return "recently-analyzed";
    if (!this.extraction.isConfigured) return "not-configured";
    return null;
  }

  // ===========================================================================
  // Immediate analysis
  // ===========================================================================

  /**
   * Analyze an entry and wait for the result. Failures are rethrown to the
   * caller and never enter the retry path.
   */
  async analyzeNow(entry: JournalEntry): Promise<void> {
    this.blockingCalls++;
    this._lastError = null;
    this.dedup.markAsAnalyzed(entry.id);
    this.publishStatus();

    try {
      const result = await this.extraction.extractPatterns(entry.content);
      await this.repository.saveExtractionResult(result, entry);
      this.logger.info("analysis_completed", { entryId: entry.id, patterns: result.patterns.length, blocking: true });
    } catch (err) {
      this.logger.warn("analysis_failed", { entryId: entry.id, blocking: true, error: describeError(err) });
      throw err;
    } finally {
      this.blockingCalls--;
      this.publishStatus();
    }
  }

  /** Resolve an entry through the lookup port, then {@link analyzeNow} it. */
  async analyzeNowById(id: string): Promise<void> {
    const entry = await this.entries.fetchEntry(id);
    if (!entry) throw new EntryNotFoundError(id);
    await this.analyzeNow(entry);
  }

  // ===========================================================================
  // Processing & failure handling
  // ===========================================================================

  private async process(entry: JournalEntry): Promise<void> {
    const attempt = (this.failures.get(entry.id) ?? 0) + 1;
    this.emit("analysis:started", { entryId: entry.id, attempt });

    let patternCount: number;
    try {
      const result = await this.extraction.extractPatterns(entry.content);
      await this.repository.saveExtractionResult(result, entry);
      patternCount = result.patterns.length;
    } catch (err) {
      this.handleFailure(entry, toError(err));
      return;
    }

    this.pending.delete(entry.id);
    this.failures.delete(entry.id);
    this.logger.info("analysis_completed", { entryId: entry.id, attempt, patterns: patternCount });
    this.emit("analysis:completed", { entryId: entry.id, patternCount });
    this.publishStatus();
  }

  private handleFailure(entry: JournalEntry, error: Error): void {
    const attempt = (this.failures.get(entry.id) ?? 0) + 1;
    this.failures.set(entry.id, attempt);
    this.pending.delete(entry.id);

    this.logger.warn("analysis_failed", { entryId: entry.id, attempt, error: describeError(error) });
    this.emit("analysis:failed", { entryId: entry.id, attempt, error });

    if (attempt >= this.config.maxAttempts) {
      this._lastError = `Analysis failed after ${this.config.maxAttempts} attempts: ${error.message}`;
      this.logger.error("analysis_exhausted", { entryId: entry.id, attempts: attempt, error: describeError(error) });
      this.emit("analysis:exhausted", { entryId: entry.id, attempts: attempt, error });
      this.publishStatus();
      return;
    }

    const delayMs = backoffDelayMs(attempt, this.config.backoffBaseMs);
    const timer = this.tasks.schedule(delayMs, () => this.resume(entry, timer));
    this.reserved.set(entry.id, timer);

    this.logger.info("retry_scheduled", { entryId: entry.id, attempt, delayMs });
    this.emit("analysis:retry-scheduled", { entryId: entry.id, attempt, delayMs });
    this.publishStatus();
  }

  /** Backoff timer fired: restart processing unless the reservation was released meanwhile. */
  private resume(entry: JournalEntry, timer: NodeJS.Timeout): void {
    if (this.reserved.get(entry.id) !== timer) {
      this.logger.debug("retry_superseded", { entryId: entry.id });
      return;
    }
    this.reserved.delete(entry.id);
    this.pending.add(entry.id);
    this.publishStatus();
    this.tasks.spawn(() => this.process(entry));
  }

  // ===========================================================================
  // Sweeps
  // ===========================================================================

  /** Drain the failure ledger and resubmit every entry that still exists. */
  async retryFailed(): Promise<void> {
    const ids = [...this.failures.keys()];
    this.failures.clear();
    for (const id of ids) this.release(id);
    this.publishStatus();

    if (ids.length > 0) this.logger.info("retry_all", { count: ids.length });

    for (const id of ids) {
      let entry: JournalEntry | null;
      try {
        entry = await this.entries.fetchEntry(id);
      } catch (err) {
        this.logger.warn("entry_lookup_failed", { entryId: id, error: describeError(err) });
        continue;
      }
      if (!entry) {
        this.logger.debug("entry_not_found", { entryId: id });
        continue;
      }
      this.submit(entry);
    }
  }

  /** Drop a backoff reservation and cancel its timer. */
  private release(id: string): void {
    const timer = this.reserved.get(id);
    if (timer === undefined) return;
    this.reserved.delete(id);
    this.tasks.cancel(timer);
  }

  /**
   * Submit up to `config.batchLimit` unanalyzed entries, in repository order.
   * Call repeatedly to work through a larger backlog.
   *
   * @returns the number of entries admitted
   */
  async processUnanalyzedEntries(): Promise<number> {
    const unanalyzed = await this.repository.fetchUnanalyzedEntries();
    const batch = unanalyzed.slice(0, this.config.batchLimit);

    let admitted = 0;
    for (const entry of batch) {
      if (this.submit(entry)) admitted++;
    }

    this.logger.info("batch_submitted", { available: unanalyzed.length, batch: batch.length, admitted });
    return admitted;
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  clearError(): void {
    if (this._lastError === null) return;
    this._lastError = null;
    this.publishStatus();
  }

  isPending(id: string): boolean {
    return this.pending.has(id);
  }

  /** True while `id` sits out a backoff delay before its next attempt. */
  isAwaitingRetry(id: string): boolean {
    return this.reserved.has(id);
  }

  getFailureCount(id: string): number {
    return this.failures.get(id) ?? 0;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get failedCount(): number {
    return this.failures.size;
  }

  get isProcessing(): boolean {
    return this.blockingCalls > 0;
  }

  get lastError(): string | null {
    return this._lastError;
  }

  get isConfigured(): boolean {
    return this.extraction.isConfigured;
  }

  getStatus(): CoordinatorStatus {
    return {
      pendingCount: this.pendingCount,
      isProcessing: this.isProcessing,
      lastError: this._lastError,
      failedCount: this.failedCount,
    };
  }

  /** One-line status for display, empty when there is nothing to report. */
  statusSummary(): string {
    if (this.isProcessing) return "Analyzing...";
    if (this.pendingCount > 0) {
      return this.pendingCount === 1 ? "Analyzing 1 entry..." : `Analyzing ${this.pendingCount} entries...`;
    }
    if (this.failedCount > 0) return `${this.failedCount} failed`;
    return "";
  }

  onStatusChange(listener: (status: CoordinatorStatus) => void): () => void {
    const handler: CoordinatorEventHandler<"status:changed"> = (event) => listener(event.data);
    return this.events.on("status:changed", handler);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /** Resolves once no analysis is running and no retry is waiting. */
  whenIdle(): Promise<void> {
    return this.tasks.whenIdle();
  }

  /**
   * Cancel every scheduled retry. Their ids stay in the failure ledger, so
   * retryFailed() can pick them up later.
   */
  shutdown(): void {
    this.tasks.cancelAll();
    this.reserved.clear();
    this.logger.debug("shutdown");
  }

  private publishStatus(): void {
    this.emit("status:changed", this.getStatus());
  }

  /** Listener errors are logged here so they never reach the bookkeeping. */
  private emit<K extends CoordinatorEventType>(type: K, data: CoordinatorEventMap[K]): void {
    try {
      this.events.emit(type, data);
    } catch (err) {
      this.logger.error("listener_failed", { type, error: describeError(err) });
    }
  }
}
