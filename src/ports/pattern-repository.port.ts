// =============================================================================
// PatternRepositoryPort — Persist findings and list entries awaiting analysis
// =============================================================================

import type { ExtractionResult, JournalEntry } from "../domain/journal.schema.js";

export interface PatternRepositoryPort {
  /**
   * Store the findings against the entry and mark it analyzed.
   * Rejects with a `PersistenceError`.
   */
  saveExtractionResult(result: ExtractionResult, entry: JournalEntry): Promise<void>;

  /** Entries whose `isAnalyzed` flag is false, in repository order. */
  fetchUnanalyzedEntries(): Promise<JournalEntry[]>;
}
