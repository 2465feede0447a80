// =============================================================================
// EntryLookupPort — Resolve an entry identifier back to its record
// =============================================================================

import type { JournalEntry } from "../domain/journal.schema.js";

export interface EntryLookupPort {
  /** Returns `null` when the entry no longer exists. */
  fetchEntry(id: string): Promise<JournalEntry | null>;
}
