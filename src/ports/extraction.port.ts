// =============================================================================
// ExtractionPort — Turn free journal text into structured findings
// =============================================================================

import type { ExtractionResult } from "../domain/journal.schema.js";

export interface ExtractionPort {
  /** False when no inference backend is available; submissions are then skipped. */
  readonly isConfigured: boolean;

  /** Extract patterns from entry text. Rejects with an `ExtractionError`. */
  extractPatterns(text: string): Promise<ExtractionResult>;
}
