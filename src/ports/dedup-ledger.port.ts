// =============================================================================
// DedupLedgerPort — Short-term memory of recently analyzed entries
// =============================================================================

/**
 * Time-windowed record of "entry X was analyzed at time T".
 *
 * Both calls are synchronous so the coordinator's admission checks stay pure
 * reads with no suspension point between them.
 */
export interface DedupLedgerPort {
  wasRecentlyAnalyzed(id: string): boolean;
  markAsAnalyzed(id: string): void;
}
