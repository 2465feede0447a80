// =============================================================================
// InMemoryDedupLedger — Time-windowed "recently analyzed" marks
// =============================================================================

import type { DedupLedgerPort } from "../../ports/dedup-ledger.port.js";

export interface InMemoryDedupLedgerOptions {
  /** How long a mark suppresses re-analysis (default: 5 minutes) */
  windowMs?: number;
  /** Marks kept before the oldest is evicted (default: 1000) */
  maxEntries?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

export class InMemoryDedupLedger implements DedupLedgerPort {
  private readonly marks = new Map<string, number>();
  private readonly windowMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: InMemoryDedupLedgerOptions = {}) {
    this.windowMs = options.windowMs ?? 5 * 60_000;
    this.maxEntries = options.maxEntries ?? 1000;
    this.now = options.now ?? Date.now;
  }

  wasRecentlyAnalyzed(id: string): boolean {
    const markedAt = this.marks.get(id);
    if (markedAt === undefined) return false;
    if (this.now() - markedAt < this.windowMs) return true;
    this.marks.delete(id);
    return false;
  }

  markAsAnalyzed(id: string): void {
    // Re-insert so iteration order stays oldest-first
    this.marks.delete(id);
    this.marks.set(id, this.now());

    if (this.marks.size > this.maxEntries) {
      const oldest = this.marks.keys().next().value;
      if (oldest !== undefined) this.marks.delete(oldest);
    }
  }

  /** Drop every mark whose window has passed. Returns how many were removed. */
  prune(): number {
    const cutoff = this.now() - this.windowMs;
    let removed = 0;
    for (const [id, markedAt] of this.marks) {
      if (markedAt <= cutoff) {
        this.marks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.marks.size;
  }

  clear(): void {
    this.marks.clear();
  }
}
