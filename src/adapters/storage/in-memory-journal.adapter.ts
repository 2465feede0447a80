// =============================================================================
// InMemoryJournalStore — Entries, patterns and cascades held in process memory
// =============================================================================

import { randomUUID } from "node:crypto";
import type {
  ExtractedPattern,
  ExtractionResult,
  JournalEntry,
  JournalEntryInput,
} from "../../domain/journal.schema.js";
import { parseJournalEntry } from "../../domain/journal.schema.js";
import type { PatternRepositoryPort } from "../../ports/pattern-repository.port.js";
import type { EntryLookupPort } from "../../ports/entry-lookup.port.js";
import { PersistenceError } from "../../errors.js";

export interface StoredPattern extends ExtractedPattern {
  id: string;
  entryId: string;
  confidence: number;
  timestamp: Date;
}

export interface StoredCascade {
  id: string;
  entryId: string;
  fromPatternId: string;
  toPatternId: string;
  confidence: number;
  description?: string;
  timestamp: Date;
}

export class InMemoryJournalStore implements PatternRepositoryPort, EntryLookupPort {
  private readonly entries = new Map<string, JournalEntry>();
  private readonly patterns = new Map<string, StoredPattern[]>();
  private readonly cascades = new Map<string, StoredCascade[]>();

  /** Add an entry; `id` and `timestamp` are generated when omitted. */
  createEntry(input: Omit<JournalEntryInput, "id" | "timestamp"> & { id?: string; timestamp?: Date }): JournalEntry {
    const entry = parseJournalEntry({
      ...input,
      id: input.id ?? randomUUID(),
      timestamp: input.timestamp ?? new Date(),
    });
    this.entries.set(entry.id, entry);
    return { ...entry };
  }

  async fetchEntry(id: string): Promise<JournalEntry | null> {
    const entry = this.entries.get(id);
    return entry ? { ...entry } : null;
  }

  async fetchUnanalyzedEntries(): Promise<JournalEntry[]> {
    return [...this.entries.values()]
      .filter((e) => !e.isAnalyzed)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .map((e) => ({ ...e }));
  }

  async saveExtractionResult(result: ExtractionResult, entry: JournalEntry): Promise<void> {
    const stored = this.entries.get(entry.id);
    if (!stored) {
      throw new PersistenceError(entry.id, "entry does not exist");
    }

    const byType = new Map<string, StoredPattern>();
    const patterns = result.patterns.map((p) => {
      const pattern: StoredPattern = {
        ...p,
        id: randomUUID(),
        entryId: entry.id,
        confidence: result.confidence,
        timestamp: stored.timestamp,
      };
      byType.set(p.type, pattern);
      return pattern;
    });

    // A cascade is kept only when both ends were extracted from this entry
    const cascades: StoredCascade[] = [];
    for (const c of result.cascades) {
      const from = byType.get(c.from);
      const to = byType.get(c.to);
      if (!from || !to) continue;
      cascades.push({
        id: randomUUID(),
        entryId: entry.id,
        fromPatternId: from.id,
        toPatternId: to.id,
        confidence: c.confidence,
        description: c.description,
        timestamp: stored.timestamp,
      });
    }

    this.patterns.set(entry.id, patterns);
    this.cascades.set(entry.id, cascades);
    this.entries.set(entry.id, {
      ...stored,
      isAnalyzed: true,
      analysisSummary: result.summary,
      analysisConfidence: result.confidence,
      overallIntensity: result.overallIntensity,
    });
  }

  getPatterns(entryId: string): StoredPattern[] {
    return [...(this.patterns.get(entryId) ?? [])];
  }

  getCascades(entryId: string): StoredCascade[] {
    return [...(this.cascades.get(entryId) ?? [])];
  }

  deleteEntry(id: string): boolean {
    this.patterns.delete(id);
    this.cascades.delete(id);
    return this.entries.delete(id);
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.patterns.clear();
    this.cascades.clear();
  }
}
