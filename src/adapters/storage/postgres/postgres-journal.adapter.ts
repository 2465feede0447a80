// =============================================================================
// PostgreSQL Journal Store — Implements PatternRepositoryPort + EntryLookupPort
// =============================================================================
//
// Tables: journal_entries, extracted_patterns, pattern_cascades
//
// Usage:
//   const store = new PostgresJournalStore({ connectionString: '...' })
//   await store.initialize() // creates tables if not exist
//
// =============================================================================

import pg from "pg";
import type { Pool, PoolClient } from "pg";
import type { ExtractionResult, JournalEntry } from "../../../domain/journal.schema.js";
import type { PatternRepositoryPort } from "../../../ports/pattern-repository.port.js";
import type { EntryLookupPort } from "../../../ports/entry-lookup.port.js";
import { PersistenceError, toError, toErrorMessage } from "../../../errors.js";

export interface PostgresJournalStoreOptions {
  /** PostgreSQL connection string */
  connectionString: string;
  /** Schema name (default: 'public') */
  schema?: string;
  /** Pool size (default: 10) */
  poolSize?: number;
}

interface JournalEntryRow {
  id: string;
  timestamp: Date;
  title: string | null;
  content: string;
  mood: number;
  is_analyzed: boolean;
  analysis_summary: string | null;
  analysis_confidence: number | null;
  overall_intensity: number | null;
}

const ENTRY_COLUMNS =
  "id, timestamp, title, content, mood, is_analyzed, analysis_summary, analysis_confidence, overall_intensity";

function rowToEntry(row: JournalEntryRow): JournalEntry {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    title: row.title ?? undefined,
    content: row.content,
    mood: row.mood,
    isAnalyzed: row.is_analyzed,
    analysisSummary: row.analysis_summary ?? undefined,
    analysisConfidence: row.analysis_confidence ?? undefined,
    overallIntensity: row.overall_intensity ?? undefined,
  };
}

export class PostgresJournalStore implements PatternRepositoryPort, EntryLookupPort {
  private readonly pool: Pool;
  private readonly schema: string;

  constructor(options: PostgresJournalStoreOptions) {
    this.schema = options.schema ?? "public";
    this.pool = new pg.Pool({
      connectionString: options.connectionString,
      max: options.poolSize ?? 10,
    });
  }

  private table(name: string): string {
    return `${this.schema}.${name}`;
  }

  /** Create tables if they do not exist */
  async initialize(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table("journal_entries")} (
        id TEXT PRIMARY KEY,
        timestamp TIMESTAMPTZ NOT NULL DEFAULT now(),
        title TEXT,
        content TEXT NOT NULL,
        mood SMALLINT NOT NULL DEFAULT 0,
        is_analyzed BOOLEAN NOT NULL DEFAULT false,
        analysis_summary TEXT,
        analysis_confidence DOUBLE PRECISION,
        overall_intensity SMALLINT
      )
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table("extracted_patterns")} (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        entry_id TEXT NOT NULL REFERENCES ${this.table("journal_entries")} (id) ON DELETE CASCADE,
        pattern_type TEXT NOT NULL,
        category TEXT NOT NULL,
        intensity SMALLINT NOT NULL,
        triggers JSONB NOT NULL DEFAULT '[]',
        time_of_day TEXT,
        coping_used JSONB NOT NULL DEFAULT '[]',
        details TEXT,
        is_user_insight BOOLEAN NOT NULL DEFAULT false,
        user_insight_text TEXT,
        confidence DOUBLE PRECISION NOT NULL,
        timestamp TIMESTAMPTZ NOT NULL
      )
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table("pattern_cascades")} (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        entry_id TEXT NOT NULL REFERENCES ${this.table("journal_entries")} (id) ON DELETE CASCADE,
        from_pattern_id UUID NOT NULL REFERENCES ${this.table("extracted_patterns")} (id) ON DELETE CASCADE,
        to_pattern_id UUID NOT NULL REFERENCES ${this.table("extracted_patterns")} (id) ON DELETE CASCADE,
        confidence DOUBLE PRECISION NOT NULL,
        description TEXT,
        timestamp TIMESTAMPTZ NOT NULL
      )
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_journal_entries_unanalyzed
      ON ${this.table("journal_entries")} (timestamp) WHERE is_analyzed = false
    `);
  }

  async insertEntry(entry: JournalEntry): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.table("journal_entries")} (${ENTRY_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (id) DO NOTHING`,
      [
        entry.id,
        entry.timestamp,
        entry.title ?? null,
        entry.content,
        entry.mood,
        entry.isAnalyzed,
        entry.analysisSummary ?? null,
        entry.analysisConfidence ?? null,
        entry.overallIntensity ?? null,
      ],
    );
  }

  async fetchEntry(id: string): Promise<JournalEntry | null> {
    const result = await this.pool.query<JournalEntryRow>(
      `SELECT ${ENTRY_COLUMNS} FROM ${this.table("journal_entries")} WHERE id = $1 LIMIT 1`,
      [id],
    );
    const row = result.rows[0];
    return row ? rowToEntry(row) : null;
  }

  async fetchUnanalyzedEntries(): Promise<JournalEntry[]> {
    const result = await this.pool.query<JournalEntryRow>(
      `SELECT ${ENTRY_COLUMNS} FROM ${this.table("journal_entries")}
       WHERE is_analyzed = false
       ORDER BY timestamp ASC`,
    );
    return result.rows.map(rowToEntry);
  }

  async saveExtractionResult(result: ExtractionResult, entry: JournalEntry): Promise<void> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new PersistenceError(entry.id, toErrorMessage(err), { cause: err });
    }

    try {
      await client.query("BEGIN");

      const updated = await client.query(
        `UPDATE ${this.table("journal_entries")}
         SET is_analyzed = true, analysis_summary = $2, analysis_confidence = $3, overall_intensity = $4
         WHERE id = $1`,
        [entry.id, result.summary, result.confidence, result.overallIntensity],
      );
      if (updated.rowCount === 0) {
        throw new Error("entry does not exist");
      }

      // Cascades go with their patterns through ON DELETE CASCADE.
      await client.query(`DELETE FROM ${this.table("extracted_patterns")} WHERE entry_id = $1`, [entry.id]);

      const patternIds = new Map<string, string>();
      for (const p of result.patterns) {
        const inserted = await client.query<{ id: string }>(
          `INSERT INTO ${this.table("extracted_patterns")}
           (entry_id, pattern_type, category, intensity, triggers, time_of_day, coping_used,
            details, is_user_insight, user_insight_text, confidence, timestamp)
           VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7::jsonb, $8, $9, $10, $11, $12)
           RETURNING id`,
          [
            entry.id,
            p.type,
            p.category,
            p.intensity,
            JSON.stringify(p.triggers ?? []),
            p.timeOfDay ?? null,
            JSON.stringify(p.copingUsed ?? []),
            p.details ?? null,
            p.isUserInsight ?? false,
            p.userInsightText ?? null,
            result.confidence,
            entry.timestamp,
          ],
        );
        const row = inserted.rows[0];
        if (row) patternIds.set(p.type, row.id);
      }

      for (const c of result.cascades) {
        const fromId = patternIds.get(c.from);
        const toId = patternIds.get(c.to);
        if (!fromId || !toId) continue;
        await client.query(
          `INSERT INTO ${this.table("pattern_cascades")}
           (entry_id, from_pattern_id, to_pattern_id, confidence, description, timestamp)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [entry.id, fromId, toId, c.confidence, c.description ?? null, entry.timestamp],
        );
      }

      await client.query("COMMIT");
    } catch (err) {
      await this.rollback(client);
      throw new PersistenceError(entry.id, toErrorMessage(err), { cause: err });
    }
    client.release();
  }

  /** Roll back and release; a client whose rollback fails is destroyed instead of returned to the pool. */
  private async rollback(client: PoolClient): Promise<void> {
    try {
      await client.query("ROLLBACK");
    } catch (err) {
      client.release(toError(err));
      return;
    }
    client.release();
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
