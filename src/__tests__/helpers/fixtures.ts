import type { ExtractionResult, JournalEntry } from "../../domain/journal.schema.js";

/**
 * Builds a journal entry with sensible defaults for tests.
 */
export function makeEntry(overrides?: Partial<JournalEntry>): JournalEntry {
  return {
    id: "entry-1",
    timestamp: new Date("2024-03-01T09:00:00.000Z"),
    content: "Loud office today, left early and sat in the car for a while.",
    mood: 0,
    isAnalyzed: false,
    ...overrides,
  };
}

/**
 * Builds an extraction result with one pattern per type given.
 */
export function makeResult(types: string[] = ["Sensory Overload"], overrides?: Partial<ExtractionResult>): ExtractionResult {
  return {
    patterns: types.map((type) => ({
      type,
      category: "Sensory",
      intensity: 6,
    })),
    cascades: [],
    triggers: [],
    context: {},
    overallIntensity: 5,
    confidence: 0.8,
    summary: "A hard day at the office.",
    ...overrides,
  };
}
