import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryJournalStore } from "../in-memory-journal.adapter.js";
import { PersistenceError } from "../../../errors.js";
import { makeEntry, makeResult } from "../../../__tests__/helpers/fixtures.js";

describe("InMemoryJournalStore", () => {
  let store: InMemoryJournalStore;

  beforeEach(() => {
    store = new InMemoryJournalStore();
  });

  it("creates entries with generated ids and defaults", () => {
    const entry = store.createEntry({ content: "hello" });
    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(entry.isAnalyzed).toBe(false);
    expect(entry.mood).toBe(0);
    expect(store.size()).toBe(1);
  });

  it("fetchEntry returns null for unknown ids", async () => {
    expect(await store.fetchEntry("missing")).toBeNull();
  });

  it("fetchEntry returns a copy", async () => {
    store.createEntry({ id: "e1", content: "hello" });
    const fetched = await store.fetchEntry("e1");
    expect(fetched?.content).toBe("hello");
    if (fetched) fetched.content = "changed";
    expect((await store.fetchEntry("e1"))?.content).toBe("hello");
  });

  it("lists unanalyzed entries oldest first", async () => {
    store.createEntry({ id: "late", content: "b", timestamp: new Date("2024-03-02T00:00:00Z") });
    store.createEntry({ id: "early", content: "a", timestamp: new Date("2024-03-01T00:00:00Z") });
    store.createEntry({ id: "done", content: "c", isAnalyzed: true });
    const ids = (await store.fetchUnanalyzedEntries()).map((e) => e.id);
    expect(ids).toEqual(["early", "late"]);
  });

  it("saveExtractionResult marks the entry analyzed with summary fields", async () => {
    const entry = store.createEntry({ id: "e1", content: "hello" });
    await store.saveExtractionResult(
      makeResult(["Sensory Overload"], { summary: "Noisy day", confidence: 0.7, overallIntensity: 8 }),
      entry,
    );
    const saved = await store.fetchEntry("e1");
    expect(saved?.isAnalyzed).toBe(true);
    expect(saved?.analysisSummary).toBe("Noisy day");
    expect(saved?.analysisConfidence).toBe(0.7);
    expect(saved?.overallIntensity).toBe(8);
    expect(await store.fetchUnanalyzedEntries()).toEqual([]);
  });

  it("stores patterns with the result confidence and entry timestamp", async () => {
    const ts = new Date("2024-03-01T09:00:00Z");
    const entry = store.createEntry({ id: "e1", content: "hello", timestamp: ts });
    await store.saveExtractionResult(makeResult(["Sensory Overload", "Shutdown"], { confidence: 0.6 }), entry);
    const patterns = store.getPatterns("e1");
    expect(patterns.map((p) => p.type)).toEqual(["Sensory Overload", "Shutdown"]);
    expect(patterns[0].confidence).toBe(0.6);
    expect(patterns[0].timestamp).toEqual(ts);
    expect(patterns[0].entryId).toBe("e1");
  });

  it("keeps only cascades whose ends were both extracted", async () => {
    const entry = store.createEntry({ id: "e1", content: "hello" });
    await store.saveExtractionResult(
      makeResult(["Sensory Overload", "Shutdown"], {
        cascades: [
          { from: "Sensory Overload", to: "Shutdown", confidence: 0.9, description: "noise led to shutdown" },
          { from: "Sensory Overload", to: "Meltdown", confidence: 0.5 },
        ],
      }),
      entry,
    );
    const patterns = store.getPatterns("e1");
    const cascades = store.getCascades("e1");
    expect(cascades).toHaveLength(1);
    expect(cascades[0].fromPatternId).toBe(patterns[0].id);
    expect(cascades[0].toPatternId).toBe(patterns[1].id);
    expect(cascades[0].description).toBe("noise led to shutdown");
  });

  it("rejects saving against an unknown entry", async () => {
    await expect(store.saveExtractionResult(makeResult(), makeEntry({ id: "ghost" }))).rejects.toBeInstanceOf(
      PersistenceError,
    );
  });

  it("deleteEntry removes the entry and its findings", async () => {
    const entry = store.createEntry({ id: "e1", content: "hello" });
    await store.saveExtractionResult(makeResult(), entry);
    expect(store.deleteEntry("e1")).toBe(true);
    expect(await store.fetchEntry("e1")).toBeNull();
    expect(store.getPatterns("e1")).toEqual([]);
  });
});
