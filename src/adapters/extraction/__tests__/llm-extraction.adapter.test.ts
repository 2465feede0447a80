import { describe, it, expect, vi, beforeEach } from "vitest";
import { LlmExtractionAdapter } from "../llm-extraction.adapter.js";
import { ExtractionError } from "../../../errors.js";

// =============================================================================
// Mock AI SDK — generateText
// =============================================================================

const { generateText } = vi.hoisted(() => ({ generateText: vi.fn() }));

vi.mock("ai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("ai")>();
  return { ...actual, generateText };
});

/** The prompt passed to the n-th generateText call. */
function promptOf(call = 0): string {
  return String(generateText.mock.calls[call][0].prompt);
}

const response = JSON.stringify({
  patterns: [
    { type: "Sensory Overload", category: "Sensory", intensity: 7 },
    { type: "Made Up Pattern", category: "Other", intensity: 3 },
  ],
  cascades: [],
  triggers: ["noise"],
  context: {},
  overall_intensity: 6,
  confidence: 0.8,
  summary: "Noise at work",
});

describe("LlmExtractionAdapter", () => {
  beforeEach(() => {
    generateText.mockReset().mockResolvedValue({ text: response });
  });

  it("is configured only when a model is given", () => {
    expect(new LlmExtractionAdapter().isConfigured).toBe(false);
    expect(new LlmExtractionAdapter({ model: "test-model" }).isConfigured).toBe(true);
  });

  it("sends the pattern bank and entry text to the model", async () => {
    const adapter = new LlmExtractionAdapter({ model: "test-model" });
    await adapter.extractPatterns("The office was loud today.");
    expect(generateText).toHaveBeenCalledTimes(1);
    expect(generateText.mock.calls[0][0]).toMatchObject({ model: "test-model", temperature: 0.2, maxRetries: 0 });
    const prompt = promptOf();
    expect(prompt).toContain("PATTERN CATEGORIES AND TYPES:");
    expect(prompt).toContain("Sensory Overload");
    expect(prompt).toContain("JOURNAL ENTRY TO ANALYZE:");
    expect(prompt.endsWith("JOURNAL ENTRY TO ANALYZE:\n\nThe office was loud today.")).toBe(true);
  });

  it("returns the parsed findings", async () => {
    const adapter = new LlmExtractionAdapter({ model: "test-model" });
    const result = await adapter.extractPatterns("The office was loud today.");
    expect(result.summary).toBe("Noise at work");
    expect(result.overallIntensity).toBe(6);
    expect(result.patterns.map((p) => p.type)).toEqual(["Sensory Overload", "Made Up Pattern"]);
  });

  it("drops unknown pattern types in strict mode", async () => {
    const adapter = new LlmExtractionAdapter({ model: "test-model", strictPatterns: true });
    const result = await adapter.extractPatterns("The office was loud today.");
    expect(result.patterns.map((p) => p.type)).toEqual(["Sensory Overload"]);
  });

  it("rejects with EXTRACTION_NOT_CONFIGURED without a model", async () => {
    const adapter = new LlmExtractionAdapter();
    await expect(adapter.extractPatterns("text")).rejects.toMatchObject({
      name: "ExtractionError",
      code: "EXTRACTION_NOT_CONFIGURED",
    });
  });

  it("wraps model failures in an ExtractionError", async () => {
    generateText.mockRejectedValue(new Error("quota exceeded"));
    const adapter = new LlmExtractionAdapter({ model: "test-model" });
    const extracting = adapter.extractPatterns("text");
    await expect(extracting).rejects.toBeInstanceOf(ExtractionError);
    await expect(extracting).rejects.toThrow("Model call failed: quota exceeded");
  });

  it("rejects unparseable output with EXTRACTION_PARSE_FAILED", async () => {
    generateText.mockResolvedValue({ text: "Sorry, I cannot help with that." });
    const adapter = new LlmExtractionAdapter({ model: "test-model" });
    await expect(adapter.extractPatterns("text")).rejects.toMatchObject({ code: "EXTRACTION_PARSE_FAILED" });
  });

  it("extracts cross-entry cascades in chronological order", async () => {
    generateText.mockResolvedValue({
      text: JSON.stringify({ cascades: [{ from: "Sleep Quality", to: "Meltdown", confidence: 0.7, description: "next day" }] }),
    });
    const adapter = new LlmExtractionAdapter({ model: "test-model" });
    const cascades = await adapter.extractCascades([
      { text: "Big blowup at dinner.", timestamp: new Date("2024-03-02T19:00:00.000Z") },
      { text: "Slept three hours.", timestamp: new Date("2024-03-01T08:00:00.000Z") },
    ]);
    expect(cascades).toEqual([{ from: "Sleep Quality", to: "Meltdown", confidence: 0.7, description: "next day" }]);

    const prompt = promptOf();
    expect(prompt.indexOf("Slept three hours.")).toBeLessThan(prompt.indexOf("Big blowup at dinner."));
    expect(prompt).toContain("[2024-03-01T08:00:00.000Z]");
  });

  it("skips the model call for an empty cascade batch", async () => {
    const adapter = new LlmExtractionAdapter({ model: "test-model" });
    expect(await adapter.extractCascades([])).toEqual([]);
    expect(generateText).not.toHaveBeenCalled();
  });

  it("validatePatterns keeps only bank names", () => {
    const adapter = new LlmExtractionAdapter();
    const kept = adapter.validatePatterns([
      { type: "Shutdown", category: "Energy & Regulation", intensity: 4 },
      { type: "Invented", category: "Other", intensity: 2 },
    ]);
    expect(kept.map((p) => p.type)).toEqual(["Shutdown"]);
  });
});
