// =============================================================================
// PatternBank — the catalogue of recognizable patterns and the extraction prompt
// =============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

const PatternDefinitionSchema = z.object({
  type: z.string().min(1),
  description: z.string(),
});

const PatternBankSchema = z.object({
  role: z.string(),
  categories: z.array(
    z.object({
      name: z.string().min(1),
      patterns: z.array(PatternDefinitionSchema),
    }),
  ),
  rules: z.array(z.string()),
  responseFormat: z.record(z.unknown()),
});

export type PatternBankData = z.infer<typeof PatternBankSchema>;

const DEFAULT_BANK_URL = new URL("../../data/pattern-bank.json", import.meta.url);

export class PatternBank {
  private readonly categoryByType = new Map<string, string>();

  constructor(private readonly data: PatternBankData) {
    for (const category of data.categories) {
      for (const pattern of category.patterns) {
        this.categoryByType.set(pattern.type, category.name);
      }
    }
  }

  /** Load and validate a bank from a JSON file (defaults to the bundled bank). */
  static load(path: string | URL = DEFAULT_BANK_URL): PatternBank {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return new PatternBank(PatternBankSchema.parse(raw));
  }

  validPatternNames(): ReadonlySet<string> {
    return new Set(this.categoryByType.keys());
  }

  isValidPattern(type: string): boolean {
    return this.categoryByType.has(type);
  }

  categoryOf(type: string): string | undefined {
    return this.categoryByType.get(type);
  }

  get categories(): ReadonlyArray<{ name: string; patterns: ReadonlyArray<{ type: string; description: string }> }> {
    return this.data.categories;
  }

  /** Instructions + catalogue + response shape, ready to prefix a journal entry. */
  buildPrompt(): string {
    const catalogue = this.data.categories.map((category) =>
      [
        `=== ${category.name.toUpperCase()} ===`,
        ...category.patterns.map((p) => `- ${p.type}: ${p.description}`),
      ].join("\n"),
    );

    return [
      this.data.role,
      "",
      "PATTERN CATEGORIES AND TYPES:",
      "",
      catalogue.join("\n\n"),
      "",
      "---",
      "",
      "ANALYSIS RULES:",
      ...this.data.rules.map((rule, i) => `${i + 1}. ${rule}`),
      "",
      "---",
      "",
      "RESPONSE FORMAT:",
      "Return ONLY valid JSON with this exact structure. Use the exact pattern type names above; return empty arrays when nothing is found.",
      JSON.stringify(this.data.responseFormat, null, 2),
    ].join("\n");
  }
}
