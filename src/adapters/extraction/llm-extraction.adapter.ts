// =============================================================================
// LlmExtractionAdapter — Pattern extraction through a Vercel AI SDK model
// =============================================================================

import { generateText } from "ai";
import type { LanguageModel } from "ai";
import type { ExtractionPort } from "../../ports/extraction.port.js";
import type { ExtractedPattern, ExtractionResult, PatternCascade } from "../../domain/journal.schema.js";
import { PatternBank } from "../../domain/pattern-bank.js";
import { ExtractionError, toErrorMessage } from "../../errors.js";
import { parseCascadeResponse, parseExtractionResponse } from "./response-parser.js";

export interface LlmExtractionAdapterOptions {
  /** Model to call; when absent the adapter reports itself unconfigured */
  model?: LanguageModel | null;
  /** Pattern catalogue (defaults to the bundled bank) */
  bank?: PatternBank;
  temperature?: number;
  maxOutputTokens?: number;
  /** Abort a model call after this long (default: 60s) */
  timeoutMs?: number;
  /** Drop patterns whose type is not in the bank (default: false) */
  strictPatterns?: boolean;
}

export interface TimestampedText {
  text: string;
  timestamp: Date;
}

export class LlmExtractionAdapter implements ExtractionPort {
  private readonly model: LanguageModel | null;
  private readonly bank: PatternBank;
  private readonly options: LlmExtractionAdapterOptions;

  constructor(options: LlmExtractionAdapterOptions = {}) {
    this.options = options;
    this.model = options.model ?? null;
    this.bank = options.bank ?? PatternBank.load();
  }

  get isConfigured(): boolean {
    return this.model !== null;
  }

  async extractPatterns(text: string): Promise<ExtractionResult> {
    const prompt = [this.bank.buildPrompt(), "", "---", "", "JOURNAL ENTRY TO ANALYZE:", "", text].join("\n");
    const result = parseExtractionResponse(await this.generate(prompt));
    if (!this.options.strictPatterns) return result;
    return { ...result, patterns: this.validatePatterns(result.patterns) };
  }

  /**
   * Look across several entries, in chronological order, for cascades where a
   * pattern in an earlier entry led to one in a later entry.
   */
  async extractCascades(entries: TimestampedText[]): Promise<PatternCascade[]> {
    if (entries.length === 0) return [];

    const formatted = [...entries]
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .map((e) => `[${e.timestamp.toISOString()}]\n${e.text}`)
      .join("\n\n---\n\n");

    const prompt = [
      this.bank.buildPrompt(),
      "",
      "---",
      "",
      "SPECIAL INSTRUCTION: Analyze these MULTIPLE journal entries in chronological order.",
      "Report only CASCADES that span entries: a pattern in an earlier entry that led to a pattern in a later one.",
      "",
      "ENTRIES:",
      "",
      formatted,
      "",
      "---",
      "",
      'Return ONLY JSON of the form {"cascades": [{"from": "Pattern Type", "to": "Pattern Type", "confidence": 0.8, "description": "how they connect, including timing"}]}',
    ].join("\n");

    return parseCascadeResponse(await this.generate(prompt));
  }

  /** Keep only patterns whose type is a known pattern bank name. */
  validatePatterns(patterns: ExtractedPattern[]): ExtractedPattern[] {
    return patterns.filter((p) => this.bank.isValidPattern(p.type));
  }

  private async generate(prompt: string): Promise<string> {
    if (!this.model) {
      throw new ExtractionError("No language model configured", "EXTRACTION_NOT_CONFIGURED");
    }

    try {
      const { text } = await generateText({
        model: this.model,
        prompt,
        temperature: this.options.temperature ?? 0.2,
        maxOutputTokens: this.options.maxOutputTokens,
        // Retries belong to the coordinator's backoff
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.options.timeoutMs ?? 60_000),
      });
      return text;
    } catch (err) {
      throw new ExtractionError(`Model call failed: ${toErrorMessage(err)}`, "EXTRACTION_FAILED", { cause: err });
    }
  }
}
