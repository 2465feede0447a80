// =============================================================================
// Journal domain schemas — entries and structured extraction findings
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Journal entry
// ---------------------------------------------------------------------------

export const JournalEntrySchema = z.object({
  id: z.string().min(1),
  timestamp: z.coerce.date(),
  title: z.string().optional(),
  content: z.string(),
  mood: z.number().int().default(0),
  isAnalyzed: z.boolean().default(false),
  analysisSummary: z.string().optional(),
  analysisConfidence: z.number().min(0).max(1).optional(),
  overallIntensity: z.number().int().min(0).max(10).optional(),
});

export type JournalEntry = z.infer<typeof JournalEntrySchema>;
export type JournalEntryInput = z.input<typeof JournalEntrySchema>;

export function parseJournalEntry(input: unknown): JournalEntry {
  return JournalEntrySchema.parse(input);
}

// ---------------------------------------------------------------------------
// Extraction findings (domain form, camelCase)
// ---------------------------------------------------------------------------

export interface ExtractedPattern {
  type: string;
  category: string;
  /** 1–10, judged from the entry's language */
  intensity: number;
  triggers?: string[];
  timeOfDay?: string;
  copingUsed?: string[];
  details?: string;
  /** The writer is reflecting on their own pattern rather than just describing it */
  isUserInsight?: boolean;
  userInsightText?: string;
}

export interface PatternCascade {
  from: string;
  to: string;
  confidence: number;
  description?: string;
}

export interface EntryContext {
  timeOfDay?: string;
  location?: string;
  socialContext?: string;
  sleepMentioned?: boolean;
  medicationMentioned?: boolean;
}

export interface ExtractionResult {
  patterns: ExtractedPattern[];
  cascades: PatternCascade[];
  triggers: string[];
  context: EntryContext;
  overallIntensity: number;
  confidence: number;
  summary: string;
}

// ---------------------------------------------------------------------------
// Wire form (snake_case JSON returned by the model)
// ---------------------------------------------------------------------------

const nullableString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const nullableStringList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? undefined);

const nullableBoolean = z
  .boolean()
  .nullish()
  .transform((v) => v ?? undefined);

export const ExtractedPatternWireSchema = z
  .object({
    type: z.string().min(1),
    category: z.string(),
    intensity: z.number().int().min(1).max(10),
    triggers: nullableStringList,
    time_of_day: nullableString,
    coping_used: nullableStringList,
    details: nullableString,
    is_user_insight: nullableBoolean,
    user_insight_text: nullableString,
  })
  .transform(
    (p): ExtractedPattern => ({
      type: p.type,
      category: p.category,
      intensity: p.intensity,
      triggers: p.triggers,
      timeOfDay: p.time_of_day,
      copingUsed: p.coping_used,
      details: p.details,
      isUserInsight: p.is_user_insight,
      userInsightText: p.user_insight_text,
    }),
  );

export const PatternCascadeWireSchema = z.object({
  from: z.string(),
  to: z.string(),
  confidence: z.number().min(0).max(1),
  description: nullableString,
});

export const EntryContextWireSchema = z
  .object({
    time_of_day: nullableString,
    location: nullableString,
    social_context: nullableString,
    sleep_mentioned: nullableBoolean,
    medication_mentioned: nullableBoolean,
  })
  .transform(
    (c): EntryContext => ({
      timeOfDay: c.time_of_day,
      location: c.location,
      socialContext: c.social_context,
      sleepMentioned: c.sleep_mentioned,
      medicationMentioned: c.medication_mentioned,
    }),
  );

export const ExtractionResultWireSchema = z
  .object({
    patterns: z.array(ExtractedPatternWireSchema).default([]),
    cascades: z.array(PatternCascadeWireSchema).default([]),
    triggers: z.array(z.string()).default([]),
    context: EntryContextWireSchema.default({}),
    overall_intensity: z.number().int().min(0).max(10),
    confidence: z.number().min(0).max(1),
    summary: z.string(),
  })
  .transform(
    (r): ExtractionResult => ({
      patterns: r.patterns,
      cascades: r.cascades,
      triggers: r.triggers,
      context: r.context,
      overallIntensity: r.overall_intensity,
      confidence: r.confidence,
      summary: r.summary,
    }),
  );

export const CascadeResponseWireSchema = z.object({
  cascades: z.array(PatternCascadeWireSchema).default([]),
});
