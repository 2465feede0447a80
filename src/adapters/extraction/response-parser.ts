// =============================================================================
// Model response parsing — fence stripping and schema validation
// =============================================================================

import type { z, ZodTypeAny } from "zod";
import type { ExtractionResult, PatternCascade } from "../../domain/journal.schema.js";
import { CascadeResponseWireSchema, ExtractionResultWireSchema } from "../../domain/journal.schema.js";
import { ExtractionError, toErrorMessage } from "../../errors.js";

/** Strip a surrounding markdown code fence (```json ... ``` or ``` ... ```). */
export function cleanJsonResponse(response: string): string {
  let cleaned = response.trim();
  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith("```")) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

function parseWith<S extends ZodTypeAny>(schema: S, response: string): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(cleanJsonResponse(response));
  } catch (err) {
    throw new ExtractionError(`Failed to parse model response: ${toErrorMessage(err)}`, "EXTRACTION_PARSE_FAILED", {
      cause: err,
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ExtractionError(`Failed to parse model response: ${issue.message}${where}`, "EXTRACTION_PARSE_FAILED", {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function parseExtractionResponse(response: string): ExtractionResult {
  return parseWith(ExtractionResultWireSchema, response);
}

export function parseCascadeResponse(response: string): PatternCascade[] {
  return parseWith(CascadeResponseWireSchema, response).cascades;
}
