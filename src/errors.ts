/**
 * Structured error hierarchy for the journal analysis engine.
 *
 * Every error raised by a port adapter or the coordinator extends
 * {@link JournalAnalysisError}, so callers can branch on `instanceof` or on
 * the `code` field:
 *
 * ```ts
 * try {
 *   await coordinator.analyzeNow(entry);
 * } catch (e) {
 *   if (e instanceof ExtractionError) { ... }
 *   if (e instanceof PersistenceError) { ... }
 * }
 * ```
 *
 * @module errors
 */

export type JournalAnalysisErrorCode =
  | "EXTRACTION_FAILED"
  | "EXTRACTION_PARSE_FAILED"
  | "EXTRACTION_NOT_CONFIGURED"
  | "PERSISTENCE_FAILED"
  | "ENTRY_NOT_FOUND"
  | "CONFIGURATION_INVALID";

/** Base error for the engine. Includes an error code for programmatic matching. */
export class JournalAnalysisError extends Error {
  readonly code: JournalAnalysisErrorCode;
  constructor(code: JournalAnalysisErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JournalAnalysisError";
    this.code = code;
  }
}

/** The inference call did not produce findings. */
export class ExtractionError extends JournalAnalysisError {
  constructor(
    message: string,
    code: Extract<
      JournalAnalysisErrorCode,
      "EXTRACTION_FAILED" | "EXTRACTION_PARSE_FAILED" | "EXTRACTION_NOT_CONFIGURED"
    > = "EXTRACTION_FAILED",
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = "ExtractionError";
  }
}

/** Findings could not be saved against their entry. */
export class PersistenceError extends JournalAnalysisError {
  readonly entryId: string;
  constructor(entryId: string, message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE_FAILED", `Failed to save analysis for entry "${entryId}": ${message}`, options);
    this.name = "PersistenceError";
    this.entryId = entryId;
  }
}

/** Thrown by strict lookups; the lookup port itself reports absence as `null`. */
export class EntryNotFoundError extends JournalAnalysisError {
  readonly entryId: string;
  constructor(entryId: string) {
    super("ENTRY_NOT_FOUND", `Journal entry "${entryId}" not found`);
    this.name = "EntryNotFoundError";
    this.entryId = entryId;
  }
}

/** Configuration validation failed. */
export class ConfigurationError extends JournalAnalysisError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("CONFIGURATION_INVALID", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ConfigurationError";
    this.field = field;
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
