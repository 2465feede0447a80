// =============================================================================
// Entries file — JSON array of journal entries for the CLI
// =============================================================================

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { JournalEntrySchema } from "../domain/journal.schema.js";
import type { JournalEntry } from "../domain/journal.schema.js";
import { ConfigurationError, toErrorMessage } from "../errors.js";

const EntriesFileSchema = z.array(JournalEntrySchema);

/** Parse the contents of an entries file, naming the first invalid field. */
export function parseEntriesFile(raw: string, source = "entries file"): JournalEntry[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`not valid JSON (${toErrorMessage(err)})`, source);
  }

  const parsed = EntriesFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at [${issue.path.join(".")}]` : "";
    throw new ConfigurationError(`${issue.message}${where}`, source);
  }

  const seen = new Set<string>();
  for (const entry of parsed.data) {
    if (seen.has(entry.id)) throw new ConfigurationError(`duplicate entry id "${entry.id}"`, source);
    seen.add(entry.id);
  }
  return parsed.data;
}

export async function loadEntriesFile(path: string): Promise<JournalEntry[]> {
  return parseEntriesFile(await readFile(path, "utf8"), path);
}
