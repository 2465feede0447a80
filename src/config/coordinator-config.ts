// =============================================================================
// Coordinator configuration — defaults, validation and environment overrides
// =============================================================================

import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export const CoordinatorConfigSchema = z.object({
  /** Consecutive failures before an entry is marked terminally failed */
  maxAttempts: z.number().int().min(1).default(3),
  /** Backoff before retry n is n² × backoffBaseMs */
  backoffBaseMs: z.number().int().min(0).default(2_000),
  /** Entries submitted per processUnanalyzedEntries() sweep */
  batchLimit: z.number().int().min(1).default(10),
  /** How long a mark in the dedup ledger suppresses re-analysis */
  dedupWindowMs: z.number().int().min(0).default(5 * 60_000),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;
export type CoordinatorConfigInput = z.input<typeof CoordinatorConfigSchema>;

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = CoordinatorConfigSchema.parse({});

const ENV_KEYS = {
  maxAttempts: "JOURNAL_ANALYSIS_MAX_ATTEMPTS",
  backoffBaseMs: "JOURNAL_ANALYSIS_BACKOFF_BASE_MS",
  batchLimit: "JOURNAL_ANALYSIS_BATCH_LIMIT",
  dedupWindowMs: "JOURNAL_ANALYSIS_DEDUP_WINDOW_MS",
  logLevel: "JOURNAL_ANALYSIS_LOG_LEVEL",
} as const satisfies Record<keyof CoordinatorConfig, string>;

/** Validate a partial config, filling defaults. */
export function resolveCoordinatorConfig(input: CoordinatorConfigInput = {}): CoordinatorConfig {
  const parsed = CoordinatorConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue.message, issue.path.join(".") || undefined);
  }
  return parsed.data;
}

function readInt(env: NodeJS.ProcessEnv, key: keyof typeof ENV_KEYS): number | undefined {
  const raw = env[ENV_KEYS[key]];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`expected an integer, got "${raw}"`, ENV_KEYS[key]);
  }
  return value;
}

/** Build a config from environment variables, falling back to defaults. */
export function loadCoordinatorConfig(env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
  const logLevel = env[ENV_KEYS.logLevel];
  const levelParse = CoordinatorConfigSchema.shape.logLevel.safeParse(logLevel || undefined);
  if (!levelParse.success) {
    throw new ConfigurationError(`unknown log level "${logLevel}"`, ENV_KEYS.logLevel);
  }

  return resolveCoordinatorConfig({
    maxAttempts: readInt(env, "maxAttempts"),
    backoffBaseMs: readInt(env, "backoffBaseMs"),
    batchLimit: readInt(env, "batchLimit"),
    dedupWindowMs: readInt(env, "dedupWindowMs"),
    logLevel: levelParse.data,
  });
}
