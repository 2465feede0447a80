#!/usr/bin/env node
// =============================================================================
// journal-analysis CLI — Main entry point
// =============================================================================

import { parseArgs } from "node:util";
import { AnalysisCoordinator } from "../coordinator/analysis-coordinator.js";
import { loadCoordinatorConfig } from "../config/coordinator-config.js";
import type { CoordinatorConfig } from "../config/coordinator-config.js";
import { createLogger } from "../logging/logger.js";
import { LlmExtractionAdapter } from "../adapters/extraction/llm-extraction.adapter.js";
import { InMemoryDedupLedger } from "../adapters/dedup-ledger/in-memory-dedup-ledger.adapter.js";
import { InMemoryJournalStore } from "../adapters/storage/in-memory-journal.adapter.js";
import { PostgresJournalStore } from "../adapters/storage/postgres/postgres-journal.adapter.js";
import type { PatternRepositoryPort } from "../ports/pattern-repository.port.js";
import type { EntryLookupPort } from "../ports/entry-lookup.port.js";
import { toErrorMessage } from "../errors.js";
import { createModel, envVarName, getDefaultModel, isValidProvider, resolveApiKey, SUPPORTED_PROVIDERS } from "./providers.js";
import type { ProviderName } from "./providers.js";
import { loadEntriesFile } from "./entries-file.js";
import { runAnalysis } from "./analyze.js";
import { bold, color } from "./format.js";

const VERSION = "0.1.0";

const HELP = `
${bold("journal-analysis")} — Background pattern extraction for journal entries

${bold("Usage:")}
  journal-analysis analyze <entries.json> [options]   Analyze entries from a JSON file
  journal-analysis analyze --database-url <url>       Analyze unanalyzed entries in PostgreSQL
  journal-analysis status                             Show the effective configuration

${bold("Options:")}
  --provider       AI provider (${SUPPORTED_PROVIDERS.join(", ")}; default: openai)
  --model          Model ID override
  --database-url   PostgreSQL connection string (also read from DATABASE_URL)
  --retry-failed   Resubmit terminally failed entries once after the backlog
  --strict         Drop pattern types that are not in the pattern bank
  --help           Show this help
  --version        Show version

${bold("Environment Variables:")}
  OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_GENERATIVE_AI_API_KEY
  JOURNAL_ANALYSIS_MAX_ATTEMPTS, JOURNAL_ANALYSIS_BACKOFF_BASE_MS,
  JOURNAL_ANALYSIS_BATCH_LIMIT, JOURNAL_ANALYSIS_DEDUP_WINDOW_MS,
  JOURNAL_ANALYSIS_LOG_LEVEL
`;

interface AnalyzeFlags {
  provider?: string;
  model?: string;
  databaseUrl?: string;
  retryFailed: boolean;
  strict: boolean;
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      provider: { type: "string", short: "p" },
      model: { type: "string", short: "m" },
      "database-url": { type: "string" },
      "retry-failed": { type: "boolean" },
      strict: { type: "boolean" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  if (values.version) {
    console.log(`journal-analysis v${VERSION}`);
    return;
  }

  const command = positionals[0];

  switch (command) {
    case "analyze":
      return handleAnalyze(positionals[1], {
        provider: values.provider,
        model: values.model,
        databaseUrl: values["database-url"] ?? process.env.DATABASE_URL,
        retryFailed: values["retry-failed"] ?? false,
        strict: values.strict ?? false,
      });

    case "status":
      return handleStatus(loadCoordinatorConfig());

    case undefined:
      console.log(HELP);
      return;

    default:
      console.error(color("red", `Unknown command: ${command}`));
      console.log(HELP);
      process.exitCode = 1;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────────────────

function handleStatus(config: CoordinatorConfig): void {
  console.log(bold("\nCoordinator configuration:"));
  console.log(`  max attempts:   ${config.maxAttempts}`);
  console.log(`  backoff base:   ${config.backoffBaseMs} ms`);
  console.log(`  batch limit:    ${config.batchLimit}`);
  console.log(`  dedup window:   ${config.dedupWindowMs} ms`);
  console.log(`  log level:      ${config.logLevel}`);

  console.log(bold("\nProviders:"));
  for (const provider of SUPPORTED_PROVIDERS) {
    const state = resolveApiKey(provider) ? color("green", "key set") : color("dim", `set ${envVarName(provider)}`);
    console.log(`  ${provider.padEnd(10)} ${getDefaultModel(provider).padEnd(26)} ${state}`);
  }
  console.log();
}

// ─────────────────────────────────────────────────────────────────────────────
// Analyze
// ─────────────────────────────────────────────────────────────────────────────

async function handleAnalyze(file: string | undefined, flags: AnalyzeFlags): Promise<void> {
  if (!file && !flags.databaseUrl) {
    console.error(color("red", "Usage: journal-analysis analyze <entries.json> | --database-url <url>"));
    process.exitCode = 1;
    return;
  }

  const providerName = flags.provider ?? "openai";
  if (!isValidProvider(providerName)) {
    console.error(color("red", `Unknown provider: ${providerName}`));
    console.log(color("dim", `Available: ${SUPPORTED_PROVIDERS.join(", ")}`));
    process.exitCode = 1;
    return;
  }
  const provider: ProviderName = providerName;

  const apiKey = resolveApiKey(provider);
  if (!apiKey) {
    console.error(color("red", `No API key for provider "${provider}".`));
    console.log(color("dim", `Set the ${envVarName(provider)} environment variable.`));
    process.exitCode = 1;
    return;
  }

  const config = loadCoordinatorConfig();
  const logger = createLogger({ level: config.logLevel });
  const extraction = new LlmExtractionAdapter({
    model: await createModel(provider, apiKey, flags.model),
    strictPatterns: flags.strict,
  });

  const store = await openStore(file, flags.databaseUrl);
  try {
    const coordinator = new AnalysisCoordinator({
      extraction,
      repository: store.repository,
      entries: store.entries,
      dedup: new InMemoryDedupLedger({ windowMs: config.dedupWindowMs }),
      config,
      logger,
    });

    const summary = await runAnalysis({
      coordinator,
      repository: store.repository,
      retryFailed: flags.retryFailed,
      onSweep: (sweep, admitted) => console.log(color("dim", `Sweep ${sweep}: ${admitted} submitted`)),
    });

    console.log(bold("\nAnalysis finished:"));
    console.log(`  ${color("green", `${summary.completed} analyzed`)}`);
    if (summary.failed > 0) console.log(`  ${color("red", `${summary.failed} failed`)}`);
    console.log(`  ${summary.remaining} still unanalyzed`);
    if (summary.lastError) {
      console.log(color("yellow", `  Last error: ${summary.lastError}`));
      process.exitCode = 1;
    }
  } finally {
    await store.close();
  }
}

interface OpenedStore {
  repository: PatternRepositoryPort;
  entries: EntryLookupPort;
  close(): Promise<void>;
}

async function openStore(file: string | undefined, databaseUrl: string | undefined): Promise<OpenedStore> {
  const loaded = file ? await loadEntriesFile(file) : [];

  if (databaseUrl) {
    const pgStore = new PostgresJournalStore({ connectionString: databaseUrl });
    await pgStore.initialize();
    for (const entry of loaded) await pgStore.insertEntry(entry);
    return { repository: pgStore, entries: pgStore, close: () => pgStore.close() };
  }

  const memory = new InMemoryJournalStore();
  for (const entry of loaded) memory.createEntry(entry);
  return { repository: memory, entries: memory, close: async () => {} };
}

main().catch((err) => {
  console.error(color("red", `\n✗ Fatal error: ${toErrorMessage(err)}\n`));
  process.exitCode = 1;
});
