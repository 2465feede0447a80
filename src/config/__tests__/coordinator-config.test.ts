import { describe, it, expect } from "vitest";
import { DEFAULT_COORDINATOR_CONFIG, loadCoordinatorConfig, resolveCoordinatorConfig } from "../coordinator-config.js";
import { ConfigurationError } from "../../errors.js";

describe("resolveCoordinatorConfig", () => {
  it("fills defaults", () => {
    expect(resolveCoordinatorConfig()).toEqual({
      maxAttempts: 3,
      backoffBaseMs: 2000,
      batchLimit: 10,
      dedupWindowMs: 300_000,
      logLevel: "info",
    });
    expect(DEFAULT_COORDINATOR_CONFIG.maxAttempts).toBe(3);
  });

  it("keeps overrides", () => {
    expect(resolveCoordinatorConfig({ batchLimit: 25 }).batchLimit).toBe(25);
  });

  it("names the invalid field", () => {
    expect(() => resolveCoordinatorConfig({ maxAttempts: 0 })).toThrow(ConfigurationError);
    expect(() => resolveCoordinatorConfig({ maxAttempts: 0 })).toThrow(/^Invalid "maxAttempts": /);
  });
});

describe("loadCoordinatorConfig", () => {
  it("reads integer overrides from the environment", () => {
    const config = loadCoordinatorConfig({
      JOURNAL_ANALYSIS_MAX_ATTEMPTS: "5",
      JOURNAL_ANALYSIS_BACKOFF_BASE_MS: "250",
      JOURNAL_ANALYSIS_LOG_LEVEL: "debug",
    });
    expect(config).toEqual({
      maxAttempts: 5,
      backoffBaseMs: 250,
      batchLimit: 10,
      dedupWindowMs: 300_000,
      logLevel: "debug",
    });
  });

  it("ignores empty values", () => {
    expect(loadCoordinatorConfig({ JOURNAL_ANALYSIS_BATCH_LIMIT: " " })).toEqual(DEFAULT_COORDINATOR_CONFIG);
  });

  it("rejects non-integer values", () => {
    expect(() => loadCoordinatorConfig({ JOURNAL_ANALYSIS_BATCH_LIMIT: "ten" })).toThrow(
      'Invalid "JOURNAL_ANALYSIS_BATCH_LIMIT": expected an integer, got "ten"',
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadCoordinatorConfig({ JOURNAL_ANALYSIS_LOG_LEVEL: "loud" })).toThrow(
      'Invalid "JOURNAL_ANALYSIS_LOG_LEVEL": unknown log level "loud"',
    );
  });
});
