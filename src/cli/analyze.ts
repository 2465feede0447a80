// =============================================================================
// CLI analyze — Drain the unanalyzed backlog through the coordinator
// =============================================================================

import type { AnalysisCoordinator } from "../coordinator/analysis-coordinator.js";
import type { PatternRepositoryPort } from "../ports/pattern-repository.port.js";

export interface AnalyzeRunOptions {
  coordinator: AnalysisCoordinator;
  repository: PatternRepositoryPort;
  /** Resubmit terminally failed entries once after the backlog is drained */
  retryFailed?: boolean;
  onSweep?: (sweep: number, admitted: number) => void;
}

export interface AnalyzeRunSummary {
  sweeps: number;
  admitted: number;
  completed: number;
  failed: number;
  remaining: number;
  lastError: string | null;
}

/**
 * Sweep batches until a sweep admits nothing or stops shrinking the backlog
 * (the same entries keep failing), waiting for every retry in between.
 */
export async function runAnalysis(options: AnalyzeRunOptions): Promise<AnalyzeRunSummary> {
  const { coordinator, repository } = options;
  let completed = 0;
  const stopCounting = coordinator.events.on("analysis:completed", () => {
    completed++;
  });

  try {
    let sweeps = 0;
    let admittedTotal = 0;
    let remaining = (await repository.fetchUnanalyzedEntries()).length;

    while (remaining > 0) {
      const admitted = await coordinator.processUnanalyzedEntries();
      sweeps++;
      admittedTotal += admitted;
      options.onSweep?.(sweeps, admitted);
      if (admitted === 0) break;

      await coordinator.whenIdle();
      const left = (await repository.fetchUnanalyzedEntries()).length;
      if (left >= remaining) break;
      remaining = left;
    }

    if (options.retryFailed && coordinator.failedCount > 0) {
      await coordinator.retryFailed();
      await coordinator.whenIdle();
    }

    return {
      sweeps,
      admitted: admittedTotal,
      completed,
      failed: coordinator.failedCount,
      remaining: (await repository.fetchUnanalyzedEntries()).length,
      lastError: coordinator.lastError,
    };
  } finally {
    stopCounting();
  }
}
