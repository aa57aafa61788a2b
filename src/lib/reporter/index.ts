/**
 * Reporter module - condenses per-dataset outcomes into the run report and exit code
 */

import type { PipelineReport } from "../pipeline/types.js";
import type { RunStatus, RunSummary } from "./types.js";

export type { RunStatus, RunSummary } from "./types.js";

function sumWarnings(byField: Record<string, number>): number {
  return Object.values(byField).reduce((total, count) => total + count, 0);
}

export function summarizeRun(report: PipelineReport, durationMs: number): RunSummary {
  let succeeded = 0;
  let skipped = 0;
  let failed = 0;
  let coercionWarnings = 0;

  for (const outcome of report.outcomes) {
    switch (outcome.status) {
      case "success":
        succeeded++;
        coercionWarnings += sumWarnings(outcome.coercionWarnings);
        break;
      case "skipped":
        skipped++;
        break;
      case "failed":
        failed++;
        break;
    }
  }

  let status: RunStatus = "success";
  if (failed > 0 || report.dictionaryError) {
    status = failed === report.outcomes.length ? "error" : "partial";
  }

  return {
    status,
    phase: "parse",
    datasets: report.outcomes,
    totals: { succeeded, skipped, failed, coercionWarnings },
    ...(report.dictionary ? { dictionary: report.dictionary } : {}),
    ...(report.dictionaryError ? { dictionaryError: report.dictionaryError } : {}),
    durationMs,
  };
}

/**
 * 0 when every dataset succeeded or was skipped, 1 otherwise
 */
export function exitCodeFor(report: PipelineReport): number {
  const failed = report.outcomes.some((outcome) => outcome.status === "failed");
  return failed || report.dictionaryError ? 1 : 0;
}
