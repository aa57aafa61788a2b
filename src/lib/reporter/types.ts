/**
 * Reporter module types
 */

import type { ErrorSummary } from "../../utils/errors.js";
import type { DictionaryUpdateResult } from "../dictionary/index.js";
import type { DatasetOutcome } from "../pipeline/types.js";

export type RunStatus = "success" | "partial" | "error";

/**
 * JSON report printed by the parse command
 */
export interface RunSummary {
  status: RunStatus;
  phase: "parse";
  datasets: DatasetOutcome[];
  totals: {
    succeeded: number;
    skipped: number;
    failed: number;
    coercionWarnings: number;
  };
  dictionary?: DictionaryUpdateResult;
  dictionaryError?: ErrorSummary;
  durationMs: number;
}
