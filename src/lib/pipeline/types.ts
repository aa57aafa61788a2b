/**
 * Pipeline driver types
 */

import type { DataDictionaryEntry, DatasetName, SchemaDrift } from "../../types/data-model.js";
import type { ErrorSummary } from "../../utils/errors.js";
import type { DictionaryUpdateResult } from "../dictionary/index.js";

export type DatasetOutcome =
  | {
      dataset: DatasetName;
      status: "success";
      outputPath: string;
      sourceFile: string;
      rows: number;
      columns: number;
      /** Coercion warning count per field */
      coercionWarnings: Record<string, number>;
      drift: SchemaDrift;
    }
  | {
      dataset: DatasetName;
      status: "skipped";
      outputPath: string;
      reason: string;
    }
  | {
      dataset: DatasetName;
      status: "failed";
      error: ErrorSummary;
    };

export interface DatasetRunResult {
  outcome: DatasetOutcome;
  dictionaryEntries: DataDictionaryEntry[];
}

export interface PipelineReport {
  outcomes: DatasetOutcome[];
  dictionary?: DictionaryUpdateResult;
  dictionaryError?: ErrorSummary;
}

export interface PipelineRunOptions {
  /** Clock used for provenance stamps */
  now?: () => Date;
}
