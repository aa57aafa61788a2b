/**
 * Normalizer module types
 */

import type {
  CoercionWarning,
  DatasetName,
  FieldType,
  NormalizedTable,
} from "../../types/data-model.js";

export interface NormalizerOptions {
  /** Forced column types; take precedence over declared and inferred types */
  typeOverrides?: Readonly<Record<string, FieldType>>;
  /** Warnings sink; a fresh log is created when omitted */
  coercionLog?: CoercionLogSink;
}

export interface CoercionLogSink {
  record(warning: CoercionWarning): void;
}

export interface CoercionSummary {
  dataset: DatasetName;
  total: number;
  /** Warning count per field */
  byField: Record<string, number>;
  /** First few warnings per field */
  samples: Record<string, CoercionWarning[]>;
}

export interface NormalizerResult {
  table: NormalizedTable;
  coercion: CoercionSummary;
}
