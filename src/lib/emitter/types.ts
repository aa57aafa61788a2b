/**
 * Emitter module types
 */

import type {
  ColumnMetadata,
  FieldType,
  Provenance,
} from "../../types/data-model.js";

export interface ParquetWriteOptions {
  /** Overwrite an existing destination instead of skipping it */
  force: boolean;
  provenance: Provenance;
  /** Rows per row group (default 100000) */
  rowGroupSize?: number;
}

export type ParquetWriteOutcome =
  | {
      status: "written";
      path: string;
      bytes: number;
      rowCount: number;
      columnCount: number;
    }
  | { status: "skipped"; path: string };

/**
 * Parquet footer key/value pair
 */
export interface KeyValueEntry {
  key: string;
  value?: string;
}

export interface DecodedColumn {
  name: string;
  type: FieldType;
  metadata: ColumnMetadata;
}

export interface DecodedTableMetadata {
  dataset?: string;
  generatedAt?: string;
  sourceFile?: string;
  rowCount?: number;
  columns: DecodedColumn[];
}
