/**
 * Parquet writer - persists an annotated table with its footer metadata
 */

import fs from "fs/promises";
import { parquetWriteBuffer } from "hyparquet-writer";
import { parquetMetadata } from "hyparquet";
import type { AnnotatedColumn, AnnotatedTable, CellValue, FieldType } from "../../types/data-model.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { fileExists, writeFileAtomic } from "./atomic-write.js";
import { decodeTableMetadata, encodeTableMetadata } from "./metadata-codec.js";
import type { DecodedTableMetadata, ParquetWriteOptions, ParquetWriteOutcome } from "./types.js";

export const DEFAULT_ROW_GROUP_SIZE = 100_000;

const PARQUET_TYPES = {
  integer: "INT64",
  float: "DOUBLE",
  date: "TIMESTAMP",
  string: "STRING",
  categorical: "STRING",
} as const satisfies Record<FieldType, string>;

type ParquetCell = bigint | number | string | Date | null;

function toParquetCell(cell: CellValue): ParquetCell {
  switch (cell.kind) {
    case "null":
      return null;
    case "integer":
      return BigInt(cell.value);
    case "float":
      return cell.value;
    case "date":
      return new Date(`${cell.value}T00:00:00.000Z`);
    case "string":
      return cell.value;
  }
}

function toColumnData(column: AnnotatedColumn) {
  return {
    name: column.name,
    data: column.values.map(toParquetCell),
    type: PARQUET_TYPES[column.type],
  };
}

/**
 * Encode an annotated table into an in-memory parquet file
 */
export function encodeParquet(table: AnnotatedTable, options: ParquetWriteOptions): ArrayBuffer {
  return parquetWriteBuffer({
    columnData: table.columns.map(toColumnData),
    kvMetadata: encodeTableMetadata(table, options.provenance),
    rowGroupSize: options.rowGroupSize ?? DEFAULT_ROW_GROUP_SIZE,
  });
}

/**
 * Write the table to `destination`. An existing destination is left untouched
 * unless `force` is set; the write itself is atomic.
 */
export async function writeParquetTable(
  table: AnnotatedTable,
  destination: string,
  options: ParquetWriteOptions,
): Promise<ParquetWriteOutcome> {
  if (!options.force && (await fileExists(destination))) {
    logger.info("Output already exists. Use --force to overwrite.", { destination });
    return { status: "skipped", path: destination };
  }

  const buffer = encodeParquet(table, options);
  await writeFileAtomic(destination, new Uint8Array(buffer));

  logger.info("Saved parquet file", {
    destination,
    records: table.rowCount,
    fields: table.columns.length,
  });

  return {
    status: "written",
    path: destination,
    bytes: buffer.byteLength,
    rowCount: table.rowCount,
    columnCount: table.columns.length,
  };
}

/**
 * Read the provenance stamp and column annotations back from a parquet footer
 */
export async function readParquetMetadata(filePath: string): Promise<DecodedTableMetadata> {
  let file: Buffer;
  try {
    file = await fs.readFile(filePath);
  } catch (error) {
    throw new FileIOError(`Failed to read parquet file ${filePath}`, undefined, { cause: error });
  }

  const arrayBuffer = new ArrayBuffer(file.byteLength);
  new Uint8Array(arrayBuffer).set(file);
  const metadata = parquetMetadata(arrayBuffer);
  return decodeTableMetadata(metadata.key_value_metadata ?? []);
}
