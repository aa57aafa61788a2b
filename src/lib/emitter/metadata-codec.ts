/**
 * Parquet footer metadata: per-column annotations and the provenance stamp.
 * Footer values are flat strings, so structured values are JSON-encoded.
 */

import type {
  AnnotatedColumn,
  AnnotatedTable,
  ColumnMetadata,
  FieldType,
  Provenance,
} from "../../types/data-model.js";
import { MetadataError } from "../../utils/errors.js";
import type { DecodedColumn, DecodedTableMetadata, KeyValueEntry } from "./types.js";

export const METADATA_NAMESPACE = "bankfind";
export const COLUMN_KEY_PREFIX = `${METADATA_NAMESPACE}.column.`;

export const PROVENANCE_KEYS = {
  dataset: `${METADATA_NAMESPACE}.dataset`,
  generatedAt: `${METADATA_NAMESPACE}.generated_at`,
  sourceFile: `${METADATA_NAMESPACE}.source_file`,
  rowCount: `${METADATA_NAMESPACE}.row_count`,
  columns: `${METADATA_NAMESPACE}.columns`,
} as const;

const FIELD_TYPES: readonly FieldType[] = ["string", "integer", "float", "date", "categorical"];

/**
 * JSON shape stored under bankfind.column.<name>; enum is an ordered list of [code, label]
 */
interface EncodedColumnMetadata {
  declared: boolean;
  type: FieldType;
  title?: string;
  description?: string;
  unit?: string;
  enum?: Array<[string, string]>;
}

export function encodeColumnMetadata(column: AnnotatedColumn): string {
  const encoded: EncodedColumnMetadata = { declared: column.metadata.declared, type: column.type };

  if (column.metadata.declared) {
    encoded.title = column.metadata.title;
    encoded.description = column.metadata.description;
    if (column.metadata.unit !== undefined) encoded.unit = column.metadata.unit;
    if (column.metadata.enum) encoded.enum = Array.from(column.metadata.enum);
  }

  return JSON.stringify(encoded);
}

/**
 * Footer key/value entries for an annotated table
 */
export function encodeTableMetadata(table: AnnotatedTable, provenance: Provenance): KeyValueEntry[] {
  const entries: KeyValueEntry[] = [
    { key: PROVENANCE_KEYS.dataset, value: provenance.dataset },
    { key: PROVENANCE_KEYS.generatedAt, value: provenance.generatedAt },
    { key: PROVENANCE_KEYS.rowCount, value: String(table.rowCount) },
    { key: PROVENANCE_KEYS.columns, value: JSON.stringify(table.columns.map((column) => column.name)) },
  ];

  if (provenance.sourceFile !== undefined) {
    entries.push({ key: PROVENANCE_KEYS.sourceFile, value: provenance.sourceFile });
  }

  for (const column of table.columns) {
    entries.push({ key: `${COLUMN_KEY_PREFIX}${column.name}`, value: encodeColumnMetadata(column) });
  }

  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function decodeEnum(value: unknown): Map<string, string> | undefined {
  if (!Array.isArray(value)) return undefined;
  const pairs: Array<[string, string]> = [];
  for (const pair of value) {
    if (Array.isArray(pair) && typeof pair[0] === "string" && typeof pair[1] === "string") {
      pairs.push([pair[0], pair[1]]);
    }
  }
  return new Map(pairs);
}

/**
 * Decode one bankfind.column.<name> value; undefined when it is not ours
 */
export function decodeColumnMetadata(name: string, value: string): DecodedColumn | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new MetadataError(`Column metadata for ${name} is not valid JSON`, { column: name }, { cause: error });
  }
  if (!isRecord(parsed) || !isFieldType(parsed.type)) return undefined;

  let metadata: ColumnMetadata = { declared: false };
  if (parsed.declared === true) {
    const unit = optionalString(parsed.unit);
    const enumMap = decodeEnum(parsed.enum);
    metadata = {
      declared: true,
      title: optionalString(parsed.title) ?? "",
      description: optionalString(parsed.description) ?? "",
      ...(unit !== undefined ? { unit } : {}),
      ...(enumMap ? { enum: enumMap } : {}),
    };
  }

  return { name, type: parsed.type, metadata };
}

/**
 * Decode the footer entries written by encodeTableMetadata; foreign keys are ignored
 */
export function decodeTableMetadata(entries: readonly KeyValueEntry[]): DecodedTableMetadata {
  const values = new Map<string, string>();
  for (const entry of entries) {
    if (entry.value !== undefined) values.set(entry.key, entry.value);
  }

  const columns: DecodedColumn[] = [];
  for (const [key, value] of values) {
    if (!key.startsWith(COLUMN_KEY_PREFIX)) continue;
    const decoded = decodeColumnMetadata(key.slice(COLUMN_KEY_PREFIX.length), value);
    if (decoded) columns.push(decoded);
  }

  const rowCount = values.get(PROVENANCE_KEYS.rowCount);
  return {
    dataset: values.get(PROVENANCE_KEYS.dataset),
    generatedAt: values.get(PROVENANCE_KEYS.generatedAt),
    sourceFile: values.get(PROVENANCE_KEYS.sourceFile),
    rowCount: rowCount === undefined ? undefined : Number(rowCount),
    columns,
  };
}
