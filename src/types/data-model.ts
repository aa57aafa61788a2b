/**
 * Core data model types for the parse pipeline
 * These structures flow through the pipeline: raw records → normalization → metadata embedding → parquet
 */

/**
 * Datasets published by the BankFind API that this pipeline knows how to parse
 */
export const DATASET_NAMES = ["institutions", "failures"] as const;

export type DatasetName = (typeof DATASET_NAMES)[number];

export function isDatasetName(value: string): value is DatasetName {
  return DATASET_NAMES.some((name) => name === value);
}

/**
 * Storage type of a column. `categorical` columns hold raw enum codes as strings.
 */
export type FieldType = "string" | "integer" | "float" | "date" | "categorical";

/**
 * Ordered mapping from raw code to human label
 */
export type EnumMap = ReadonlyMap<string, string>;

/**
 * FieldDefinition - one declared variable from a field-definition document
 */
export interface FieldDefinition {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly unit?: string;
  readonly enum?: EnumMap;
  readonly declaredType: FieldType;
}

/**
 * FieldRegistry - declared fields of one dataset, keyed by name in declaration order
 */
export interface FieldRegistry {
  readonly dataset: DatasetName;
  readonly fields: ReadonlyMap<string, FieldDefinition>;
}

/**
 * SchemaRegistry - field registries of every dataset in a run
 */
export type SchemaRegistry = ReadonlyMap<DatasetName, FieldRegistry>;

/**
 * RawValue - scalar as delivered by the API
 */
export type RawValue = string | number | boolean | null;

/**
 * RawRecord - one entity before type normalization; keys vary record to record
 */
export type RawRecord = Readonly<Record<string, RawValue>>;

/**
 * CellValue - a normalized value, tagged with the type it was coerced to
 */
export type CellValue =
  | { readonly kind: "null" }
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "date"; readonly value: string } // YYYY-MM-DD
  | { readonly kind: "string"; readonly value: string };

export const NULL_CELL: CellValue = { kind: "null" };

/**
 * Column - name, resolved type and row-aligned values
 */
export interface Column {
  readonly name: string;
  readonly type: FieldType;
  readonly values: readonly CellValue[];
  /** Present in the field registry */
  readonly declared: boolean;
  /** Present as a key in at least one raw record */
  readonly observed: boolean;
}

/**
 * NormalizedTable - uniform tabular form of one dataset.
 * Column names are unique and every column holds exactly rowCount values.
 */
export interface NormalizedTable {
  readonly dataset: DatasetName;
  readonly rowCount: number;
  readonly columns: readonly Column[];
}

/**
 * CoercionWarning - a present value that failed to parse under its column type
 */
export interface CoercionWarning {
  readonly dataset: DatasetName;
  readonly field: string;
  readonly row: number;
  readonly rawValue: RawValue;
  readonly targetType: FieldType;
}

/**
 * ColumnMetadata - sidecar annotations attached to a column.
 * Undeclared columns carry `{ declared: false }`.
 */
export type ColumnMetadata =
  | {
      readonly declared: true;
      readonly title: string;
      readonly description: string;
      readonly unit?: string;
      readonly enum?: EnumMap;
    }
  | { readonly declared: false };

export interface AnnotatedColumn extends Column {
  readonly metadata: ColumnMetadata;
}

/**
 * SchemaDrift - declared field set vs. observed field set
 */
export interface SchemaDrift {
  /** Observed in the data but missing from the field-definition document */
  readonly undeclared: readonly string[];
  /** Declared but never observed in the data */
  readonly unobserved: readonly string[];
}

export interface AnnotatedTable extends NormalizedTable {
  readonly columns: readonly AnnotatedColumn[];
  readonly drift: SchemaDrift;
}

/**
 * Dictionary status of a field: declared and observed, observed only, or declared only
 */
export type DictionaryStatus = "declared" | "undefined" | "unobserved";

/**
 * DataDictionaryEntry - one flattened row of the cross-dataset dictionary
 */
export interface DataDictionaryEntry {
  readonly dataset: string;
  readonly field_name: string;
  readonly type: string;
  readonly status: DictionaryStatus;
  readonly title: string;
  readonly description: string;
  readonly unit: string;
  readonly enum: string;
}

/**
 * Provenance stamp written into each parquet file footer
 */
export interface Provenance {
  readonly dataset: DatasetName;
  readonly generatedAt: string; // ISO 8601
  readonly sourceFile?: string;
}
