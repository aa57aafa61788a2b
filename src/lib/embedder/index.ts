/**
 * Metadata embedder - attaches field metadata to normalized columns and
 * flattens it into data dictionary entries
 */

import type {
  AnnotatedColumn,
  AnnotatedTable,
  ColumnMetadata,
  DataDictionaryEntry,
  EnumMap,
  FieldDefinition,
  FieldRegistry,
  NormalizedTable,
  SchemaDrift,
} from "../../types/data-model.js";
import { MetadataError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Metadata record for a column; undeclared columns get an explicit empty record
 */
export function columnMetadataFor(definition: FieldDefinition | undefined): ColumnMetadata {
  if (!definition) return { declared: false };
  return {
    declared: true,
    title: definition.title,
    description: definition.description,
    ...(definition.unit !== undefined ? { unit: definition.unit } : {}),
    ...(definition.enum ? { enum: definition.enum } : {}),
  };
}

/**
 * Fields seen in data but not declared, and declared but never seen
 */
export function detectDrift(table: NormalizedTable): SchemaDrift {
  return {
    undeclared: table.columns.filter((column) => !column.declared).map((column) => column.name),
    unobserved: table.columns
      .filter((column) => column.declared && !column.observed)
      .map((column) => column.name),
  };
}

/**
 * Attach a ColumnMetadata record to every column of the table
 */
export function embedMetadata(table: NormalizedTable, registry: FieldRegistry): AnnotatedTable {
  if (table.dataset !== registry.dataset) {
    throw new MetadataError(`Field registry for ${registry.dataset} cannot annotate ${table.dataset}`, {
      table: table.dataset,
      registry: registry.dataset,
    });
  }

  const columns: AnnotatedColumn[] = table.columns.map((column) => ({
    ...column,
    metadata: columnMetadataFor(registry.fields.get(column.name)),
  }));

  const drift = detectDrift(table);
  if (drift.undeclared.length > 0 || drift.unobserved.length > 0) {
    logger.info("Schema drift detected", { dataset: table.dataset, ...drift });
  }

  return { ...table, columns, drift };
}

/**
 * Serialize an enum map for the dictionary: code=label pairs joined by "|",
 * bare codes where the label repeats the code
 */
export function formatEnum(enumMap: EnumMap | undefined): string {
  if (!enumMap) return "";
  return Array.from(enumMap, ([code, label]) => (code === label ? code : `${code}=${label}`)).join("|");
}

function flattenText(text: string): string {
  return text.replace(/\s*\n\s*/g, " ").trim();
}

/**
 * Build a dictionary entry for one field
 */
export function dictionaryEntry(
  dataset: string,
  fieldName: string,
  type: string,
  metadata: ColumnMetadata,
  observed: boolean,
): DataDictionaryEntry {
  if (!metadata.declared) {
    return {
      dataset,
      field_name: fieldName,
      type,
      status: "undefined",
      title: "",
      description: "",
      unit: "",
      enum: "",
    };
  }

  return {
    dataset,
    field_name: fieldName,
    type,
    status: observed ? "declared" : "unobserved",
    title: flattenText(metadata.title),
    description: flattenText(metadata.description),
    unit: metadata.unit ?? "",
    enum: formatEnum(metadata.enum),
  };
}

/**
 * Flatten an annotated table into one dictionary entry per column
 */
export function buildDictionaryEntries(table: AnnotatedTable): DataDictionaryEntry[] {
  return table.columns.map((column) =>
    dictionaryEntry(table.dataset, column.name, column.type, column.metadata, column.observed),
  );
}
