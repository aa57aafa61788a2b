/**
 * The two BankFind datasets and where their files live
 */

import type { DatasetDefinition } from "../../types/config.js";
import type { DatasetName, FieldType } from "../../types/data-model.js";

/**
 * Fields delivered as M/D/YYYY strings that are stored as dates
 */
export const FDIC_DATE_FIELDS: readonly string[] = ["FAILDATE", "RESDATE", "BRDATE", "PTRDATE"];

export const SCHEMA_FILES: Readonly<Record<DatasetName, string>> = {
  institutions: "institution_properties.yaml",
  failures: "failure_properties.yaml",
};

export function dateOverrides(fields: readonly string[]): Record<string, FieldType> {
  return Object.fromEntries(fields.map((field): [string, FieldType] => [field, "date"]));
}

export function datasetDefinition(
  name: DatasetName,
  dateFields: readonly string[] = FDIC_DATE_FIELDS,
): DatasetDefinition {
  return {
    name,
    rawPrefix: name,
    schemaFile: SCHEMA_FILES[name],
    typeOverrides: dateOverrides(dateFields),
  };
}
