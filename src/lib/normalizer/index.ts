/**
 * Normalizer module - turns loosely-typed raw records into a uniform typed table
 */

import type {
  CellValue,
  Column,
  FieldRegistry,
  FieldType,
  NormalizedTable,
  RawRecord,
  RawValue,
} from "../../types/data-model.js";
import { NULL_CELL } from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import { CoercionLog } from "./coercion-log.js";
import { coerceValue, inferColumnType } from "./type-mappers.js";
import type { CoercionLogSink, NormalizerOptions, NormalizerResult } from "./types.js";

export * from "./types.js";
export * from "./type-mappers.js";
export * from "./coercion-log.js";

interface ColumnPlan {
  name: string;
  declared: boolean;
  observed: boolean;
}

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Effective column set: declared fields in declaration order, then fields seen
 * only in the data, sorted
 */
export function planColumns(records: readonly RawRecord[], registry: FieldRegistry): ColumnPlan[] {
  const observed = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      observed.add(key);
    }
  }

  const declared = Array.from(registry.fields.keys());
  const declaredSet = new Set(declared);
  const undeclared = Array.from(observed)
    .filter((name) => !declaredSet.has(name))
    .sort(compareCodeUnits);

  return [
    ...declared.map((name) => ({ name, declared: true, observed: observed.has(name) })),
    ...undeclared.map((name) => ({ name, declared: false, observed: true })),
  ];
}

function columnValues(records: readonly RawRecord[], name: string): Array<RawValue | undefined> {
  return records.map((record) => (Object.hasOwn(record, name) ? record[name] : undefined));
}

function resolveType(
  plan: ColumnPlan,
  registry: FieldRegistry,
  rawValues: Array<RawValue | undefined>,
  options: NormalizerOptions,
): FieldType {
  const override = options.typeOverrides?.[plan.name];
  if (override) return override;

  const definition = registry.fields.get(plan.name);
  if (definition) return definition.declaredType;

  return inferColumnType(rawValues);
}

function buildColumn(
  plan: ColumnPlan,
  type: FieldType,
  rawValues: Array<RawValue | undefined>,
  registry: FieldRegistry,
  log: CoercionLogSink,
): Column {
  const values: CellValue[] = rawValues.map((raw, row) => {
    const cell = coerceValue(raw, type);
    if (cell !== undefined) return cell;

    log.record({
      dataset: registry.dataset,
      field: plan.name,
      row,
      rawValue: raw ?? null,
      targetType: type,
    });
    return NULL_CELL;
  });

  return {
    name: plan.name,
    type,
    values,
    declared: plan.declared,
    observed: plan.observed,
  };
}

/**
 * Normalize the raw records of one dataset against its field registry
 *
 * Row order follows record order. A value that is present but does not parse
 * under its column type becomes null and is recorded as a coercion warning;
 * the run continues.
 */
export function normalizeRecords(
  records: readonly RawRecord[],
  registry: FieldRegistry,
  options: NormalizerOptions = {},
): NormalizerResult {
  logger.info("Normalizing records", { dataset: registry.dataset, count: records.length });

  const coercionLog = new CoercionLog(registry.dataset);
  const sink: CoercionLogSink = options.coercionLog
    ? {
        record: (warning) => {
          coercionLog.record(warning);
          options.coercionLog?.record(warning);
        },
      }
    : coercionLog;

  const columns = planColumns(records, registry).map((plan) => {
    const rawValues = columnValues(records, plan.name);
    const type = resolveType(plan, registry, rawValues, options);
    return buildColumn(plan, type, rawValues, registry, sink);
  });

  const table: NormalizedTable = {
    dataset: registry.dataset,
    rowCount: records.length,
    columns,
  };

  const coercion = coercionLog.summarize();
  if (coercion.total > 0) {
    logger.warn("Coercion warnings", { dataset: registry.dataset, byField: coercion.byField });
  }

  logger.info("Normalization complete", {
    dataset: registry.dataset,
    rows: table.rowCount,
    columns: columns.length,
    coercionWarnings: coercion.total,
  });

  return { table, coercion };
}

/**
 * Main normalizer class
 */
export class Normalizer {
  constructor(private readonly options: NormalizerOptions = {}) {}

  normalize(records: readonly RawRecord[], registry: FieldRegistry): NormalizerResult {
    return normalizeRecords(records, registry, this.options);
  }
}
