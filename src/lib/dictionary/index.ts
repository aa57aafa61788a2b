/**
 * Data dictionary - flat cross-dataset table of field definitions, merged by (dataset, field_name)
 */

import fs from "fs/promises";
import Papa from "papaparse";
import type {
  DataDictionaryEntry,
  DictionaryStatus,
  FieldRegistry,
  FieldType,
} from "../../types/data-model.js";
import { InputReadError, FileIOError, hasErrorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { writeFileAtomic } from "../emitter/atomic-write.js";
import { columnMetadataFor, dictionaryEntry } from "../embedder/index.js";

export const DICTIONARY_COLUMNS = [
  "dataset",
  "field_name",
  "type",
  "status",
  "title",
  "description",
  "unit",
  "enum",
] as const satisfies ReadonlyArray<keyof DataDictionaryEntry>;

const STATUSES: readonly DictionaryStatus[] = ["declared", "undefined", "unobserved"];

export interface DictionaryUpdateResult {
  path: string;
  entries: number;
  /** False when the merged dictionary matched the file already on disk */
  written: boolean;
}

function compareEntries(a: DataDictionaryEntry, b: DataDictionaryEntry): number {
  if (a.dataset !== b.dataset) return a.dataset < b.dataset ? -1 : 1;
  if (a.field_name !== b.field_name) return a.field_name < b.field_name ? -1 : 1;
  return 0;
}

function entryKey(entry: DataDictionaryEntry): string {
  return `${entry.dataset}\u0000${entry.field_name}`;
}

export interface DictionaryMergeOptions {
  /** Datasets whose existing entries are all dropped before the incoming ones are added */
  replaceDatasets?: readonly string[];
  /** Keep the status and type already on file for fields that have an entry (definitions-only rebuilds) */
  keepObservedFields?: boolean;
}

/**
 * Merge incoming entries into an existing dictionary. An incoming entry replaces
 * the existing entry with the same (dataset, field_name); the result is sorted by
 * dataset, then field name.
 */
export function mergeDictionary(
  existing: readonly DataDictionaryEntry[],
  incoming: readonly DataDictionaryEntry[],
  options: DictionaryMergeOptions = {},
): DataDictionaryEntry[] {
  const replaced = new Set(options.replaceDatasets ?? []);
  const merged = new Map<string, DataDictionaryEntry>();
  for (const entry of existing) {
    if (!replaced.has(entry.dataset)) merged.set(entryKey(entry), entry);
  }
  for (const entry of incoming) {
    const key = entryKey(entry);
    const current = merged.get(key);
    merged.set(
      key,
      options.keepObservedFields && current ? { ...entry, status: current.status, type: current.type } : entry,
    );
  }
  return Array.from(merged.values()).sort(compareEntries);
}

/**
 * Dictionary entries straight from a field registry, without looking at data.
 * Type overrides win over declared types, as they do when parsing.
 */
export function dictionaryFromRegistry(
  registry: FieldRegistry,
  typeOverrides: Readonly<Record<string, FieldType>> = {},
): DataDictionaryEntry[] {
  return Array.from(registry.fields.values(), (definition) =>
    dictionaryEntry(
      registry.dataset,
      definition.name,
      typeOverrides[definition.name] ?? definition.declaredType,
      columnMetadataFor(definition),
      true,
    ),
  );
}

export function serializeDictionary(entries: readonly DataDictionaryEntry[]): string {
  const csv = Papa.unparse(
    {
      fields: [...DICTIONARY_COLUMNS],
      data: entries.map((entry) => DICTIONARY_COLUMNS.map((column) => entry[column])),
    },
    { newline: "\n" },
  );
  return `${csv}\n`;
}

function toStatus(value: string | undefined): DictionaryStatus {
  return STATUSES.find((status) => status === value) ?? "declared";
}

export function parseDictionary(text: string): DataDictionaryEntry[] {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new InputReadError(`Failed to parse data dictionary: ${first?.message} (row ${first?.row})`, {
      errors: parsed.errors.length,
    });
  }

  const entries: DataDictionaryEntry[] = [];
  for (const row of parsed.data) {
    const dataset = row.dataset;
    const fieldName = row.field_name;
    if (!dataset || !fieldName) {
      logger.warn("Skipping data dictionary row without dataset or field_name", row);
      continue;
    }
    entries.push({
      dataset,
      field_name: fieldName,
      type: row.type ?? "",
      status: toStatus(row.status),
      title: row.title ?? "",
      description: row.description ?? "",
      unit: row.unit ?? "",
      enum: row.enum ?? "",
    });
  }
  return entries;
}

async function readExistingText(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return undefined;
    throw new FileIOError(`Failed to read data dictionary ${filePath}`, undefined, { cause: error });
  }
}

/**
 * Merge entries into the dictionary file. Single writer: call once per run,
 * after every dataset pipeline has finished.
 */
export async function updateDictionaryFile(
  filePath: string,
  incoming: readonly DataDictionaryEntry[],
  options: DictionaryMergeOptions = {},
): Promise<DictionaryUpdateResult> {
  const existingText = await readExistingText(filePath);
  const existing = existingText === undefined ? [] : parseDictionary(existingText);
  const merged = mergeDictionary(existing, incoming, options);
  const text = serializeDictionary(merged);

  if (text === existingText) {
    logger.info("Data dictionary unchanged", { path: filePath, entries: merged.length });
    return { path: filePath, entries: merged.length, written: false };
  }

  await writeFileAtomic(filePath, text);
  logger.info("Data dictionary saved", { path: filePath, entries: merged.length });
  return { path: filePath, entries: merged.length, written: true };
}
