/**
 * Raw input - locates and loads the JSON files written by the download stage
 */

import fs from "fs/promises";
import path from "path";
import type { RawRecord, RawValue } from "../../types/data-model.js";
import { InputReadError, hasErrorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export interface RawFileInfo {
  path: string;
  /** YYYYMMDD stamp from the file name, when present */
  stamp?: string;
  mtimeMs: number;
}

const STAMP_PATTERN = /_(\d{8})\.json$/;

export function stampFromFileName(fileName: string): string | undefined {
  return STAMP_PATTERN.exec(fileName)?.[1];
}

/**
 * Newest `<prefix>_*.json` file in a directory: by name stamp, then modification time
 */
export async function findLatestRawFile(dir: string, prefix: string): Promise<RawFileInfo | undefined> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return undefined;
    throw new InputReadError(`Failed to list raw data directory ${dir}`, { dir }, { cause: error });
  }

  const candidates = await Promise.all(
    names
      .filter((name) => name.startsWith(`${prefix}_`) && name.endsWith(".json"))
      .map(async (name): Promise<RawFileInfo> => {
        const filePath = path.join(dir, name);
        const stats = await fs.stat(filePath);
        return { path: filePath, stamp: stampFromFileName(name), mtimeMs: stats.mtimeMs };
      }),
  );

  candidates.sort((a, b) => {
    const stampA = a.stamp ?? "";
    const stampB = b.stamp ?? "";
    if (stampA !== stampB) return stampA < stampB ? -1 : 1;
    return a.mtimeMs - b.mtimeMs;
  });

  return candidates.at(-1);
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRawValue(value: unknown): RawValue | undefined {
  if (value === undefined) return undefined;
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  // Nested structures are kept as their JSON text
  return JSON.stringify(value);
}

function toRawRecord(item: Record<string, unknown>): RawRecord {
  const record: Record<string, RawValue> = {};
  for (const [key, value] of Object.entries(item)) {
    const raw = toRawValue(value);
    if (raw !== undefined) record[key] = raw;
  }
  return record;
}

/**
 * Turn a downloaded payload into raw records. Accepts a list of records, a list of
 * API items wrapping each record in `data`, or an API page `{ meta, data: [...] }`.
 */
export function flattenRecords(payload: unknown): RawRecord[] {
  const items = Array.isArray(payload)
    ? payload
    : isRecordObject(payload) && Array.isArray(payload.data)
      ? payload.data
      : undefined;

  if (!items) {
    throw new InputReadError("Raw data must be a JSON array of records");
  }

  return items.map((item: unknown, index: number) => {
    if (!isRecordObject(item)) {
      throw new InputReadError(`Raw record ${index} is not an object`, { index });
    }
    const inner = isRecordObject(item.data) ? item.data : item;
    return toRawRecord(inner);
  });
}

export async function loadRawRecords(filePath: string): Promise<RawRecord[]> {
  let payload: unknown;
  try {
    const content = await fs.readFile(filePath, "utf-8");
    payload = JSON.parse(content);
  } catch (error) {
    throw new InputReadError(`Failed to load raw data from ${filePath}`, { filePath }, { cause: error });
  }

  const records = flattenRecords(payload);
  logger.debug("Raw records loaded", { filePath, count: records.length });
  return records;
}
