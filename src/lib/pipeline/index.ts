/**
 * Pipeline driver - raw JSON + field definitions → normalized table → metadata → parquet,
 * one independent run per dataset
 */

import path from "path";
import type { DatasetDefinition, ParseConfig } from "../../types/config.js";
import type { DataDictionaryEntry } from "../../types/data-model.js";
import { InputReadError, toBankFindError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { updateDictionaryFile } from "../dictionary/index.js";
import { buildDictionaryEntries, embedMetadata } from "../embedder/index.js";
import { fileExists, writeParquetTable } from "../emitter/index.js";
import { Normalizer } from "../normalizer/index.js";
import { loadSchemaFile } from "../schema/index.js";
import { findLatestRawFile, loadRawRecords } from "./raw-input.js";
import type { DatasetOutcome, DatasetRunResult, PipelineReport, PipelineRunOptions } from "./types.js";

export * from "./types.js";
export * from "./datasets.js";
export * from "./raw-input.js";

/**
 * YYYYMMDD in local time
 */
export function formatStamp(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}${month}${day}`;
}

export function outputPathFor(definition: DatasetDefinition, processedDir: string, stamp: string): string {
  return path.join(processedDir, `${definition.name}_${stamp}.parquet`);
}

/**
 * Parse one dataset. Throws on fatal errors; runPipeline turns them into failed outcomes.
 */
export async function runDataset(
  definition: DatasetDefinition,
  config: ParseConfig,
  options: PipelineRunOptions = {},
): Promise<DatasetRunResult> {
  const now = options.now ?? (() => new Date());
  const dataset = definition.name;
  logger.info("Parsing dataset", { dataset });

  const rawFile = await findLatestRawFile(config.paths.rawDir, definition.rawPrefix);
  if (!rawFile) {
    throw new InputReadError(`No ${dataset} data found in ${config.paths.rawDir}`, { dataset });
  }

  // Unstamped raw files are dated by their modification time so re-runs map to the same output
  const stamp = rawFile.stamp ?? formatStamp(new Date(rawFile.mtimeMs));
  const outputPath = outputPathFor(definition, config.paths.processedDir, stamp);

  // Checked before any parsing so a skipped dataset touches nothing
  if (!config.force && (await fileExists(outputPath))) {
    logger.info("Output already exists. Use --force to overwrite.", { dataset, outputPath });
    return {
      outcome: { dataset, status: "skipped", outputPath, reason: "output exists" },
      dictionaryEntries: [],
    };
  }

  logger.info("Reading raw data", { dataset, file: rawFile.path });
  const registry = await loadSchemaFile(path.join(config.paths.rawDir, definition.schemaFile), dataset);
  const records = await loadRawRecords(rawFile.path);

  const normalizer = new Normalizer({ typeOverrides: definition.typeOverrides });
  const { table, coercion } = normalizer.normalize(records, registry);
  const annotated = embedMetadata(table, registry);

  const written = await writeParquetTable(annotated, outputPath, {
    force: config.force,
    provenance: {
      dataset,
      generatedAt: now().toISOString(),
      sourceFile: path.basename(rawFile.path),
    },
  });

  if (written.status === "skipped") {
    return {
      outcome: { dataset, status: "skipped", outputPath, reason: "output exists" },
      dictionaryEntries: [],
    };
  }

  return {
    outcome: {
      dataset,
      status: "success",
      outputPath,
      sourceFile: rawFile.path,
      rows: written.rowCount,
      columns: written.columnCount,
      coercionWarnings: coercion.byField,
      drift: annotated.drift,
    },
    dictionaryEntries: buildDictionaryEntries(annotated),
  };
}

async function runDatasetSafely(
  definition: DatasetDefinition,
  config: ParseConfig,
  options: PipelineRunOptions,
): Promise<DatasetRunResult> {
  try {
    return await runDataset(definition, config, options);
  } catch (error) {
    const failure = toBankFindError(error);
    logger.error(`Failed to parse ${definition.name}`, failure.summarize());
    return {
      outcome: { dataset: definition.name, status: "failed", error: failure.summarize() },
      dictionaryEntries: [],
    };
  }
}

/**
 * Run every configured dataset, then merge the data dictionary once.
 * A failing dataset never stops its siblings.
 */
export async function runPipeline(config: ParseConfig, options: PipelineRunOptions = {}): Promise<PipelineReport> {
  let results: DatasetRunResult[];
  if (config.parallel) {
    results = await Promise.all(config.datasets.map((definition) => runDatasetSafely(definition, config, options)));
  } else {
    results = [];
    for (const definition of config.datasets) {
      results.push(await runDatasetSafely(definition, config, options));
    }
  }

  const outcomes: DatasetOutcome[] = results.map((result) => result.outcome);
  const entries: DataDictionaryEntry[] = results.flatMap((result) => result.dictionaryEntries);
  const parsed = outcomes.filter((outcome) => outcome.status === "success").map((outcome) => outcome.dataset);
  const report: PipelineReport = { outcomes };

  if (parsed.length === 0) {
    return report;
  }

  // Single writer: the dictionary is merged after every dataset has finished.
  // A parsed dataset's entries are replaced as a whole so fields that disappeared drop out.
  try {
    report.dictionary = await updateDictionaryFile(config.paths.dictionaryPath, entries, {
      replaceDatasets: parsed,
    });
  } catch (error) {
    const failure = toBankFindError(error);
    logger.error("Failed to update data dictionary", failure.summarize());
    report.dictionaryError = failure.summarize();
  }

  return report;
}
