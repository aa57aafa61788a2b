/**
 * Configuration loader for the parse command
 */

import path from "path";
import type { ParseConfig } from "../types/config.js";
import { DATASET_NAMES, isDatasetName } from "../types/data-model.js";
import type { DatasetName } from "../types/data-model.js";
import { datasetDefinition, FDIC_DATE_FIELDS } from "../lib/pipeline/datasets.js";
import { ConfigError } from "./errors.js";
import { isLogLevel, logger } from "./logger.js";
import type { LogLevel } from "./logger.js";

/**
 * CLI options shared by the parse and dictionary commands
 */
export interface ParseCliOptions {
  force?: boolean;
  dataset?: string; // Comma-separated dataset names
  parallel?: boolean;
  dataDir?: string;
  rawDir?: string;
  processedDir?: string;
  dictionaryPath?: string;
}

/**
 * `parse` section of a config file
 */
export interface ParseConfigSection {
  dataDir?: string;
  rawDir?: string;
  processedDir?: string;
  dictionaryPath?: string;
  datasets?: string[];
  force?: boolean;
  parallel?: boolean;
  dateFields?: string[];
  logLevel?: LogLevel;
}

export const DEFAULT_DATA_DIR = "data";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Validate the untyped `parse` section read from a config file
 *
 * @throws ConfigError if a key has the wrong type
 */
export function validateParseConfigSection(section: unknown): ParseConfigSection {
  if (section === undefined || section === null) return {};
  if (!isRecord(section)) {
    throw new ConfigError("Config section `parse` must be a mapping");
  }

  const result: ParseConfigSection = {};

  for (const key of ["dataDir", "rawDir", "processedDir", "dictionaryPath"] as const) {
    const value = section[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || value.trim() === "") {
      throw new ConfigError(`Config key parse.${key} must be a non-empty string`);
    }
    result[key] = value;
  }

  for (const key of ["force", "parallel"] as const) {
    const value = section[key];
    if (value === undefined) continue;
    if (typeof value !== "boolean") {
      throw new ConfigError(`Config key parse.${key} must be a boolean`);
    }
    result[key] = value;
  }

  for (const key of ["datasets", "dateFields"] as const) {
    const value = section[key];
    if (value === undefined) continue;
    if (!isStringArray(value)) {
      throw new ConfigError(`Config key parse.${key} must be a list of strings`);
    }
    result[key] = value;
  }

  if (section.logLevel !== undefined) {
    if (!isLogLevel(section.logLevel)) {
      throw new ConfigError(`Config key parse.logLevel must be one of error, warn, info, debug`);
    }
    result.logLevel = section.logLevel;
  }

  return result;
}

/**
 * Parse a dataset selection; an empty selection means every dataset
 */
export function parseDatasetList(names: readonly string[] | undefined): DatasetName[] {
  if (!names || names.length === 0) return [...DATASET_NAMES];

  const selected: DatasetName[] = [];
  for (const raw of names) {
    const name = raw.trim();
    if (!isDatasetName(name)) {
      throw new ConfigError(`Unknown dataset "${name}". Expected one of: ${DATASET_NAMES.join(", ")}`);
    }
    if (!selected.includes(name)) selected.push(name);
  }
  return selected;
}

/**
 * Build the parse configuration with precedence: CLI > config file > defaults
 *
 * @example
 * const config = loadParseConfig({ force: true }, { dataDir: "/srv/fdic" });
 * // config.paths.rawDir === "/srv/fdic/raw", config.force === true
 */
export function loadParseConfig(
  cliOptions: ParseCliOptions = {},
  configFile: ParseConfigSection = {},
): ParseConfig {
  const dataDir = cliOptions.dataDir ?? configFile.dataDir ?? DEFAULT_DATA_DIR;

  const datasetNames = cliOptions.dataset
    ? parseDatasetList(cliOptions.dataset.split(","))
    : parseDatasetList(configFile.datasets);

  const dateFields = configFile.dateFields ?? FDIC_DATE_FIELDS;

  const config: ParseConfig = {
    paths: {
      dataDir,
      rawDir: cliOptions.rawDir ?? configFile.rawDir ?? path.join(dataDir, "raw"),
      processedDir: cliOptions.processedDir ?? configFile.processedDir ?? path.join(dataDir, "processed"),
      dictionaryPath: cliOptions.dictionaryPath ?? configFile.dictionaryPath ?? path.join(dataDir, "data_dictionary.csv"),
    },
    datasets: datasetNames.map((name) => datasetDefinition(name, dateFields)),
    force: cliOptions.force ?? configFile.force ?? false,
    parallel: cliOptions.parallel ?? configFile.parallel ?? false,
  };

  logger.debug("Parse config loaded", {
    paths: config.paths,
    datasets: datasetNames,
    force: config.force,
    parallel: config.parallel,
  });

  return config;
}
