/**
 * Resolved configuration types for the parse pipeline
 */

import type { DatasetName, FieldType } from "./data-model.js";

/**
 * PathsConfig - where raw inputs are read and outputs are written
 */
export interface PathsConfig {
  dataDir: string;
  rawDir: string;
  processedDir: string;
  dictionaryPath: string;
}

/**
 * DatasetDefinition - how one dataset's files are located and typed
 */
export interface DatasetDefinition {
  name: DatasetName;
  rawPrefix: string; // raw files are <rawPrefix>_<YYYYMMDD>.json
  schemaFile: string; // relative to rawDir
  typeOverrides: Readonly<Record<string, FieldType>>;
}

/**
 * ParseConfig - fully resolved settings of one parse run
 */
export interface ParseConfig {
  paths: PathsConfig;
  datasets: DatasetDefinition[];
  force: boolean;
  parallel: boolean;
}
