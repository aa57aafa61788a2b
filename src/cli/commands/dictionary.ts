/**
 * Dictionary command - rebuild data dictionary entries from field-definition documents alone
 */

import path from "path";
import { Command } from "commander";
import { dictionaryFromRegistry, updateDictionaryFile } from "../../lib/dictionary/index.js";
import { loadSchemaFile } from "../../lib/schema/index.js";
import type { DataDictionaryEntry } from "../../types/data-model.js";
import type { DictionaryCommandOptions } from "../config/types.js";
import { exitWithError, resolveCommandConfig } from "./common.js";

async function executeDictionary(options: DictionaryCommandOptions): Promise<void> {
  try {
    const config = resolveCommandConfig(options);

    const entries: DataDictionaryEntry[] = [];
    for (const definition of config.datasets) {
      const registry = await loadSchemaFile(path.join(config.paths.rawDir, definition.schemaFile), definition.name);
      entries.push(...dictionaryFromRegistry(registry, definition.typeOverrides));
    }

    // Status and type written by `parse` reflect the data; definitions alone cannot revise them
    const result = await updateDictionaryFile(config.paths.dictionaryPath, entries, {
      keepObservedFields: true,
    });
    console.log(JSON.stringify({ status: "success", phase: "dictionary", dictionary: result }, null, 2));
    process.exit(0);
  } catch (error) {
    exitWithError(error, "dictionary");
  }
}

export function createDictionaryCommand(): Command {
  return new Command("dictionary")
    .description("Rebuild the data dictionary from field-definition documents")
    .option("--dataset <names>", "Datasets to include (comma-separated): institutions, failures")
    .option("--data-dir <path>", "Base data directory (default: data)")
    .option("--raw-dir <path>", "Directory holding field definitions (default: <data-dir>/raw)")
    .option("--dictionary-path <path>", "Data dictionary CSV (default: <data-dir>/data_dictionary.csv)")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeDictionary);
}
