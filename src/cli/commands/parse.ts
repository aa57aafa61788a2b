/**
 * Parse command - raw JSON + field definitions → parquet files and data dictionary
 */

import { Command } from "commander";
import { runPipeline } from "../../lib/pipeline/index.js";
import { exitCodeFor, summarizeRun } from "../../lib/reporter/index.js";
import { logger } from "../../utils/logger.js";
import type { ParseCommandOptions } from "../config/types.js";
import { exitWithError, resolveCommandConfig } from "./common.js";

/**
 * Execute parse command
 */
async function executeParse(options: ParseCommandOptions): Promise<void> {
  const startTime = Date.now();

  try {
    const config = resolveCommandConfig(options);
    logger.info("Starting parse", {
      datasets: config.datasets.map((definition) => definition.name),
      force: config.force,
    });

    const report = await runPipeline(config);
    const summary = summarizeRun(report, Date.now() - startTime);

    console.log(JSON.stringify(summary, null, 2));
    process.exit(exitCodeFor(report));
  } catch (error) {
    exitWithError(error, "parse");
  }
}

/**
 * Create parse command
 */
export function createParseCommand(): Command {
  return new Command("parse")
    .description("Parse raw BankFind JSON into parquet files with embedded field metadata")
    .option("-f, --force", "Overwrite existing output files")
    .option("--dataset <names>", "Datasets to parse (comma-separated): institutions, failures")
    .option("--parallel", "Parse datasets concurrently")
    .option("--data-dir <path>", "Base data directory (default: data)")
    .option("--raw-dir <path>", "Directory holding raw JSON and field definitions (default: <data-dir>/raw)")
    .option("--processed-dir <path>", "Directory for parquet output (default: <data-dir>/processed)")
    .option("--dictionary-path <path>", "Data dictionary CSV (default: <data-dir>/data_dictionary.csv)")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeParse);
}
