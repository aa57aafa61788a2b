/**
 * CLI configuration types
 */

import type { ParseCliOptions, ParseConfigSection } from "../../utils/config-loader.js";

/**
 * Complete configuration file structure
 */
export interface BankFindConfigFile {
  parse?: ParseConfigSection;
}

/**
 * CLI command options (from commander)
 */
export interface ParseCommandOptions extends ParseCliOptions {
  config?: string;
  logLevel?: string;
}

export type DictionaryCommandOptions = Omit<ParseCommandOptions, "force" | "parallel" | "processedDir">;
