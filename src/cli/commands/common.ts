/**
 * Helpers shared by the CLI commands
 */

import type { ParseConfig } from "../../types/config.js";
import { loadParseConfig } from "../../utils/config-loader.js";
import type { ParseConfigSection } from "../../utils/config-loader.js";
import { BankFindError, ConfigError, ErrorCode, toBankFindError } from "../../utils/errors.js";
import { isLogLevel, logger } from "../../utils/logger.js";
import { parseConfigFile } from "../config/parser.js";
import type { ParseCommandOptions } from "../config/types.js";

/**
 * Merge the config file (when given) with CLI options and apply the log level
 */
export function resolveCommandConfig(options: ParseCommandOptions): ParseConfig {
  let configFile: ParseConfigSection | undefined;
  if (options.config) {
    configFile = parseConfigFile(options.config).parse;
  }

  const level = options.logLevel ?? configFile?.logLevel;
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigError(`Invalid log level "${level}". Expected error, warn, info or debug`);
    }
    logger.setLevel(level);
  }

  return loadParseConfig(options, configFile);
}

/**
 * Print an error response and exit: 2 for configuration errors, 1 otherwise
 */
export function exitWithError(error: unknown, phase: string): never {
  const failure: BankFindError = toBankFindError(error);
  logger.error(failure.message, failure.summarize());
  console.error(JSON.stringify(failure.toResponse(phase), null, 2));
  process.exit(failure.code === ErrorCode.CONFIG_ERROR ? 2 : 1);
}
