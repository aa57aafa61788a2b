/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { BankFindConfigFile } from "./types.js";
import { validateParseConfigSection } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): BankFindConfigFile {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let raw: unknown;
  try {
    raw = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  if (raw === null || raw === undefined) {
    return {};
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }

  const config: BankFindConfigFile = {
    parse: validateParseConfigSection("parse" in raw ? raw.parse : undefined),
  };

  logger.info("Configuration file parsed successfully", {
    hasParseConfig: "parse" in raw,
  });

  return config;
}
