/**
 * BankFind parse: FDIC institutions and failures data to parquet with embedded field metadata
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/schema/index.js";
export * from "./lib/normalizer/index.js";
export * from "./lib/embedder/index.js";
export * from "./lib/dictionary/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/pipeline/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
