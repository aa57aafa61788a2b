/**
 * Emitter module - parquet output with embedded field metadata
 */
export * from "./types.js";
export * from "./atomic-write.js";
export * from "./metadata-codec.js";
export * from "./parquet-writer.js";
