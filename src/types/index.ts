// Core re-exports for the pipeline type system
// This file provides a single import point for the shared data model

export * from "./data-model.js";
export * from "./config.js";
