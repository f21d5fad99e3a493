/**
 * Rent roll engine: structure detection, charge extraction, write-back.
 */

export * from "./amount";
export * from "./cell-value";
export * from "./errors";
export * from "./extractor";
export * from "./formatting";
export * from "./pipeline";
export * from "./result-writer";
export * from "./sheet";
export * from "./structure-detector";
export * from "./types";
