/**
 * Shared type foundations for the study plot pipeline.
 */

export * from "./dataset.js";
export * from "./module.js";
export * from "./pipeline.js";
