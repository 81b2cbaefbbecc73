export * from "./schema.js";
export * from "./hash.js";
export * from "./registry.js";
export * from "./cleanup.js";
export * from "./validate.js";
