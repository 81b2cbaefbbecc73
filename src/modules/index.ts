export * from "./discovery.js";
export * from "./catalog.js";
export * from "./loader.js";
export * from "./batch.js";
export * from "./dependencies.js";
