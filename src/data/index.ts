export * from "./quality.js";
export * from "./loader.js";
