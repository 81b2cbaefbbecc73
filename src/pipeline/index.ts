export * from "./state-machine.js";
export * from "./summary.js";
export * from "./metadata.js";
export * from "./driver.js";
