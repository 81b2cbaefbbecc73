export * from "./orchestrator.js";
