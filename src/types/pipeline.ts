/**
 * Pipeline state definitions.
 * A run moves through these states in order, or ends in Failed.
 */

export enum PipelineState {
  Initialized = "initialized",
  DataLoaded = "data_loaded",
  PlotsGenerated = "plots_generated",
  ReportsRendered = "reports_rendered",
  Finalized = "finalized",
  Failed = "failed",
}

export enum PipelinePhase {
  DataLoad = "data_load",
  PlotGeneration = "plot_generation",
  Registration = "registration",
  Reporting = "reporting",
}

export type ReportPhaseStatus = "success" | "partial" | "failed" | "unavailable" | "skipped";
