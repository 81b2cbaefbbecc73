/**
 * Structured outcome shared by every pipeline phase.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STATUS ESCALATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A Result starts as "success" and can only move toward a worse state:
 *
 *   success → partial → failed
 *
 * None of the helpers below can improve a degraded status. A run that hit a
 * recoverable error stays "partial" even if a later phase reports success,
 * and a "failed" run stays failed.
 *
 * The helpers are pure: each returns a new Result and leaves its input
 * untouched, so the same aggregation code serves the data-load, plot and
 * reporting phases as well as the top-level run.
 */

export type ResultStatus = "success" | "partial" | "failed";

export interface Result {
  readonly name: string;
  readonly status: ResultStatus;
  readonly message: string;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  /** Sub-results keyed by phase name */
  readonly phaseResults: Readonly<Record<string, unknown>>;
  readonly startedAt: string;
  readonly finishedAt: string | null;
  readonly durationMs: number | null;
  readonly qualityScore: number | null;
}

const STATUS_RANK: Record<ResultStatus, number> = {
  success: 0,
  partial: 1,
  failed: 2,
};

/**
 * The worse of two statuses.
 */
export function worseStatus(a: ResultStatus, b: ResultStatus): ResultStatus {
  return STATUS_RANK[a] >= STATUS_RANK[b] ? a : b;
}

export function createResult(name: string, now: Date = new Date()): Result {
  return {
    name,
    status: "success",
    message: "",
    errors: [],
    warnings: [],
    phaseResults: {},
    startedAt: now.toISOString(),
    finishedAt: null,
    durationMs: null,
    qualityScore: null,
  };
}

/**
 * Record a fatal error. Status becomes "failed".
 */
export function addError(result: Result, message: string): Result {
  return {
    ...result,
    status: "failed",
    message,
    errors: [...result.errors, message],
  };
}

/**
 * Record an error the run can continue past. Status degrades to "partial"
 * unless it is already worse.
 */
export function addRecoverableError(result: Result, message: string): Result {
  return {
    ...result,
    status: worseStatus(result.status, "partial"),
    errors: [...result.errors, message],
  };
}

export function addWarning(result: Result, message: string): Result {
  return {
    ...result,
    status: worseStatus(result.status, "partial"),
    warnings: [...result.warnings, message],
  };
}

/**
 * Set status and message. "failed" is not accepted here; use addError.
 * The stored status is the worse of the current and requested one.
 */
export function setResultStatus(
  result: Result,
  status: Exclude<ResultStatus, "failed">,
  message: string
): Result {
  return {
    ...result,
    status: worseStatus(result.status, status),
    message,
  };
}

export function setPhaseResult(result: Result, phase: string, value: unknown): Result {
  return {
    ...result,
    phaseResults: { ...result.phaseResults, [phase]: value },
  };
}

export function setQualityScore(result: Result, qualityScore: number): Result {
  return { ...result, qualityScore };
}

/**
 * Stamp finish time and duration. Calling it again keeps the first stamp.
 */
export function finalizeResult(result: Result, now: Date = new Date()): Result {
  if (result.finishedAt !== null) {
    return result;
  }
  const durationMs = Math.max(0, now.getTime() - Date.parse(result.startedAt));
  return {
    ...result,
    finishedAt: now.toISOString(),
    durationMs,
  };
}

export function isResultSuccess(result: Result): boolean {
  return result.status !== "failed";
}

/**
 * One-line summary, followed by the error list when there is one.
 */
export function formatResultSummary(result: Result): string {
  const duration = result.durationMs === null ? "..." : `${(result.durationMs / 1000).toFixed(2)} sec`;
  const issues = result.errors.length + result.warnings.length;
  let summary = `[${result.status}] ${result.name} (${duration}, ${issues} issue${issues === 1 ? "" : "s"})`;
  if (result.errors.length > 0) {
    summary += "\nErrors:\n" + result.errors.map((e) => `  - ${e}`).join("\n");
  }
  return summary;
}
