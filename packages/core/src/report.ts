import type { DesiredPhase, InstancePhase, ProviderErrorKind } from "@gpufleet/adapters-common";
import type { Action } from "./reconciler";

/**
 * Why an instance failed: a provider error kind, a convergence timeout, or the
 * instance entering ERROR while converging.
 */
export type FailureKind = `${ProviderErrorKind}` | "Timeout" | "InstanceError";

export interface SucceededResult {
  outcome: "succeeded";
  action: Action;
  attempts: number;
  /** Last observed phase, when convergence was awaited */
  phase?: InstancePhase;
}

export interface FailedResult {
  outcome: "failed";
  /** Absent when the failure happened before an action was decided */
  action?: Action;
  reason: string;
  errorKind: FailureKind;
  attempts: number;
}

export interface SkippedResult {
  outcome: "skipped";
  reason: string;
}

export type OperationResult = SucceededResult | FailedResult | SkippedResult;

export type Outcome = OperationResult["outcome"];

export interface FleetReport {
  desiredPhase: DesiredPhase;
  /** Per-instance results in submission order */
  results: Map<string, OperationResult>;
  cancelled: boolean;
  startedAt: Date;
  finishedAt: Date;
}

export type ReportSummary = Record<Outcome, number> & { total: number };

/**
 * 0 when every instance succeeded or was skipped, 1 when any failed or the
 * pass was cancelled before every instance was dispatched.
 */
export function reportExitCode(report: FleetReport): number {
  if (report.cancelled) return 1;
  for (const result of report.results.values()) {
    if (result.outcome === "failed") return 1;
  }
  return 0;
}

export function summarizeReport(report: FleetReport): ReportSummary {
  const summary: ReportSummary = { succeeded: 0, failed: 0, skipped: 0, total: 0 };
  for (const result of report.results.values()) {
    summary[result.outcome]++;
    summary.total++;
  }
  return summary;
}

/**
 * Names of the instances that failed, with their error kind.
 */
export function failedInstances(report: FleetReport): Array<{ name: string; result: FailedResult }> {
  const failed: Array<{ name: string; result: FailedResult }> = [];
  for (const [name, result] of report.results) {
    if (result.outcome === "failed") failed.push({ name, result });
  }
  return failed;
}
