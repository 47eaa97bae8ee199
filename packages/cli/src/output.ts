import chalk from "chalk";
import type { LogCallback } from "@gpufleet/adapters-common";
import { summarizeReport } from "@gpufleet/core";
import type { FleetReport, InstanceStatus, OperationResult } from "@gpufleet/core";
import type { CliContext } from "./context";

const phaseColor = (phase: string) =>
  phase === "RUNNING" ? chalk.green :
  phase === "ERROR" ? chalk.red :
  phase === "STOPPED" || phase === "ABSENT" ? chalk.gray :
  chalk.yellow;

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatResult(name: string, result: OperationResult): string {
  switch (result.outcome) {
    case "succeeded": {
      const action = result.action.kind === "noop" ? result.action.reason : result.action.kind;
      const phase = result.phase ? ` -> ${phaseColor(result.phase)(result.phase)}` : " (submitted)";
      const attempts = result.attempts > 1 ? chalk.gray(` after ${plural(result.attempts, "attempt")}`) : "";
      return `  ${chalk.green("✓")} ${chalk.cyan(name)} ${action}${phase}${attempts}`;
    }
    case "failed":
      return `  ${chalk.red("✗")} ${chalk.cyan(name)} ${chalk.red(result.errorKind)}: ${result.reason}`;
    case "skipped":
      return `  ${chalk.gray("-")} ${chalk.cyan(name)} ${chalk.gray(`skipped: ${result.reason}`)}`;
  }
}

export function formatSummary(report: FleetReport): string {
  const summary = summarizeReport(report);
  const seconds = ((report.finishedAt.getTime() - report.startedAt.getTime()) / 1000).toFixed(1);
  const parts = [
    chalk.green(`${summary.succeeded} succeeded`),
    summary.failed > 0 ? chalk.red(`${summary.failed} failed`) : `${summary.failed} failed`,
    `${summary.skipped} skipped`,
  ];
  return `${plural(summary.total, "instance")}: ${parts.join(", ")} in ${seconds}s`;
}

export function formatStatus(name: string, status: InstanceStatus): string {
  switch (status.kind) {
    case "observed": {
      const { state } = status;
      const details = [
        state.machineType,
        state.externalIp ? `external ${state.externalIp}` : undefined,
        state.internalIp ? `internal ${state.internalIp}` : undefined,
      ].filter((detail): detail is string => detail !== undefined);
      const suffix = details.length > 0 ? chalk.gray(`  ${details.join("  ")}`) : "";
      return `  ${chalk.cyan(name)} ${phaseColor(state.phase)(state.phase)}${suffix}`;
    }
    case "failed":
      return `  ${chalk.cyan(name)} ${chalk.red(status.error.kind)}: ${status.error.message}`;
    case "skipped":
      return `  ${chalk.cyan(name)} ${chalk.gray(`skipped: ${status.reason}`)}`;
  }
}

/**
 * Log sink for --verbose: provider and orchestrator messages, gray on
 * stdout and yellow on stderr. Silent otherwise.
 */
export function createLogCallback(context: Pick<CliContext, "stdout" | "stderr">, verbose: boolean): LogCallback {
  if (!verbose) return () => {};
  return (message, stream = "stdout") => {
    if (stream === "stderr") {
      context.stderr(chalk.yellow(message));
    } else {
      context.stdout(chalk.gray(message));
    }
  };
}
