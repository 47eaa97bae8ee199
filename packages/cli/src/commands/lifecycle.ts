import chalk from "chalk";
import { ConfigurationError, buildInstanceSpecs, reportExitCode } from "@gpufleet/core";
import type { DesiredPhase } from "@gpufleet/adapters-common";
import type { CliContext } from "../context";
import { loadFleetConfig, selectInstanceNames } from "../config";
import { createLogCallback, formatResult, formatSummary } from "../output";
import { createOrchestrator, startSpinner } from "./shared";
import type { GlobalOptions } from "./shared";

export type LifecycleCommand = "create" | "start" | "stop" | "delete";

export interface LifecycleOptions extends GlobalOptions {
  /** create: override PREEMPTIBLE */
  preemptible?: boolean;
  /** delete: skip the confirmation prompt */
  yes?: boolean;
}

const COMMANDS: Record<LifecycleCommand, { desired: DesiredPhase; createIfAbsent: boolean; progress: string }> = {
  create: { desired: "running", createIfAbsent: true, progress: "Creating" },
  start: { desired: "running", createIfAbsent: false, progress: "Starting" },
  stop: { desired: "stopped", createIfAbsent: false, progress: "Stopping" },
  delete: { desired: "absent", createIfAbsent: true, progress: "Deleting" },
};

/**
 * Converge the selected instances on the command's desired phase.
 *
 * @returns Exit code: 0 when every instance succeeded or was skipped, 1 on any
 *   failure or when interrupted before every instance was dispatched
 */
export async function lifecycle(
  command: LifecycleCommand,
  names: string[],
  options: LifecycleOptions,
  context: CliContext
): Promise<number> {
  const { desired, createIfAbsent, progress } = COMMANDS[command];
  const loaded = await loadFleetConfig({ envFile: options.envFile, env: context.env, cwd: context.cwd });
  const selected = selectInstanceNames(loaded.config, names);
  const specs = buildInstanceSpecs(loaded.config, loaded.metadata, { preemptible: options.preemptible })
    .filter((spec) => selected.includes(spec.name));

  if (command === "delete" && !options.yes) {
    if (!context.interactive) {
      throw new ConfigurationError("Refusing to delete without confirmation in a non-interactive session; pass --yes");
    }
    const confirmed = await context.confirm(
      chalk.yellow(`Delete ${selected.join(", ")} in ${loaded.config.zone}? Boot disks are deleted with them.`)
    );
    if (!confirmed) {
      context.stdout(chalk.yellow("Delete cancelled."));
      return 0;
    }
  }

  const log = createLogCallback(context, options.verbose);
  const orchestrator = createOrchestrator(context, loaded, options, log);

  const controller = new AbortController();
  const removeInterruptHandler = context.onInterrupt(() => {
    controller.abort();
    context.stderr(chalk.yellow("Interrupted: finishing instances in flight (Ctrl+C again to exit)"));
  });

  const spinner = startSpinner(context, options, `${progress} ${specs.length} instance(s)...`);
  const report = await orchestrator
    .apply(specs, desired, { signal: controller.signal, createIfAbsent })
    .finally(() => {
      spinner.stop();
      removeInterruptHandler();
    });

  for (const [name, result] of report.results) {
    context.stdout(formatResult(name, result));
  }
  context.stdout(formatSummary(report));
  if (report.cancelled) {
    context.stdout(chalk.yellow("Cancelled before every instance was dispatched"));
  }

  return reportExitCode(report);
}
