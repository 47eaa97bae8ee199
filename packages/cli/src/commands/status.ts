import chalk from "chalk";
import type { CliContext } from "../context";
import { loadFleetConfig, selectInstanceNames } from "../config";
import { createLogCallback, formatStatus } from "../output";
import { createOrchestrator, startSpinner } from "./shared";
import type { GlobalOptions } from "./shared";

/**
 * Print the observed phase of each instance. Read-only.
 *
 * @returns 1 when any instance could not be described
 */
export async function status(names: string[], options: GlobalOptions, context: CliContext): Promise<number> {
  const loaded = await loadFleetConfig({ envFile: options.envFile, env: context.env, cwd: context.cwd });
  const selected = selectInstanceNames(loaded.config, names);
  const log = createLogCallback(context, options.verbose);
  const orchestrator = createOrchestrator(context, loaded, options, log);

  context.stdout(chalk.blue.bold(`Fleet ${loaded.config.projectId} / ${loaded.config.zone}`));

  const spinner = startSpinner(context, options, "Describing instances...");
  const fleet = await orchestrator.describeFleet(selected).finally(() => spinner.stop());

  let failed = false;
  for (const [name, instance] of fleet) {
    context.stdout(formatStatus(name, instance));
    if (instance.kind === "failed") failed = true;
  }
  return failed ? 1 : 0;
}
