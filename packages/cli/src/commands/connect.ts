import chalk from "chalk";
import type { CliContext } from "../context";
import { loadFleetConfig, selectInstanceNames } from "../config";
import { createLogCallback, formatStatus } from "../output";
import { createOrchestrator } from "./shared";
import type { GlobalOptions } from "./shared";

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Open an SSH session to a running instance through gcloud.
 * Defaults to the first configured instance.
 */
export async function connect(
  name: string | undefined,
  sshArgs: string[],
  options: GlobalOptions,
  context: CliContext
): Promise<number> {
  const loaded = await loadFleetConfig({ envFile: options.envFile, env: context.env, cwd: context.cwd });
  const [target] = selectInstanceNames(loaded.config, name === undefined ? [loaded.config.instanceNames[0]] : [name]);
  const log = createLogCallback(context, options.verbose);
  const orchestrator = createOrchestrator(context, loaded, { ...options, wait: false }, log);

  const instance = (await orchestrator.describeFleet([target])).get(target);
  if (instance?.kind !== "observed") {
    if (instance) context.stderr(formatStatus(target, instance));
    return 1;
  }
  if (instance.state.phase !== "RUNNING") {
    context.stderr(chalk.red(`${target} is ${instance.state.phase}; run 'gpufleet start ${target}' first`));
    return 1;
  }

  const args = [
    "compute", "ssh", target,
    "--zone", loaded.config.zone,
    "--project", loaded.config.projectId,
    ...(sshArgs.length > 0 ? ["--", ...sshArgs] : []),
  ];
  log(`$ gcloud ${args.join(" ")}`, "stdout");

  try {
    return await context.run("gcloud", args);
  } catch (error) {
    if (isMissingExecutable(error)) {
      context.stderr(chalk.red("gcloud was not found on PATH; install the Google Cloud CLI to connect"));
      return 1;
    }
    throw error;
  }
}
