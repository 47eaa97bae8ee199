import { Command, CommanderError, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { ConfigurationError, GPUFLEET_VERSION } from "@gpufleet/core";
import { createDefaultContext } from "./context";
import type { CliContext } from "./context";
import { lifecycle } from "./commands/lifecycle";
import { status } from "./commands/status";
import { connect } from "./commands/connect";
import type { GlobalOptions } from "./commands/shared";

const NAMES_DESCRIPTION = "Instances to act on (default: every name in INSTANCE_NAMES)";

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function globalOptions(program: Command): GlobalOptions {
  const values = program.opts();
  return {
    envFile: typeof values.envFile === "string" ? values.envFile : undefined,
    concurrency: typeof values.concurrency === "number" ? values.concurrency : undefined,
    wait: values.wait !== false,
    timeout: typeof values.timeout === "number" ? values.timeout : undefined,
    verbose: values.verbose === true,
  };
}

function exitCodeFor(error: unknown, context: CliContext): number {
  if (error instanceof CommanderError) {
    // Commander has already printed help, the version or the usage error
    if (error.code === "commander.helpDisplayed" || error.code === "commander.version" || error.code === "commander.help") {
      return error.exitCode;
    }
    return 2;
  }
  if (error instanceof ConfigurationError) {
    context.stderr(chalk.red(`Configuration error: ${error.message}`));
    return 2;
  }
  context.stderr(`${chalk.red("Error:")} ${error instanceof Error ? error.message : String(error)}`);
  return 1;
}

/**
 * Run the gpufleet CLI.
 *
 * @param argv - Full argument vector, including the node and script entries
 * @returns Process exit code: 0 success, 1 instance failure, 2 configuration error
 */
export async function runCli(argv: string[], context: CliContext = createDefaultContext()): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name("gpufleet")
    .description("Idempotent lifecycle management for a fleet of GPU instances")
    .version(GPUFLEET_VERSION)
    .option("-e, --env-file <path>", "Environment file with the fleet configuration (default: .env)")
    .option("-c, --concurrency <n>", "Maximum instances handled in parallel (1-10)", parsePositiveInt)
    .option("--no-wait", "Return once operations are submitted instead of waiting for convergence")
    .option("-t, --timeout <seconds>", "Seconds to wait for each instance to converge", parsePositiveInt)
    .option("-v, --verbose", "Log provider calls, retries and polling")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.stdout(text.trimEnd()),
      writeErr: (text) => context.stderr(text.trimEnd()),
    });

  program
    .command("create")
    .description("Create missing instances and wait until every instance runs")
    .argument("[names...]", NAMES_DESCRIPTION)
    .option("--preemptible", "Create preemptible instances")
    .action(async (names: string[], options: { preemptible?: boolean }) => {
      exitCode = await lifecycle("create", names, { ...globalOptions(program), ...options }, context);
    });

  program
    .command("start")
    .description("Start stopped instances")
    .argument("[names...]", NAMES_DESCRIPTION)
    .action(async (names: string[]) => {
      exitCode = await lifecycle("start", names, globalOptions(program), context);
    });

  program
    .command("stop")
    .description("Stop running instances")
    .argument("[names...]", NAMES_DESCRIPTION)
    .action(async (names: string[]) => {
      exitCode = await lifecycle("stop", names, globalOptions(program), context);
    });

  program
    .command("delete")
    .description("Delete instances and their boot disks")
    .argument("[names...]", NAMES_DESCRIPTION)
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(async (names: string[], options: { yes?: boolean }) => {
      exitCode = await lifecycle("delete", names, { ...globalOptions(program), ...options }, context);
    });

  program
    .command("status")
    .description("Show the phase and addresses of each instance")
    .argument("[names...]", NAMES_DESCRIPTION)
    .action(async (names: string[]) => {
      exitCode = await status(names, globalOptions(program), context);
    });

  program
    .command("connect")
    .description("Open an SSH session to a running instance through gcloud")
    .argument("[name]", "Instance to connect to (default: the first in INSTANCE_NAMES)")
    .argument("[sshArgs...]", "Arguments passed to ssh after --")
    .allowUnknownOption()
    .action(async (name: string | undefined, sshArgs: string[]) => {
      exitCode = await connect(name, sshArgs, globalOptions(program), context);
    });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    return exitCodeFor(error, context);
  }
  return exitCode;
}
