import { spawn } from "child_process";
import inquirer from "inquirer";
import type { LogCallback, ProviderClient } from "@gpufleet/adapters-common";
import type { FleetConfig } from "@gpufleet/core";
import { createProvider } from "./provider-factory";

/**
 * Everything a command touches outside its own arguments.
 * Commands never read process state directly.
 */
export interface CliContext {
  env: Record<string, string | undefined>;
  cwd: string;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  /** Whether prompts and spinners can be shown */
  interactive: boolean;
  confirm: (message: string) => Promise<boolean>;
  createProvider: (config: FleetConfig, log: LogCallback) => ProviderClient;
  /** Run a command with inherited stdio; resolves with its exit code */
  run: (command: string, args: string[]) => Promise<number>;
  /** Register an interrupt handler; returns a function that removes it */
  onInterrupt: (handler: () => void) => () => void;
}

async function confirm(message: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([{
    type: "confirm",
    name: "confirmed",
    message,
    default: false,
  }]);
  return confirmed;
}

function run(command: string, args: string[]): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "inherit" });
    child.on("error", reject);
    child.on("exit", (code, signal) => resolve(code ?? (signal ? 128 : 1)));
  });
}

function onInterrupt(handler: () => void): () => void {
  // A second Ctrl+C falls through to Node's default and exits
  process.once("SIGINT", handler);
  return () => {
    process.removeListener("SIGINT", handler);
  };
}

export function createDefaultContext(): CliContext {
  return {
    env: process.env,
    cwd: process.cwd(),
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
    confirm,
    createProvider,
    run,
    onInterrupt,
  };
}
