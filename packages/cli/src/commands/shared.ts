import ora from "ora";
import type { Ora } from "ora";
import { FleetOrchestrator } from "@gpufleet/core";
import type { LogCallback } from "@gpufleet/adapters-common";
import type { CliContext } from "../context";
import type { LoadedFleet } from "../config";

/** Options accepted by every command */
export interface GlobalOptions {
  envFile?: string;
  concurrency?: number;
  /** false with --no-wait */
  wait: boolean;
  /** Convergence timeout in seconds */
  timeout?: number;
  verbose: boolean;
}

export function createOrchestrator(
  context: CliContext,
  loaded: LoadedFleet,
  options: GlobalOptions,
  log: LogCallback
): FleetOrchestrator {
  const provider = context.createProvider(loaded.config, log);
  return new FleetOrchestrator(provider, {
    concurrency: options.concurrency ?? loaded.config.concurrency,
    waitForConvergence: options.wait
      ? { timeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000 }
      : false,
    log,
  });
}

/**
 * Spinner for a pass. Silent when verbose logs are printed or no TTY is attached.
 */
export function startSpinner(context: CliContext, options: GlobalOptions, text: string): Ora {
  return ora({ text, isSilent: options.verbose || !context.interactive }).start();
}
