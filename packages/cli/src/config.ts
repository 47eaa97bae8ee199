import path from "path";
import fs from "fs-extra";
import dotenv from "dotenv";
import { ConfigurationError, fleetConfigFromEnv } from "@gpufleet/core";
import type { FleetConfig } from "@gpufleet/core";
import type { InstanceMetadata } from "@gpufleet/adapters-common";

export const DEFAULT_ENV_FILE = ".env";

export interface LoadFleetOptions {
  /** Environment file; `.env` in cwd when omitted, which may then be absent */
  envFile?: string;
  env: Record<string, string | undefined>;
  cwd: string;
}

export interface LoadedFleet {
  config: Readonly<FleetConfig>;
  /** Contents of the SSH key and startup-script files */
  metadata: InstanceMetadata;
  /** Absolute path of the environment file read, if any */
  envFile?: string;
}

function definedVariables(env: Record<string, string | undefined>): Record<string, string> {
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") defined[key] = value;
  }
  return defined;
}

async function resolveFile(
  baseDir: string,
  file: string | undefined,
  variable: string,
  issues: string[]
): Promise<string | undefined> {
  if (!file) return undefined;
  const resolved = path.resolve(baseDir, file);
  if (!(await fs.pathExists(resolved))) {
    issues.push(`${variable}: file not found: ${resolved}`);
    return undefined;
  }
  return resolved;
}

/**
 * Load the fleet configuration from an environment file and the process
 * environment. Process variables override file values; relative file paths
 * resolve against the environment file's directory.
 *
 * @throws ConfigurationError for a missing env file, invalid variables, or
 * referenced files that do not exist
 */
export async function loadFleetConfig(options: LoadFleetOptions): Promise<LoadedFleet> {
  const envFile = path.resolve(options.cwd, options.envFile ?? DEFAULT_ENV_FILE);
  let fileVariables: Record<string, string> = {};
  let loadedFrom: string | undefined;

  if (await fs.pathExists(envFile)) {
    fileVariables = dotenv.parse(await fs.readFile(envFile, "utf8"));
    loadedFrom = envFile;
  } else if (options.envFile !== undefined) {
    throw new ConfigurationError(`Environment file not found: ${envFile}`);
  }

  const config = fleetConfigFromEnv({ ...fileVariables, ...definedVariables(options.env) });
  const baseDir = loadedFrom ? path.dirname(loadedFrom) : options.cwd;

  const issues: string[] = [];
  const sshKeysPath = await resolveFile(baseDir, config.sshKeysPath, "SSH_KEY_PATH", issues);
  const startupScriptPath = await resolveFile(baseDir, config.startupScriptPath, "STARTUP_SCRIPT", issues);
  const keyFilename = await resolveFile(baseDir, config.keyFilename, "GOOGLE_APPLICATION_CREDENTIALS", issues);
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid environment configuration", issues);
  }

  const metadata: InstanceMetadata = {
    sshKeys: sshKeysPath ? await fs.readFile(sshKeysPath, "utf8") : undefined,
    startupScript: startupScriptPath ? await fs.readFile(startupScriptPath, "utf8") : undefined,
  };

  return {
    config: Object.freeze({ ...config, sshKeysPath, startupScriptPath, keyFilename }),
    metadata,
    envFile: loadedFrom,
  };
}

/**
 * Restrict a pass to the named instances. No names selects the whole fleet.
 *
 * @throws ConfigurationError for names that are not configured
 */
export function selectInstanceNames(config: Readonly<FleetConfig>, names: readonly string[]): string[] {
  if (names.length === 0) return [...config.instanceNames];

  const unknown = names.filter((name) => !config.instanceNames.includes(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      "Unknown instance names",
      unknown.map((name) => `${name} is not listed in INSTANCE_NAMES`)
    );
  }
  return [...new Set(names)];
}
