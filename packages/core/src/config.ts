import { z } from "zod";
import type { InstanceMetadata, InstanceSpec } from "@gpufleet/adapters-common";
import { ConfigurationError } from "./errors";
import {
  DEFAULT_ACCELERATOR_COUNT,
  DEFAULT_ACCELERATOR_TYPE,
  DEFAULT_BOOT_DISK_SIZE_GB,
  DEFAULT_IMAGE_FAMILY,
  DEFAULT_IMAGE_PROJECT,
  DEFAULT_MACHINE_TYPE,
  DEFAULT_ZONE,
  MANAGED_BY_LABEL,
} from "./constants/fleet-defaults";

// Compute Engine resource names
export const InstanceNameSchema = z.string()
  .min(1)
  .max(63, "Must be 63 characters or less")
  .regex(/^[a-z]/, "Must start with a lowercase letter")
  .regex(/^[a-z0-9-]+$/, "Must be lowercase alphanumeric with hyphens")
  .regex(/[a-z0-9]$/, "Must end with alphanumeric");

export const ProviderType = z.enum(["gce", "simulated"]);
export type ProviderType = z.infer<typeof ProviderType>;

const booleanish = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off", ""].includes(normalized)) return false;
  return value;
}, z.boolean({ invalid_type_error: "Expected true/false" }));

export const FleetConfigSchema = z.object({
  projectId: z.string().min(1),
  zone: z.string()
    .regex(/^[a-z]+-[a-z]+\d+-[a-z]$/, "Must be a zone such as asia-northeast1-c")
    .default(DEFAULT_ZONE),
  instanceNames: z.array(InstanceNameSchema)
    .min(1, "At least one instance name is required")
    .refine(
      (names) => new Set(names).size === names.length,
      { message: "Duplicate instance names are not allowed" }
    ),
  machineType: z.string().min(1).default(DEFAULT_MACHINE_TYPE),
  accelerator: z.object({
    type: z.string().min(1).default(DEFAULT_ACCELERATOR_TYPE),
    count: z.coerce.number().int().min(0).max(8).default(DEFAULT_ACCELERATOR_COUNT),
  }).default({}),
  bootDiskSizeGb: z.coerce.number().int().min(10).max(65_536).default(DEFAULT_BOOT_DISK_SIZE_GB),
  image: z.object({
    family: z.string().min(1).default(DEFAULT_IMAGE_FAMILY),
    project: z.string().min(1).default(DEFAULT_IMAGE_PROJECT),
  }).default({}),
  /** Static external addresses, one per instance in name order */
  networkAddresses: z.array(z.string().min(1)).default([]),
  sshKeysPath: z.string().min(1).optional(),
  startupScriptPath: z.string().min(1).optional(),
  preemptible: booleanish.default(false),
  keyFilename: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
  provider: ProviderType.default("gce"),
  labels: z.record(z.string()).default({}),
}).superRefine((config, ctx) => {
  // A static address can only be attached to one instance
  const addresses = config.networkAddresses.length;
  if (addresses > 0 && addresses !== config.instanceNames.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["networkAddresses"],
      message: `Expected one address per instance (${config.instanceNames.length}), got ${addresses}`,
    });
  }
});

export type FleetConfig = z.infer<typeof FleetConfigSchema>;
export type FleetConfigInput = z.input<typeof FleetConfigSchema>;

// Config keys by the environment variable that sets them
const ENV_VARIABLES: Record<string, string> = {
  projectId: "GCP_PROJECT",
  zone: "ZONE",
  instanceNames: "INSTANCE_NAMES",
  machineType: "MACHINE_TYPE",
  "accelerator.type": "ACCELERATOR_TYPE",
  "accelerator.count": "ACCELERATOR_COUNT",
  bootDiskSizeGb: "BOOT_DISK_SIZE_GB",
  "image.family": "IMAGE_FAMILY",
  "image.project": "IMAGE_PROJECT",
  networkAddresses: "ADDRESS",
  sshKeysPath: "SSH_KEY_PATH",
  startupScriptPath: "STARTUP_SCRIPT",
  preemptible: "PREEMPTIBLE",
  keyFilename: "GOOGLE_APPLICATION_CREDENTIALS",
  concurrency: "MAX_CONCURRENCY",
  provider: "GPUFLEET_PROVIDER",
};

function envVariableFor(path: Array<string | number>): string {
  // Array indices (instanceNames.1) report against the list variable
  const keyPath = path.filter((segment) => typeof segment === "string").join(".");
  const variable = ENV_VARIABLES[keyPath];
  const index = path.find((segment) => typeof segment === "number");
  if (!variable) return keyPath;
  return index === undefined ? variable : `${variable}[${index}]`;
}

function readEnv(env: Record<string, string | undefined>, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Validate a programmatic fleet configuration.
 */
export function parseFleetConfig(input: FleetConfigInput): FleetConfig {
  const result = FleetConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromIssues("Invalid fleet configuration", result.error.issues);
  }
  return result.data;
}

/**
 * Build a fleet configuration from environment-file variables.
 * Instance names and addresses may be separated by spaces or commas; the
 * boot disk size accepts a trailing "GB".
 *
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function fleetConfigFromEnv(env: Record<string, string | undefined>): FleetConfig {
  const input = {
    projectId: readEnv(env, "GCP_PROJECT") ?? readEnv(env, "GOOGLE_CLOUD_PROJECT"),
    zone: readEnv(env, "ZONE"),
    instanceNames: readEnv(env, "INSTANCE_NAMES")?.split(/[\s,]+/).filter(Boolean),
    machineType: readEnv(env, "MACHINE_TYPE"),
    accelerator: {
      type: readEnv(env, "ACCELERATOR_TYPE"),
      count: readEnv(env, "ACCELERATOR_COUNT"),
    },
    bootDiskSizeGb: readEnv(env, "BOOT_DISK_SIZE_GB")?.replace(/\s*GB$/i, ""),
    image: {
      family: readEnv(env, "IMAGE_FAMILY"),
      project: readEnv(env, "IMAGE_PROJECT"),
    },
    networkAddresses: readEnv(env, "ADDRESS")?.split(/[\s,]+/).filter(Boolean),
    sshKeysPath: readEnv(env, "SSH_KEY_PATH"),
    startupScriptPath: readEnv(env, "STARTUP_SCRIPT"),
    preemptible: readEnv(env, "PREEMPTIBLE"),
    keyFilename: readEnv(env, "GOOGLE_APPLICATION_CREDENTIALS"),
    concurrency: readEnv(env, "MAX_CONCURRENCY"),
    provider: readEnv(env, "GPUFLEET_PROVIDER"),
  };

  const result = FleetConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromIssues("Invalid environment configuration", result.error.issues, envVariableFor);
  }
  return result.data;
}

/**
 * Build one frozen InstanceSpec per configured instance name.
 *
 * @param metadata - Metadata contents (already read from the configured files)
 * @param overrides - Per-invocation overrides, such as a --preemptible flag
 */
export function buildInstanceSpecs(
  config: FleetConfig,
  metadata: InstanceMetadata = {},
  overrides: { preemptible?: boolean } = {}
): readonly InstanceSpec[] {
  return Object.freeze(
    config.instanceNames.map((name, index) =>
      Object.freeze({
        name,
        machineType: config.machineType,
        zone: config.zone,
        accelerator: Object.freeze({ ...config.accelerator }),
        bootDiskSizeGb: config.bootDiskSizeGb,
        image: Object.freeze({ ...config.image }),
        networkAddress: config.networkAddresses.length > 0 ? config.networkAddresses[index] : undefined,
        metadata: Object.freeze({ ...metadata }),
        preemptible: overrides.preemptible ?? config.preemptible,
        labels: Object.freeze({ ...config.labels, "managed-by": MANAGED_BY_LABEL }),
      })
    )
  );
}
