import { createGceProviderClient } from "./compute/gce-provider-client";
import type { GceProviderClient } from "./compute/gce-provider-client";
import type { LogCallback } from "@gpufleet/adapters-common";

// Re-export classes
export { GceProviderClient, buildInstanceResource, toInstancePhase } from "./compute/gce-provider-client";

// Re-export types
export type { ComputeInstancesApi, GceProviderClientConfig } from "./compute/gce-provider-client";

/**
 * Configuration for GCP adapters.
 */
export interface GcpConfig {
  /** GCP project ID */
  projectId: string;

  /** GCP zone for Compute Engine resources (e.g., "asia-northeast1-c") */
  zone: string;

  /**
   * Path to service account key file (JSON).
   * If not provided, Application Default Credentials will be used.
   */
  keyFilename?: string;
}

/**
 * Create a Compute Engine provider client with the given configuration.
 */
export function createComputeProvider(config: GcpConfig, log?: LogCallback): GceProviderClient {
  return createGceProviderClient(config, log);
}
