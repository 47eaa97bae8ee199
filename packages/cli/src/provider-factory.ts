import { createComputeProvider } from "@gpufleet/adapters-gcp";
import type { LogCallback, ProviderClient } from "@gpufleet/adapters-common";
import { SimulatedProviderClient } from "@gpufleet/core";
import type { FleetConfig } from "@gpufleet/core";

/**
 * Create the provider client selected by GPUFLEET_PROVIDER.
 */
export function createProvider(config: FleetConfig, log: LogCallback): ProviderClient {
  switch (config.provider) {
    case "gce":
      return createComputeProvider(
        {
          projectId: config.projectId,
          zone: config.zone,
          keyFilename: config.keyFilename,
        },
        log
      );
    case "simulated":
      log("Using the simulated provider: no cloud resources will be touched", "stderr");
      return new SimulatedProviderClient({ log });
  }
}
