/**
 * Provider Client Interface
 *
 * Capability set over a cloud provider's instance operations.
 * Implemented by the GCE provider client and the simulated provider.
 */

import type { Accepted, InstanceSpec, ObservedState } from "../types/instance";

/**
 * Instance operations against a single provider zone.
 *
 * Mutating calls return once the provider has accepted the request; completion
 * must be observed through `describe`. Failures are thrown as `ProviderError`.
 */
export interface ProviderClient {
  /**
   * Read the current state of an instance.
   *
   * @returns The observed state, or null when the instance does not exist
   */
  describe(name: string): Promise<ObservedState | null>;

  /**
   * Submit creation of an instance.
   */
  create(spec: InstanceSpec): Promise<Accepted>;

  /**
   * Submit a start of a stopped instance.
   */
  start(name: string): Promise<Accepted>;

  /**
   * Submit a stop of a running instance.
   */
  stop(name: string): Promise<Accepted>;

  /**
   * Submit deletion of an instance.
   */
  delete(name: string): Promise<Accepted>;
}

/**
 * Log sink shared by providers and orchestration components.
 */
export type LogCallback = (message: string, stream?: "stdout" | "stderr") => void;
