/**
 * Instance type definitions.
 *
 * Shared shapes for GPU instance lifecycle operations across providers.
 */

/**
 * Lifecycle phase of an instance as observed on the provider.
 * ABSENT is reported when the provider has no instance with the given name.
 */
export type InstancePhase =
  | "ABSENT"
  | "PROVISIONING"
  | "RUNNING"
  | "STOPPING"
  | "STOPPED"
  | "DELETING"
  | "ERROR";

/**
 * Phase the caller wants an instance to converge on.
 */
export type DesiredPhase = "running" | "stopped" | "absent";

/**
 * Accelerator attached to an instance.
 */
export interface AcceleratorConfig {
  /** Accelerator type (e.g., "nvidia-tesla-t4") */
  type: string;
  /** Number of accelerators, 0 for none */
  count: number;
}

/**
 * Boot image reference.
 */
export interface ImageReference {
  /** Image family (e.g., "ubuntu-1804-lts") */
  family: string;
  /** Project hosting the image family (e.g., "ubuntu-os-cloud") */
  project: string;
}

/**
 * Instance metadata. Values are file contents, not paths.
 */
export interface InstanceMetadata {
  sshKeys?: string;
  startupScript?: string;
}

/**
 * Desired configuration of a single instance. Immutable once submitted.
 */
export interface InstanceSpec {
  /** Instance name, unique within the fleet */
  readonly name: string;
  readonly machineType: string;
  readonly zone: string;
  readonly accelerator: Readonly<AcceleratorConfig>;
  readonly bootDiskSizeGb: number;
  readonly image: Readonly<ImageReference>;
  /** Static external address for the primary interface */
  readonly networkAddress?: string;
  readonly metadata: Readonly<InstanceMetadata>;
  readonly preemptible: boolean;
  readonly labels: Readonly<Record<string, string>>;
}

/**
 * Provider-side state of an instance at a point in time.
 */
export interface ObservedState {
  name: string;
  phase: InstancePhase;
  observedAt: Date;
  /** Raw provider status (e.g., "TERMINATED") */
  providerStatus?: string;
  machineType?: string;
  internalIp?: string;
  externalIp?: string;
}

/**
 * Acknowledgement that a mutating request was submitted.
 * The operation is not necessarily complete.
 */
export interface Accepted {
  /** Provider operation identifier, when one is returned */
  operation?: string;
  submittedAt: Date;
}
