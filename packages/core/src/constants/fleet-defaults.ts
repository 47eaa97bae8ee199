/**
 * Fleet default configuration values.
 *
 * Instance defaults match the GPU workstation profile the fleet was first
 * built for: one T4 on a high-memory N1 host in Tokyo.
 */

// Instance defaults
export const DEFAULT_ZONE = "asia-northeast1-c";
export const DEFAULT_MACHINE_TYPE = "n1-highmem-16";
export const DEFAULT_ACCELERATOR_TYPE = "nvidia-tesla-t4";
export const DEFAULT_ACCELERATOR_COUNT = 1;
export const DEFAULT_BOOT_DISK_SIZE_GB = 200;
export const DEFAULT_IMAGE_FAMILY = "ubuntu-1804-lts";
export const DEFAULT_IMAGE_PROJECT = "ubuntu-os-cloud";

// Orchestration defaults
/** Upper bound on parallel instance tasks */
export const MAX_CONCURRENCY = 10;

// Retry defaults
export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_BASE_DELAY_MS = 1_000;
export const DEFAULT_BACKOFF_MULTIPLIER = 2;
export const DEFAULT_MAX_DELAY_MS = 30_000;
export const DEFAULT_JITTER = 0.2;

// Convergence polling defaults
/** Maximum time to wait for an instance to reach its target phase (10 minutes) */
export const CONVERGENCE_TIMEOUT_MS = 600_000;

/** Polling interval for checking instance phase */
export const CONVERGENCE_POLL_INTERVAL_MS = 5_000;

export const MANAGED_BY_LABEL = "gpufleet";
