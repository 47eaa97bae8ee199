/**
 * Test fixtures and fakes for @gpufleet/core.
 */

import type { InstanceSpec } from "@gpufleet/adapters-common";

// =============================================================================
// Instance Fixtures
// =============================================================================

export function makeSpec(overrides: Partial<InstanceSpec> = {}): InstanceSpec {
  return {
    name: "gpu-a",
    machineType: "n1-highmem-16",
    zone: "asia-northeast1-c",
    accelerator: { type: "nvidia-tesla-t4", count: 1 },
    bootDiskSizeGb: 200,
    image: { family: "ubuntu-1804-lts", project: "ubuntu-os-cloud" },
    metadata: {},
    preemptible: false,
    labels: { "managed-by": "gpufleet" },
    ...overrides,
  };
}

export function makeSpecs(...names: string[]): InstanceSpec[] {
  return names.map((name) => makeSpec({ name }));
}

// =============================================================================
// Time Fakes
// =============================================================================

/**
 * A manual clock whose sleep advances time instantly and records each delay.
 */
export function createFakeClock(start = 0) {
  let current = start;
  const delays: number[] = [];

  return {
    delays,
    now: (): number => current,
    sleep: async (ms: number): Promise<void> => {
      delays.push(ms);
      current += ms;
    },
  };
}
