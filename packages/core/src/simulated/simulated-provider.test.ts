import { describe, it, expect, vi } from "vitest";
import { ProviderErrorKind } from "@gpufleet/adapters-common";
import { SimulatedProviderClient } from "./simulated-provider";
import { makeSpec } from "../__tests__/fixtures";

describe("SimulatedProviderClient", () => {
  it("returns null for unknown instances", async () => {
    const provider = new SimulatedProviderClient();
    await expect(provider.describe("gpu-a")).resolves.toBeNull();
  });

  it("settles a create after the configured number of describes", async () => {
    const provider = new SimulatedProviderClient({ settleAfter: 2 });
    await provider.create(makeSpec({ name: "gpu-a", networkAddress: "203.0.113.10" }));

    const phases = [];
    for (let i = 0; i < 3; i++) {
      phases.push((await provider.describe("gpu-a"))?.phase);
    }

    expect(phases).toEqual(["PROVISIONING", "PROVISIONING", "RUNNING"]);
    await expect(provider.describe("gpu-a")).resolves.toMatchObject({
      machineType: "n1-highmem-16",
      externalIp: "203.0.113.10",
    });
  });

  it("walks stop and delete through their transitional phases", async () => {
    const provider = new SimulatedProviderClient({ settleAfter: 0 }).seed("gpu-a", "RUNNING");

    await provider.stop("gpu-a");
    expect(provider.phaseOf("gpu-a")).toBe("STOPPING");
    expect((await provider.describe("gpu-a"))?.phase).toBe("STOPPED");

    await provider.delete("gpu-a");
    expect(provider.phaseOf("gpu-a")).toBe("DELETING");
    await expect(provider.describe("gpu-a")).resolves.toBeNull();
  });

  it("rejects mutations of an instance in transition", async () => {
    const provider = new SimulatedProviderClient().seed("gpu-a", "STOPPED");
    await provider.start("gpu-a");

    await expect(provider.stop("gpu-a")).rejects.toMatchObject({ kind: ProviderErrorKind.CONFLICT });
  });

  it("rejects creating an existing instance", async () => {
    const provider = new SimulatedProviderClient().seed("gpu-a", "RUNNING");
    await expect(provider.create(makeSpec({ name: "gpu-a" }))).rejects.toMatchObject({
      kind: ProviderErrorKind.CONFLICT,
    });
  });

  it("rejects starting a missing instance and accepts deleting one", async () => {
    const provider = new SimulatedProviderClient();

    await expect(provider.start("gpu-a")).rejects.toMatchObject({ kind: ProviderErrorKind.INVALID_ARGUMENT });
    await expect(provider.delete("gpu-a")).resolves.toEqual({
      operation: "operation-sim-1",
      submittedAt: expect.any(Date),
    });
  });

  it("fails scripted calls the requested number of times", async () => {
    const provider = new SimulatedProviderClient();
    provider.failNext("describe", "gpu-a", ProviderErrorKind.UNAVAILABLE, 2);

    await expect(provider.describe("gpu-a")).rejects.toMatchObject({ kind: ProviderErrorKind.UNAVAILABLE });
    await expect(provider.describe("gpu-a")).rejects.toMatchObject({ kind: ProviderErrorKind.UNAVAILABLE });
    await expect(provider.describe("gpu-a")).resolves.toBeNull();
    expect(provider.callsFor("describe", "gpu-a")).toHaveLength(3);
  });

  it("logs mutating calls", async () => {
    const log = vi.fn();
    const provider = new SimulatedProviderClient({ log });

    await provider.create(makeSpec({ name: "gpu-a" }));
    await provider.describe("gpu-a");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[sim] create gpu-a", "stdout");
  });
});
