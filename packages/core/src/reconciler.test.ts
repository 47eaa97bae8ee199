import { describe, it, expect } from "vitest";
import type { DesiredPhase, InstancePhase, ObservedState } from "@gpufleet/adapters-common";
import { actionSteps, expectedPhase, reconcile } from "./reconciler";
import type { ActionKind } from "./reconciler";
import { makeSpec } from "./__tests__/fixtures";

function observed(phase: InstancePhase): ObservedState | null {
  if (phase === "ABSENT") return null;
  return { name: "gpu-a", phase, observedAt: new Date("2024-01-01T00:00:00Z") };
}

describe("reconcile", () => {
  const spec = makeSpec({ name: "gpu-a" });

  it.each<[DesiredPhase, InstancePhase, ActionKind]>([
    ["running", "ABSENT", "create"],
    ["running", "STOPPED", "start"],
    ["running", "RUNNING", "noop"],
    ["stopped", "RUNNING", "stop"],
    ["stopped", "STOPPED", "noop"],
    ["stopped", "ABSENT", "noop"],
    ["absent", "RUNNING", "delete"],
    ["absent", "STOPPED", "delete"],
    ["absent", "ABSENT", "noop"],
    ["running", "ERROR", "recreate"],
    ["stopped", "ERROR", "recreate"],
    ["absent", "ERROR", "delete"],
  ])("desired %s, observed %s -> %s", (desired, phase, kind) => {
    expect(reconcile(spec, observed(phase), desired).kind).toBe(kind);
  });

  it.each<[DesiredPhase, InstancePhase]>([
    ["running", "PROVISIONING"],
    ["running", "STOPPING"],
    ["running", "DELETING"],
    ["stopped", "PROVISIONING"],
    ["stopped", "STOPPING"],
    ["absent", "PROVISIONING"],
    ["absent", "STOPPING"],
    ["absent", "DELETING"],
  ])("never mutates an instance in flight (desired %s, observed %s)", (desired, phase) => {
    expect(reconcile(spec, observed(phase), desired)).toEqual({
      kind: "noop",
      name: "gpu-a",
      reason: `operation in progress (${phase})`,
    });
  });

  it("carries the spec on create", () => {
    expect(reconcile(spec, null, "running")).toEqual({ kind: "create", name: "gpu-a", spec });
  });

  it("recreates as delete then create", () => {
    const action = reconcile(spec, observed("ERROR"), "running");

    expect(action).toEqual({
      kind: "recreate",
      name: "gpu-a",
      steps: [
        { kind: "delete", name: "gpu-a" },
        { kind: "create", name: "gpu-a", spec },
      ],
    });
  });

  it("returns equal actions for equal inputs", () => {
    const state = observed("STOPPED");
    expect(reconcile(spec, state, "running")).toEqual(reconcile(spec, state, "running"));
  });

  it("is idempotent once the expected phase is reached", () => {
    const first = reconcile(spec, null, "running");
    const target = expectedPhase(first);

    expect(target).toBe("RUNNING");
    expect(reconcile(spec, observed("RUNNING"), "running").kind).toBe("noop");
  });
});

describe("expectedPhase", () => {
  it("maps each action to the phase it converges to", () => {
    expect(expectedPhase({ kind: "start", name: "gpu-a" })).toBe("RUNNING");
    expect(expectedPhase({ kind: "stop", name: "gpu-a" })).toBe("STOPPED");
    expect(expectedPhase({ kind: "delete", name: "gpu-a" })).toBe("ABSENT");
    expect(expectedPhase({ kind: "noop", name: "gpu-a", reason: "already running" })).toBeNull();
  });
});

describe("actionSteps", () => {
  it("expands actions into provider calls", () => {
    const spec = makeSpec({ name: "gpu-a" });

    expect(actionSteps({ kind: "noop", name: "gpu-a", reason: "already absent" })).toEqual([]);
    expect(actionSteps({ kind: "stop", name: "gpu-a" })).toEqual([{ kind: "stop", name: "gpu-a" }]);
    expect(actionSteps(reconcile(spec, observed("ERROR"), "running")).map((step) => step.kind)).toEqual([
      "delete",
      "create",
    ]);
  });
});
