import type { DesiredPhase, InstancePhase, InstanceSpec, ObservedState } from "@gpufleet/adapters-common";

// =============================================================================
// Actions
// =============================================================================

export interface NoopAction {
  kind: "noop";
  name: string;
  reason: string;
}

export interface CreateAction {
  kind: "create";
  name: string;
  spec: InstanceSpec;
}

export interface StartAction {
  kind: "start";
  name: string;
}

export interface StopAction {
  kind: "stop";
  name: string;
}

export interface DeleteAction {
  kind: "delete";
  name: string;
}

/**
 * Delete followed by create, for instances stuck in ERROR.
 */
export interface RecreateAction {
  kind: "recreate";
  name: string;
  steps: readonly [DeleteAction, CreateAction];
}

/** A single provider call */
export type StepAction = CreateAction | StartAction | StopAction | DeleteAction;

export type Action = NoopAction | StepAction | RecreateAction;

export type ActionKind = Action["kind"];

const IN_FLIGHT: ReadonlySet<InstancePhase> = new Set(["PROVISIONING", "STOPPING", "DELETING"]);

function noop(name: string, reason: string): NoopAction {
  return { kind: "noop", name, reason };
}

function create(spec: InstanceSpec): CreateAction {
  return { kind: "create", name: spec.name, spec };
}

// =============================================================================
// Reconcile
// =============================================================================

/**
 * Decide the single action that moves an instance toward the desired phase.
 *
 * Pure: the same inputs always produce the same action. A missing observation
 * is treated as ABSENT. Instances in a transitional phase are never mutated;
 * the next pass re-evaluates them.
 */
export function reconcile(
  spec: InstanceSpec,
  observed: ObservedState | null,
  desired: DesiredPhase
): Action {
  const name = spec.name;
  const phase: InstancePhase = observed?.phase ?? "ABSENT";

  if (IN_FLIGHT.has(phase)) {
    return noop(name, `operation in progress (${phase})`);
  }

  if (phase === "ERROR") {
    if (desired === "absent") {
      return { kind: "delete", name };
    }
    return {
      kind: "recreate",
      name,
      steps: [{ kind: "delete", name }, create(spec)],
    };
  }

  switch (desired) {
    case "running":
      if (phase === "ABSENT") return create(spec);
      if (phase === "STOPPED") return { kind: "start", name };
      return noop(name, "already running");

    case "stopped":
      if (phase === "RUNNING") return { kind: "stop", name };
      return noop(name, phase === "ABSENT" ? "does not exist" : "already stopped");

    case "absent":
      if (phase === "ABSENT") return noop(name, "already absent");
      return { kind: "delete", name };
  }
}

/**
 * Phase an instance reaches once the action has completed.
 * A noop expects no change.
 */
export function expectedPhase(action: Action): InstancePhase | null {
  switch (action.kind) {
    case "create":
    case "start":
    case "recreate":
      return "RUNNING";
    case "stop":
      return "STOPPED";
    case "delete":
      return "ABSENT";
    case "noop":
      return null;
  }
}

/**
 * Provider calls an action expands to, in execution order.
 */
export function actionSteps(action: Action): readonly StepAction[] {
  switch (action.kind) {
    case "noop":
      return [];
    case "recreate":
      return action.steps;
    default:
      return [action];
  }
}
